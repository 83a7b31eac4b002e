import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import {
  getCachePath,
  getNameRegistryPath,
  resolveTranslationConfig,
  type TranslationConfig,
  type TranslationConfigInput
} from '@/config/translation';
import { getLogger, type Logger } from '@/lib/logger';
import { CacheStore } from '@/services/subtitle-translation/cache';
import { NameRegistry } from '@/services/subtitle-translation/name-registry';
import { createNameStrategy } from '@/services/subtitle-translation/name-strategies';
import { HybridOrchestrator } from '@/services/subtitle-translation/orchestrator';
import {
  createProviderChain,
  type FetchLike,
  type GeminiModelsClient,
  type Seq2SeqModel
} from '@/services/subtitle-translation/providers/index';
import {
  detectSubtitleFormat,
  parseSubtitles,
  renderSubtitles
} from '@/services/subtitle-translation/subtitle-format';
import type {
  BatchProgress,
  ProviderAttempt,
  SubtitleDocument,
  SubtitleFormat,
  TranslationRunResult,
  TranslationRunSummary
} from '@/services/subtitle-translation/types';

export interface TranslateOptions {
  config?: TranslationConfigInput;
  localModel?: Seq2SeqModel;
  fetchImpl?: FetchLike;
  geminiClient?: GeminiModelsClient;
  /** Shared stores; when omitted they are loaded from the data root. */
  cache?: CacheStore;
  nameRegistry?: NameRegistry;
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  onAttempt?: (attempt: ProviderAttempt) => void;
  onBatchComplete?: (progress: BatchProgress) => void;
}

async function openCache(config: TranslationConfig): Promise<CacheStore> {
  const cache = new CacheStore({ storagePath: getCachePath(config) });
  await cache.load();
  return cache;
}

async function openNameRegistry(config: TranslationConfig, logger: Logger): Promise<NameRegistry> {
  const registry = new NameRegistry({
    strategy: createNameStrategy(config.sourceLanguage, {
      minOccurrences: config.nameMinOccurrences
    }),
    storagePath: getNameRegistryPath(config),
    logger: logger.child({ scope: 'name-registry' })
  });
  await registry.load();
  return registry;
}

export async function translateSubtitleDocument(
  document: SubtitleDocument,
  options: TranslateOptions = {}
): Promise<TranslationRunResult> {
  const config = resolveTranslationConfig(options.config);
  const logger = options.logger ?? getLogger();
  const cache = options.cache ?? (await openCache(config));
  const nameRegistry = config.preserveNames
    ? (options.nameRegistry ?? (await openNameRegistry(config, logger)))
    : undefined;

  const providers = createProviderChain(config.providerChain, {
    cache,
    logger: logger.child({ scope: 'provider' }),
    localModel: options.localModel,
    fetchImpl: options.fetchImpl,
    geminiClient: options.geminiClient
  });

  const orchestrator = new HybridOrchestrator({
    providers,
    cache,
    settings: config,
    nameRegistry,
    sleep: options.sleep,
    logger: logger.child({ scope: 'orchestrator' }),
    onAttempt: options.onAttempt,
    onBatchComplete: options.onBatchComplete
  });

  const result = await orchestrator.translateDocument(document, { signal: options.signal });
  await nameRegistry?.save();
  return result;
}

export interface TranslateFileOptions extends TranslateOptions {
  inputPath: string;
  outputPath: string;
  format?: SubtitleFormat;
}

export async function translateSubtitleFile(
  options: TranslateFileOptions
): Promise<TranslationRunSummary> {
  const inputFormat = options.format ?? detectSubtitleFormat(options.inputPath);
  const outputFormat = detectSubtitleFormat(options.outputPath);
  const content = await readFile(options.inputPath, 'utf8');
  const document = parseSubtitles(content, inputFormat);

  const { document: translated, summary } = await translateSubtitleDocument(document, options);

  await mkdir(path.dirname(options.outputPath), { recursive: true });
  await writeFile(options.outputPath, renderSubtitles(translated, outputFormat), 'utf8');
  return summary;
}
