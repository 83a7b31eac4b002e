import path from 'node:path';
import { readEnv, type Env } from '@/config/env';
import {
  getGeminiSettings,
  getLocalModelSettings,
  getOpenRouterSettings
} from '@/config/providers';
import { ConfigurationError } from '@/services/subtitle-translation/errors';

export type ProviderKind = 'local' | 'openrouter' | 'gemini';

const PROVIDER_KINDS: readonly ProviderKind[] = ['local', 'openrouter', 'gemini'];

export interface LocalProviderSpec {
  kind: 'local';
  id: string;
  maxBatchSize: number;
  maxConcurrency: number;
}

export interface OpenRouterProviderSpec {
  kind: 'openrouter';
  id: string;
  apiKey: string;
  model: string;
  baseUrl: string;
  appName: string;
  siteUrl?: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  maxConcurrency: number;
}

export interface GeminiProviderSpec {
  kind: 'gemini';
  id: string;
  apiKey: string;
  model: string;
  temperature: number;
  timeoutMs: number;
  maxConcurrency: number;
}

export type ProviderSpec = LocalProviderSpec | OpenRouterProviderSpec | GeminiProviderSpec;

export type ProviderSpecInput =
  | ProviderKind
  | ({ kind: 'local' } & Partial<Omit<LocalProviderSpec, 'kind'>>)
  | ({ kind: 'openrouter' } & Partial<Omit<OpenRouterProviderSpec, 'kind'>>)
  | ({ kind: 'gemini' } & Partial<Omit<GeminiProviderSpec, 'kind'>>);

export interface TranslationConfig {
  providerChain: ProviderSpec[];
  batchSize: number;
  maxRetries: number;
  backoffBaseMs: number;
  concurrency: number;
  sourceLanguage: string;
  targetLanguage: string;
  preserveNames: boolean;
  contextHint?: string;
  nameMinOccurrences: number;
  dataRootPath: string;
}

export type TranslationConfigInput = Partial<Omit<TranslationConfig, 'providerChain'>> & {
  providerChain?: ProviderSpecInput[];
};

function isProviderKind(value: string): value is ProviderKind {
  return PROVIDER_KINDS.some((kind) => kind === value);
}

export function parseProviderChain(raw: string): ProviderKind[] {
  return raw
    .split(',')
    .map((value) => value.trim().toLowerCase())
    .filter(Boolean)
    .map((value) => {
      if (!isProviderKind(value)) {
        throw new ConfigurationError(
          `Unknown translation provider "${value}".`,
          `Use a comma-separated list of ${PROVIDER_KINDS.join(', ')}.`
        );
      }
      return value;
    });
}

function requireApiKey(kind: ProviderKind, apiKey: string, envKey: string): string {
  if (!apiKey.trim()) {
    throw new ConfigurationError(
      `Provider "${kind}" is in the chain but has no API key.`,
      `Set ${envKey} or pass apiKey in the provider spec.`
    );
  }
  return apiKey;
}

function toSpecInput(input: ProviderSpecInput): Exclude<ProviderSpecInput, ProviderKind> {
  if (typeof input !== 'string') {
    return input;
  }
  switch (input) {
    case 'local':
      return { kind: 'local' };
    case 'openrouter':
      return { kind: 'openrouter' };
    case 'gemini':
      return { kind: 'gemini' };
  }
}

function buildProviderSpec(input: ProviderSpecInput, env: Env): ProviderSpec {
  const spec = toSpecInput(input);

  switch (spec.kind) {
    case 'local': {
      const defaults = getLocalModelSettings();
      return {
        kind: 'local',
        id: spec.id ?? 'local',
        maxBatchSize: spec.maxBatchSize ?? defaults.maxBatchSize,
        maxConcurrency: spec.maxConcurrency ?? defaults.maxConcurrency
      };
    }
    case 'openrouter': {
      const defaults = getOpenRouterSettings();
      return {
        kind: 'openrouter',
        id: spec.id ?? 'openrouter',
        apiKey: requireApiKey('openrouter', spec.apiKey ?? env.openRouterApiKey, 'OPENROUTER_API_KEY'),
        model: spec.model ?? env.openRouterModel,
        baseUrl: spec.baseUrl ?? defaults.baseUrl,
        appName: spec.appName ?? defaults.appName,
        siteUrl: spec.siteUrl ?? defaults.siteUrl,
        temperature: spec.temperature ?? defaults.temperature,
        maxTokens: spec.maxTokens ?? defaults.maxTokens,
        timeoutMs: spec.timeoutMs ?? defaults.timeoutMs,
        maxConcurrency: spec.maxConcurrency ?? defaults.maxConcurrency
      };
    }
    case 'gemini': {
      const defaults = getGeminiSettings();
      return {
        kind: 'gemini',
        id: spec.id ?? 'gemini',
        apiKey: requireApiKey('gemini', spec.apiKey ?? env.geminiApiKey, 'GEMINI_API_KEY'),
        model: spec.model ?? env.geminiModel,
        temperature: spec.temperature ?? defaults.temperature,
        timeoutMs: spec.timeoutMs ?? defaults.timeoutMs,
        maxConcurrency: spec.maxConcurrency ?? defaults.maxConcurrency
      };
    }
    default: {
      const exhaustiveCheck: never = spec;
      throw new ConfigurationError(
        `Unsupported provider spec: ${JSON.stringify(exhaustiveCheck)}`,
        `Use one of ${PROVIDER_KINDS.join(', ')}.`
      );
    }
  }
}

function assertInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(
      `${name} must be an integer >= ${min}, received ${String(value)}.`,
      `Fix the ${name} option or its environment variable.`
    );
  }
}

export function resolveTranslationConfig(
  overrides: TranslationConfigInput = {},
  env: Env = readEnv()
): TranslationConfig {
  const chainInput = overrides.providerChain ?? parseProviderChain(env.providerChain);
  if (chainInput.length === 0) {
    throw new ConfigurationError(
      'The provider chain is empty.',
      'Configure at least one provider, e.g. TRANSLATION_PROVIDER_CHAIN=local,openrouter.'
    );
  }

  const providerChain = chainInput.map((input) => buildProviderSpec(input, env));
  const seen = new Set<string>();
  for (const spec of providerChain) {
    if (seen.has(spec.id)) {
      throw new ConfigurationError(
        `Provider id "${spec.id}" appears twice in the chain.`,
        'Give each provider spec a distinct id.'
      );
    }
    seen.add(spec.id);
    if (spec.kind === 'local') {
      assertInteger(`${spec.id}.maxBatchSize`, spec.maxBatchSize, 1);
    }
    assertInteger(`${spec.id}.maxConcurrency`, spec.maxConcurrency, 1);
  }

  const config: TranslationConfig = {
    providerChain,
    batchSize: overrides.batchSize ?? env.batchSize,
    maxRetries: overrides.maxRetries ?? env.maxRetries,
    backoffBaseMs: overrides.backoffBaseMs ?? env.backoffBaseMs,
    concurrency: overrides.concurrency ?? env.concurrency,
    sourceLanguage: overrides.sourceLanguage ?? env.sourceLanguage,
    targetLanguage: overrides.targetLanguage ?? env.targetLanguage,
    preserveNames: overrides.preserveNames ?? env.preserveNames,
    contextHint: overrides.contextHint ?? env.contextHint,
    nameMinOccurrences: overrides.nameMinOccurrences ?? env.nameMinOccurrences,
    dataRootPath: overrides.dataRootPath ?? env.dataRootPath
  };

  assertInteger('batchSize', config.batchSize, 1);
  assertInteger('maxRetries', config.maxRetries, 0);
  assertInteger('concurrency', config.concurrency, 1);
  assertInteger('nameMinOccurrences', config.nameMinOccurrences, 1);
  if (!Number.isFinite(config.backoffBaseMs) || config.backoffBaseMs < 0) {
    throw new ConfigurationError(
      `backoffBaseMs must be a non-negative number, received ${String(config.backoffBaseMs)}.`,
      'Fix the backoffBaseMs option or TRANSLATION_BACKOFF_BASE_MS.'
    );
  }
  if (!config.targetLanguage.trim()) {
    throw new ConfigurationError('targetLanguage is empty.', 'Set TRANSLATION_TARGET_LANGUAGE.');
  }

  return config;
}

export function getCachePath(config: Pick<TranslationConfig, 'dataRootPath'>): string {
  return path.join(config.dataRootPath, 'translation-cache.json');
}

export function getNameRegistryPath(config: Pick<TranslationConfig, 'dataRootPath'>): string {
  return path.join(config.dataRootPath, 'name-mappings.json');
}
