import { setTimeout as delay } from 'node:timers/promises';
import type { TranslationConfig } from '@/config/translation';
import { getLogger, type Logger } from '@/lib/logger';
import {
  dispatchBatches,
  mergeBatchResults,
  partitionDocument
} from '@/services/subtitle-translation/batch-scheduler';
import type { CacheStore } from '@/services/subtitle-translation/cache';
import { createSubtitleDocument, getSourceTexts } from '@/services/subtitle-translation/document';
import {
  ConfigurationError,
  ContractViolation,
  isContractViolation,
  isProviderError,
  ProviderError
} from '@/services/subtitle-translation/errors';
import type { NameRegistry } from '@/services/subtitle-translation/name-registry';
import type { TranslationProvider } from '@/services/subtitle-translation/providers/base';
import type {
  AttemptOutcome,
  Batch,
  BatchResult,
  BatchProgress,
  BatchState,
  DegradationReason,
  DegradedEntry,
  NameSubstitution,
  ProviderAttempt,
  ProviderUsage,
  SubtitleDocument,
  TranslationRequest,
  TranslationRunResult,
  TranslationRunSummary
} from '@/services/subtitle-translation/types';

export type OrchestratorSettings = Pick<
  TranslationConfig,
  'batchSize' | 'maxRetries' | 'backoffBaseMs' | 'concurrency' | 'targetLanguage' | 'sourceLanguage' | 'contextHint'
>;

export interface HybridOrchestratorOptions {
  providers: TranslationProvider[];
  cache: CacheStore;
  settings: OrchestratorSettings;
  /** Omit to send names through untouched. */
  nameRegistry?: NameRegistry;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  logger?: Logger;
  onAttempt?: (attempt: ProviderAttempt) => void;
  /** Called once per batch that finished, successfully or degraded. */
  onBatchComplete?: (progress: BatchProgress) => void;
}

type BatchOutcome =
  | { state: 'SUCCESS'; texts: string[]; cacheHits: number; nameLosses: number }
  | { state: 'FAILED' };

interface RunTally {
  usage: Map<string, ProviderUsage>;
  startedAt: number;
  totalEntries: number;
  totalBatches: number;
  completedEntries: number;
  completedBatches: number;
}

const OUTCOME_COUNTER: Record<AttemptOutcome, keyof Omit<ProviderUsage, 'attempts'>> = {
  success: 'successes',
  'retryable-failure': 'retryableFailures',
  'fatal-failure': 'fatalFailures'
};

export function computeBackoffMs(baseMs: number, attempt: number, retryAfterMs?: number): number {
  const exponential = baseMs * 2 ** attempt;
  return retryAfterMs !== undefined && retryAfterMs > exponential ? retryAfterMs : exponential;
}

function toProviderError(providerId: string, error: unknown): ProviderError {
  if (isProviderError(error)) {
    return error;
  }
  return new ProviderError({
    kind: 'Unavailable',
    providerId,
    message: error instanceof Error ? error.message : `${providerId} translation failed.`,
    cause: error
  });
}

/**
 * Drives each batch through the provider chain in order. A provider gets up to
 * `maxRetries + 1` attempts on retryable failures before the batch moves on;
 * when the chain runs out the batch keeps its source text and is reported as
 * degraded. Contract violations abort the whole run.
 */
export class HybridOrchestrator {
  private readonly providers: TranslationProvider[];
  private readonly cache: CacheStore;
  private readonly settings: OrchestratorSettings;
  private readonly nameRegistry: NameRegistry | undefined;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly onAttempt: ((attempt: ProviderAttempt) => void) | undefined;
  private readonly onBatchComplete: ((progress: BatchProgress) => void) | undefined;

  constructor(options: HybridOrchestratorOptions) {
    if (options.providers.length === 0) {
      throw new ConfigurationError(
        'HybridOrchestrator needs at least one provider.',
        'Configure a non-empty provider chain.'
      );
    }
    this.providers = options.providers;
    this.cache = options.cache;
    this.settings = options.settings;
    this.nameRegistry = options.nameRegistry;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger ?? getLogger('orchestrator');
    this.onAttempt = options.onAttempt;
    this.onBatchComplete = options.onBatchComplete;
  }

  /**
   * Translates a document. The input is validated and sorted by index first,
   * so an `InvalidDocumentError` is thrown before any provider is called.
   */
  async translateDocument(
    input: SubtitleDocument,
    options: { signal?: AbortSignal } = {}
  ): Promise<TranslationRunResult> {
    const document = createSubtitleDocument(input.entries);
    const batches = partitionDocument(document, this.settings.batchSize);
    this.nameRegistry?.prime(getSourceTexts(document));

    const tally: RunTally = {
      usage: new Map(
        this.providers.map((provider) => [
          provider.id,
          { attempts: 0, successes: 0, retryableFailures: 0, fatalFailures: 0 }
        ])
      ),
      startedAt: this.now(),
      totalEntries: document.entries.length,
      totalBatches: batches.length,
      completedEntries: 0,
      completedBatches: 0
    };

    const worker = async (batch: Batch): Promise<BatchOutcome> => {
      const outcome = await this.runBatch(batch, tally);
      this.reportProgress(batch, outcome, tally);
      return outcome;
    };

    const outcomes = await dispatchBatches(batches, worker, {
      concurrency: this.settings.concurrency,
      signal: options.signal
    });

    const results: BatchResult[] = [];
    const degradedEntries: DegradedEntry[] = [];
    const summary: TranslationRunSummary = {
      totalEntries: document.entries.length,
      translatedEntries: 0,
      degradedEntries,
      batches: { total: batches.length, succeeded: 0, failed: 0, cancelled: 0 },
      cacheHits: 0,
      providerUsage: Object.fromEntries(tally.usage),
      nameLosses: 0
    };

    const degrade = (batch: Batch, reason: DegradationReason): void => {
      results.push({ batch, texts: batch.entries.map((entry) => entry.text) });
      for (const entry of batch.entries) {
        degradedEntries.push({ index: entry.index, reason });
      }
    };

    for (const outcome of outcomes) {
      if (outcome.status === 'cancelled') {
        summary.batches.cancelled += 1;
        degrade(outcome.batch, 'cancelled');
        continue;
      }
      if (outcome.value.state === 'FAILED') {
        summary.batches.failed += 1;
        degrade(outcome.batch, 'provider-chain-exhausted');
        continue;
      }
      summary.batches.succeeded += 1;
      summary.translatedEntries += outcome.batch.entries.length;
      summary.cacheHits += outcome.value.cacheHits;
      summary.nameLosses += outcome.value.nameLosses;
      results.push({ batch: outcome.batch, texts: outcome.value.texts });
    }

    degradedEntries.sort((a, b) => a.index - b.index);
    const translated = mergeBatchResults(document, results);

    if (degradedEntries.length > 0) {
      this.logger.warn(
        {
          failedBatches: summary.batches.failed,
          cancelledBatches: summary.batches.cancelled,
          degradedEntries: degradedEntries.length
        },
        'some batches kept their source text'
      );
    }
    this.logger.info(
      {
        totalEntries: summary.totalEntries,
        translatedEntries: summary.translatedEntries,
        cacheHits: summary.cacheHits,
        nameLosses: summary.nameLosses,
        batches: summary.batches
      },
      'translation run finished'
    );

    return { document: translated, summary };
  }

  private async runBatch(batch: Batch, tally: RunTally): Promise<BatchOutcome> {
    let state: BatchState = 'PENDING';
    const transition = (next: BatchState, providerId?: string): void => {
      this.logger.debug({ batch: batch.ordinal, providerId, from: state, to: next }, 'batch transition');
      state = next;
    };

    const prepared = batch.entries.map((entry) =>
      this.nameRegistry
        ? this.nameRegistry.preprocess(entry.text)
        : { text: entry.text, substitutions: [] }
    );
    const texts = prepared.map((item) => item.text);

    for (const [position, provider] of this.providers.entries()) {
      if (position > 0) {
        transition('PENDING', provider.id);
      }
      const answer = await this.translateWithProvider(provider, batch, texts, tally, transition);
      if (!answer) {
        continue;
      }

      transition('SUCCESS', provider.id);
      let nameLosses = 0;
      const restored = answer.texts.map((text, position) => {
        const substitutions: NameSubstitution[] = prepared[position]?.substitutions ?? [];
        if (!this.nameRegistry || substitutions.length === 0) {
          return text;
        }
        const result = this.nameRegistry.postprocess(text, substitutions);
        nameLosses += result.losses.length;
        return result.text;
      });
      return { state: 'SUCCESS', texts: restored, cacheHits: answer.cacheHits, nameLosses };
    }

    transition('FAILED');
    this.logger.warn(
      { batch: batch.ordinal, entries: batch.entries.length },
      'provider chain exhausted; keeping source text'
    );
    return { state: 'FAILED' };
  }

  private async translateWithProvider(
    provider: TranslationProvider,
    batch: Batch,
    texts: string[],
    tally: RunTally,
    transition: (next: BatchState, providerId?: string) => void
  ): Promise<{ texts: string[]; cacheHits: number } | undefined> {
    const scope = { targetLanguage: this.settings.targetLanguage, providerId: provider.id };
    const cached = this.cache.getMany(texts, scope);
    const missPositions: number[] = [];
    cached.forEach((value, position) => {
      if (value === undefined) {
        missPositions.push(position);
      }
    });
    const cacheHits = texts.length - missPositions.length;

    const splice = (fresh: string[]): string[] => {
      const merged = cached.map((value) => value ?? '');
      missPositions.forEach((position, slot) => {
        merged[position] = fresh[slot] ?? '';
      });
      return merged;
    };

    if (missPositions.length === 0) {
      return { texts: splice([]), cacheHits };
    }

    const request: TranslationRequest = {
      targetLanguage: this.settings.targetLanguage,
      sourceLanguage: this.settings.sourceLanguage,
      contextHint: this.settings.contextHint
    };
    const missTexts = missPositions.map((position) => texts[position] ?? '');

    for (let attempt = 0; attempt <= this.settings.maxRetries; attempt += 1) {
      transition('IN_FLIGHT', provider.id);
      const startedAt = this.now();

      try {
        const translations = await provider.translateBatch(missTexts, request);
        if (translations.length !== missTexts.length) {
          throw new ContractViolation({
            batchOrdinal: batch.ordinal,
            expected: missTexts.length,
            received: translations.length,
            detail: `provider ${provider.id}`
          });
        }
        this.record(tally, {
          providerId: provider.id,
          batchOrdinal: batch.ordinal,
          attempt: attempt + 1,
          outcome: 'success',
          latencyMs: this.now() - startedAt
        });
        return { texts: splice(translations), cacheHits };
      } catch (error) {
        if (isContractViolation(error)) {
          throw error;
        }

        const failure = toProviderError(provider.id, error);
        const shouldRetry = failure.retryable && attempt < this.settings.maxRetries;
        transition('PROVIDER_FAILED', provider.id);
        this.record(tally, {
          providerId: provider.id,
          batchOrdinal: batch.ordinal,
          attempt: attempt + 1,
          outcome: failure.retryable ? 'retryable-failure' : 'fatal-failure',
          latencyMs: this.now() - startedAt,
          errorKind: failure.kind
        });
        this.logger.warn(
          {
            batch: batch.ordinal,
            providerId: provider.id,
            attempt: attempt + 1,
            errorKind: failure.kind,
            willRetry: shouldRetry
          },
          `provider attempt failed: ${failure.message}`
        );

        if (!shouldRetry) {
          return undefined;
        }
        await this.sleep(
          computeBackoffMs(this.settings.backoffBaseMs, attempt, failure.retryAfterMs)
        );
      }
    }

    return undefined;
  }

  private reportProgress(batch: Batch, outcome: BatchOutcome, tally: RunTally): void {
    tally.completedEntries += batch.entries.length;
    tally.completedBatches += 1;
    const elapsedMs = this.now() - tally.startedAt;
    const remainingEntries = tally.totalEntries - tally.completedEntries;
    const progress: BatchProgress = {
      batchOrdinal: batch.ordinal,
      state: outcome.state,
      completedEntries: tally.completedEntries,
      totalEntries: tally.totalEntries,
      completedBatches: tally.completedBatches,
      totalBatches: tally.totalBatches,
      elapsedMs,
      etaMs: Math.round((elapsedMs / tally.completedEntries) * remainingEntries)
    };

    this.logger.info(progress, 'batch finished');
    this.onBatchComplete?.(progress);
  }

  private record(tally: RunTally, attempt: ProviderAttempt): void {
    let usage = tally.usage.get(attempt.providerId);
    if (!usage) {
      usage = { attempts: 0, successes: 0, retryableFailures: 0, fatalFailures: 0 };
      tally.usage.set(attempt.providerId, usage);
    }
    usage.attempts += 1;
    usage[OUTCOME_COUNTER[attempt.outcome]] += 1;
    this.onAttempt?.(attempt);
  }
}
