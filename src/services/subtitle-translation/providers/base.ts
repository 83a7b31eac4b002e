import pLimit, { type LimitFunction } from 'p-limit';
import type { ProviderKind } from '@/config/translation';
import { getLogger, type Logger } from '@/lib/logger';
import type { CacheStore } from '@/services/subtitle-translation/cache';
import {
  isContractViolation,
  isProviderError,
  ProviderError
} from '@/services/subtitle-translation/errors';
import type { TranslationRequest } from '@/services/subtitle-translation/types';

export interface TranslationProvider {
  readonly id: string;
  readonly kind: ProviderKind;
  translateBatch(texts: string[], request: TranslationRequest): Promise<string[]>;
}

export interface ProviderDeps {
  cache?: CacheStore;
  logger?: Logger;
}

/**
 * Shared plumbing for every backend: a per-provider concurrency gate, cache
 * write-through on success (a failed write is logged, never fatal), and wrapping of unexpected failures as
 * non-retryable `Unavailable` errors.
 */
export abstract class BaseTranslationProvider implements TranslationProvider {
  abstract readonly kind: ProviderKind;
  protected readonly logger: Logger;
  private readonly limit: LimitFunction;
  private readonly cache: CacheStore | undefined;

  protected constructor(
    readonly id: string,
    maxConcurrency: number,
    deps: ProviderDeps
  ) {
    this.limit = pLimit(maxConcurrency);
    this.cache = deps.cache;
    this.logger = (deps.logger ?? getLogger('provider')).child({ providerId: id });
  }

  async translateBatch(texts: string[], request: TranslationRequest): Promise<string[]> {
    if (texts.length === 0) {
      return [];
    }

    const translations = await this.limit(() => this.runGuarded(texts, request));

    // A short or long answer is left for the caller to reject; caching it would
    // pair texts with the wrong translations.
    if (this.cache && translations.length === texts.length) {
      await this.remember(this.cache, texts, translations, request);
    }

    return translations;
  }

  private async remember(
    cache: CacheStore,
    texts: string[],
    translations: string[],
    request: TranslationRequest
  ): Promise<void> {
    try {
      await cache.putMany(
        texts.map((text, position) => ({
          key: { text, targetLanguage: request.targetLanguage, providerId: this.id },
          text: translations[position] ?? ''
        }))
      );
    } catch (error) {
      this.logger.warn(
        { err: error, lines: texts.length },
        'could not persist translations to the cache; continuing without it'
      );
    }
  }

  protected abstract translateTexts(
    texts: string[],
    request: TranslationRequest
  ): Promise<string[]>;

  private async runGuarded(texts: string[], request: TranslationRequest): Promise<string[]> {
    try {
      return await this.translateTexts(texts, request);
    } catch (error) {
      if (isProviderError(error) || isContractViolation(error)) {
        throw error;
      }

      throw new ProviderError({
        kind: 'Unavailable',
        providerId: this.id,
        message: error instanceof Error ? error.message : `${this.id} translation failed.`,
        cause: error
      });
    }
  }
}
