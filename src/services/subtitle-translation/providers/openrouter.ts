import type { OpenRouterProviderSpec } from '@/config/translation';
import { ProviderError } from '@/services/subtitle-translation/errors';
import {
  BaseTranslationProvider,
  type ProviderDeps
} from '@/services/subtitle-translation/providers/base';
import {
  buildTranslationPrompt,
  parseTranslationsPayload
} from '@/services/subtitle-translation/providers/prompt';
import type {
  ProviderErrorKind,
  TranslationRequest
} from '@/services/subtitle-translation/types';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export function classifyHttpStatus(status: number): ProviderErrorKind {
  if (status === 429) {
    return 'RateLimited';
  }
  if (status === 401 || status === 403) {
    return 'AuthFailure';
  }
  if (status === 408 || status === 504) {
    return 'Timeout';
  }
  return 'Unavailable';
}

export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) {
    return undefined;
  }

  const seconds = Number(header.trim());
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }

  const date = Date.parse(header);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

function extractContent(payload: unknown): string | undefined {
  if (typeof payload !== 'object' || payload === null || !('choices' in payload)) {
    return undefined;
  }
  const choices = payload.choices;
  if (!Array.isArray(choices)) {
    return undefined;
  }

  const message: unknown = choices[0]?.message;
  if (typeof message !== 'object' || message === null || !('content' in message)) {
    return undefined;
  }

  const content = message.content;
  if (typeof content === 'string') {
    return content;
  }

  if (Array.isArray(content)) {
    const text = content
      .map((item: unknown) =>
        typeof item === 'object' && item !== null && 'text' in item && typeof item.text === 'string'
          ? item.text
          : ''
      )
      .join('')
      .trim();
    return text || undefined;
  }

  return undefined;
}

export class OpenRouterTranslationProvider extends BaseTranslationProvider {
  readonly kind = 'openrouter' as const;
  private readonly spec: OpenRouterProviderSpec;
  private readonly fetchImpl: FetchLike;

  constructor(spec: OpenRouterProviderSpec, deps: ProviderDeps & { fetchImpl?: FetchLike } = {}) {
    super(spec.id, spec.maxConcurrency, deps);
    this.spec = spec;
    this.fetchImpl = deps.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  protected async translateTexts(texts: string[], request: TranslationRequest): Promise<string[]> {
    const { systemPrompt, userPrompt } = buildTranslationPrompt(texts, request);
    const content = await this.complete(systemPrompt, userPrompt);
    return parseTranslationsPayload(content, texts.length, this.id);
  }

  private async complete(systemPrompt: string, userPrompt: string): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.spec.timeoutMs);

    try {
      const response = await this.fetchImpl(this.spec.baseUrl, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.spec.apiKey}`,
          'Content-Type': 'application/json',
          ...(this.spec.siteUrl ? { 'HTTP-Referer': this.spec.siteUrl } : {}),
          'X-Title': this.spec.appName
        },
        body: JSON.stringify({
          model: this.spec.model,
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: userPrompt }
          ],
          temperature: this.spec.temperature,
          max_tokens: this.spec.maxTokens,
          response_format: { type: 'json_object' }
        }),
        signal: controller.signal
      });

      if (!response.ok) {
        const detail = await response.text();
        throw new ProviderError({
          kind: classifyHttpStatus(response.status),
          providerId: this.id,
          message: `OpenRouter request failed (${response.status}): ${detail || response.statusText}`,
          retryAfterMs: parseRetryAfter(response.headers.get('retry-after'))
        });
      }

      let payload: unknown;
      try {
        payload = await response.json();
      } catch (error) {
        throw new ProviderError({
          kind: 'MalformedResponse',
          providerId: this.id,
          message: 'OpenRouter response body was not JSON.',
          cause: error
        });
      }

      const content = extractContent(payload);
      if (content === undefined) {
        throw new ProviderError({
          kind: 'MalformedResponse',
          providerId: this.id,
          message: 'OpenRouter response did not include message content.'
        });
      }
      return content;
    } catch (error) {
      if (error instanceof ProviderError) {
        throw error;
      }

      if (error instanceof Error && error.name === 'AbortError') {
        throw new ProviderError({
          kind: 'Timeout',
          providerId: this.id,
          message: `OpenRouter request timed out after ${this.spec.timeoutMs}ms.`,
          cause: error
        });
      }

      throw new ProviderError({
        kind: 'Unavailable',
        providerId: this.id,
        message: error instanceof Error ? error.message : 'OpenRouter request failed.',
        cause: error
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
