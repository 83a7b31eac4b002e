import { GoogleGenAI, type GenerateContentParameters } from '@google/genai';
import type { GeminiProviderSpec } from '@/config/translation';
import { ProviderError } from '@/services/subtitle-translation/errors';
import {
  BaseTranslationProvider,
  type ProviderDeps
} from '@/services/subtitle-translation/providers/base';
import { classifyHttpStatus } from '@/services/subtitle-translation/providers/openrouter';
import {
  buildTranslationPrompt,
  parseTranslationsPayload
} from '@/services/subtitle-translation/providers/prompt';
import type { TranslationRequest } from '@/services/subtitle-translation/types';

/** The slice of the `@google/genai` models API this provider calls. */
export interface GeminiModelsClient {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string | undefined }>;
}

function readStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

export class GeminiTranslationProvider extends BaseTranslationProvider {
  readonly kind = 'gemini' as const;
  private readonly spec: GeminiProviderSpec;
  private readonly client: GeminiModelsClient;

  constructor(spec: GeminiProviderSpec, deps: ProviderDeps & { client?: GeminiModelsClient } = {}) {
    super(spec.id, spec.maxConcurrency, deps);
    this.spec = spec;
    this.client = deps.client ?? new GoogleGenAI({ apiKey: spec.apiKey }).models;
  }

  protected async translateTexts(texts: string[], request: TranslationRequest): Promise<string[]> {
    const { systemPrompt, userPrompt } = buildTranslationPrompt(texts, request);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.spec.timeoutMs);

    let text: string | undefined;
    try {
      const response = await this.client.generateContent({
        model: this.spec.model,
        contents: userPrompt,
        config: {
          systemInstruction: systemPrompt,
          temperature: this.spec.temperature,
          responseMimeType: 'application/json',
          abortSignal: controller.signal
        }
      });
      text = response.text;
    } catch (error) {
      if (controller.signal.aborted) {
        throw new ProviderError({
          kind: 'Timeout',
          providerId: this.id,
          message: `Gemini request timed out after ${this.spec.timeoutMs}ms.`,
          cause: error
        });
      }

      const status = readStatus(error);
      throw new ProviderError({
        kind: status === undefined ? 'Unavailable' : classifyHttpStatus(status),
        providerId: this.id,
        message: `Gemini request failed${status === undefined ? '' : ` (${status})`}: ${
          error instanceof Error ? error.message : 'unknown error'
        }`,
        cause: error
      });
    } finally {
      clearTimeout(timeout);
    }

    if (!text) {
      throw new ProviderError({
        kind: 'MalformedResponse',
        providerId: this.id,
        message: 'Gemini response did not include text.'
      });
    }

    return parseTranslationsPayload(text, texts.length, this.id);
  }
}
