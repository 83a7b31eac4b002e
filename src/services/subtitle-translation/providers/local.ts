import type { LocalProviderSpec } from '@/config/translation';
import {
  BaseTranslationProvider,
  type ProviderDeps
} from '@/services/subtitle-translation/providers/base';
import { ProviderError } from '@/services/subtitle-translation/errors';
import type { TranslationRequest } from '@/services/subtitle-translation/types';

/**
 * An in-process sequence-to-sequence model. `generate` must return one output
 * per input, in input order.
 */
export interface Seq2SeqModel {
  readonly name: string;
  generate(
    texts: string[],
    options: { sourceLanguage?: string; targetLanguage: string }
  ): Promise<string[]>;
}

export class LocalTranslationProvider extends BaseTranslationProvider {
  readonly kind = 'local' as const;
  private readonly model: Seq2SeqModel;
  private readonly maxBatchSize: number;

  constructor(spec: LocalProviderSpec, model: Seq2SeqModel, deps: ProviderDeps = {}) {
    super(spec.id, spec.maxConcurrency, deps);
    this.model = model;
    this.maxBatchSize = spec.maxBatchSize;
  }

  protected async translateTexts(texts: string[], request: TranslationRequest): Promise<string[]> {
    const outputs: string[] = [];

    for (let offset = 0; offset < texts.length; offset += this.maxBatchSize) {
      const chunk = texts.slice(offset, offset + this.maxBatchSize);
      let generated: string[];
      try {
        generated = await this.model.generate(chunk, {
          sourceLanguage: request.sourceLanguage,
          targetLanguage: request.targetLanguage
        });
      } catch (error) {
        // Inference failures are resource problems (memory, missing weights); retrying will not help.
        throw new ProviderError({
          kind: 'Unavailable',
          providerId: this.id,
          message: `Local model ${this.model.name} failed: ${
            error instanceof Error ? error.message : 'unknown error'
          }`,
          cause: error
        });
      }
      outputs.push(...generated);
    }

    this.logger.debug(
      { model: this.model.name, lines: texts.length, chunks: Math.ceil(texts.length / this.maxBatchSize) },
      'local inference finished'
    );
    return outputs;
  }
}
