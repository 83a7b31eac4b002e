import type { ProviderSpec } from '@/config/translation';
import { ConfigurationError } from '@/services/subtitle-translation/errors';
import type { ProviderDeps, TranslationProvider } from '@/services/subtitle-translation/providers/base';
import {
  GeminiTranslationProvider,
  type GeminiModelsClient
} from '@/services/subtitle-translation/providers/gemini';
import {
  LocalTranslationProvider,
  type Seq2SeqModel
} from '@/services/subtitle-translation/providers/local';
import {
  OpenRouterTranslationProvider,
  type FetchLike
} from '@/services/subtitle-translation/providers/openrouter';

export type { TranslationProvider } from '@/services/subtitle-translation/providers/base';
export type { Seq2SeqModel } from '@/services/subtitle-translation/providers/local';
export type { GeminiModelsClient } from '@/services/subtitle-translation/providers/gemini';
export type { FetchLike } from '@/services/subtitle-translation/providers/openrouter';

export interface ProviderFactoryDeps extends ProviderDeps {
  localModel?: Seq2SeqModel;
  fetchImpl?: FetchLike;
  geminiClient?: GeminiModelsClient;
}

export function createProvider(spec: ProviderSpec, deps: ProviderFactoryDeps = {}): TranslationProvider {
  const shared: ProviderDeps = { cache: deps.cache, logger: deps.logger };

  switch (spec.kind) {
    case 'local':
      if (!deps.localModel) {
        throw new ConfigurationError(
          `Provider "${spec.id}" needs an in-process model but none was supplied.`,
          'Pass localModel when building the provider chain, or remove local from it.'
        );
      }
      return new LocalTranslationProvider(spec, deps.localModel, shared);
    case 'openrouter':
      return new OpenRouterTranslationProvider(spec, { ...shared, fetchImpl: deps.fetchImpl });
    case 'gemini':
      return new GeminiTranslationProvider(spec, { ...shared, client: deps.geminiClient });
    default: {
      const exhaustiveCheck: never = spec;
      throw new ConfigurationError(
        `Unsupported provider spec: ${JSON.stringify(exhaustiveCheck)}`,
        'Use local, openrouter or gemini.'
      );
    }
  }
}

export function createProviderChain(
  specs: ProviderSpec[],
  deps: ProviderFactoryDeps = {}
): TranslationProvider[] {
  if (specs.length === 0) {
    throw new ConfigurationError('The provider chain is empty.', 'Configure at least one provider.');
  }
  return specs.map((spec) => createProvider(spec, deps));
}
