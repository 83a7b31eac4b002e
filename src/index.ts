export {
  translateSubtitleDocument,
  translateSubtitleFile,
  type TranslateFileOptions,
  type TranslateOptions
} from '@/services/subtitle-translation/index';
export { HybridOrchestrator, computeBackoffMs } from '@/services/subtitle-translation/orchestrator';
export type {
  HybridOrchestratorOptions,
  OrchestratorSettings
} from '@/services/subtitle-translation/orchestrator';
export {
  dispatchBatches,
  mergeBatchResults,
  partitionDocument
} from '@/services/subtitle-translation/batch-scheduler';
export { CacheStore, buildCacheKey, normalizeCacheText } from '@/services/subtitle-translation/cache';
export type { CacheKey, CacheEntry } from '@/services/subtitle-translation/cache';
export { NameRegistry } from '@/services/subtitle-translation/name-registry';
export {
  CapitalizedNameStrategy,
  CjkNameStrategy,
  DictionaryOnlyStrategy,
  FrequentNameStrategy,
  createNameStrategy,
  type NameExtractionStrategy
} from '@/services/subtitle-translation/name-strategies';
export { classifyScript, type ScriptClass } from '@/services/subtitle-translation/language-classifier';
export { createProvider, createProviderChain } from '@/services/subtitle-translation/providers/index';
export type {
  FetchLike,
  GeminiModelsClient,
  ProviderFactoryDeps,
  Seq2SeqModel,
  TranslationProvider
} from '@/services/subtitle-translation/providers/index';
export { createSubtitleDocument, getOutputText } from '@/services/subtitle-translation/document';
export {
  detectSubtitleFormat,
  parseSubtitles,
  renderSubtitles
} from '@/services/subtitle-translation/subtitle-format';
export {
  ConfigurationError,
  ContractViolation,
  InvalidDocumentError,
  ProviderError,
  isConfigurationError,
  isContractViolation,
  isInvalidDocumentError,
  isProviderError
} from '@/services/subtitle-translation/errors';
export {
  parseProviderChain,
  resolveTranslationConfig,
  type ProviderSpec,
  type ProviderSpecInput,
  type TranslationConfig,
  type TranslationConfigInput
} from '@/config/translation';
export { createLogger, getLogger } from '@/lib/logger';
export type * from '@/services/subtitle-translation/types';
