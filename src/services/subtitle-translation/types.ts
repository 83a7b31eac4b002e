export interface SubtitleEntry {
  index: number;
  startTime: number;
  endTime: number;
  text: string;
  translatedText?: string;
}

export interface SubtitleDocument {
  entries: SubtitleEntry[];
}

export type SubtitleFormat = 'srt' | 'vtt';

export interface Batch {
  ordinal: number;
  offset: number;
  entries: SubtitleEntry[];
}

export interface BatchResult {
  batch: Batch;
  texts: string[];
}

export type BatchState =
  | 'PENDING'
  | 'IN_FLIGHT'
  | 'SUCCESS'
  | 'PROVIDER_FAILED'
  | 'FAILED'
  | 'CANCELLED';

export type ProviderErrorKind =
  | 'RateLimited'
  | 'Timeout'
  | 'AuthFailure'
  | 'Unavailable'
  | 'MalformedResponse';

export type AttemptOutcome = 'success' | 'retryable-failure' | 'fatal-failure';

export interface ProviderAttempt {
  providerId: string;
  batchOrdinal: number;
  attempt: number;
  outcome: AttemptOutcome;
  latencyMs: number;
  errorKind?: ProviderErrorKind;
}

export interface TranslationRequest {
  targetLanguage: string;
  sourceLanguage?: string;
  contextHint?: string;
}

export interface NameMapping {
  source: string;
  placeholder: string;
  target?: string;
}

export interface NameSpan {
  name: string;
  start: number;
  end: number;
}

export interface NameSubstitution {
  source: string;
  placeholder: string;
}

export interface NamePreservationLoss {
  source: string;
  placeholder: string;
}

export type DegradationReason = 'provider-chain-exhausted' | 'cancelled';

export interface DegradedEntry {
  index: number;
  reason: DegradationReason;
}

export interface ProviderUsage {
  attempts: number;
  successes: number;
  retryableFailures: number;
  fatalFailures: number;
}

export interface TranslationRunSummary {
  totalEntries: number;
  translatedEntries: number;
  degradedEntries: DegradedEntry[];
  batches: {
    total: number;
    succeeded: number;
    failed: number;
    cancelled: number;
  };
  cacheHits: number;
  providerUsage: Record<string, ProviderUsage>;
  nameLosses: number;
}

export interface TranslationRunResult {
  document: SubtitleDocument;
  summary: TranslationRunSummary;
}

/** Running totals reported after each finished batch. Cancelled batches never report. */
export interface BatchProgress {
  batchOrdinal: number;
  state: 'SUCCESS' | 'FAILED';
  completedEntries: number;
  totalEntries: number;
  completedBatches: number;
  totalBatches: number;
  elapsedMs: number;
  /** Linear estimate from the average time per completed entry. */
  etaMs: number;
}
