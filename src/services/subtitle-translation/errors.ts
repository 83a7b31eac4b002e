import type { ProviderErrorKind } from '@/services/subtitle-translation/types';

const RETRYABLE_KINDS: ReadonlySet<ProviderErrorKind> = new Set(['RateLimited', 'Timeout']);

export class ProviderError extends Error {
  readonly kind: ProviderErrorKind;
  readonly providerId: string;
  readonly retryable: boolean;
  readonly retryAfterMs?: number;

  constructor(opts: {
    kind: ProviderErrorKind;
    providerId: string;
    message: string;
    retryAfterMs?: number;
    cause?: unknown;
  }) {
    super(opts.message);
    this.name = 'ProviderError';
    this.kind = opts.kind;
    this.providerId = opts.providerId;
    this.retryable = RETRYABLE_KINDS.has(opts.kind);
    if (opts.retryAfterMs !== undefined) {
      this.retryAfterMs = opts.retryAfterMs;
    }
    if (opts.cause !== undefined) {
      this.cause = opts.cause;
    }
  }
}

export function isProviderError(value: unknown): value is ProviderError {
  return value instanceof ProviderError;
}

/**
 * A provider or batch result whose shape no longer lines up with its input.
 * Always aborts the run.
 */
export class ContractViolation extends Error {
  readonly batchOrdinal: number;
  readonly expected: number;
  readonly received: number;

  constructor(opts: { batchOrdinal: number; expected: number; received: number; detail?: string }) {
    super(
      `Batch ${opts.batchOrdinal} expected ${opts.expected} translations but received ${opts.received}` +
        (opts.detail ? ` (${opts.detail})` : '.')
    );
    this.name = 'ContractViolation';
    this.batchOrdinal = opts.batchOrdinal;
    this.expected = opts.expected;
    this.received = opts.received;
  }
}

export function isContractViolation(value: unknown): value is ContractViolation {
  return value instanceof ContractViolation;
}

export class ConfigurationError extends Error {
  readonly operatorHint: string;

  constructor(message: string, operatorHint: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.operatorHint = operatorHint;
  }
}

export function isConfigurationError(value: unknown): value is ConfigurationError {
  return value instanceof ConfigurationError;
}

export class InvalidDocumentError extends Error {
  readonly entryIndex: number | undefined;

  constructor(message: string, entryIndex?: number) {
    super(message);
    this.name = 'InvalidDocumentError';
    this.entryIndex = entryIndex;
  }
}

export function isInvalidDocumentError(value: unknown): value is InvalidDocumentError {
  return value instanceof InvalidDocumentError;
}
