import pLimit from 'p-limit';
import { ConfigurationError, ContractViolation } from '@/services/subtitle-translation/errors';
import type {
  Batch,
  BatchResult,
  SubtitleDocument
} from '@/services/subtitle-translation/types';

export function partitionDocument(document: SubtitleDocument, maxBatchSize: number): Batch[] {
  if (!Number.isInteger(maxBatchSize) || maxBatchSize <= 0) {
    throw new ConfigurationError(
      `Batch size must be a positive integer, received ${String(maxBatchSize)}.`,
      'Set batchSize (TRANSLATION_BATCH_SIZE) to 1 or more.'
    );
  }

  const batches: Batch[] = [];
  for (let offset = 0; offset < document.entries.length; offset += maxBatchSize) {
    batches.push({
      ordinal: batches.length,
      offset,
      entries: document.entries.slice(offset, offset + maxBatchSize)
    });
  }
  return batches;
}

export type DispatchOutcome<T> =
  | { status: 'completed'; batch: Batch; value: T }
  | { status: 'cancelled'; batch: Batch };

/**
 * Runs `worker` over the batches with at most `concurrency` in flight.
 * Batches that have not started when `signal` aborts are reported as
 * cancelled; started ones run to completion. The first worker error stops
 * further dispatch and rejects once in-flight work has settled.
 */
export async function dispatchBatches<T>(
  batches: Batch[],
  worker: (batch: Batch) => Promise<T>,
  options: { concurrency: number; signal?: AbortSignal }
): Promise<Array<DispatchOutcome<T>>> {
  const limit = pLimit(options.concurrency);
  const run: { failure?: { error: unknown } } = {};

  const settled = await Promise.allSettled(
    batches.map((batch) =>
      limit(async (): Promise<DispatchOutcome<T>> => {
        if (run.failure || options.signal?.aborted) {
          return { status: 'cancelled', batch };
        }
        try {
          return { status: 'completed', batch, value: await worker(batch) };
        } catch (error) {
          if (!run.failure) {
            run.failure = { error };
          }
          throw error;
        }
      })
    )
  );

  if (run.failure) {
    throw run.failure.error;
  }

  return settled.map((result, position) => {
    if (result.status === 'fulfilled') {
      return result.value;
    }
    // Unreachable: every rejection above records a failure first.
    const batch = batches[position];
    if (!batch) {
      throw result.reason;
    }
    return { status: 'cancelled', batch };
  });
}

/**
 * Scatters batch outputs back into a copy of the document by position, so the
 * completion order of concurrent batches never affects entry order.
 */
export function mergeBatchResults(
  document: SubtitleDocument,
  results: BatchResult[]
): SubtitleDocument {
  const output: Array<string | undefined> = new Array(document.entries.length).fill(undefined);

  for (const { batch, texts } of results) {
    if (texts.length !== batch.entries.length) {
      throw new ContractViolation({
        batchOrdinal: batch.ordinal,
        expected: batch.entries.length,
        received: texts.length,
        detail: 'merge'
      });
    }

    texts.forEach((text, position) => {
      const target = batch.offset + position;
      if (document.entries[target]?.index !== batch.entries[position]?.index) {
        throw new ContractViolation({
          batchOrdinal: batch.ordinal,
          expected: batch.entries.length,
          received: texts.length,
          detail: `entry ${String(batch.entries[position]?.index)} is not at position ${target}`
        });
      }
      output[target] = text;
    });
  }

  return {
    entries: document.entries.map((entry, position) => {
      const translated = output[position];
      return translated === undefined ? { ...entry } : { ...entry, translatedText: translated };
    })
  };
}
