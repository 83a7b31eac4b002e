import { InvalidDocumentError } from '@/services/subtitle-translation/errors';
import type { SubtitleDocument, SubtitleEntry } from '@/services/subtitle-translation/types';

function assertValidEntry(entry: SubtitleEntry): void {
  if (!Number.isInteger(entry.index) || entry.index <= 0) {
    throw new InvalidDocumentError(
      `Entry index must be a positive integer, received ${String(entry.index)}.`,
      entry.index
    );
  }

  if (!Number.isFinite(entry.startTime) || !Number.isFinite(entry.endTime)) {
    throw new InvalidDocumentError(`Entry ${entry.index} has a non-finite timestamp.`, entry.index);
  }

  if (entry.startTime >= entry.endTime) {
    throw new InvalidDocumentError(
      `Entry ${entry.index} starts at ${entry.startTime}s but ends at ${entry.endTime}s.`,
      entry.index
    );
  }

  if (typeof entry.text !== 'string') {
    throw new InvalidDocumentError(`Entry ${entry.index} has no text.`, entry.index);
  }
}

/**
 * Validates entries and returns a document sorted by index. Entries are
 * copied so later merges never mutate the caller's objects.
 */
export function createSubtitleDocument(entries: SubtitleEntry[]): SubtitleDocument {
  const seen = new Set<number>();
  for (const entry of entries) {
    assertValidEntry(entry);
    if (seen.has(entry.index)) {
      throw new InvalidDocumentError(`Duplicate entry index ${entry.index}.`, entry.index);
    }
    seen.add(entry.index);
  }

  return {
    entries: entries.map((entry) => ({ ...entry })).sort((a, b) => a.index - b.index)
  };
}

export function getSourceTexts(document: SubtitleDocument): string[] {
  return document.entries.map((entry) => entry.text);
}

export function getOutputText(entry: SubtitleEntry): string {
  return entry.translatedText ?? entry.text;
}
