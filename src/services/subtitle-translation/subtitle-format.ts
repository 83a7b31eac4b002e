import path from 'node:path';
import { createSubtitleDocument, getOutputText } from '@/services/subtitle-translation/document';
import { InvalidDocumentError } from '@/services/subtitle-translation/errors';
import type {
  SubtitleDocument,
  SubtitleEntry,
  SubtitleFormat
} from '@/services/subtitle-translation/types';

const SRT_TIMESTAMP_PATTERN = /^(\d{2,}):(\d{2}):(\d{2}),(\d{3})$/;
const VTT_TIMESTAMP_PATTERN = /^(?:(\d{2,}):)?(\d{2}):(\d{2})\.(\d{3})$/;

function formatTimestamp(totalSeconds: number, separator: ',' | '.'): string {
  const totalMillis = Math.round(Math.max(0, totalSeconds) * 1000);
  const hours = Math.floor(totalMillis / 3_600_000)
    .toString()
    .padStart(2, '0');
  const minutes = Math.floor((totalMillis % 3_600_000) / 60_000)
    .toString()
    .padStart(2, '0');
  const seconds = Math.floor((totalMillis % 60_000) / 1000)
    .toString()
    .padStart(2, '0');
  const milliseconds = (totalMillis % 1000).toString().padStart(3, '0');
  return `${hours}:${minutes}:${seconds}${separator}${milliseconds}`;
}

export function toSrtTimestamp(totalSeconds: number): string {
  return formatTimestamp(totalSeconds, ',');
}

export function toVttTimestamp(totalSeconds: number): string {
  return formatTimestamp(totalSeconds, '.');
}

function toSeconds(match: RegExpExecArray): number {
  const hours = Number.parseInt(match[1] ?? '0', 10);
  const minutes = Number.parseInt(match[2] ?? '0', 10);
  const seconds = Number.parseInt(match[3] ?? '0', 10);
  const millis = Number.parseInt(match[4] ?? '0', 10);
  return hours * 3600 + minutes * 60 + seconds + millis / 1000;
}

export function parseTimestamp(value: string, format: SubtitleFormat): number | null {
  const pattern = format === 'srt' ? SRT_TIMESTAMP_PATTERN : VTT_TIMESTAMP_PATTERN;
  const match = pattern.exec(value.trim());
  return match ? toSeconds(match) : null;
}

function parseTimingLine(
  line: string,
  format: SubtitleFormat
): { startTime: number; endTime: number } | null {
  const parts = line.split('-->').map((part) => part.trim());
  if (parts.length !== 2) {
    return null;
  }

  // WebVTT allows cue settings after the end timestamp.
  const endToken = (parts[1] ?? '').split(/\s+/)[0] ?? '';
  const startTime = parseTimestamp(parts[0] ?? '', format);
  const endTime = parseTimestamp(endToken, format);
  if (startTime === null || endTime === null) {
    return null;
  }
  return { startTime, endTime };
}

function splitBlocks(content: string): string[][] {
  const lines = content.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n').split('\n');
  const blocks: string[][] = [];
  let current: string[] = [];

  for (const line of lines) {
    if (line.trim() === '') {
      if (current.length > 0) {
        blocks.push(current);
        current = [];
      }
      continue;
    }
    current.push(line);
  }

  if (current.length > 0) {
    blocks.push(current);
  }
  return blocks;
}

export function parseSrt(content: string): SubtitleDocument {
  const entries: SubtitleEntry[] = [];

  for (const block of splitBlocks(content)) {
    const timingAt = block.findIndex((line) => line.includes('-->'));
    if (timingAt < 0) {
      throw new InvalidDocumentError(`SRT block without timing line: "${block.join(' / ')}".`);
    }

    const timing = parseTimingLine(block[timingAt] ?? '', 'srt');
    if (!timing) {
      throw new InvalidDocumentError(`Malformed SRT timing line: "${block[timingAt] ?? ''}".`);
    }

    const declaredIndex =
      timingAt > 0 ? Number.parseInt((block[timingAt - 1] ?? '').trim(), 10) : Number.NaN;
    entries.push({
      index: Number.isInteger(declaredIndex) ? declaredIndex : entries.length + 1,
      startTime: timing.startTime,
      endTime: timing.endTime,
      text: block.slice(timingAt + 1).join('\n')
    });
  }

  return createSubtitleDocument(entries);
}

export function parseWebVtt(content: string): SubtitleDocument {
  const blocks = splitBlocks(content);
  const header = blocks[0]?.[0]?.trim() ?? '';
  if (!header.startsWith('WEBVTT')) {
    throw new InvalidDocumentError('WebVTT content must start with a WEBVTT header.');
  }

  const entries: SubtitleEntry[] = [];
  for (const block of blocks.slice(1)) {
    const first = block[0]?.trim() ?? '';
    if (first.startsWith('NOTE') || first === 'STYLE' || first === 'REGION') {
      continue;
    }

    const timingAt = block.findIndex((line) => line.includes('-->'));
    const timing = timingAt >= 0 ? parseTimingLine(block[timingAt] ?? '', 'vtt') : null;
    if (!timing) {
      throw new InvalidDocumentError(`Malformed WebVTT cue: "${block.join(' / ')}".`);
    }

    entries.push({
      index: entries.length + 1,
      startTime: timing.startTime,
      endTime: timing.endTime,
      text: block.slice(timingAt + 1).join('\n')
    });
  }

  return createSubtitleDocument(entries);
}

export function renderSrt(document: SubtitleDocument): string {
  const blocks = document.entries.map((entry) =>
    [
      String(entry.index),
      `${toSrtTimestamp(entry.startTime)} --> ${toSrtTimestamp(entry.endTime)}`,
      getOutputText(entry)
    ].join('\n')
  );
  return `${blocks.join('\n\n')}\n`;
}

export function renderWebVtt(document: SubtitleDocument): string {
  const lines = ['WEBVTT', ''];
  for (const entry of document.entries) {
    lines.push(`${toVttTimestamp(entry.startTime)} --> ${toVttTimestamp(entry.endTime)}`);
    lines.push(getOutputText(entry));
    lines.push('');
  }
  return `${lines.join('\n')}\n`;
}

export function parseSubtitles(content: string, format: SubtitleFormat): SubtitleDocument {
  return format === 'srt' ? parseSrt(content) : parseWebVtt(content);
}

export function renderSubtitles(document: SubtitleDocument, format: SubtitleFormat): string {
  return format === 'srt' ? renderSrt(document) : renderWebVtt(document);
}

export function detectSubtitleFormat(filePath: string): SubtitleFormat {
  const extension = path.extname(filePath).toLowerCase();
  if (extension === '.srt') {
    return 'srt';
  }
  if (extension === '.vtt') {
    return 'vtt';
  }
  throw new InvalidDocumentError(`Unsupported subtitle file extension "${extension || filePath}".`);
}
