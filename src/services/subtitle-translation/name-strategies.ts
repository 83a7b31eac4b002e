import { readFileSync } from 'node:fs';
import { classifyScript } from '@/services/subtitle-translation/language-classifier';
import type { NameSpan } from '@/services/subtitle-translation/types';

export interface NameExtractionStrategy {
  readonly id: string;
  find(text: string): NameSpan[];
  prime?(texts: string[]): void;
}

function loadWordList(fileName: string): Set<string> {
  const raw: unknown = JSON.parse(
    readFileSync(new URL(`../../../data/${fileName}`, import.meta.url), 'utf8')
  );
  if (!Array.isArray(raw)) {
    throw new Error(`Word list ${fileName} must be a JSON array.`);
  }
  return new Set(raw.filter((item): item is string => typeof item === 'string'));
}

let cjkCommonWords: Set<string> | undefined;
let capitalizedStopwords: Set<string> | undefined;

function getCjkCommonWords(): Set<string> {
  if (!cjkCommonWords) {
    cjkCommonWords = loadWordList('cjk-common-words.json');
  }
  return cjkCommonWords;
}

function getCapitalizedStopwords(): Set<string> {
  if (!capitalizedStopwords) {
    capitalizedStopwords = loadWordList('capitalized-stopwords.json');
  }
  return capitalizedStopwords;
}

const HAN_RUN_PATTERN = /\p{Script=Han}{2,4}/gu;

export class CjkNameStrategy implements NameExtractionStrategy {
  readonly id = 'cjk';

  constructor(private readonly commonWords: Set<string> = getCjkCommonWords()) {}

  find(text: string): NameSpan[] {
    const spans: NameSpan[] = [];
    for (const match of text.matchAll(HAN_RUN_PATTERN)) {
      const name = match[0];
      const start = match.index ?? 0;
      if (this.commonWords.has(name)) {
        continue;
      }
      spans.push({ name, start, end: start + name.length });
    }
    return spans;
  }
}

const CAPITALIZED_PHRASE_PATTERN = /\p{Lu}[\p{Ll}\p{M}-]+(?:[ \t]+\p{Lu}[\p{Ll}\p{M}-]+)*/gu;
const SENTENCE_BREAK_PATTERN = /[.!?…:;"“”«»()\-–—]$/u;

function opensSentence(text: string, start: number): boolean {
  const before = text.slice(0, start).trimEnd();
  return before.length === 0 || SENTENCE_BREAK_PATTERN.test(before);
}

export class CapitalizedNameStrategy implements NameExtractionStrategy {
  readonly id = 'capitalized';

  constructor(private readonly stopwords: Set<string> = getCapitalizedStopwords()) {}

  find(text: string): NameSpan[] {
    const spans: NameSpan[] = [];

    for (const match of text.matchAll(CAPITALIZED_PHRASE_PATTERN)) {
      const base = match.index ?? 0;
      const words = [...match[0].matchAll(/\S+/g)].map((word) => ({
        value: word[0],
        start: base + (word.index ?? 0)
      }));

      let first = 0;
      let last = words.length - 1;
      while (first <= last && this.stopwords.has(words[first]?.value ?? '')) {
        first += 1;
      }
      while (last >= first && this.stopwords.has(words[last]?.value ?? '')) {
        last -= 1;
      }

      const head = words[first];
      const tail = words[last];
      if (!head || !tail || first > last) {
        continue;
      }

      // A lone capitalized word opening a sentence is usually not a name.
      if (first === last && first === 0 && opensSentence(text, base)) {
        continue;
      }

      const end = tail.start + tail.value.length;
      spans.push({ name: text.slice(head.start, end), start: head.start, end });
    }

    return spans;
  }
}

export class DictionaryOnlyStrategy implements NameExtractionStrategy {
  readonly id = 'dictionary';

  find(_text: string): NameSpan[] {
    return [];
  }
}

/**
 * Keeps only the candidates of an inner strategy that repeat across the
 * document. Until `prime` runs, every inner candidate passes.
 */
export class FrequentNameStrategy implements NameExtractionStrategy {
  readonly id: string;
  private accepted: Set<string> | undefined;

  constructor(
    private readonly inner: NameExtractionStrategy,
    private readonly minOccurrences: number
  ) {
    this.id = `frequent(${inner.id})`;
  }

  prime(texts: string[]): void {
    const counts = new Map<string, number>();
    for (const text of texts) {
      for (const span of this.inner.find(text)) {
        counts.set(span.name, (counts.get(span.name) ?? 0) + 1);
      }
    }

    this.accepted = new Set(
      [...counts.entries()]
        .filter(([, count]) => count >= this.minOccurrences)
        .map(([name]) => name)
    );
  }

  find(text: string): NameSpan[] {
    const spans = this.inner.find(text);
    const accepted = this.accepted;
    return accepted ? spans.filter((span) => accepted.has(span.name)) : spans;
  }
}

export function createNameStrategy(
  sourceLanguage: string,
  options: { minOccurrences?: number } = {}
): NameExtractionStrategy {
  const minOccurrences = options.minOccurrences ?? 2;

  const scriptClass = classifyScript(sourceLanguage);
  switch (scriptClass) {
    case 'han':
      return new FrequentNameStrategy(new CjkNameStrategy(), minOccurrences);
    case 'cased':
      return new FrequentNameStrategy(new CapitalizedNameStrategy(), minOccurrences);
    case 'uncased':
      return new DictionaryOnlyStrategy();
    default: {
      const exhaustiveCheck: never = scriptClass;
      throw new Error(`Unsupported script class: ${String(exhaustiveCheck)}`);
    }
  }
}
