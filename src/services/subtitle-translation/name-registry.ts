import { getLogger, type Logger } from '@/lib/logger';
import { updateJsonFile, readJsonFile } from '@/lib/json-store';
import {
  DictionaryOnlyStrategy,
  type NameExtractionStrategy
} from '@/services/subtitle-translation/name-strategies';
import type {
  NameMapping,
  NamePreservationLoss,
  NameSpan,
  NameSubstitution
} from '@/services/subtitle-translation/types';

interface NameRegistryDb {
  nextId: number;
  mappings: NameMapping[];
}

const EMPTY_DB: NameRegistryDb = { nextId: 1, mappings: [] };

const PLACEHOLDER_PATTERN = /\[\[\s*N\s*(\d+)\s*\]\]/g;
const HAN_CHAR = /\p{Script=Han}/u;
const WORD_CHAR = /[\p{L}\p{N}]/u;

function parseRegistryDb(value: unknown): NameRegistryDb {
  if (typeof value !== 'object' || value === null) {
    return EMPTY_DB;
  }

  const nextId = 'nextId' in value && typeof value.nextId === 'number' ? value.nextId : 1;
  const rawMappings: unknown[] = 'mappings' in value && Array.isArray(value.mappings) ? value.mappings : [];
  const mappings: NameMapping[] = [];
  for (const item of rawMappings) {
    if (
      typeof item === 'object' &&
      item !== null &&
      'source' in item &&
      typeof item.source === 'string' &&
      'placeholder' in item &&
      typeof item.placeholder === 'string'
    ) {
      const target = 'target' in item && typeof item.target === 'string' ? item.target : undefined;
      mappings.push({ source: item.source, placeholder: item.placeholder, target });
    }
  }
  return { nextId, mappings };
}

function toPlaceholder(id: number): string {
  return `[[N${id}]]`;
}

function hasBoundaryAt(text: string, position: number, edgeChar: string): boolean {
  // Han text has no word boundaries, so any occurrence counts.
  if (HAN_CHAR.test(edgeChar)) {
    return true;
  }
  const neighbour = text.charAt(position);
  return neighbour === '' || !WORD_CHAR.test(neighbour);
}

function selectNonOverlapping(spans: NameSpan[]): NameSpan[] {
  const byPriority = [...spans].sort(
    (a, b) => b.end - b.start - (a.end - a.start) || a.start - b.start
  );
  const picked: NameSpan[] = [];
  for (const span of byPriority) {
    if (picked.every((other) => span.end <= other.start || span.start >= other.end)) {
      picked.push(span);
    }
  }
  return picked.sort((a, b) => a.start - b.start);
}

export interface NameRegistryOptions {
  strategy?: NameExtractionStrategy;
  storagePath?: string;
  logger?: Logger;
}

export interface PreprocessResult {
  text: string;
  substitutions: NameSubstitution[];
}

export interface PostprocessResult {
  text: string;
  losses: NamePreservationLoss[];
}

/**
 * Owns the name mapping table for one project. Pass the same instance to
 * every batch of a run; separate projects get separate registries.
 */
export class NameRegistry {
  private readonly bySource = new Map<string, NameMapping>();
  private readonly byPlaceholder = new Map<string, NameMapping>();
  private nextId = 1;
  private readonly strategy: NameExtractionStrategy;
  private readonly storagePath: string | undefined;
  private readonly logger: Logger;

  constructor(options: NameRegistryOptions = {}) {
    this.strategy = options.strategy ?? new DictionaryOnlyStrategy();
    this.storagePath = options.storagePath;
    this.logger = options.logger ?? getLogger('name-registry');
  }

  async load(): Promise<void> {
    if (!this.storagePath) {
      return;
    }
    const db = await readJsonFile(this.storagePath, EMPTY_DB, parseRegistryDb);
    for (const mapping of db.mappings) {
      this.index(mapping);
    }
    this.nextId = Math.max(this.nextId, db.nextId);
  }

  async save(): Promise<void> {
    if (!this.storagePath) {
      return;
    }
    const snapshot = this.listMappings();
    await updateJsonFile(this.storagePath, EMPTY_DB, parseRegistryDb, (current) => {
      const merged = new Map(current.mappings.map((mapping) => [mapping.source, mapping]));
      for (const mapping of snapshot) {
        merged.set(mapping.source, mapping);
      }
      return {
        nextId: Math.max(current.nextId, this.nextId),
        mappings: [...merged.values()]
      };
    });
  }

  prime(texts: string[]): void {
    this.strategy.prime?.(texts);
  }

  addName(source: string, target?: string): NameMapping {
    const name = source.trim();
    if (!name) {
      throw new Error('Cannot register an empty name.');
    }

    const existing = this.bySource.get(name);
    if (existing) {
      if (target !== undefined) {
        existing.target = target;
      }
      return existing;
    }

    let placeholder = toPlaceholder(this.nextId);
    while (this.byPlaceholder.has(placeholder)) {
      this.nextId += 1;
      placeholder = toPlaceholder(this.nextId);
    }
    this.nextId += 1;

    const mapping: NameMapping = { source: name, placeholder, target };
    this.index(mapping);
    return mapping;
  }

  setRendering(source: string, target: string): NameMapping {
    return this.addName(source, target);
  }

  getMapping(source: string): NameMapping | undefined {
    return this.bySource.get(source);
  }

  listMappings(): NameMapping[] {
    return [...this.bySource.values()].map((mapping) => ({ ...mapping }));
  }

  extractCandidates(text: string): NameSpan[] {
    return selectNonOverlapping([...this.findRegistered(text), ...this.strategy.find(text)]);
  }

  preprocess(text: string): PreprocessResult {
    const spans = this.extractCandidates(text);
    if (spans.length === 0) {
      return { text, substitutions: [] };
    }

    const substitutions: NameSubstitution[] = [];
    let rewritten = '';
    let cursor = 0;
    for (const span of spans) {
      const mapping = this.addName(span.name);
      rewritten += text.slice(cursor, span.start) + mapping.placeholder;
      cursor = span.end;
      if (!substitutions.some((item) => item.placeholder === mapping.placeholder)) {
        substitutions.push({ source: mapping.source, placeholder: mapping.placeholder });
      }
    }
    rewritten += text.slice(cursor);

    return { text: rewritten, substitutions };
  }

  postprocess(translatedText: string, substitutions: NameSubstitution[]): PostprocessResult {
    const expected = new Set(substitutions.map((item) => item.placeholder));
    const found = new Set<string>();

    const text = translatedText.replace(PLACEHOLDER_PATTERN, (raw, id: string) => {
      const placeholder = toPlaceholder(Number.parseInt(id, 10));
      const mapping = this.byPlaceholder.get(placeholder);
      if (!mapping || !expected.has(placeholder)) {
        return raw;
      }
      found.add(placeholder);
      return mapping.target || mapping.source;
    });

    const losses = substitutions.filter((item) => !found.has(item.placeholder));
    for (const loss of losses) {
      this.logger.warn(
        { placeholder: loss.placeholder, source: loss.source },
        'name placeholder did not survive translation; leaving text unchanged'
      );
    }

    return { text, losses };
  }

  private index(mapping: NameMapping): void {
    this.bySource.set(mapping.source, mapping);
    this.byPlaceholder.set(mapping.placeholder, mapping);
  }

  private findRegistered(text: string): NameSpan[] {
    const spans: NameSpan[] = [];
    for (const name of this.bySource.keys()) {
      let from = 0;
      while (from <= text.length) {
        const start = text.indexOf(name, from);
        if (start < 0) {
          break;
        }
        const end = start + name.length;
        if (
          hasBoundaryAt(text, start - 1, name.charAt(0)) &&
          hasBoundaryAt(text, end, name.charAt(name.length - 1))
        ) {
          spans.push({ name, start, end });
        }
        from = start + 1;
      }
    }
    return spans;
  }
}
