import { createHash } from 'node:crypto';
import { readJsonFile, updateJsonFile } from '@/lib/json-store';

export interface CacheKey {
  text: string;
  targetLanguage: string;
  providerId: string;
}

export interface CacheEntry {
  key: string;
  text: string;
  savedAt: string;
}

interface TranslationCacheDb {
  entries: Record<string, CacheEntry>;
}

const EMPTY_CACHE: TranslationCacheDb = { entries: {} };

function parseCacheDb(value: unknown): TranslationCacheDb {
  if (typeof value !== 'object' || value === null || !('entries' in value)) {
    return EMPTY_CACHE;
  }
  const rawEntries = value.entries;
  if (typeof rawEntries !== 'object' || rawEntries === null) {
    return EMPTY_CACHE;
  }

  const pairs: Array<[string, unknown]> = Object.entries(rawEntries);
  const entries: Record<string, CacheEntry> = {};
  for (const [hash, entry] of pairs) {
    if (
      typeof entry === 'object' &&
      entry !== null &&
      'text' in entry &&
      typeof entry.text === 'string' &&
      'savedAt' in entry &&
      typeof entry.savedAt === 'string'
    ) {
      entries[hash] = { key: hash, text: entry.text, savedAt: entry.savedAt };
    }
  }
  return { entries };
}

export function normalizeCacheText(text: string): string {
  return text.normalize('NFC').trim().replace(/\s+/g, ' ').toLowerCase();
}

export function buildCacheKey(key: CacheKey): string {
  return createHash('sha256')
    .update(
      JSON.stringify({
        text: normalizeCacheText(key.text),
        targetLanguage: key.targetLanguage.trim().toLowerCase(),
        providerId: key.providerId
      })
    )
    .digest('hex');
}

export interface CacheStoreOptions {
  storagePath?: string;
  now?: () => Date;
}

/**
 * Advisory translation cache. Reads and writes on the in-memory map are
 * synchronous, so interleaved batches never observe a half-written entry;
 * file persistence is serialized per path by the JSON store.
 */
export class CacheStore {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly storagePath: string | undefined;
  private readonly now: () => Date;

  constructor(options: CacheStoreOptions = {}) {
    this.storagePath = options.storagePath;
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.entries.size;
  }

  async load(): Promise<void> {
    if (!this.storagePath) {
      return;
    }
    const db = await readJsonFile(this.storagePath, EMPTY_CACHE, parseCacheDb);
    for (const entry of Object.values(db.entries)) {
      this.entries.set(entry.key, entry);
    }
  }

  get(key: CacheKey): string | undefined {
    return this.entries.get(buildCacheKey(key))?.text;
  }

  getMany(texts: string[], scope: Omit<CacheKey, 'text'>): Array<string | undefined> {
    return texts.map((text) => this.get({ ...scope, text }));
  }

  async put(key: CacheKey, text: string): Promise<void> {
    await this.putMany([{ key, text }]);
  }

  async putMany(items: Array<{ key: CacheKey; text: string }>): Promise<void> {
    if (items.length === 0) {
      return;
    }

    const savedAt = this.now().toISOString();
    const written: CacheEntry[] = [];
    for (const item of items) {
      const entry: CacheEntry = { key: buildCacheKey(item.key), text: item.text, savedAt };
      this.entries.set(entry.key, entry);
      written.push(entry);
    }

    await this.persist(written);
  }

  private async persist(written: CacheEntry[]): Promise<void> {
    if (!this.storagePath) {
      return;
    }

    await updateJsonFile(this.storagePath, EMPTY_CACHE, parseCacheDb, (current) => {
      const next = { ...current.entries };
      for (const entry of written) {
        next[entry.key] = entry;
      }
      return { entries: next };
    });
  }
}
