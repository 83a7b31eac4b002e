import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';

const TRANSIENT_PARSE_RETRIES = 3;
const TRANSIENT_PARSE_RETRY_DELAY_MS = 15;

// One write queue per file so the cache and the name table do not wait on each other.
const fileLocks = new Map<string, Promise<void>>();
let tmpCounter = 0;

function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withFileLock<T>(filePath: string, fn: () => Promise<T>): Promise<T> {
  const key = path.resolve(filePath);
  const previous = fileLocks.get(key) ?? Promise.resolve();
  const run = previous.then(fn, fn);
  const settled = run.then(
    () => undefined,
    () => undefined
  );
  fileLocks.set(key, settled);
  void settled.then(() => {
    if (fileLocks.get(key) === settled) {
      fileLocks.delete(key);
    }
  });
  return run;
}

export async function readJsonFile<T>(
  filePath: string,
  defaultValue: T,
  parse: (value: unknown) => T
): Promise<T> {
  for (let attempt = 0; attempt <= TRANSIENT_PARSE_RETRIES; attempt += 1) {
    try {
      const content = await readFile(filePath, 'utf8');

      if (content.trim().length === 0) {
        if (attempt < TRANSIENT_PARSE_RETRIES) {
          await delay(TRANSIENT_PARSE_RETRY_DELAY_MS);
          continue;
        }
        return defaultValue;
      }

      const raw: unknown = JSON.parse(content);
      return parse(raw);
    } catch (error) {
      if (isMissingFileError(error)) {
        return defaultValue;
      }

      if (
        error instanceof SyntaxError &&
        error.message.includes('Unexpected end of JSON input') &&
        attempt < TRANSIENT_PARSE_RETRIES
      ) {
        await delay(TRANSIENT_PARSE_RETRY_DELAY_MS);
        continue;
      }

      throw error;
    }
  }

  return defaultValue;
}

export async function writeJsonFile<T>(filePath: string, value: T): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });

  tmpCounter += 1;
  const tmpPath = `${filePath}.${process.pid}.${Date.now()}.${tmpCounter}.tmp`;
  await writeFile(tmpPath, JSON.stringify(value, null, 2), 'utf8');
  await rename(tmpPath, filePath);
}

export async function updateJsonFile<T>(
  filePath: string,
  defaultValue: T,
  parse: (value: unknown) => T,
  mutator: (current: T) => T
): Promise<T> {
  return withFileLock(filePath, async () => {
    const current = await readJsonFile(filePath, defaultValue, parse);
    const next = mutator(current);
    await writeJsonFile(filePath, next);
    return next;
  });
}
