import assert from 'node:assert/strict';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import test from 'node:test';
import {
  CacheStore,
  buildCacheKey,
  normalizeCacheText
} from '../../src/services/subtitle-translation/cache';
import { withTempDataEnv } from '../helpers/temp-env';

test('normalizeCacheText folds case, whitespace and Unicode composition', () => {
  assert.equal(normalizeCacheText('  Hello\n  World '), 'hello world');
  assert.equal(normalizeCacheText('Cafe\u0301'), 'caf\u00e9');
});

test('buildCacheKey is scoped by target language and provider', () => {
  const base = buildCacheKey({ text: 'Hello  world', targetLanguage: 'VI', providerId: 'local' });

  assert.match(base, /^[0-9a-f]{64}$/);
  assert.equal(buildCacheKey({ text: ' hello world', targetLanguage: 'vi', providerId: 'local' }), base);
  assert.notEqual(buildCacheKey({ text: 'Hello world', targetLanguage: 'en', providerId: 'local' }), base);
  assert.notEqual(buildCacheKey({ text: 'Hello world', targetLanguage: 'vi', providerId: 'gemini' }), base);
});

test('a miss is undefined and a hit returns the stored text', async () => {
  const cache = new CacheStore();
  const key = { text: '你好', targetLanguage: 'vi', providerId: 'local' };

  assert.equal(cache.get(key), undefined);
  await cache.put(key, 'Xin chào');
  assert.equal(cache.get(key), 'Xin chào');
  assert.equal(cache.size, 1);

  assert.deepEqual(cache.getMany(['你好', '再见'], { targetLanguage: 'vi', providerId: 'local' }), [
    'Xin chào',
    undefined
  ]);
});

test('the last write for a key wins', async () => {
  const cache = new CacheStore();
  const key = { text: '你好', targetLanguage: 'vi', providerId: 'local' };
  await cache.put(key, 'Chào');
  await cache.put(key, 'Xin chào');
  assert.equal(cache.get(key), 'Xin chào');
  assert.equal(cache.size, 1);
});

test('entries survive a reload and concurrent writes are all kept', async () => {
  await withTempDataEnv('cache', async ({ root }) => {
    const storagePath = path.join(root, 'translation-cache.json');
    const now = () => new Date('2026-01-02T03:04:05.000Z');
    const cache = new CacheStore({ storagePath, now });
    const scope = { targetLanguage: 'vi', providerId: 'openrouter' };

    await Promise.all([
      cache.putMany([{ key: { ...scope, text: 'one' }, text: 'một' }]),
      cache.putMany([{ key: { ...scope, text: 'two' }, text: 'hai' }]),
      cache.put({ ...scope, text: 'three' }, 'ba')
    ]);

    const reloaded = new CacheStore({ storagePath });
    await reloaded.load();
    assert.equal(reloaded.size, 3);
    assert.deepEqual(reloaded.getMany(['one', 'two', 'three'], scope), ['một', 'hai', 'ba']);

    const raw: unknown = JSON.parse(await readFile(storagePath, 'utf8'));
    const key = buildCacheKey({ ...scope, text: 'one' });
    assert.deepEqual(raw, {
      entries: {
        [key]: { key, text: 'một', savedAt: '2026-01-02T03:04:05.000Z' },
        [buildCacheKey({ ...scope, text: 'two' })]: {
          key: buildCacheKey({ ...scope, text: 'two' }),
          text: 'hai',
          savedAt: '2026-01-02T03:04:05.000Z'
        },
        [buildCacheKey({ ...scope, text: 'three' })]: {
          key: buildCacheKey({ ...scope, text: 'three' }),
          text: 'ba',
          savedAt: '2026-01-02T03:04:05.000Z'
        }
      }
    });
  });
});

test('load on a missing file leaves the cache empty', async () => {
  await withTempDataEnv('cache-empty', async ({ root }) => {
    const cache = new CacheStore({ storagePath: path.join(root, 'none.json') });
    await cache.load();
    assert.equal(cache.size, 0);
  });
});
