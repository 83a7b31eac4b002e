import assert from 'node:assert/strict';
import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import test from 'node:test';
import { readJsonFile, updateJsonFile, writeJsonFile } from '../src/lib/json-store';
import { withTempDataEnv } from './helpers/temp-env';

function parseCounter(value: unknown): { count: number } {
  if (typeof value === 'object' && value !== null && 'count' in value && typeof value.count === 'number') {
    return { count: value.count };
  }
  return { count: 0 };
}

test('readJsonFile returns the default for a missing file', async () => {
  await withTempDataEnv('json-missing', async ({ root }) => {
    const value = await readJsonFile(path.join(root, 'absent.json'), { count: 7 }, parseCounter);
    assert.deepEqual(value, { count: 7 });
  });
});

test('writeJsonFile creates parent directories and round-trips through the parser', async () => {
  await withTempDataEnv('json-write', async ({ root }) => {
    const filePath = path.join(root, 'nested', 'dir', 'counter.json');
    await writeJsonFile(filePath, { count: 3 });

    assert.deepEqual(await readJsonFile(filePath, { count: 0 }, parseCounter), { count: 3 });
    assert.equal(await readFile(filePath, 'utf8'), '{\n  "count": 3\n}');
  });
});

test('updateJsonFile serializes concurrent read-modify-write cycles', async () => {
  await withTempDataEnv('json-update', async ({ root }) => {
    const filePath = path.join(root, 'counter.json');

    await Promise.all(
      Array.from({ length: 20 }, () =>
        updateJsonFile(filePath, { count: 0 }, parseCounter, (current) => ({ count: current.count + 1 }))
      )
    );

    assert.deepEqual(await readJsonFile(filePath, { count: 0 }, parseCounter), { count: 20 });
  });
});

test('readJsonFile surfaces corrupt JSON instead of resetting the file', async () => {
  await withTempDataEnv('json-corrupt', async ({ root }) => {
    const filePath = path.join(root, 'corrupt.json');
    await writeFile(filePath, '{"count": nope}', 'utf8');

    await assert.rejects(() => readJsonFile(filePath, { count: 0 }, parseCounter), SyntaxError);
  });
});
