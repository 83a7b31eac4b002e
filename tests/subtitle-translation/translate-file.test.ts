import assert from 'node:assert/strict';
import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import test from 'node:test';
import {
  translateSubtitleDocument,
  translateSubtitleFile
} from '../../src/services/subtitle-translation/index';
import { createSubtitleDocument } from '../../src/services/subtitle-translation/document';
import { withTempDataEnv } from '../helpers/temp-env';
import { FakeModel, makeEntries, noSleep, silentLogger } from '../helpers/translation-fakes';

const SOURCE_SRT = [
  '1',
  '00:00:01,000 --> 00:00:02,000',
  '李明，你好',
  '',
  '2',
  '00:00:03,000 --> 00:00:04,000',
  '李明，再见',
  '',
  '3',
  '00:00:05,000 --> 00:00:06,000',
  '谢谢',
  ''
].join('\n');

test('translateSubtitleFile translates an SRT file into WebVTT and persists names and cache', async () => {
  await withTempDataEnv('translate-file', async ({ root }) => {
    const inputPath = path.join(root, 'episode.srt');
    const outputPath = path.join(root, 'out', 'episode.vi.vtt');
    await writeFile(inputPath, SOURCE_SRT, 'utf8');
    const model = new FakeModel();

    const summary = await translateSubtitleFile({
      inputPath,
      outputPath,
      config: {
        providerChain: ['local'],
        batchSize: 2,
        concurrency: 1,
        sourceLanguage: 'zh',
        targetLanguage: 'vi'
      },
      localModel: model,
      sleep: noSleep,
      logger: silentLogger()
    });

    assert.equal(summary.translatedEntries, 3);
    assert.deepEqual(summary.degradedEntries, []);
    assert.deepEqual(model.chunks, [['[[N1]]，你好', '[[N1]]，再见'], ['谢谢']]);
    assert.equal(
      await readFile(outputPath, 'utf8'),
      [
        'WEBVTT',
        '',
        '00:00:01.000 --> 00:00:02.000',
        'vi:李明，你好',
        '',
        '00:00:03.000 --> 00:00:04.000',
        'vi:李明，再见',
        '',
        '00:00:05.000 --> 00:00:06.000',
        'vi:谢谢',
        '',
        ''
      ].join('\n')
    );

    const names: unknown = JSON.parse(await readFile(path.join(root, 'name-mappings.json'), 'utf8'));
    assert.deepEqual(names, { nextId: 2, mappings: [{ source: '李明', placeholder: '[[N1]]' }] });

    const cache: unknown = JSON.parse(await readFile(path.join(root, 'translation-cache.json'), 'utf8'));
    assert.ok(typeof cache === 'object' && cache !== null && 'entries' in cache);
    assert.ok(typeof cache.entries === 'object' && cache.entries !== null);
    assert.equal(Object.keys(cache.entries).length, 3);
  });
});

test('translateSubtitleDocument leaves names alone when preservation is off', async () => {
  await withTempDataEnv('translate-plain', async () => {
    const model = new FakeModel();

    const { document } = await translateSubtitleDocument(
      createSubtitleDocument(makeEntries(['李明，你好', '李明，再见'])),
      {
        config: { providerChain: ['local'], preserveNames: false, targetLanguage: 'en' },
        localModel: model,
        logger: silentLogger()
      }
    );

    assert.deepEqual(model.chunks, [['李明，你好', '李明，再见']]);
    assert.deepEqual(
      document.entries.map((entry) => entry.translatedText),
      ['en:李明，你好', 'en:李明，再见']
    );
  });
});

test('a misconfigured chain fails before any file is written', async () => {
  await withTempDataEnv('translate-misconfigured', async ({ root }) => {
    const inputPath = path.join(root, 'episode.srt');
    await writeFile(inputPath, SOURCE_SRT, 'utf8');

    await assert.rejects(
      translateSubtitleFile({
        inputPath,
        outputPath: path.join(root, 'episode.vi.srt'),
        config: { providerChain: ['local'] },
        logger: silentLogger()
      }),
      { name: 'ConfigurationError' }
    );
    await assert.rejects(readFile(path.join(root, 'episode.vi.srt'), 'utf8'), { code: 'ENOENT' });
  });
});
