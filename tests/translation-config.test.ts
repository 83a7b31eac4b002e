import assert from 'node:assert/strict';
import path from 'node:path';
import test from 'node:test';
import {
  getCachePath,
  getNameRegistryPath,
  parseProviderChain,
  resolveTranslationConfig
} from '../src/config/translation';
import { isConfigurationError } from '../src/services/subtitle-translation/errors';
import { withEnv } from './helpers/temp-env';

test('resolveTranslationConfig falls back to environment defaults', async () => {
  await withEnv({ OPENROUTER_API_KEY: 'test-secret' }, async () => {
    const config = resolveTranslationConfig();

    assert.deepEqual(
      config.providerChain.map((spec) => [spec.kind, spec.id]),
      [
        ['local', 'local'],
        ['openrouter', 'openrouter']
      ]
    );
    assert.equal(config.batchSize, 16);
    assert.equal(config.maxRetries, 3);
    assert.equal(config.backoffBaseMs, 500);
    assert.equal(config.concurrency, 2);
    assert.equal(config.sourceLanguage, 'zh');
    assert.equal(config.targetLanguage, 'vi');
    assert.equal(config.preserveNames, true);
    assert.equal(config.nameMinOccurrences, 2);
    assert.equal(config.dataRootPath, '.data');

    const remote = config.providerChain[1];
    assert.equal(remote?.kind, 'openrouter');
    if (remote?.kind === 'openrouter') {
      assert.equal(remote.apiKey, 'test-secret');
      assert.equal(remote.model, 'openchat/openchat-7b');
      assert.equal(remote.baseUrl, 'https://openrouter.ai/api/v1/chat/completions');
      assert.equal(remote.maxConcurrency, 2);
    }
  });
});

test('environment variables override defaults and invalid integers are ignored', async () => {
  await withEnv(
    {
      TRANSLATION_PROVIDER_CHAIN: 'gemini',
      GEMINI_API_KEY: 'test-secret',
      TRANSLATION_BATCH_SIZE: 'abc',
      TRANSLATION_MAX_RETRIES: '0',
      TRANSLATION_CONCURRENCY: '0',
      TRANSLATION_TARGET_LANGUAGE: 'en',
      TRANSLATION_PRESERVE_NAMES: 'no'
    },
    async () => {
      const config = resolveTranslationConfig();
      assert.deepEqual(
        config.providerChain.map((spec) => spec.kind),
        ['gemini']
      );
      assert.equal(config.batchSize, 16);
      assert.equal(config.maxRetries, 0);
      assert.equal(config.concurrency, 2);
      assert.equal(config.targetLanguage, 'en');
      assert.equal(config.preserveNames, false);
    }
  );
});

test('explicit overrides take precedence over the environment', async () => {
  await withEnv({ TRANSLATION_BATCH_SIZE: '40' }, async () => {
    const config = resolveTranslationConfig({
      providerChain: [
        { kind: 'local', id: 'fast', maxBatchSize: 4 },
        { kind: 'gemini', apiKey: 'test-secret', model: 'gemini-test' }
      ],
      batchSize: 2,
      targetLanguage: 'fr',
      contextHint: 'period drama'
    });

    assert.equal(config.batchSize, 2);
    assert.equal(config.targetLanguage, 'fr');
    assert.equal(config.contextHint, 'period drama');
    assert.deepEqual(config.providerChain[0], {
      kind: 'local',
      id: 'fast',
      maxBatchSize: 4,
      maxConcurrency: 1
    });
    assert.deepEqual(config.providerChain[1], {
      kind: 'gemini',
      id: 'gemini',
      apiKey: 'test-secret',
      model: 'gemini-test',
      temperature: 0,
      timeoutMs: 60000,
      maxConcurrency: 2
    });
  });
});

test('a remote provider without an API key is a configuration error', async () => {
  await withEnv({}, async () => {
    assert.throws(
      () => resolveTranslationConfig(),
      (error: unknown) =>
        isConfigurationError(error) &&
        error.message === 'Provider "openrouter" is in the chain but has no API key.' &&
        error.operatorHint.includes('OPENROUTER_API_KEY')
    );
  });
});

test('unknown kinds, empty chains and duplicate ids are rejected', async () => {
  await withEnv({ TRANSLATION_PROVIDER_CHAIN: 'local,deepl' }, async () => {
    assert.throws(() => resolveTranslationConfig(), {
      name: 'ConfigurationError',
      message: 'Unknown translation provider "deepl".'
    });
    assert.throws(() => resolveTranslationConfig({ providerChain: [] }), {
      name: 'ConfigurationError',
      message: 'The provider chain is empty.'
    });
    assert.throws(() => resolveTranslationConfig({ providerChain: ['local', 'local'] }), {
      name: 'ConfigurationError',
      message: 'Provider id "local" appears twice in the chain.'
    });
  });
});

test('numeric options are validated', async () => {
  await withEnv({}, async () => {
    const chain = ['local' as const];
    assert.throws(() => resolveTranslationConfig({ providerChain: chain, batchSize: 0 }), {
      message: 'batchSize must be an integer >= 1, received 0.'
    });
    assert.throws(() => resolveTranslationConfig({ providerChain: chain, maxRetries: -1 }), {
      message: 'maxRetries must be an integer >= 0, received -1.'
    });
    assert.throws(() => resolveTranslationConfig({ providerChain: chain, concurrency: 1.5 }), {
      message: 'concurrency must be an integer >= 1, received 1.5.'
    });
    assert.throws(() => resolveTranslationConfig({ providerChain: chain, backoffBaseMs: -5 }), {
      message: 'backoffBaseMs must be a non-negative number, received -5.'
    });
    assert.throws(
      () => resolveTranslationConfig({ providerChain: [{ kind: 'local', maxBatchSize: 0 }] }),
      { message: 'local.maxBatchSize must be an integer >= 1, received 0.' }
    );
  });
});

test('parseProviderChain normalizes case and skips blanks', () => {
  assert.deepEqual(parseProviderChain(' Local , GEMINI ,'), ['local', 'gemini']);
});

test('storage paths live under the data root', () => {
  const config = { dataRootPath: path.join('tmp', 'project') };
  assert.equal(getCachePath(config), path.join('tmp', 'project', 'translation-cache.json'));
  assert.equal(getNameRegistryPath(config), path.join('tmp', 'project', 'name-mappings.json'));
});
