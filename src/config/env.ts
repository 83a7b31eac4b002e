export function readEnvTrimmed(key: string): string | undefined {
  const value = process.env[key];
  if (typeof value !== 'string') {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function readEnvInt(key: string, fallback: number, min: number): number {
  const raw = readEnvTrimmed(key);
  if (!raw) {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < min) {
    return fallback;
  }
  return parsed;
}

export function readEnvBoolean(key: string, fallback: boolean): boolean {
  const raw = readEnvTrimmed(key)?.toLowerCase();
  if (raw === 'true' || raw === '1' || raw === 'yes') {
    return true;
  }
  if (raw === 'false' || raw === '0' || raw === 'no') {
    return false;
  }
  return fallback;
}

// Read lazily so tests can swap process.env between runs.
export function readEnv() {
  return {
    logLevel: readEnvTrimmed('LOG_LEVEL') ?? 'info',
    dataRootPath: readEnvTrimmed('DATA_ROOT_PATH') ?? '.data',
    providerChain: readEnvTrimmed('TRANSLATION_PROVIDER_CHAIN') ?? 'local,openrouter',
    batchSize: readEnvInt('TRANSLATION_BATCH_SIZE', 16, 1),
    maxRetries: readEnvInt('TRANSLATION_MAX_RETRIES', 3, 0),
    backoffBaseMs: readEnvInt('TRANSLATION_BACKOFF_BASE_MS', 500, 0),
    concurrency: readEnvInt('TRANSLATION_CONCURRENCY', 2, 1),
    sourceLanguage: readEnvTrimmed('TRANSLATION_SOURCE_LANGUAGE') ?? 'zh',
    targetLanguage: readEnvTrimmed('TRANSLATION_TARGET_LANGUAGE') ?? 'vi',
    preserveNames: readEnvBoolean('TRANSLATION_PRESERVE_NAMES', true),
    contextHint: readEnvTrimmed('TRANSLATION_CONTEXT_HINT'),
    nameMinOccurrences: readEnvInt('TRANSLATION_NAME_MIN_OCCURRENCES', 2, 1),
    openRouterApiKey: readEnvTrimmed('OPENROUTER_API_KEY') ?? '',
    openRouterModel: readEnvTrimmed('OPENROUTER_MODEL') ?? 'openchat/openchat-7b',
    geminiApiKey: readEnvTrimmed('GEMINI_API_KEY') ?? '',
    geminiModel: readEnvTrimmed('GEMINI_MODEL') ?? 'gemini-2.5-flash'
  };
}

export type Env = ReturnType<typeof readEnv>;
