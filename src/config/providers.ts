import { readEnvInt, readEnvTrimmed } from '@/config/env';

const DEFAULT_OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1/chat/completions';

export function getOpenRouterSettings() {
  return {
    baseUrl: readEnvTrimmed('OPENROUTER_BASE_URL') ?? DEFAULT_OPENROUTER_BASE_URL,
    appName: readEnvTrimmed('OPENROUTER_APP_NAME') ?? 'subtitle-translation',
    siteUrl: readEnvTrimmed('OPENROUTER_SITE_URL'),
    temperature: 0,
    maxTokens: readEnvInt('OPENROUTER_MAX_TOKENS', 4000, 1),
    timeoutMs: readEnvInt('OPENROUTER_TIMEOUT_MS', 60000, 1),
    maxConcurrency: readEnvInt('OPENROUTER_MAX_CONCURRENCY', 2, 1)
  };
}

export function getGeminiSettings() {
  return {
    temperature: 0,
    timeoutMs: readEnvInt('GEMINI_TIMEOUT_MS', 60000, 1),
    maxConcurrency: readEnvInt('GEMINI_MAX_CONCURRENCY', 2, 1)
  };
}

export function getLocalModelSettings() {
  return {
    maxBatchSize: readEnvInt('LOCAL_MODEL_MAX_BATCH_SIZE', 8, 1),
    maxConcurrency: readEnvInt('LOCAL_MODEL_MAX_CONCURRENCY', 1, 1)
  };
}
