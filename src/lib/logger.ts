import pino, { type Logger } from 'pino';
import { readEnv } from '@/config/env';

export type { Logger };

const REDACTED_PATHS = [
  'apiKey',
  '*.apiKey',
  'authorization',
  '*.authorization',
  'headers.Authorization'
];

let rootLogger: Logger | undefined;

export function createLogger(options: { level?: string; name?: string } = {}): Logger {
  return pino({
    name: options.name ?? 'subtitle-translation',
    level: options.level ?? readEnv().logLevel,
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' }
  });
}

export function getLogger(scope?: string): Logger {
  if (!rootLogger) {
    rootLogger = createLogger();
  }
  return scope ? rootLogger.child({ scope }) : rootLogger;
}
