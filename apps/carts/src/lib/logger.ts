import type { Logger, LoggerOptions } from 'pino';
import pino from 'pino';

import type { AppConfig } from '../config';
import { sanitizeLogValue } from './log-sanitizer';

const REDACT_FIELDS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'request.headers.authorization',
  'request.headers.cookie',
  'res.headers.set-cookie',
  'response.headers.set-cookie',
  'headers.authorization',
  'headers.cookie',
  'config.redis.url',
  'config.sentry.dsn',
];

export type AppLogger = Logger;

export function buildLoggerOptions(config: AppConfig): LoggerOptions {
  return {
    level: config.logging.level,
    base: { service: config.service.name },
    redact: {
      paths: REDACT_FIELDS,
      remove: true,
    },
    formatters: {
      level: (label) => ({ level: label }),
      log: (object) => sanitizeLogValue(object),
    },
  };
}

export function createLogger(config: AppConfig): AppLogger {
  return pino(buildLoggerOptions(config));
}
