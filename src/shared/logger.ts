/**
 * Structured JSON logger with credential redaction.
 * Must be imported before any logging occurs to ensure tokens are never leaked.
 */

import pino from 'pino';

const logLevel = process.env['LOG_LEVEL'] ?? 'info';

// Pretty output unless LOG_FORMAT=json or running in production.
const usePretty =
  process.env['LOG_FORMAT'] === 'pretty' ||
  (process.env['NODE_ENV'] !== 'production' && process.env['LOG_FORMAT'] !== 'json');

/** Redaction paths shared by the application logger and its tests. */
export const REDACT_PATHS = [
  'headers.authorization',
  'headers.Authorization',
  'request.headers.authorization',
  'request.headers.Authorization',
  '*.token',
  '*.clientSecret',
];

export const logger = pino({
  name: 'mimecast-api-client',
  level: logLevel,
  redact: {
    paths: REDACT_PATHS,
    censor: '[REDACTED]',
  },
  ...(usePretty && {
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
        colorize: true,
        destination: 2,
      },
    },
  }),
});
