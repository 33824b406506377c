/**
 * Structured JSON logger with API key redaction.
 * Must be imported before any logging occurs to ensure secrets are never leaked.
 */

import pino from 'pino';

const logLevel = process.env['LOG_LEVEL'] ?? 'info';

/** Paths scrubbed from every log line. */
export const REDACT_PATHS = [
  'req.headers.authorization',
  'req.headers["api-key"]',
  '*.apiKey',
  '*.api_key',
];

// LOG_FORMAT=pretty forces pretty output, LOG_FORMAT=json forces JSON,
// otherwise pretty everywhere except production.
const usePretty =
  process.env['LOG_FORMAT'] === 'pretty' ||
  (process.env['NODE_ENV'] !== 'production' &&
    process.env['NODE_ENV'] !== 'test' &&
    process.env['LOG_FORMAT'] !== 'json');

export const logger = pino({
  name: 'switchyard',
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
      },
    },
  }),
});
