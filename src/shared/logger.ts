/**
 * Structured JSON logger with token redaction.
 * Must be imported before any logging occurs to ensure secrets are never leaked.
 */

import pino from 'pino';

const logLevel = process.env['LOG_LEVEL'] ?? 'info';

/** Paths censored in every log line; gateway IDENTIFY/RESUME payloads carry the token in `d`. */
export const REDACT_PATHS = [
  'token',
  '*.token',
  'd.token',
  'payload.d.token',
  'headers.authorization',
  'headers.Authorization',
  'req.headers.authorization',
];

// Determine if pretty logging should be used:
// - Explicit LOG_FORMAT=pretty → use pretty
// - Explicit LOG_FORMAT=json → use JSON
// - Otherwise outside production and tests → use pretty
const usePretty =
  process.env['LOG_FORMAT'] === 'pretty' ||
  (process.env['NODE_ENV'] !== 'production' &&
    process.env['NODE_ENV'] !== 'test' &&
    process.env['LOG_FORMAT'] !== 'json');

export const logger = pino({
  name: 'shardwire',
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

export type Logger = pino.Logger;

/** Child logger bound to one shard, so every line carries `shard`. */
export function shardLogger(shardId: number, parent: Logger = logger): Logger {
  return parent.child({ shard: shardId });
}
