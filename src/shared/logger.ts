/**
 * Logger factory.
 *
 * Logs go to stderr so that redacted documents written to stdout are not
 * interleaved with log lines.
 */

import pino from 'pino';

const isTest = process.env['VITEST'] !== undefined || process.env['NODE_ENV'] === 'test';

export function createLogger(name: string): pino.Logger {
  return pino(
    {
      name,
      level: process.env['LOG_LEVEL'] || (isTest ? 'silent' : 'info'),
    },
    pino.destination(2)
  );
}
