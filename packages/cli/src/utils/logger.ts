import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export const LOG_LEVELS: LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

export function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Root logger for a CLI invocation. Structured logs go to stderr so they
 * never mix with listing output on stdout.
 */
export function createLogger(level: LevelWithSilent): Logger {
  return pino({ name: 'cloudmirror', level }, pino.destination(2));
}
