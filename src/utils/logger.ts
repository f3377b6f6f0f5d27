/**
 * Logging
 *
 * pino logger writing to stderr; stdout carries only command output.
 * Level comes from LOG_LEVEL (default: info).
 */

import pino, { type Logger } from 'pino';

/**
 * Pick the logger level from LOG_LEVEL; unknown or empty values fall back to info
 */
export function resolveLogLevel(value: string | undefined): string {
  if (!value) return 'info';
  if (value === 'silent' || value in pino.levels.values) return value;
  return 'info';
}

/** Log sink: file descriptor 2 (stderr) */
export const logDestination = pino.destination({ fd: 2, sync: true });

const rootLogger = pino(
  {
    name: 'ecef-sez',
    level: resolveLogLevel(process.env.LOG_LEVEL),
  },
  logDestination
);

/**
 * Create a child logger tagged with the calling module
 */
export function createLogger(module: string): Logger {
  return rootLogger.child({ module });
}
