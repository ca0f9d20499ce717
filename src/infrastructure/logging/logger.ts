import pino from 'pino';
import type { Logger } from 'pino';

/** Sits between info (30) and warn (40). */
export const CHECK_LEVEL = 35;

/** Root logger type: pino plus the `check` level for startup outcomes. */
export type AppLogger = Logger<'check'>;

export function createLogger(level: string = process.env['LOG_LEVEL'] ?? 'info'): AppLogger {
  return pino<'check'>({
    level,
    customLevels: { check: CHECK_LEVEL },
  });
}

/**
 * Records one startup check. A failure additionally logs the error with its
 * stack at error level.
 */
export function logCheck(log: AppLogger, message: string, err?: unknown): void {
  log.check(message);
  if (err !== undefined) {
    log.error({ err }, message);
  }
}
