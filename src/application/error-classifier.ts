import { UpstreamApiError } from '../domain/index.js';

/** Statuses below 500 that are still worth another attempt. */
const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([409, 412, 429]);

/**
 * Decides whether a failed upstream call may be retried.
 *
 * Only errors raised by our upstream clients are considered; anything else
 * (programming errors, validation failures) propagates immediately.
 */
export function isRetryableError(err: unknown): boolean {
  if (!(err instanceof UpstreamApiError)) return false;
  return err.statusCode >= 500 || RETRYABLE_STATUS_CODES.has(err.statusCode);
}
