import type { AppLogger } from '../infrastructure/logging/index.js';
import { isRetryableError } from './error-classifier.js';
import { sleep as defaultSleep } from './sleep.js';
import type { Sleep } from './sleep.js';

export interface RetryPolicy {
  /** Total attempts including the first one. */
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 500,
  maxDelayMs: 30_000,
};

export interface RetryOptions {
  readonly policy: RetryPolicy;
  readonly log: AppLogger;
  /** Short operation name for log records, e.g. `changes` or `create contract`. */
  readonly operation: string;
  readonly signal?: AbortSignal | undefined;
  readonly sleep?: Sleep | undefined;
  readonly isRetryable?: ((err: unknown) => boolean) | undefined;
}

/** Delay before attempt `attempt + 1`: base * 2^(attempt - 1), capped. */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

/**
 * Runs `fn` until it succeeds, the error is classified fatal, the attempt
 * budget is spent, or `signal` aborts. The last error is rethrown as-is;
 * an abort during the backoff wait stops without another attempt.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { policy, log, operation, signal } = options;
  const wait = options.sleep ?? defaultSleep;
  const retryable = options.isRetryable ?? isRetryableError;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err: unknown) {
      if (!retryable(err)) {
        throw err;
      }
      if (attempt >= policy.maxAttempts) {
        log.error({ err, operation, attempt }, 'Retry budget exhausted');
        throw err;
      }
      if (signal?.aborted) {
        throw err;
      }

      const delayMs = backoffDelay(policy, attempt);
      log.warn({ err, operation, attempt, delayMs }, 'Retryable upstream failure, backing off');
      await wait(delayMs, signal);
      if (signal?.aborted) {
        throw err;
      }
    }
  }
}
