import { describe, it, expect, vi, beforeEach } from 'vitest';
import { withRetry, backoffDelay } from '../../src/application/retry.js';
import type { RetryPolicy } from '../../src/application/retry.js';
import { Conflict, Forbidden, RequestFailed } from '../../src/domain/index.js';
import { fakeLogger } from '../helpers.js';

const policy: RetryPolicy = { maxAttempts: 4, baseDelayMs: 100, maxDelayMs: 250 };

describe('backoffDelay', () => {
  it('doubles per attempt and caps at maxDelayMs', () => {
    expect(backoffDelay(policy, 1)).toBe(100);
    expect(backoffDelay(policy, 2)).toBe(200);
    expect(backoffDelay(policy, 3)).toBe(250);
    expect(backoffDelay(policy, 10)).toBe(250);
  });
});

describe('withRetry', () => {
  let log: ReturnType<typeof fakeLogger>;
  let sleep: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    log = fakeLogger();
    sleep = vi.fn().mockResolvedValue(undefined);
  });

  it('returns the first successful result without sleeping', async () => {
    const fn = vi.fn().mockResolvedValue('done');

    await expect(withRetry(fn, { policy, log, operation: 'op', sleep })).resolves.toBe('done');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries retryable failures with exponential delays', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new RequestFailed('down', 503))
      .mockRejectedValueOnce(new Conflict('race', 409))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(fn, { policy, log, operation: 'op', sleep })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([100, 200]);
    expect(log.warn).toHaveBeenCalledTimes(2);
  });

  it('passes the attempt number to the operation', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new RequestFailed('down', 500))
      .mockResolvedValueOnce('ok');

    await withRetry(fn, { policy, log, operation: 'op', sleep });
    expect(fn.mock.calls).toEqual([[1], [2]]);
  });

  it('rethrows fatal errors immediately', async () => {
    const fatal = new Forbidden('no', 403);
    const fn = vi.fn().mockRejectedValue(fatal);

    await expect(withRetry(fn, { policy, log, operation: 'op', sleep })).rejects.toBe(fatal);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('stops without another attempt when aborted during the backoff wait', async () => {
    const ac = new AbortController();
    const failure = new RequestFailed('down', 503);
    const fn = vi.fn().mockRejectedValue(failure);
    sleep.mockImplementation(async () => {
      ac.abort();
    });

    await expect(withRetry(fn, { policy, log, operation: 'op', sleep, signal: ac.signal })).rejects.toBe(failure);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('gives up after maxAttempts and rethrows the last error', async () => {
    const last = new RequestFailed('still down', 502);
    const fn = vi.fn()
      .mockRejectedValueOnce(new RequestFailed('down', 503))
      .mockRejectedValueOnce(new RequestFailed('down', 503))
      .mockRejectedValueOnce(new RequestFailed('down', 503))
      .mockRejectedValueOnce(last);

    await expect(withRetry(fn, { policy, log, operation: 'op', sleep })).rejects.toBe(last);
    expect(fn).toHaveBeenCalledTimes(4);
    expect(sleep).toHaveBeenCalledTimes(3);
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ operation: 'op', attempt: 4 }),
      'Retry budget exhausted',
    );
  });

  it('stops retrying once the signal is aborted', async () => {
    const ac = new AbortController();
    ac.abort();
    const err = new RequestFailed('down', 503);
    const fn = vi.fn().mockRejectedValue(err);

    await expect(withRetry(fn, { policy, log, operation: 'op', sleep, signal: ac.signal })).rejects.toBe(err);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('honours a custom classifier', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('ok');

    const result = await withRetry(fn, { policy, log, operation: 'op', sleep, isRetryable: () => true });
    expect(result).toBe('ok');
  });
});
