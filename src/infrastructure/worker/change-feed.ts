import type { AppLogger } from '../logging/index.js';
import type { ChangeEvent, ChangesBatch, Cursor, DocumentStore } from '../../domain/index.js';
import { ORIGIN_CURSOR } from '../../domain/index.js';
import {
  CONVOY_FEED_FILTER_REF,
  DEFAULT_RETRY_POLICY,
  changeEventSchema,
  sleep as defaultSleep,
  withRetry,
} from '../../application/index.js';
import type { RetryPolicy, Sleep } from '../../application/index.js';

/**
 * `continuous` polls until the signal aborts; `once` stops at the first
 * empty batch, i.e. once the feed has caught up.
 */
export type FeedMode = 'continuous' | 'once';

export interface ChangeFeedOptions {
  readonly mode?: FeedMode | undefined;
  /** Cursor to resume from; the feed origin by default. */
  readonly since?: Cursor | undefined;
  readonly limit?: number | undefined;
  readonly filter?: string | undefined;
  /** Wait after an empty poll, in milliseconds. */
  readonly idleMs?: number | undefined;
  readonly retry?: RetryPolicy | undefined;
  readonly sleep?: Sleep | undefined;
  /** Called after every poll with the new cursor and the batch size. */
  readonly onPoll?: ((cursor: Cursor, batchSize: number) => void) | undefined;
}

export const DEFAULT_FEED_LIMIT = 100;
export const DEFAULT_IDLE_MS = 10_000;

/**
 * Streams new documents from the store's change feed.
 *
 * Each iteration polls from the current cursor, adopts the returned
 * `last_seq` unconditionally, then either yields the batch in feed order
 * or idles. Cancellation is checked only between batches: after a
 * non-empty batch has been fully consumed, and around the idle wait. A
 * batch in progress is always drained.
 *
 * Poll failures go through the retry policy; once it gives up the error
 * propagates to the caller, unless the signal aborted meanwhile, which ends
 * the feed like any other cancellation. Rows without a usable document are logged and
 * skipped.
 */
export async function* continuousChangesFeed(
  store: DocumentStore,
  signal: AbortSignal,
  log: AppLogger,
  options: ChangeFeedOptions = {},
): AsyncGenerator<ChangeEvent, void, undefined> {
  const mode = options.mode ?? 'continuous';
  const limit = options.limit ?? DEFAULT_FEED_LIMIT;
  const filter = options.filter ?? CONVOY_FEED_FILTER_REF;
  const idleMs = options.idleMs ?? DEFAULT_IDLE_MS;
  const policy = options.retry ?? DEFAULT_RETRY_POLICY;
  const wait = options.sleep ?? defaultSleep;

  let cursor: Cursor = options.since ?? ORIGIN_CURSOR;
  log.info({ since: cursor, limit, filter, mode }, 'Change feed started');

  for (;;) {
    const since = cursor;
    let batch: ChangesBatch;
    try {
      batch = await withRetry(
        () => store.changes({ since, limit, filter, includeDocs: true }),
        { policy, log, operation: 'changes', signal, sleep: wait },
      );
    } catch (err: unknown) {
      if (!signal.aborted) throw err;
      log.info({ err, cursor }, 'Change feed cancelled while retrying a poll');
      break;
    }

    cursor = batch.last_seq;
    options.onPoll?.(cursor, batch.results.length);

    if (batch.results.length > 0) {
      log.debug({ since, cursor, count: batch.results.length }, 'Change batch received');

      for (const row of batch.results) {
        const parsed = changeEventSchema.safeParse(row.doc);
        if (!parsed.success) {
          log.warn({ id: row.id, seq: row.seq, issues: parsed.error.issues }, 'Skipping change without a valid document');
          continue;
        }
        yield parsed.data;
      }

      if (signal.aborted) break;
      continue;
    }

    if (signal.aborted || mode === 'once') break;
    await wait(idleMs, signal);
    if (signal.aborted) break;
  }

  log.info({ cursor }, 'Change feed stopped');
}
