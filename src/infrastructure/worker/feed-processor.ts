import type { AppLogger } from '../logging/index.js';
import type { ChangeEvent, DedupStore } from '../../domain/index.js';
import { PROCESSED_MARKER } from '../../domain/index.js';
import { DEFAULT_RETRY_POLICY, withRetry } from '../../application/index.js';
import type { FeedState, RetryPolicy, Sleep } from '../../application/index.js';

/** Creates the downstream record for one event. */
export type DerivedRecordHandler = (event: ChangeEvent) => Promise<void>;

export interface ProcessorDeps {
  readonly dedup: DedupStore;
  readonly log: AppLogger;
  readonly handle: DerivedRecordHandler;
  readonly signal?: AbortSignal | undefined;
  readonly retry?: RetryPolicy | undefined;
  readonly sleep?: Sleep | undefined;
  readonly state?: FeedState | undefined;
  /** Expiry for dedup entries, in seconds; entries never expire by default. */
  readonly markerTtlSeconds?: number | undefined;
}

export interface ProcessSummary {
  /** Events received from the feed. */
  delivered: number;
  processed: number;
  skipped: number;
  failed: number;
}

/**
 * Handles one event: skip when already recorded, otherwise run the handler
 * (retrying transient upstream failures) and record the id.
 *
 * The id is recorded only after the handler succeeded, so a crash in
 * between replays the event on restart rather than losing it.
 */
export async function processEvent(
  event: ChangeEvent,
  deps: ProcessorDeps,
): Promise<'processed' | 'skipped'> {
  if (await deps.dedup.has(event.id)) {
    deps.log.debug({ id: event.id }, 'Already processed, skipping');
    return 'skipped';
  }

  await withRetry(() => deps.handle(event), {
    policy: deps.retry ?? DEFAULT_RETRY_POLICY,
    log: deps.log,
    operation: 'handle event',
    signal: deps.signal,
    sleep: deps.sleep,
  });

  await deps.dedup.put(event.id, PROCESSED_MARKER, deps.markerTtlSeconds);
  return 'processed';
}

/**
 * Drains the feed into the handler.
 *
 * A failing event is logged and counted but never stops the loop; the
 * feed itself ending (cancellation, `once` mode) ends processing.
 */
export async function processChangeFeed(
  events: AsyncIterable<ChangeEvent>,
  deps: ProcessorDeps,
): Promise<ProcessSummary> {
  const summary: ProcessSummary = { delivered: 0, processed: 0, skipped: 0, failed: 0 };

  for await (const event of events) {
    summary.delivered++;
    deps.state?.recordDelivered();
    try {
      const outcome = await processEvent(event, deps);
      if (outcome === 'processed') {
        summary.processed++;
        deps.state?.recordProcessed();
        deps.log.info({ id: event.id, status: event.status }, 'Event processed');
      } else {
        summary.skipped++;
        deps.state?.recordSkipped();
      }
    } catch (err: unknown) {
      summary.failed++;
      deps.state?.recordFailed();
      deps.log.error({ err, id: event.id }, 'Failed to process event, skipping');
    }
  }

  deps.log.info({ ...summary }, 'Feed processing finished');
  return summary;
}
