import type { Cursor, ResourceOutcome } from '../domain/index.js';
import { ORIGIN_CURSOR } from '../domain/index.js';

export interface FeedSnapshot {
  readonly cursor: Cursor;
  readonly polls: number;
  readonly delivered: number;
  readonly processed: number;
  readonly skipped: number;
  readonly failed: number;
  readonly lastPollAt: string | null;
  readonly resources: readonly { resource: string; status: 'ok' | 'failed' }[];
}

/**
 * Counters describing the running feed, read by the status routes.
 *
 * Written only by the single consumer flow, so plain fields suffice.
 */
export class FeedState {
  private cursor: Cursor = ORIGIN_CURSOR;
  private polls = 0;
  private delivered = 0;
  private processed = 0;
  private skipped = 0;
  private failed = 0;
  private lastPollAt: Date | null = null;
  private resources: readonly ResourceOutcome[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  recordPoll(cursor: Cursor): void {
    this.cursor = cursor;
    this.polls++;
    this.lastPollAt = this.now();
  }

  /** One event handed to processing; rows the feed skipped never count. */
  recordDelivered(): void {
    this.delivered++;
  }

  recordProcessed(): void {
    this.processed++;
  }

  recordSkipped(): void {
    this.skipped++;
  }

  recordFailed(): void {
    this.failed++;
  }

  setResources(resources: readonly ResourceOutcome[]): void {
    this.resources = resources;
  }

  /** True when every startup resource came up. */
  healthy(): boolean {
    return this.resources.every((r) => r.status === 'ok');
  }

  snapshot(): FeedSnapshot {
    return {
      cursor: this.cursor,
      polls: this.polls,
      delivered: this.delivered,
      processed: this.processed,
      skipped: this.skipped,
      failed: this.failed,
      lastPollAt: this.lastPollAt?.toISOString() ?? null,
      resources: this.resources.map(({ resource, status }) => ({ resource, status })),
    };
  }
}
