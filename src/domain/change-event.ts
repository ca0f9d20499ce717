/**
 * Core domain types for documents flowing out of the change feed.
 *
 * These types carry no framework dependencies.
 */

/**
 * Opaque resumable position in a change feed.
 *
 * CouchDB 1.x issues integers, 2.x+ issues strings. Either way the value is
 * handed back to the store verbatim.
 */
export type Cursor = string | number;

/** Cursor value for "start of the feed". */
export const ORIGIN_CURSOR: Cursor = 0;

/**
 * A materialized document delivered by the feed.
 *
 * Only `id` is guaranteed; the discriminators are present on the documents
 * the server-side filter lets through but are not validated beyond that.
 */
export interface ChangeEvent {
  readonly id: string;
  readonly status?: string | undefined;
  readonly procurementMethodType?: string | undefined;
  readonly doc_type?: string | undefined;
  readonly [field: string]: unknown;
}

/** Procurement method types per track, substituted into the feed filter. */
export interface TrackTypes {
  readonly basic: readonly string[];
  readonly loki: readonly string[];
}
