import type { Cursor } from './change-event.js';

/** A stored document. `_id` is mandatory, `_rev` is set once persisted. */
export interface StoredDocument {
  _id: string;
  _rev?: string | undefined;
  [field: string]: unknown;
}

export interface ChangesQuery {
  readonly since: Cursor;
  readonly limit: number;
  /** `<design doc>/<filter name>`, e.g. `auction_filters/convoy_feed`. */
  readonly filter: string;
  readonly includeDocs: boolean;
}

export interface ChangeRow {
  readonly seq: Cursor;
  readonly id: string;
  readonly deleted?: boolean | undefined;
  readonly doc?: Record<string, unknown> | undefined;
}

export interface ChangesBatch {
  readonly results: readonly ChangeRow[];
  readonly last_seq: Cursor;
}

/**
 * The slice of a document database the feed and the filter installer need.
 *
 * `save` is an upsert: when `_rev` matches the stored revision the document
 * is replaced, and the new revision is written back onto the argument.
 */
export interface DocumentStore {
  readonly name: string;
  get(id: string): Promise<StoredDocument | undefined>;
  save(doc: StoredDocument): Promise<{ id: string; rev: string }>;
  changes(query: ChangesQuery): Promise<ChangesBatch>;
}
