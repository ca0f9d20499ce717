export { ORIGIN_CURSOR } from './change-event.js';
export type { Cursor, ChangeEvent, TrackTypes } from './change-event.js';
export type {
  StoredDocument,
  ChangesQuery,
  ChangeRow,
  ChangesBatch,
  DocumentStore,
} from './document-store.js';
export { PROCESSED_MARKER } from './dedup-store.js';
export type { DedupStore } from './dedup-store.js';
export {
  ConfigurationError,
  UpstreamApiError,
  Forbidden,
  ResourceNotFound,
  UnprocessableEntity,
  Conflict,
  PreconditionFailed,
  RequestFailed,
  errorFromStatus,
} from './errors.js';
export type { ResourceOutcome } from './bootstrap-report.js';
