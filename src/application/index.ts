export { isRetryableError } from './error-classifier.js';
export { withRetry, backoffDelay, DEFAULT_RETRY_POLICY } from './retry.js';
export type { RetryPolicy, RetryOptions } from './retry.js';
export { sleep } from './sleep.js';
export type { Sleep } from './sleep.js';
export { changeEventSchema } from './change-event-schema.js';
export {
  FILTER_DOC_ID,
  CONVOY_FEED_FILTER,
  CONVOY_FEED_FILTER_REF,
  renderConvoyFeedFilter,
} from './filter-template.js';
export { FeedState } from './feed-state.js';
export type { FeedSnapshot } from './feed-state.js';
export { buildDerivedRecord } from './derived-record.js';
export type { DerivedRecord } from './derived-record.js';
