export { continuousChangesFeed, DEFAULT_FEED_LIMIT, DEFAULT_IDLE_MS } from './change-feed.js';
export type { ChangeFeedOptions, FeedMode } from './change-feed.js';
export { processChangeFeed, processEvent } from './feed-processor.js';
export type { DerivedRecordHandler, ProcessorDeps, ProcessSummary } from './feed-processor.js';
