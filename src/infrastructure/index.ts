export { loadConfig, parseConfig, configSchema } from './config/index.js';
export type { ConvoyConfig, CouchDbSettings, DedupStoreSettings, ResourceSection } from './config/index.js';
export { createLogger, logCheck, CHECK_LEVEL } from './logging/index.js';
export type { AppLogger } from './logging/index.js';
export { CouchDatabase, prepareCouchDb, couchServerUrl, pushFilterDoc } from './couchdb/index.js';
export {
  RedisDedupStore,
  SqliteDedupStore,
  resolveDedupBackend,
  createDedupStore,
  selfCheckDedupStore,
  prepareDedupStore,
} from './dedup/index.js';
export type { DedupBackend } from './dedup/index.js';
export { ResourceClient, RESOURCE_TYPES } from './upstream/index.js';
export type { ResourceType, ResourceData } from './upstream/index.js';
export { initClients, getClientFromResourceType, defaultClientFactories } from './bootstrap/index.js';
export type { Clients, ResourceClients, BootstrapResult, ClientFactories } from './bootstrap/index.js';
export { continuousChangesFeed, processChangeFeed, processEvent } from './worker/index.js';
export type { ChangeFeedOptions, FeedMode, DerivedRecordHandler, ProcessSummary } from './worker/index.js';
