export { RedisDedupStore } from './redis-dedup-store.js';
export { SqliteDedupStore, embeddedDatabasePath } from './sqlite-dedup-store.js';
export { dedupEntries } from './schema.js';
export {
  resolveDedupBackend,
  createDedupStore,
  selfCheckDedupStore,
  prepareDedupStore,
  DEFAULT_REDIS_PORT,
  DEFAULT_EMBEDDED_NAME,
} from './dedup-factory.js';
export type { DedupBackend, PrepareDedupOptions } from './dedup-factory.js';
