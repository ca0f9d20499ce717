export { configSchema, parseConfig, loadConfig } from './config.js';
export type { ConvoyConfig, CouchDbSettings, DedupStoreSettings, ResourceSection } from './config.js';
