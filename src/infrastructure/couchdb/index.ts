export { CouchDatabase, prepareCouchDb, couchServerUrl } from './couch-client.js';
export { pushFilterDoc } from './filter-installer.js';
