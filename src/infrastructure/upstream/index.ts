export { ResourceClient, RESOURCE_TYPES } from './resource-client.js';
export type { ResourceType, ResourceData } from './resource-client.js';
