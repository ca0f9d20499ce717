export {
  initClients,
  getClientFromResourceType,
  defaultClientFactories,
} from './init-clients.js';
export type { Clients, ResourceClients, BootstrapResult, ClientFactories } from './init-clients.js';
