export { default as statusRoutes } from './status-routes.js';
export type { StatusRoutesOptions } from './status-routes.js';
