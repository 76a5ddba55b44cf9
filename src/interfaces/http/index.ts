export { default as connectorPlugin } from './connector-plugin.js';
export { default as statusRoutes } from './status-routes.js';
export { buildStatusServer } from './server.js';
