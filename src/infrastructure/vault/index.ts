export { ConnectionManager } from './connection-manager.js';
export type { ConnectionManagerDeps, ConnectorHandle, StopReport } from './connection-manager.js';
export { ConnectionSession, createSocket } from './session.js';
export type { SessionOptions, SocketFactory, EventDeliverer, TransitionListener } from './session.js';
export { buildHandshakeHeaders, TOKEN_HEADER, NAMESPACE_HEADER } from './subscription.js';
