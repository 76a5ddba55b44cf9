/**
 * Library surface: everything a host process needs to run the connector
 * in-process and consume its events.
 */
export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/delivery/index.js';
export * from './infrastructure/vault/index.js';
export { buildStatusServer } from './interfaces/http/index.js';
