export { nextDelay, MAX_JITTER } from './backoff.js';
export type { BackoffPolicy } from './backoff.js';
export {
  connectorConfigSchema,
  parseConnectorConfig,
  loadConnectorConfig,
  parseEventPaths,
  toBackoffPolicy,
  DEFAULT_EVENT_PATH,
} from './config.js';
export type { ConnectorConfig, ConnectorConfigInput } from './config.js';
export {
  ConnectorError,
  ConfigurationError,
  TransportError,
  AuthorizationError,
  NormalizationError,
  classifyConnectionError,
} from './errors.js';
export { classifyWireMessage, isJsonObject, wireHeaderSchema, vaultEventDataSchema, WILDCARD_TYPE } from './event-schema.js';
export type { WireMessage, WireHeader } from './event-schema.js';
export { normalize, decodeFrame } from './normalizer.js';
export type { RawMessage, NormalizeContext, NormalizeResult } from './normalizer.js';
export { buildSubscriptionUrl, SUBSCRIBE_PATH } from './subscription-url.js';
export { summarizeHealth } from './health.js';
export type { HealthSummary } from './health.js';
