export type {
  TopicPattern,
  JsonValue,
  JsonObject,
  Provenance,
  EventEnvelope,
} from './event.js';
export { UNKNOWN_EVENT_TYPE } from './event.js';
export type {
  ConnectionState,
  FailureClass,
  SessionFailure,
  SessionStats,
  SessionSnapshot,
  StateTransition,
} from './connection.js';
