/**
 * Core domain types for the relay's event model.
 *
 * These types define the canonical shape of an event as it leaves the
 * connector. They carry no framework dependencies.
 */

/**
 * Server-side subscription filter, e.g. `kv-v2/*` or `database/*`.
 * One pattern is served by exactly one connection.
 */
export type TopicPattern = string;

/** Structured JSON value as received on the wire. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** Sentinel event type for payloads whose type cannot be determined. */
export const UNKNOWN_EVENT_TYPE = 'unknown';

/** Which connection produced an envelope, and where in its stream. */
export interface Provenance {
  readonly connection_id: string;
  readonly pattern: TopicPattern;
  /** 1-based position in the connection's frame stream. */
  readonly sequence: number;
  readonly received_at: string; // ISO-8601
}

/**
 * Canonical event envelope.
 *
 * `origin` always equals `provenance.pattern`: the topic pattern of the
 * session that received the frame, never a value read from the payload.
 */
export interface EventEnvelope {
  readonly event_id: string;
  readonly event_type: string;
  readonly origin: TopicPattern;
  readonly timestamp: string; // ISO-8601
  readonly payload: JsonValue;
  readonly provenance: Provenance;
}
