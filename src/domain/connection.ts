import type { TopicPattern } from './event.js';

export type ConnectionState =
  | 'connecting'
  | 'open'
  | 'closing'
  | 'backoff'
  | 'stopped';

export type FailureClass = 'transport' | 'authorization' | 'configuration';

export interface SessionFailure {
  readonly class: FailureClass;
  readonly message: string;
  readonly at: string; // ISO-8601
  /** HTTP status of a rejected handshake, when there was one. */
  readonly status?: number;
}

export interface SessionStats {
  framesReceived: number;
  eventsDelivered: number;
  normalizationErrors: number;
  reconnects: number;
}

/** Point-in-time view of one session, safe to hand to callers. */
export interface SessionSnapshot {
  readonly connectionId: string;
  readonly pattern: TopicPattern;
  readonly state: ConnectionState;
  readonly attempt: number;
  readonly stats: Readonly<SessionStats>;
  readonly lastFailure: SessionFailure | null;
}

export interface StateTransition {
  readonly connectionId: string;
  readonly pattern: TopicPattern;
  readonly from: ConnectionState;
  readonly to: ConnectionState;
  readonly at: string;
}
