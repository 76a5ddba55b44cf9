import type { EventEnvelope } from '../../domain/index.js';

/**
 * The only contract the connector needs from its consumer.
 *
 * A returned promise that has not settled yet means the consumer is not
 * ready; the dispatcher keeps at most one put in flight per session.
 */
export interface EventSink {
  put(envelope: EventEnvelope): void | Promise<void>;
}
