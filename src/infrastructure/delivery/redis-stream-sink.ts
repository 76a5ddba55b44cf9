import type { Redis } from 'ioredis';
import type { EventEnvelope } from '../../domain/index.js';
import type { EventSink } from './sink.js';

export const DEFAULT_STREAM_KEY = 'vault_events';
export const DEFAULT_STREAM_MAXLEN = 10_000;

export interface RedisStreamSinkOptions {
  streamKey?: string;
  /** Approximate cap on stream length (`MAXLEN ~`). */
  maxLen?: number;
}

/**
 * Appends envelopes to a Redis Stream for the downstream rule engine.
 *
 * Uses `XADD` with auto-generated IDs. Redis Streams require string
 * values, so payload and provenance are JSON-serialized. The stream is
 * trimmed approximately so it never becomes a durable log.
 */
export class RedisStreamSink implements EventSink {
  readonly streamKey: string;
  private readonly maxLen: number;

  constructor(
    private readonly redis: Redis,
    options: RedisStreamSinkOptions = {},
  ) {
    this.streamKey = options.streamKey ?? DEFAULT_STREAM_KEY;
    this.maxLen = options.maxLen ?? DEFAULT_STREAM_MAXLEN;
  }

  async put(envelope: EventEnvelope): Promise<void> {
    await this.redis.xadd(
      this.streamKey,
      'MAXLEN', '~', this.maxLen,
      '*',
      'event_id', envelope.event_id,
      'event_type', envelope.event_type,
      'origin', envelope.origin,
      'timestamp', envelope.timestamp,
      'payload', JSON.stringify(envelope.payload),
      'provenance', JSON.stringify(envelope.provenance),
    );
  }
}
