import type { Logger } from 'pino';
import type { EventEnvelope, Provenance } from '../../domain/index.js';
import type { EventSink } from './sink.js';
import { sleep } from '../timers.js';

export type DeliveryOutcome = 'accepted' | 'dropped-oldest' | 'closed';

export interface DispatcherCounters {
  accepted: number;
  delivered: number;
  dropped: number;
  failed: number;
}

export interface BufferSnapshot extends DispatcherCounters {
  connectionId: string;
  pattern: string;
  queued: number;
}

export interface DispatcherStats {
  totals: DispatcherCounters & { queued: number };
  buffers: BufferSnapshot[];
}

interface SessionBuffer {
  readonly connectionId: string;
  readonly pattern: string;
  readonly queue: EventEnvelope[];
  readonly counters: DispatcherCounters;
  pumping: boolean;
}

/**
 * Single delivery point in front of the consumer's sink.
 *
 * Each session gets its own FIFO buffer, keyed by the envelope's
 * provenance. A buffer is pumped by one loop that awaits `sink.put`
 * for one envelope at a time, so a session's events reach the sink in
 * receive order. Buffers of different sessions pump independently; their
 * interleaving at the sink is unspecified.
 *
 * Overflow policy is drop-oldest: `deliver()` never waits, and when a
 * buffer already holds `capacity` events the oldest one is discarded.
 */
export class Dispatcher {
  private readonly buffers = new Map<string, SessionBuffer>();
  private idleWaiters: Array<() => void> = [];
  private closed = false;

  constructor(
    private readonly sink: EventSink,
    private readonly log: Logger,
    private readonly capacity: number,
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Dispatcher capacity must be a positive integer, got ${capacity}`);
    }
  }

  deliver(envelope: EventEnvelope): DeliveryOutcome {
    if (this.closed) {
      this.log.debug(
        { event_id: envelope.event_id, connectionId: envelope.provenance.connection_id },
        'Dispatcher closed, event discarded',
      );
      return 'closed';
    }

    const buffer = this.bufferFor(envelope.provenance);
    let outcome: DeliveryOutcome = 'accepted';

    if (buffer.queue.length >= this.capacity) {
      const dropped = buffer.queue.shift();
      buffer.counters.dropped++;
      outcome = 'dropped-oldest';
      this.log.warn(
        {
          connectionId: buffer.connectionId,
          pattern: buffer.pattern,
          dropped_event_id: dropped?.event_id,
          capacity: this.capacity,
        },
        'Dispatcher buffer full, dropped oldest event',
      );
    }

    buffer.queue.push(envelope);
    buffer.counters.accepted++;

    if (!buffer.pumping) {
      void this.pump(buffer);
    }

    return outcome;
  }

  /**
   * Waits until every buffer is drained or `timeoutMs` elapses.
   * Returns the number of events still queued.
   */
  async flush(timeoutMs: number): Promise<number> {
    if (!this.isIdle()) {
      const timer = new AbortController();
      await Promise.race([
        new Promise<void>((resolve) => this.idleWaiters.push(resolve)),
        sleep(timeoutMs, timer.signal),
      ]);
      timer.abort();
    }
    return this.queuedCount();
  }

  /** Stops accepting events and discards anything still queued. */
  close(): number {
    this.closed = true;
    const discarded = this.queuedCount();
    for (const buffer of this.buffers.values()) {
      buffer.queue.length = 0;
    }
    if (discarded > 0) {
      this.log.warn({ discarded }, 'Dispatcher closed with undelivered events');
    }
    this.releaseIdleWaiters();
    return discarded;
  }

  stats(): DispatcherStats {
    const buffers: BufferSnapshot[] = [...this.buffers.values()].map((b) => ({
      connectionId: b.connectionId,
      pattern: b.pattern,
      queued: b.queue.length,
      ...b.counters,
    }));

    const totals = { accepted: 0, delivered: 0, dropped: 0, failed: 0, queued: 0 };
    for (const b of buffers) {
      totals.accepted += b.accepted;
      totals.delivered += b.delivered;
      totals.dropped += b.dropped;
      totals.failed += b.failed;
      totals.queued += b.queued;
    }

    return { totals, buffers };
  }

  /* ------------------------------------------------------------------ */
  /*  Private                                                            */
  /* ------------------------------------------------------------------ */

  private bufferFor(provenance: Provenance): SessionBuffer {
    let buffer = this.buffers.get(provenance.connection_id);
    if (!buffer) {
      buffer = {
        connectionId: provenance.connection_id,
        pattern: provenance.pattern,
        queue: [],
        counters: { accepted: 0, delivered: 0, dropped: 0, failed: 0 },
        pumping: false,
      };
      this.buffers.set(provenance.connection_id, buffer);
    }
    return buffer;
  }

  private async pump(buffer: SessionBuffer): Promise<void> {
    buffer.pumping = true;
    try {
      let next = buffer.queue.shift();
      while (next !== undefined) {
        try {
          await this.sink.put(next);
          buffer.counters.delivered++;
        } catch (err: unknown) {
          // Not retried: the sink owns its own failure handling.
          buffer.counters.failed++;
          this.log.error(
            { err, connectionId: buffer.connectionId, event_id: next.event_id },
            'Sink rejected event',
          );
        }
        next = buffer.queue.shift();
      }
    } finally {
      buffer.pumping = false;
      if (this.isIdle()) this.releaseIdleWaiters();
    }
  }

  private isIdle(): boolean {
    for (const buffer of this.buffers.values()) {
      if (buffer.pumping || buffer.queue.length > 0) return false;
    }
    return true;
  }

  private queuedCount(): number {
    let count = 0;
    for (const buffer of this.buffers.values()) count += buffer.queue.length;
    return count;
  }

  private releaseIdleWaiters(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
