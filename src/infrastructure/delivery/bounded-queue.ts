import type { EventEnvelope } from '../../domain/index.js';
import type { EventSink } from './sink.js';

export class QueueClosedError extends Error {
  constructor() {
    super('Event queue is closed');
    this.name = 'QueueClosedError';
  }
}

interface PendingPut {
  envelope: EventEnvelope;
  resolve: () => void;
  reject: (err: Error) => void;
}

/**
 * In-process bounded channel between the connector and a consumer.
 *
 * `put()` resolves immediately while there is room and otherwise waits
 * until the consumer takes an item; waiting producers are admitted in the
 * order they arrived. Consumers read with `for await`. After `close()`
 * pending producers are rejected and iteration ends once the queue is
 * empty.
 */
export class BoundedEventQueue implements EventSink, AsyncIterable<EventEnvelope> {
  private readonly items: EventEnvelope[] = [];
  private readonly putters: PendingPut[] = [];
  private readonly takers: Array<(result: IteratorResult<EventEnvelope>) => void> = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  /** Producers waiting for room. */
  get waiting(): number {
    return this.putters.length;
  }

  put(envelope: EventEnvelope): Promise<void> {
    if (this.closed) return Promise.reject(new QueueClosedError());

    const taker = this.takers.shift();
    if (taker) {
      taker({ value: envelope, done: false });
      return Promise.resolve();
    }

    if (this.items.length < this.capacity) {
      this.items.push(envelope);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.putters.push({ envelope, resolve, reject });
    });
  }

  take(): Promise<IteratorResult<EventEnvelope>> {
    const item = this.items.shift();
    if (item !== undefined) {
      const pending = this.putters.shift();
      if (pending) {
        this.items.push(pending.envelope);
        pending.resolve();
      }
      return Promise.resolve({ value: item, done: false });
    }

    if (this.closed) return Promise.resolve({ value: undefined, done: true });

    return new Promise((resolve) => this.takers.push(resolve));
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const taker of this.takers.splice(0)) {
      taker({ value: undefined, done: true });
    }
    for (const pending of this.putters.splice(0)) {
      pending.reject(new QueueClosedError());
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<EventEnvelope> {
    return { next: () => this.take() };
  }
}
