export { Dispatcher } from './dispatcher.js';
export type { DeliveryOutcome, DispatcherStats, DispatcherCounters, BufferSnapshot } from './dispatcher.js';
export { BoundedEventQueue, QueueClosedError } from './bounded-queue.js';
export { RedisStreamSink, DEFAULT_STREAM_KEY, DEFAULT_STREAM_MAXLEN } from './redis-stream-sink.js';
export type { RedisStreamSinkOptions } from './redis-stream-sink.js';
export { createLogSink } from './log-sink.js';
export type { EventSink } from './sink.js';
