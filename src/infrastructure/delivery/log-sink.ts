import type { Logger } from 'pino';
import type { EventSink } from './sink.js';

/** Writes every envelope as one structured log line. */
export function createLogSink(log: Logger): EventSink {
  return {
    put(envelope) {
      log.info(
        { event: envelope },
        `Event ${envelope.event_type} from ${envelope.origin}`,
      );
    },
  };
}
