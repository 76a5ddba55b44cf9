import { randomUUID } from 'node:crypto';
import type { EventEnvelope, JsonValue, TopicPattern } from '../domain/index.js';
import { UNKNOWN_EVENT_TYPE } from '../domain/index.js';
import { classifyWireMessage } from './event-schema.js';
import { NormalizationError } from './errors.js';

/** A frame exactly as the socket layer hands it over. */
export type RawMessage = string | Buffer | ArrayBuffer | Buffer[];

export interface NormalizeContext {
  connectionId: string;
  sequence: number;
  receivedAt: Date;
}

export type NormalizeResult =
  | { success: true; envelope: EventEnvelope }
  | { success: false; error: NormalizationError };

const EXCERPT_LENGTH = 200;

export function decodeFrame(raw: RawMessage): string {
  if (typeof raw === 'string') return raw;
  if (Array.isArray(raw)) return Buffer.concat(raw).toString('utf8');
  if (Buffer.isBuffer(raw)) return raw.toString('utf8');
  return Buffer.from(raw).toString('utf8');
}

function toIsoTimestamp(value: string | undefined, fallback: Date): string {
  if (value === undefined) return fallback.toISOString();
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? fallback.toISOString() : new Date(ms).toISOString();
}

/**
 * Turns one raw frame into the canonical envelope.
 *
 * Never throws: a malformed body comes back as a NormalizationError for
 * the caller to log. `origin` is taken from the session, not the payload.
 */
export function normalize(
  raw: RawMessage,
  origin: TopicPattern,
  context: NormalizeContext,
  newId: () => string = randomUUID,
): NormalizeResult {
  const text = decodeFrame(raw);

  let value: JsonValue;
  try {
    value = JSON.parse(text);
  } catch (err: unknown) {
    return {
      success: false,
      error: new NormalizationError(
        err instanceof Error ? `Malformed JSON frame: ${err.message}` : 'Malformed JSON frame',
        text.slice(0, EXCERPT_LENGTH),
        { cause: err },
      ),
    };
  }

  const message = classifyWireMessage(value);
  const provenance = {
    connection_id: context.connectionId,
    pattern: origin,
    sequence: context.sequence,
    received_at: context.receivedAt.toISOString(),
  };

  if (message.kind === 'unknown') {
    return {
      success: true,
      envelope: {
        event_id: newId(),
        event_type: UNKNOWN_EVENT_TYPE,
        origin,
        timestamp: context.receivedAt.toISOString(),
        payload: message.raw,
        provenance,
      },
    };
  }

  return {
    success: true,
    envelope: {
      event_id: message.id ?? newId(),
      event_type: message.event_type,
      origin,
      timestamp: toIsoTimestamp(message.time, context.receivedAt),
      payload: message.data,
      provenance,
    },
  };
}
