import { z } from 'zod';
import type { JsonObject, JsonValue } from '../domain/index.js';

/**
 * Zod schemas for the push-notification wire format.
 *
 * The server speaks CloudEvents 1.0 with the concrete event type nested
 * under `data.event_type`, e.g.
 *
 *   { "id": "…", "source": "vault://node-1", "specversion": "1.0",
 *     "type": "*", "time": "2024-05-01T10:00:00.000Z",
 *     "data": { "event_type": "kv-v2/data-write",
 *               "event": { "id": "…", "metadata": { "path": "secret/data/app" } },
 *               "plugin_info": { "mount_path": "secret/", "plugin": "kv" } } }
 *
 * Other producers send a flat `{ type | event_type, data }` object.
 * Anything else is kept whole under an unknown type.
 */

// Header fields are advisory: a wrong type degrades to "absent", never to an error.
const optionalText = z.string().min(1).optional().catch(undefined);

export const wireHeaderSchema = z.object({
  id: optionalText,
  time: optionalText,
  timestamp: optionalText,
  type: optionalText,
  event_type: optionalText,
});

export const vaultEventDataSchema = z.object({
  event_type: z.string().min(1),
  event: z
    .object({ id: optionalText })
    .optional()
    .catch(undefined),
});

export type WireHeader = z.infer<typeof wireHeaderSchema>;

/** CloudEvents `type` the server sends when the concrete type lives in `data`. */
export const WILDCARD_TYPE = '*';

export type WireMessage =
  | {
      kind: 'vault';
      event_type: string;
      id: string | undefined;
      time: string | undefined;
      data: JsonObject;
    }
  | {
      kind: 'typed';
      event_type: string;
      id: string | undefined;
      time: string | undefined;
      data: JsonValue;
    }
  | { kind: 'unknown'; raw: JsonValue };

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Sorts a parsed frame into one of the known shapes.
 *
 * Type resolution order: `data.event_type`, then top-level `event_type`,
 * then top-level `type` unless it is the CloudEvents wildcard.
 */
export function classifyWireMessage(value: JsonValue): WireMessage {
  if (!isJsonObject(value)) return { kind: 'unknown', raw: value };

  const header = wireHeaderSchema.safeParse(value);
  const fields: WireHeader = header.success ? header.data : {};
  const data = value['data'];

  if (isJsonObject(data)) {
    const vault = vaultEventDataSchema.safeParse(data);
    if (vault.success) {
      return {
        kind: 'vault',
        event_type: vault.data.event_type,
        id: fields.id ?? vault.data.event?.id,
        time: fields.time ?? fields.timestamp,
        data,
      };
    }
  }

  const type = fields.event_type
    ?? (fields.type !== undefined && fields.type !== WILDCARD_TYPE ? fields.type : undefined);

  if (type !== undefined) {
    return {
      kind: 'typed',
      event_type: type,
      id: fields.id,
      time: fields.time ?? fields.timestamp,
      data: data !== undefined ? data : value,
    };
  }

  return { kind: 'unknown', raw: value };
}
