import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { BackoffPolicy } from './backoff.js';
import { buildSubscriptionUrl } from './subscription-url.js';

export const DEFAULT_EVENT_PATH = 'kv-v2/data-*';

const ENDPOINT_PROTOCOLS = new Set(['http:', 'https:', 'ws:', 'wss:']);

function isEndpointUrl(value: string): boolean {
  try {
    return ENDPOINT_PROTOCOLS.has(new URL(value).protocol);
  } catch {
    return false;
  }
}

// RFC 7230 token characters.
const HEADER_NAME = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
// CR, LF and NUL would split or truncate the handshake request.
const HEADER_UNSAFE = /[\r\n\0]/;

const headerSafe = (v: string): boolean => !HEADER_UNSAFE.test(v);
const HEADER_UNSAFE_MESSAGE = 'Must not contain CR, LF or NUL';

const QUERY_OR_FRAGMENT = /[?#]/;

function isSubscriptionUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return (parsed.protocol === 'ws:' || parsed.protocol === 'wss:') && parsed.hash === '';
  } catch {
    return false;
  }
}

/** Patterns go into the URL path; `?` and `#` would end it early. */
const eventPath = z
  .string()
  .trim()
  .min(1, 'Event paths must not be blank')
  .refine((p) => !QUERY_OR_FRAGMENT.test(p), { message: 'Event paths must not contain "?" or "#"' });

/**
 * Connector configuration, supplied once at startup and read-only for the
 * whole run. Durations are in seconds, as operators write them.
 */
export const connectorConfigSchema = z
  .object({
    vaultAddr: z
      .string()
      .min(1, 'vaultAddr is required')
      .refine(isEndpointUrl, { message: 'Must be an http(s):// or ws(s):// URL' })
      .refine((v) => !QUERY_OR_FRAGMENT.test(v), { message: 'Must not carry a query string or fragment' }),
    vaultToken: z
      .string()
      .min(1, 'vaultToken is required')
      .refine(headerSafe, { message: HEADER_UNSAFE_MESSAGE }),
    eventPaths: z
      .array(eventPath)
      .min(1, 'At least one event path is required')
      .default([DEFAULT_EVENT_PATH]),
    verifySsl: z.boolean().default(true),
    pingIntervalSeconds: z.number().positive().default(20),
    backoffInitialSeconds: z.number().positive().default(1),
    backoffMaxSeconds: z.number().positive().default(30),
    backoffJitter: z.number().min(0).max(0.2).default(0),
    namespace: z.string().min(1).refine(headerSafe, { message: HEADER_UNSAFE_MESSAGE }).optional(),
    headers: z
      .record(
        z.string().regex(HEADER_NAME, 'Header names must be HTTP tokens'),
        z.string().refine(headerSafe, { message: HEADER_UNSAFE_MESSAGE }),
      )
      .default({}),
    filterExpression: z.string().min(1).optional(),
    handshakeTimeoutSeconds: z.number().positive().default(10),
    bufferSize: z.number().int().positive().default(1000),
    shutdownGraceSeconds: z.number().nonnegative().default(5),
    maxAuthFailures: z.number().int().nonnegative().default(0),
  })
  .refine((c) => c.backoffMaxSeconds >= c.backoffInitialSeconds, {
    message: 'backoffMaxSeconds must be >= backoffInitialSeconds',
    path: ['backoffMaxSeconds'],
  })
  .refine((c) => new Set(c.eventPaths).size === c.eventPaths.length, {
    message: 'Event paths must be unique (one connection per pattern)',
    path: ['eventPaths'],
  })
  .superRefine((c, ctx) => {
    // Reported on the field itself already.
    if (!isEndpointUrl(c.vaultAddr) || QUERY_OR_FRAGMENT.test(c.vaultAddr)) return;

    c.eventPaths.forEach((pattern, index) => {
      if (QUERY_OR_FRAGMENT.test(pattern)) return;
      if (!isSubscriptionUrl(buildSubscriptionUrl(c.vaultAddr, pattern, c.filterExpression))) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Does not form a valid subscription URL with ${c.vaultAddr}`,
          path: ['eventPaths', index],
        });
      }
    });
  });

export type ConnectorConfigInput = z.input<typeof connectorConfigSchema>;
export type ConnectorConfig = Readonly<z.output<typeof connectorConfigSchema>>;

function describeIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validates a programmatic configuration object.
 * Throws ConfigurationError with the zod issues attached.
 */
export function parseConnectorConfig(input: unknown): ConnectorConfig {
  const parsed = connectorConfigSchema.safeParse(input);

  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid connector configuration: ${describeIssues(parsed.error.issues)}`,
      parsed.error.issues,
    );
  }

  return Object.freeze(parsed.data);
}

/* ------------------------------------------------------------------ */
/*  Environment                                                        */
/* ------------------------------------------------------------------ */

function envBoolean(raw: string): boolean | string {
  const v = raw.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(v)) return true;
  if (['false', '0', 'no', 'off'].includes(v)) return false;
  return raw; // left for zod to reject
}

function envNumber(raw: string): number {
  return raw.trim() === '' ? Number.NaN : Number(raw);
}

/**
 * `VAULT_EVENT_PATHS` takes either a JSON array or a comma-separated list.
 * An empty value is an empty list, which validation rejects.
 */
export function parseEventPaths(raw: string): unknown {
  const trimmed = raw.trim();
  if (trimmed.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      return parsed;
    } catch {
      throw new ConfigurationError('VAULT_EVENT_PATHS is not a valid JSON array');
    }
  }
  return trimmed
    .split(',')
    .map((p) => p.trim())
    .filter((p) => p !== '');
}

function parseHeaders(raw: string): unknown {
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    throw new ConfigurationError('VAULT_EVENT_HEADERS must be a JSON object of string values');
  }
}

/**
 * Builds the connector configuration from environment variables.
 * Unset variables fall back to the schema defaults.
 */
export function loadConnectorConfig(
  env: NodeJS.ProcessEnv = process.env,
): ConnectorConfig {
  const input: Record<string, unknown> = {};
  const set = <T>(key: string, raw: string | undefined, convert: (v: string) => T): void => {
    if (raw !== undefined) input[key] = convert(raw);
  };
  const str = (v: string): string => v;

  set('vaultAddr', env['VAULT_ADDR'], str);
  set('vaultToken', env['VAULT_TOKEN'], str);
  set('eventPaths', env['VAULT_EVENT_PATHS'], parseEventPaths);
  set('verifySsl', env['VAULT_VERIFY_SSL'], envBoolean);
  set('pingIntervalSeconds', env['VAULT_PING_INTERVAL'], envNumber);
  set('backoffInitialSeconds', env['VAULT_BACKOFF_INITIAL'], envNumber);
  set('backoffMaxSeconds', env['VAULT_BACKOFF_MAX'], envNumber);
  set('backoffJitter', env['VAULT_BACKOFF_JITTER'], envNumber);
  set('namespace', env['VAULT_NAMESPACE'] || undefined, str);
  set('headers', env['VAULT_EVENT_HEADERS'] || undefined, parseHeaders);
  set('filterExpression', env['VAULT_EVENT_FILTER'] || undefined, str);
  set('handshakeTimeoutSeconds', env['VAULT_HANDSHAKE_TIMEOUT'], envNumber);
  set('bufferSize', env['DISPATCH_BUFFER_SIZE'], envNumber);
  set('shutdownGraceSeconds', env['SHUTDOWN_GRACE_SECONDS'], envNumber);
  set('maxAuthFailures', env['MAX_AUTH_FAILURES'], envNumber);

  return parseConnectorConfig(input);
}

/** Backoff policy in milliseconds derived from the config. */
export function toBackoffPolicy(config: ConnectorConfig): BackoffPolicy {
  return {
    initialMs: config.backoffInitialSeconds * 1000,
    maxMs: config.backoffMaxSeconds * 1000,
    jitter: config.backoffJitter,
  };
}
