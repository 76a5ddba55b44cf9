import type { ZodIssue } from 'zod';

/** Base class for every error the connector raises on purpose. */
export class ConnectorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid or incomplete configuration. Always raised before any
 * connection is attempted and never recovered from.
 */
export class ConfigurationError extends ConnectorError {
  readonly issues: readonly ZodIssue[];

  constructor(message: string, issues: readonly ZodIssue[] = [], options?: { cause?: unknown }) {
    super(message, options);
    this.issues = issues;
  }
}

/** Network, TLS, abrupt close or heartbeat timeout. Triggers backoff. */
export class TransportError extends ConnectorError {
  readonly code: number | undefined;

  constructor(message: string, options?: { cause?: unknown; code?: number }) {
    super(message, options);
    this.code = options?.code;
  }
}

/** Handshake rejected because of the token or its policy. */
export class AuthorizationError extends ConnectorError {
  readonly status: number;

  constructor(message: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
  }
}

/** A frame that could not be turned into an envelope. Never fatal. */
export class NormalizationError extends ConnectorError {
  /** First bytes of the offending frame, for logs. */
  readonly excerpt: string;

  constructor(message: string, excerpt: string, options?: { cause?: unknown }) {
    super(message, options);
    this.excerpt = excerpt;
  }
}

const UNEXPECTED_RESPONSE = /Unexpected server response: (\d{3})/;
const AUTH_STATUSES = new Set([401, 403]);

/**
 * Maps whatever the socket layer threw into the connector's taxonomy.
 *
 * `ws` reports a non-101 handshake reply as
 * "Unexpected server response: <status>"; 401 and 403 are authorization
 * failures, everything else is transport.
 */
export function classifyConnectionError(err: unknown): TransportError | AuthorizationError {
  if (err instanceof TransportError || err instanceof AuthorizationError) return err;

  const message = err instanceof Error ? err.message : String(err);
  const match = UNEXPECTED_RESPONSE.exec(message);
  const status = match?.[1] !== undefined ? Number(match[1]) : undefined;

  if (status !== undefined && AUTH_STATUSES.has(status)) {
    return new AuthorizationError(`Handshake rejected with status ${status}`, status, { cause: err });
  }

  return new TransportError(message, { cause: err, code: status });
}
