import WebSocket from 'ws';
import type { ClientOptions, RawData } from 'ws';
import type { Logger } from 'pino';
import type {
  ConnectionState,
  EventEnvelope,
  SessionFailure,
  SessionSnapshot,
  SessionStats,
  StateTransition,
  TopicPattern,
} from '../../domain/index.js';
import type { BackoffPolicy } from '../../application/backoff.js';
import { nextDelay } from '../../application/backoff.js';
import { normalize } from '../../application/normalizer.js';
import {
  AuthorizationError,
  ConfigurationError,
  TransportError,
  classifyConnectionError,
} from '../../application/errors.js';
import type { DeliveryOutcome } from '../delivery/dispatcher.js';
import { sleep } from '../timers.js';

/** Opens the underlying socket. Swapped out in tests. */
export type SocketFactory = (url: string, options: ClientOptions) => WebSocket;

export const createSocket: SocketFactory = (url, options) => new WebSocket(url, options);

/** The part of the dispatcher a session talks to. */
export interface EventDeliverer {
  deliver(envelope: EventEnvelope): DeliveryOutcome;
}

export type TransitionListener = (transition: StateTransition) => void;

export interface SessionOptions {
  connectionId: string;
  pattern: TopicPattern;
  url: string;
  headers: Readonly<Record<string, string>>;
  verifySsl: boolean;
  heartbeatMs: number;
  handshakeTimeoutMs: number;
  backoff: BackoffPolicy;
  /** Consecutive authorization failures before giving up; 0 never gives up. */
  maxAuthFailures: number;
  dispatcher: EventDeliverer;
  log: Logger;
  socketFactory?: SocketFactory;
  onTransition?: TransitionListener;
}

type ConnectFailure = TransportError | AuthorizationError;

/**
 * One WebSocket subscription for one topic pattern.
 *
 * State machine:
 *
 *   connecting ──open──▶ open ──error/close/heartbeat timeout──▶ backoff
 *        ▲                                                         │
 *        └──────────────────────── delay elapsed ──────────────────┘
 *
 * Cancellation (the run's AbortSignal) moves any state to closing and
 * then stopped; stopped is terminal. The attempt counter resets once the
 * connection proves itself live: first frame or first pong after open.
 *
 * Every frame is normalized and handed to the dispatcher in receive
 * order. Malformed frames are logged and dropped; the socket stays open.
 */
export class ConnectionSession {
  readonly connectionId: string;
  readonly pattern: TopicPattern;

  private state: ConnectionState = 'connecting';
  private attempt = 0;
  private authFailures = 0;
  private sequence = 0;
  private socket: WebSocket | null = null;
  private lastFailure: SessionFailure | null = null;
  private started = false;
  private readonly stats: SessionStats = {
    framesReceived: 0,
    eventsDelivered: 0,
    normalizationErrors: 0,
    reconnects: 0,
  };
  private readonly log: Logger;
  private readonly socketFactory: SocketFactory;

  constructor(private readonly options: SessionOptions) {
    this.connectionId = options.connectionId;
    this.pattern = options.pattern;
    this.log = options.log.child({ connectionId: options.connectionId, pattern: options.pattern });
    this.socketFactory = options.socketFactory ?? createSocket;
  }

  get currentState(): ConnectionState {
    return this.state;
  }

  snapshot(): SessionSnapshot {
    return {
      connectionId: this.connectionId,
      pattern: this.pattern,
      state: this.state,
      attempt: this.attempt,
      stats: { ...this.stats },
      lastFailure: this.lastFailure,
    };
  }

  /**
   * Runs the connect / read / backoff loop until `signal` aborts.
   *
   * Resolves once stopped. Rejects with AuthorizationError only when
   * `maxAuthFailures` is set and that many consecutive handshakes were
   * rejected, and with ConfigurationError when the socket cannot even be
   * created from the configured URL and headers. Neither is retried.
   */
  async run(signal: AbortSignal): Promise<void> {
    if (this.started) {
      throw new Error(`Session ${this.connectionId} has already been started`);
    }
    this.started = true;
    this.log.info({ url: this.options.url }, 'Session starting');

    try {
      while (!signal.aborted) {
        this.transition('connecting');
        const failure = await this.connectOnce(signal);
        if (failure === null || signal.aborted) break;

        this.recordFailure(failure);

        if (failure instanceof AuthorizationError) {
          this.authFailures++;
          const limit = this.options.maxAuthFailures;
          if (limit > 0 && this.authFailures >= limit) {
            this.log.error(
              { err: failure, authFailures: this.authFailures, limit },
              'Authorization failure limit reached, giving up',
            );
            throw failure;
          }
        }

        this.transition('backoff');
        const delayMs = nextDelay(this.options.backoff, this.attempt);
        this.log.warn(
          { err: failure, attempt: this.attempt, delayMs },
          failure instanceof AuthorizationError
            ? 'Subscription rejected, retrying after backoff'
            : 'Connection lost, reconnecting after backoff',
        );
        this.attempt++;

        await sleep(delayMs, signal);
        if (!signal.aborted) this.stats.reconnects++;
      }
    } finally {
      this.transition('stopped');
    }
  }

  /**
   * Drops the socket without a close handshake. Used by the manager to
   * abandon a session that did not stop within the grace period.
   */
  terminate(): void {
    this.socket?.terminate();
  }

  /* ------------------------------------------------------------------ */
  /*  Private: one connection attempt                                   */
  /* ------------------------------------------------------------------ */

  /**
   * Opens one socket and resolves when it is gone: with the failure that
   * ended it, or null when it was closed because of cancellation.
   */
  private connectOnce(signal: AbortSignal): Promise<ConnectFailure | null> {
    const { url, headers, verifySsl, handshakeTimeoutMs, heartbeatMs } = this.options;

    let socket: WebSocket;
    try {
      socket = this.socketFactory(url, {
        headers: { ...headers },
        rejectUnauthorized: verifySsl,
        handshakeTimeout: handshakeTimeoutMs,
      });
    } catch (err: unknown) {
      // ws validates the URL and header values synchronously.
      const reason = err instanceof Error ? err.message : String(err);
      const error = new ConfigurationError(
        `Cannot open subscription for ${this.pattern}: ${reason}`,
        [],
        { cause: err },
      );
      this.lastFailure = { class: 'configuration', message: error.message, at: new Date().toISOString() };
      this.log.error({ err, url }, 'Subscription could not be opened, giving up');
      return Promise.reject(error);
    }
    this.socket = socket;

    return new Promise((resolve) => {
      let failure: ConnectFailure | null = null;
      let heartbeat: ReturnType<typeof setInterval> | null = null;
      let awaitingPong = false;
      let established = false;

      const stopHeartbeat = (): void => {
        if (heartbeat) {
          clearInterval(heartbeat);
          heartbeat = null;
        }
      };

      const onAbort = (): void => {
        stopHeartbeat();
        this.transition('closing');
        if (socket.readyState === WebSocket.CONNECTING) {
          socket.terminate();
        } else {
          socket.close(1000, 'shutdown');
        }
      };

      const markAlive = (): void => {
        awaitingPong = false;
        if (!established) {
          established = true;
          this.attempt = 0;
          this.authFailures = 0;
          this.log.info('Subscription established');
        }
      };

      socket.on('open', () => {
        this.transition('open');
        this.log.info({ url }, 'Connected to event stream');

        heartbeat = setInterval(() => {
          if (awaitingPong) {
            failure = new TransportError(`No heartbeat ack within ${heartbeatMs}ms`);
            this.log.warn({ heartbeatMs }, 'Heartbeat timeout, dropping connection');
            stopHeartbeat();
            socket.terminate();
            return;
          }
          awaitingPong = true;
          try {
            socket.ping();
          } catch (err: unknown) {
            failure ??= classifyConnectionError(err);
            stopHeartbeat();
            socket.terminate();
          }
        }, heartbeatMs);
      });

      socket.on('message', (data: RawData) => {
        markAlive();
        this.handleFrame(data);
      });

      socket.on('pong', markAlive);

      socket.on('error', (err: Error) => {
        if (signal.aborted) return;
        failure ??= classifyConnectionError(err);
        this.log.debug({ err }, 'Socket error');
      });

      socket.on('close', (code: number, reason: Buffer) => {
        stopHeartbeat();
        signal.removeEventListener('abort', onAbort);
        if (this.socket === socket) this.socket = null;

        if (signal.aborted) {
          this.log.info({ code }, 'Connection closed on shutdown');
          resolve(null);
          return;
        }

        const text = reason.toString('utf8');
        resolve(
          failure
            ?? new TransportError(
              `Connection closed by remote (code ${code}${text ? `: ${text}` : ''})`,
              { code },
            ),
        );
      });

      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  private handleFrame(data: RawData): void {
    this.stats.framesReceived++;
    this.sequence++;

    const result = normalize(data, this.pattern, {
      connectionId: this.connectionId,
      sequence: this.sequence,
      receivedAt: new Date(),
    });

    if (!result.success) {
      this.stats.normalizationErrors++;
      this.log.warn(
        { err: result.error, excerpt: result.error.excerpt, sequence: this.sequence },
        'Dropping malformed frame',
      );
      return;
    }

    const { envelope } = result;
    this.log.debug(
      { event_id: envelope.event_id, event_type: envelope.event_type, sequence: this.sequence },
      'Event received',
    );

    if (this.options.dispatcher.deliver(envelope) !== 'closed') {
      this.stats.eventsDelivered++;
    }
  }

  /* ------------------------------------------------------------------ */
  /*  Private: bookkeeping                                              */
  /* ------------------------------------------------------------------ */

  private recordFailure(failure: ConnectFailure): void {
    this.lastFailure = {
      class: failure instanceof AuthorizationError ? 'authorization' : 'transport',
      message: failure.message,
      at: new Date().toISOString(),
      ...(failure instanceof AuthorizationError ? { status: failure.status } : {}),
    };
  }

  private transition(to: ConnectionState): void {
    const from = this.state;
    if (from === to) return;
    this.state = to;

    const transition: StateTransition = {
      connectionId: this.connectionId,
      pattern: this.pattern,
      from,
      to,
      at: new Date().toISOString(),
    };

    this.log.info({ from, to }, 'Session state changed');

    try {
      this.options.onTransition?.(transition);
    } catch (err: unknown) {
      this.log.warn({ err }, 'State transition listener threw');
    }
  }
}
