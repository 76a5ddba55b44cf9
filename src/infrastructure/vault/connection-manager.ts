import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { SessionSnapshot } from '../../domain/index.js';
import type { ConnectorConfig, ConnectorConfigInput } from '../../application/config.js';
import { parseConnectorConfig, toBackoffPolicy } from '../../application/config.js';
import { AuthorizationError } from '../../application/errors.js';
import type { EventSink } from '../delivery/sink.js';
import type { DispatcherStats } from '../delivery/dispatcher.js';
import { Dispatcher } from '../delivery/dispatcher.js';
import { buildSubscriptionUrl } from '../../application/subscription-url.js';
import { sleep } from '../timers.js';
import { ConnectionSession } from './session.js';
import type { SocketFactory, TransitionListener } from './session.js';
import { buildHandshakeHeaders } from './subscription.js';

export interface ConnectionManagerDeps {
  sink: EventSink;
  log: Logger;
  socketFactory?: SocketFactory;
  onTransition?: TransitionListener;
}

/** What `start()` hands back: the caller's grip on one connector run. */
export interface ConnectorHandle {
  readonly runId: string;
  readonly config: ConnectorConfig;
  /**
   * Settles when every session has stopped. Rejects with the error that
   * ended a session on its own: AuthorizationError when the fatal
   * authorization policy fired, ConfigurationError when a subscription
   * could not be opened at all.
   */
  readonly done: Promise<void>;
  sessions(): SessionSnapshot[];
  dispatcherStats(): DispatcherStats;
}

export interface StopReport {
  stopped: string[];
  abandoned: string[];
  /** Buffered events discarded because the grace period ran out. */
  undelivered: number;
}

interface Run {
  readonly id: string;
  readonly config: ConnectorConfig;
  readonly controller: AbortController;
  readonly sessions: ConnectionSession[];
  /** One per session, never rejects. */
  readonly tasks: Promise<void>[];
  readonly dispatcher: Dispatcher;
}

/**
 * Supervises one ConnectionSession per configured topic pattern.
 *
 * The remote protocol accepts a single subscription filter per socket,
 * so N patterns means N sessions, started together and kept alive
 * independently: one session's backoff cycle never touches another's.
 *
 * Each run owns its AbortController, sessions and Dispatcher. Nothing
 * is shared between runs, so a run started after `stop()` begins clean.
 */
export class ConnectionManager {
  private readonly runs = new Map<string, Run>();
  private readonly stops = new WeakMap<ConnectorHandle, Promise<StopReport>>();

  constructor(private readonly deps: ConnectionManagerDeps) {}

  /**
   * Validates the config and starts every session.
   * Throws ConfigurationError before any connection is attempted.
   */
  start(input: ConnectorConfigInput): ConnectorHandle {
    const config = parseConnectorConfig(input);
    const runId = randomUUID();
    const log = this.deps.log.child({ runId });

    const controller = new AbortController();
    const dispatcher = new Dispatcher(this.deps.sink, log, config.bufferSize);
    const headers = buildHandshakeHeaders(config);
    const backoff = toBackoffPolicy(config);

    if (config.eventPaths.length > 1) {
      log.info(
        { connections: config.eventPaths.length },
        'Multiple event paths configured, one connection per path',
      );
    }
    if (config.filterExpression) {
      log.info({ filter: config.filterExpression }, 'Applying server-side filter expression');
    }

    const sessions = config.eventPaths.map(
      (pattern, index) =>
        new ConnectionSession({
          connectionId: `conn-${index + 1}`,
          pattern,
          url: buildSubscriptionUrl(config.vaultAddr, pattern, config.filterExpression),
          headers,
          verifySsl: config.verifySsl,
          heartbeatMs: config.pingIntervalSeconds * 1000,
          handshakeTimeoutMs: config.handshakeTimeoutSeconds * 1000,
          backoff,
          maxAuthFailures: config.maxAuthFailures,
          dispatcher,
          log,
          socketFactory: this.deps.socketFactory,
          onTransition: this.deps.onTransition,
        }),
    );

    // First error that ended a session; the rest of the run is stopped.
    let fatal: { error: unknown } | null = null;

    const tasks = sessions.map((session) =>
      session.run(controller.signal).catch((err: unknown) => {
        fatal ??= { error: err };
        log.fatal(
          { err, pattern: session.pattern },
          err instanceof AuthorizationError
            ? 'Authorization failures exceeded limit, stopping connector'
            : 'Session terminated unexpectedly, stopping connector',
        );
        controller.abort();
      }),
    );

    const done = Promise.all(tasks).then(() => {
      if (fatal) throw fatal.error;
    });
    // Observed through the handle; this keeps an unobserved fatal from
    // surfacing as an unhandled rejection.
    void done.catch(() => undefined);

    const run: Run = {
      id: runId,
      config,
      controller,
      sessions,
      tasks,
      dispatcher,
    };
    this.runs.set(runId, run);

    log.info(
      { vaultAddr: config.vaultAddr, eventPaths: config.eventPaths, verifySsl: config.verifySsl },
      'Connector started',
    );

    return {
      runId,
      config,
      done,
      sessions: () => sessions.map((s) => s.snapshot()),
      dispatcherStats: () => dispatcher.stats(),
    };
  }

  /**
   * Cancels every session of the run and waits for them to stop.
   *
   * Sessions still running when the grace period ends are terminated and
   * reported as abandoned. Buffered events get whatever grace is left to
   * reach the sink; the rest are discarded. Calling stop twice returns
   * the same report.
   */
  stop(handle: ConnectorHandle): Promise<StopReport> {
    const pending = this.stops.get(handle);
    if (pending) return pending;

    const run = this.runs.get(handle.runId);
    if (!run) {
      return Promise.resolve({ stopped: [], abandoned: [], undelivered: 0 });
    }
    const stopping = this.shutdown(run);
    this.stops.set(handle, stopping);
    return stopping;
  }

  /** Number of runs started and not yet stopped. */
  get activeRuns(): number {
    return this.runs.size;
  }

  private async shutdown(run: Run): Promise<StopReport> {
    const log = this.deps.log.child({ runId: run.id });
    const graceMs = run.config.shutdownGraceSeconds * 1000;
    const startedAt = Date.now();

    log.info({ sessions: run.sessions.length, graceMs }, 'Stopping connector');
    run.controller.abort();

    const finished = new Set<string>();
    const all = Promise.all(
      run.tasks.map((task, i) =>
        task.then(() => {
          const session = run.sessions[i];
          if (session) finished.add(session.connectionId);
        }),
      ),
    );

    const timer = new AbortController();
    await Promise.race([all, sleep(graceMs, timer.signal)]);
    timer.abort();

    const abandoned: string[] = [];
    for (const session of run.sessions) {
      if (finished.has(session.connectionId)) continue;
      abandoned.push(session.connectionId);
      log.warn(
        { connectionId: session.connectionId, pattern: session.pattern, state: session.currentState },
        'Session did not stop within grace period, abandoning',
      );
      session.terminate();
    }

    const remainingMs = Math.max(0, graceMs - (Date.now() - startedAt));
    await run.dispatcher.flush(remainingMs);
    const undelivered = run.dispatcher.close();

    this.runs.delete(run.id);

    const report: StopReport = {
      stopped: run.sessions
        .map((s) => s.connectionId)
        .filter((id) => finished.has(id)),
      abandoned,
      undelivered,
    };

    log.info(report, 'Connector stopped');
    return report;
  }
}
