import type { ConnectionState, SessionSnapshot } from '../domain/index.js';

export interface HealthSummary {
  status: 'ok' | 'degraded';
  sessions: number;
  states: Record<ConnectionState, number>;
}

/**
 * Rolls session snapshots up into one status.
 * `ok` only when there is at least one session and all of them are open.
 */
export function summarizeHealth(snapshots: readonly SessionSnapshot[]): HealthSummary {
  const states: Record<ConnectionState, number> = {
    connecting: 0,
    open: 0,
    closing: 0,
    backoff: 0,
    stopped: 0,
  };

  for (const snapshot of snapshots) {
    states[snapshot.state]++;
  }

  const healthy = snapshots.length > 0 && states.open === snapshots.length;

  return {
    status: healthy ? 'ok' : 'degraded',
    sessions: snapshots.length,
    states,
  };
}
