import { describe, it, expect } from 'vitest';
import { summarizeHealth } from '../../src/application/health.js';
import type { ConnectionState, SessionSnapshot } from '../../src/domain/index.js';

function snapshot(state: ConnectionState, pattern = 'kv-v2/*'): SessionSnapshot {
  return {
    connectionId: `conn-${pattern}`,
    pattern,
    state,
    attempt: 0,
    stats: { framesReceived: 0, eventsDelivered: 0, normalizationErrors: 0, reconnects: 0 },
    lastFailure: null,
  };
}

describe('summarizeHealth', () => {
  it('is ok when every session is open', () => {
    expect(summarizeHealth([snapshot('open', 'a'), snapshot('open', 'b')])).toEqual({
      status: 'ok',
      sessions: 2,
      states: { connecting: 0, open: 2, closing: 0, backoff: 0, stopped: 0 },
    });
  });

  it('is degraded when any session is not open', () => {
    const summary = summarizeHealth([snapshot('open', 'a'), snapshot('backoff', 'b')]);
    expect(summary.status).toBe('degraded');
    expect(summary.states.backoff).toBe(1);
  });

  it('is degraded with no sessions', () => {
    expect(summarizeHealth([]).status).toBe('degraded');
  });
});
