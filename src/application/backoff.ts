/**
 * Exponential reconnect delay with a hard ceiling.
 *
 * delay(attempt) = min(initialMs * 2^attempt, maxMs)
 *
 * With `jitter` > 0 each delay is scaled by a random factor in
 * [1 - jitter, 1 + jitter] and clamped to `maxMs` again, so the cap holds
 * but strict monotonicity does not. Jitter is limited to ±20%.
 */
export interface BackoffPolicy {
  initialMs: number;
  maxMs: number;
  jitter: number;
}

export const MAX_JITTER = 0.2;

/**
 * Computes the delay before reconnect attempt `attempt` (0-based).
 * Large attempts saturate at `maxMs` instead of overflowing.
 */
export function nextDelay(
  policy: BackoffPolicy,
  attempt: number,
  random: () => number = Math.random,
): number {
  const n = Number.isFinite(attempt) ? Math.max(0, Math.floor(attempt)) : Number.MAX_SAFE_INTEGER;
  const raw = policy.initialMs * 2 ** n;
  const base = Number.isFinite(raw) ? Math.min(raw, policy.maxMs) : policy.maxMs;

  const jitter = Math.min(Math.max(policy.jitter, 0), MAX_JITTER);
  if (jitter === 0) return base;

  const factor = 1 + (random() * 2 - 1) * jitter;
  return Math.min(Math.round(base * factor), policy.maxMs);
}
