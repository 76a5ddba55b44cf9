import type { TopicPattern } from '../domain/index.js';

export const SUBSCRIBE_PATH = '/v1/sys/events/subscribe';

/**
 * Builds the WebSocket subscription URI for one pattern.
 *
 *   http://host:8200  + kv-v2/*  →  ws://host:8200/v1/sys/events/subscribe/kv-v2/*?json=true
 *
 * The pattern goes into the path as-is (it carries `/` and `*` the server
 * interprets). The filter expression, when present, is URL-encoded into
 * `filter` and is identical for every pattern of a run.
 */
export function buildSubscriptionUrl(
  vaultAddr: string,
  pattern: TopicPattern,
  filterExpression?: string,
): string {
  const base = vaultAddr
    .replace(/^https:\/\//i, 'wss://')
    .replace(/^http:\/\//i, 'ws://')
    .replace(/\/+$/, '');

  let url = `${base}${SUBSCRIBE_PATH}/${pattern}?json=true`;

  if (filterExpression) {
    url += `&filter=${encodeURIComponent(filterExpression)}`;
  }

  return url;
}
