import { describe, it, expect } from 'vitest';
import { buildSubscriptionUrl } from '../../src/application/subscription-url.js';
import { buildHandshakeHeaders } from '../../src/infrastructure/vault/subscription.js';
import { parseConnectorConfig } from '../../src/application/config.js';

describe('buildSubscriptionUrl', () => {
  it('switches http to ws', () => {
    expect(buildSubscriptionUrl('http://127.0.0.1:8200', 'kv-v2/*')).toBe(
      'ws://127.0.0.1:8200/v1/sys/events/subscribe/kv-v2/*?json=true',
    );
  });

  it('switches https to wss', () => {
    expect(buildSubscriptionUrl('https://vault.example.com', 'database/*')).toBe(
      'wss://vault.example.com/v1/sys/events/subscribe/database/*?json=true',
    );
  });

  it('keeps ws and wss addresses', () => {
    expect(buildSubscriptionUrl('wss://vault:8200', '*')).toBe(
      'wss://vault:8200/v1/sys/events/subscribe/*?json=true',
    );
  });

  it('drops trailing slashes from the base', () => {
    expect(buildSubscriptionUrl('http://vault:8200//', 'kv-v1/*')).toBe(
      'ws://vault:8200/v1/sys/events/subscribe/kv-v1/*?json=true',
    );
  });

  it('URL-encodes the filter expression', () => {
    expect(buildSubscriptionUrl('http://vault:8200', 'kv-v2/*', 'event_type == "kv-v2/data-write"')).toBe(
      'ws://vault:8200/v1/sys/events/subscribe/kv-v2/*?json=true&filter=event_type%20%3D%3D%20%22kv-v2%2Fdata-write%22',
    );
  });

  it('encodes the same filter identically for every pattern', () => {
    const filter = 'event_type contains "write"';
    const query = (url: string) => url.slice(url.indexOf('?'));
    expect(query(buildSubscriptionUrl('http://vault:8200', 'kv-v2/*', filter))).toBe(
      query(buildSubscriptionUrl('http://vault:8200', 'database/*', filter)),
    );
  });

  it('round-trips the filter through URL parsing', () => {
    const filter = 'event_type == "kv-v2/data-write" or event_type == "kv-v2/data-delete"';
    const url = new URL(buildSubscriptionUrl('http://vault:8200', 'kv-v2/*', filter));
    expect(url.searchParams.get('filter')).toBe(filter);
    expect(url.searchParams.get('json')).toBe('true');
  });

  it('omits the filter when empty', () => {
    expect(buildSubscriptionUrl('http://vault:8200', 'kv-v2/*', '')).toBe(
      'ws://vault:8200/v1/sys/events/subscribe/kv-v2/*?json=true',
    );
  });
});

describe('buildHandshakeHeaders', () => {
  const base = { vaultAddr: 'http://vault:8200', vaultToken: 'test-token' };

  it('sends the token', () => {
    expect(buildHandshakeHeaders(parseConnectorConfig(base))).toEqual({ 'X-Vault-Token': 'test-token' });
  });

  it('adds the namespace and extra headers', () => {
    const config = parseConnectorConfig({ ...base, namespace: 'team-a', headers: { 'X-Request-Source': 'relay' } });
    expect(buildHandshakeHeaders(config)).toEqual({
      'X-Vault-Token': 'test-token',
      'X-Vault-Namespace': 'team-a',
      'X-Request-Source': 'relay',
    });
  });

  it('lets extra headers override defaults', () => {
    const config = parseConnectorConfig({ ...base, headers: { 'X-Vault-Token': 'override-token' } });
    expect(buildHandshakeHeaders(config)['X-Vault-Token']).toBe('override-token');
  });
});
