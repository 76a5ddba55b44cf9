import type { ConnectorConfig } from '../../application/config.js';

export const TOKEN_HEADER = 'X-Vault-Token';
export const NAMESPACE_HEADER = 'X-Vault-Namespace';

/**
 * Handshake headers shared by every session of a run.
 * Extra headers are applied last and may override the defaults.
 */
export function buildHandshakeHeaders(config: ConnectorConfig): Record<string, string> {
  const headers: Record<string, string> = {
    [TOKEN_HEADER]: config.vaultToken,
  };

  if (config.namespace) {
    headers[NAMESPACE_HEADER] = config.namespace;
  }

  return { ...headers, ...config.headers };
}
