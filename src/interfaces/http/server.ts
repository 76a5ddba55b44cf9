import Fastify from 'fastify';
import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import type { ConnectorHandle } from '../../infrastructure/vault/index.js';
import connectorPlugin from './connector-plugin.js';
import statusRoutes from './status-routes.js';

/**
 * Builds the status server without listening, so tests can `inject()`.
 */
export async function buildStatusServer(
  handle: ConnectorHandle,
  log: Logger,
): Promise<FastifyInstance> {
  const loggerInstance: FastifyBaseLogger = log;
  const fastify = Fastify({ loggerInstance });

  await fastify.register(connectorPlugin, { handle });
  await fastify.register(statusRoutes);

  return fastify;
}
