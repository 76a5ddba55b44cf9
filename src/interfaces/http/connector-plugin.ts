import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { ConnectorHandle } from '../../infrastructure/vault/index.js';

export interface ConnectorPluginOptions {
  handle: ConnectorHandle;
}

/**
 * Fastify plugin exposing the running connector to routes.
 * Decorates `fastify.connector`; the connector's lifecycle stays with the
 * process entry point.
 */
async function connectorPlugin(
  fastify: FastifyInstance,
  opts: ConnectorPluginOptions,
): Promise<void> {
  fastify.decorate('connector', opts.handle);
}

export default fp(connectorPlugin, {
  name: 'connector',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.connector` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    connector: ConnectorHandle;
  }
}
