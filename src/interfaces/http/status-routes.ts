import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply } from 'fastify';
import { summarizeHealth } from '../../application/health.js';

/**
 * Connector status routes.
 *
 * GET /health          : 200 when every session is open, 503 otherwise
 * GET /api/v1/sessions : per-session state, counters and last failure
 */
async function statusRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get('/health', async (_request, reply: FastifyReply) => {
    const summary = summarizeHealth(fastify.connector.sessions());
    return reply.status(summary.status === 'ok' ? 200 : 503).send(summary);
  });

  fastify.get('/api/v1/sessions', async (_request, reply: FastifyReply) => {
    const handle = fastify.connector;
    return reply.status(200).send({
      run_id: handle.runId,
      sessions: handle.sessions(),
      dispatcher: handle.dispatcherStats(),
    });
  });
}

export default fp(statusRoutes, {
  name: 'status-routes',
  dependencies: ['connector'],
  fastify: '5.x',
});
