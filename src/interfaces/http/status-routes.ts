import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply } from 'fastify';
import type { FeedState } from '../../application/index.js';

export interface StatusRoutesOptions {
  state: FeedState;
}

/**
 * Worker status routes.
 *
 * GET /health — 200 when every startup resource came up, 503 otherwise.
 * GET /status — cursor, poll count and processing counters.
 */
async function statusRoutes(fastify: FastifyInstance, opts: StatusRoutesOptions): Promise<void> {
  fastify.get('/health', async (_request, reply: FastifyReply) => {
    const healthy = opts.state.healthy();
    return reply.status(healthy ? 200 : 503).send({ status: healthy ? 'ok' : 'degraded' });
  });

  fastify.get('/status', async (_request, reply: FastifyReply) => {
    return reply.status(200).send(opts.state.snapshot());
  });
}

export default fp(statusRoutes, {
  name: 'status-routes',
  fastify: '5.x',
});
