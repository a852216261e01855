import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { errorResponse, successResponse } from './response.js';

/**
 * GET /health - liveness. 200 when the store answers, 503 otherwise.
 * The broker is not checked: a broker outage only delays publishing.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      await fastify.outbox.events.ping();
      return reply.status(200).send(successResponse({ status: 'ok', store: 'reachable' }));
    } catch (err: unknown) {
      fastify.log.error({ err }, 'Store health check failed');
      return reply.status(503).send(errorResponse(503, 'Store unreachable'));
    }
  });
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['outbox'],
  fastify: '5.x',
});
