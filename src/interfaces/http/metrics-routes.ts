import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { Registry } from 'prom-client';
import { getOutboxHealth } from '../../application/index.js';

export interface MetricsRoutesOptions {
  registry: Registry;
}

/**
 * GET /metrics - Prometheus exposition, unauthenticated like /health.
 *
 * The outbox gauges are refreshed from the store on every scrape. A store
 * failure is logged and the last known values are served.
 */
async function metricsRoutes(fastify: FastifyInstance, opts: MetricsRoutesOptions): Promise<void> {
  const { registry } = opts;

  fastify.get('/metrics', async (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      fastify.outbox.metrics.setOutboxCounts(await getOutboxHealth(fastify.outbox));
    } catch (err: unknown) {
      fastify.log.warn({ err }, 'Outbox gauges not refreshed');
    }

    return reply
      .status(200)
      .header('content-type', registry.contentType)
      .send(await registry.metrics());
  });
}

export default fp(metricsRoutes, {
  name: 'metrics-routes',
  dependencies: ['outbox'],
  fastify: '5.x',
});
