import Fastify from 'fastify';
import type { FastifyInstance, FastifyServerOptions } from 'fastify';
import type { Registry } from 'prom-client';
import type { OutboxDeps } from '../../application/index.js';
import outboxPlugin from './outbox-plugin.js';
import errorHandler from './error-handler.js';
import authPlugin from './auth.js';
import eventRoutes from './event-routes.js';
import tenantRoutes from './tenant-routes.js';
import adminRoutes from './admin-routes.js';
import healthRoutes from './health-routes.js';
import metricsRoutes from './metrics-routes.js';

export interface AppOptions {
  logger?: FastifyServerOptions['logger'];
  adminToken: string;
  /** Served on GET /metrics. */
  metricsRegistry: Registry;
}

/**
 * Assembles the HTTP server around already-built dependencies.
 *
 * Order:
 * 1) Dependencies and error handling
 * 2) Authentication
 * 3) Routes
 *
 * Does not listen; the caller owns that.
 */
export async function buildApp(deps: OutboxDeps, options: AppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: options.logger ?? false });

  await fastify.register(outboxPlugin, { deps });
  await fastify.register(errorHandler);
  await fastify.register(authPlugin, { adminToken: options.adminToken });

  await fastify.register(healthRoutes);
  await fastify.register(metricsRoutes, { registry: options.metricsRegistry });
  await fastify.register(eventRoutes);
  await fastify.register(tenantRoutes);
  await fastify.register(adminRoutes);

  return fastify;
}
