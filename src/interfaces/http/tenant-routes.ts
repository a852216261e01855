import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { describeTenantTopology } from '../../domain/index.js';
import { tenantOf } from './auth.js';
import { successResponse } from './response.js';

/**
 * GET /api/v1/tenants/me/topology - the broker objects the calling tenant
 * is expected to declare and consume from.
 */
async function tenantRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/api/v1/tenants/me/topology',
    { preHandler: fastify.requireTenant },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const tenant = tenantOf(request);
      const topology = describeTenantTopology(fastify.outbox.settings.topology, tenant.routing_name);
      return reply.status(200).send(successResponse({
        tenant_id: tenant.tenant_id,
        routing_name: tenant.routing_name,
        topology,
      }));
    },
  );
}

export default fp(tenantRoutes, {
  name: 'tenant-routes',
  dependencies: ['outbox', 'auth'],
  fastify: '5.x',
});
