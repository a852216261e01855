import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  getOutboxHealth,
  healthQuerySchema,
  redeliver,
  resend,
  retryFilterSchema,
} from '../../application/index.js';
import { ValidationError } from '../../domain/index.js';
import { describeValidationError, successResponse } from './response.js';

/**
 * Administrative triggers, guarded by `X-Admin-Token`.
 *
 * POST /api/v1/admin/events/resend      - one resend batch
 * POST /api/v1/admin/events/redeliver   - one redeliver batch
 * GET  /api/v1/admin/events/health      - counts, all tenants or `?tenant_id=`
 */
async function adminRoutes(fastify: FastifyInstance): Promise<void> {
  const { settings } = fastify.outbox;
  const filterSchema = retryFilterSchema({
    days: settings.defaultLookbackDays,
    max_try_count: settings.defaultMaxTryCount,
    max_limit: settings.retryBatchLimit,
  });

  fastify.post(
    '/api/v1/admin/events/resend',
    { preHandler: fastify.requireAdmin },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = filterSchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        throw new ValidationError(describeValidationError(parsed.error));
      }
      const result = await resend(fastify.outbox, parsed.data);
      return reply.status(200).send(successResponse(result));
    },
  );

  fastify.post(
    '/api/v1/admin/events/redeliver',
    { preHandler: fastify.requireAdmin },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = filterSchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        throw new ValidationError(describeValidationError(parsed.error));
      }
      const result = await redeliver(fastify.outbox, parsed.data);
      return reply.status(200).send(successResponse(result));
    },
  );

  fastify.get(
    '/api/v1/admin/events/health',
    { preHandler: fastify.requireAdmin },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = healthQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        throw new ValidationError(describeValidationError(parsed.error));
      }
      const counts = await getOutboxHealth(fastify.outbox, parsed.data.tenant_id);
      return reply.status(200).send(successResponse(counts));
    },
  );
}

export default fp(adminRoutes, {
  name: 'admin-routes',
  dependencies: ['outbox', 'auth'],
  fastify: '5.x',
});
