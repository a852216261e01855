import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  confirmDelivery,
  confirmDeliverySchema,
  eventIdParamsSchema,
  getEventDetail,
  getOutboxHealth,
  listEvents,
  listEventsQuerySchema,
  recordEvent,
  recordEventSchema,
} from '../../application/index.js';
import { UnknownEventError, ValidationError } from '../../domain/index.js';
import { tenantOf } from './auth.js';
import { describeValidationError, successResponse } from './response.js';

/**
 * Tenant-facing event routes. All require `X-API-Key`; the authenticated
 * tenant is the only tenant id ever used.
 *
 * POST /api/v1/events                     - record an event (publishes inline)
 * GET  /api/v1/events                     - own events, paginated and filtered
 * GET  /api/v1/events/status              - own pipeline counts
 * GET  /api/v1/events/:event_id           - one own event
 * POST /api/v1/events/:event_id/confirm   - delivery acknowledgment
 */
async function eventRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.post(
    '/api/v1/events',
    { preHandler: fastify.requireTenant },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = recordEventSchema.safeParse(request.body);
      if (!parsed.success) {
        throw new ValidationError(describeValidationError(parsed.error));
      }

      const result = await recordEvent(fastify.outbox, tenantOf(request).tenant_id, parsed.data);
      return reply.status(201).send(successResponse(result, 201));
    },
  );

  fastify.get(
    '/api/v1/events',
    { preHandler: fastify.requireTenant },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = listEventsQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        throw new ValidationError(describeValidationError(parsed.error));
      }

      const result = await listEvents(fastify.outbox, tenantOf(request).tenant_id, parsed.data);
      return reply.status(200).send(successResponse(result));
    },
  );

  fastify.get(
    '/api/v1/events/status',
    { preHandler: fastify.requireTenant },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const counts = await getOutboxHealth(fastify.outbox, tenantOf(request).tenant_id);
      return reply.status(200).send(successResponse(counts));
    },
  );

  fastify.get(
    '/api/v1/events/:event_id',
    { preHandler: fastify.requireTenant },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const params = eventIdParamsSchema.safeParse(request.params);
      if (!params.success) {
        throw new ValidationError(describeValidationError(params.error));
      }

      const event = await getEventDetail(fastify.outbox, tenantOf(request).tenant_id, params.data.event_id);
      if (event === null) {
        throw new UnknownEventError(params.data.event_id);
      }
      return reply.status(200).send(successResponse(event));
    },
  );

  fastify.post(
    '/api/v1/events/:event_id/confirm',
    { preHandler: fastify.requireTenant },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const params = eventIdParamsSchema.safeParse(request.params);
      if (!params.success) {
        throw new ValidationError(describeValidationError(params.error));
      }
      const body = confirmDeliverySchema.safeParse(request.body);
      if (!body.success) {
        throw new ValidationError(describeValidationError(body.error));
      }

      const result = await confirmDelivery(fastify.outbox, tenantOf(request).tenant_id, {
        event_id: params.data.event_id,
        outcome: body.data.outcome,
        failure_reason: body.data.failure_reason,
        received_at: body.data.received_at !== undefined ? new Date(body.data.received_at) : undefined,
      });
      return reply.status(200).send(successResponse(result));
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['outbox', 'auth'],
  fastify: '5.x',
});
