import { z } from 'zod';
import {
  EVENT_TYPES,
  PUBLISH_STATUSES,
  DELIVERY_STATUSES,
  RECEIPT_OUTCOMES,
} from '../domain/index.js';

/**
 * Body of POST /api/v1/events.
 *
 * The tenant is never part of the body; it comes from authentication.
 * `payload` and `metadata` are open-ended objects so every event type
 * can carry its own business fact.
 */
export const recordEventSchema = z.object({
  entity_id: z.string().uuid(),
  event_type: z.enum(EVENT_TYPES),
  origin: z.string().min(1).max(100).default('api'),
  payload: z.record(z.string(), z.unknown()).default({}),
  metadata: z.record(z.string(), z.unknown()).default({}),
});

export type RecordEventInput = z.infer<typeof recordEventSchema>;

/** Body of POST /api/v1/events/:event_id/confirm. */
export const confirmDeliverySchema = z.object({
  outcome: z.enum(RECEIPT_OUTCOMES),
  failure_reason: z.string().min(1).max(2000).optional(),
  received_at: z.string().datetime({ message: 'Must be a valid ISO-8601 datetime' }).optional(),
});

export type ConfirmDeliveryBody = z.infer<typeof confirmDeliverySchema>;

export interface RetryFilterDefaults {
  days: number;
  max_try_count: number;
  max_limit: number;
}

/**
 * Retry filter for resend / redeliver.
 *
 * Built per call site because the defaults and the batch ceiling come from
 * configuration.
 */
export function retryFilterSchema(defaults: RetryFilterDefaults) {
  return z.object({
    days: z.number().int().min(1).max(365).default(defaults.days),
    max_try_count: z.number().int().min(0).default(defaults.max_try_count),
    event_types: z.array(z.enum(EVENT_TYPES)).min(1).optional(),
    tenant_id: z.string().uuid().optional(),
    limit: z.number().int().min(1).max(defaults.max_limit).optional(),
  });
}

export type RetryFilter = z.infer<ReturnType<typeof retryFilterSchema>>;

/** Query string of GET /api/v1/events. Numbers arrive as strings. */
export const listEventsQuerySchema = z.object({
  limit: z.coerce.number().int().optional(),
  offset: z.coerce.number().int().optional(),
  event_type: z.enum(EVENT_TYPES).optional(),
  publish_status: z.enum(PUBLISH_STATUSES).optional(),
  deliver_status: z.enum(DELIVERY_STATUSES).optional(),
  entity_id: z.string().uuid().optional(),
});

export type ListEventsQuery = z.infer<typeof listEventsQuerySchema>;

/** Path parameter of the single-event routes. */
export const eventIdParamsSchema = z.object({
  event_id: z.string().uuid(),
});

/** Query string of the admin health route. */
export const healthQuerySchema = z.object({
  tenant_id: z.string().uuid().optional(),
});
