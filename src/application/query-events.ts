import type { DeliveryReceipt, OutboxEvent } from '../domain/index.js';
import type { ListEventsQuery } from './event-schema.js';
import type { EventListFilters, OutboxDeps } from './ports.js';
import { withStorage } from './storage.js';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

/**
 * Use case: list a tenant's events with pagination and filters.
 * Clamps limit to [1, 500], defaults to 50.
 */
export async function listEvents(deps: OutboxDeps, tenantId: string, params: ListEventsQuery) {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);
  const offset = Math.max(params.offset ?? 0, 0);

  const filters: EventListFilters = { tenant_id: tenantId };
  if (params.event_type !== undefined) filters.event_type = params.event_type;
  if (params.publish_status !== undefined) filters.publish_status = params.publish_status;
  if (params.deliver_status !== undefined) filters.deliver_status = params.deliver_status;
  if (params.entity_id !== undefined) filters.entity_id = params.entity_id;

  const data = await withStorage('list events', () => deps.events.list(filters, { limit, offset }));

  return {
    data,
    pagination: { limit, offset, count: data.length },
  };
}

/**
 * Use case: fetch one of the tenant's events.
 * Returns null when it does not exist or belongs to someone else.
 */
export async function getEvent(
  deps: OutboxDeps,
  tenantId: string,
  eventId: string,
): Promise<OutboxEvent | null> {
  const row = await withStorage('event lookup', () => deps.events.findById(eventId));
  if (row === undefined || row.tenant_id !== tenantId) return null;
  return row;
}

export type EventDetail = OutboxEvent & { receipts: DeliveryReceipt[] };

/**
 * Use case: one of the tenant's events with its delivery receipts, oldest first.
 * Returns null under the same conditions as `getEvent`.
 */
export async function getEventDetail(
  deps: OutboxDeps,
  tenantId: string,
  eventId: string,
): Promise<EventDetail | null> {
  const event = await getEvent(deps, tenantId, eventId);
  if (event === null) return null;
  const receipts = await withStorage('list receipts', () => deps.receipts.listForEvent(eventId, tenantId));
  return { ...event, receipts };
}
