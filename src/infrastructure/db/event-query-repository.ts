import { and, asc, desc, eq, gte, inArray, isNull, lt, lte, or, sql, type SQL } from 'drizzle-orm';
import type { OutboxEvent } from '../../domain/index.js';
import type {
  EventListFilters,
  PaginationParams,
  RetryCriteria,
  StatusCounts,
} from '../../application/index.js';
import type { Database } from './client.js';
import { outboxEvents } from './schema.js';

/**
 * Fetches a single event by event_id.
 * Returns undefined if not found.
 */
export async function findEventById(db: Database, eventId: string): Promise<OutboxEvent | undefined> {
  const rows = await db
    .select()
    .from(outboxEvents)
    .where(eq(outboxEvents.event_id, eventId))
    .limit(1);

  return rows[0];
}

/**
 * Fetches a paginated, filtered list of one tenant's events.
 * Only non-undefined filters are applied. Newest first.
 */
export async function queryEvents(
  db: Database,
  filters: EventListFilters,
  pagination: PaginationParams,
): Promise<OutboxEvent[]> {
  const conditions: SQL[] = [eq(outboxEvents.tenant_id, filters.tenant_id)];

  if (filters.event_type !== undefined) {
    conditions.push(eq(outboxEvents.event_type, filters.event_type));
  }
  if (filters.publish_status !== undefined) {
    conditions.push(eq(outboxEvents.publish_status, filters.publish_status));
  }
  if (filters.deliver_status !== undefined) {
    conditions.push(eq(outboxEvents.deliver_status, filters.deliver_status));
  }
  if (filters.entity_id !== undefined) {
    conditions.push(eq(outboxEvents.entity_id, filters.entity_id));
  }

  return db
    .select()
    .from(outboxEvents)
    .where(and(...conditions))
    .orderBy(desc(outboxEvents.created_at))
    .limit(pagination.limit)
    .offset(pagination.offset);
}

function sharedRetryConditions(criteria: RetryCriteria): SQL[] {
  const conditions: SQL[] = [gte(outboxEvents.created_at, criteria.createdSince)];

  if (criteria.eventTypes !== undefined && criteria.eventTypes.length > 0) {
    conditions.push(inArray(outboxEvents.event_type, [...criteria.eventTypes]));
  }
  if (criteria.tenantId !== undefined) {
    conditions.push(eq(outboxEvents.tenant_id, criteria.tenantId));
  }
  return conditions;
}

/** Uses `idx_outbox_publish_retry`. Oldest first, bounded by `criteria.limit`. */
export async function findResendCandidates(
  db: Database,
  criteria: RetryCriteria,
): Promise<OutboxEvent[]> {
  return db
    .select()
    .from(outboxEvents)
    .where(and(
      eq(outboxEvents.publish_status, 'pending'),
      lt(outboxEvents.publish_try_count, criteria.maxTryCount),
      or(
        isNull(outboxEvents.publish_last_tried_at),
        lte(outboxEvents.publish_last_tried_at, criteria.leaseCutoff),
      ),
      ...sharedRetryConditions(criteria),
    ))
    .orderBy(asc(outboxEvents.created_at))
    .limit(criteria.limit);
}

/** Uses `idx_outbox_deliver_retry`. Oldest first, bounded by `criteria.limit`. */
export async function findRedeliverCandidates(
  db: Database,
  criteria: RetryCriteria,
): Promise<OutboxEvent[]> {
  return db
    .select()
    .from(outboxEvents)
    .where(and(
      eq(outboxEvents.publish_status, 'published'),
      inArray(outboxEvents.deliver_status, ['pending', 'failed']),
      lt(outboxEvents.deliver_try_count, criteria.maxTryCount),
      or(
        isNull(outboxEvents.deliver_last_tried_at),
        lte(outboxEvents.deliver_last_tried_at, criteria.leaseCutoff),
      ),
      ...sharedRetryConditions(criteria),
    ))
    .orderBy(asc(outboxEvents.created_at))
    .limit(criteria.limit);
}

/**
 * Status counts for monitoring in a single pass, optionally for one tenant.
 * `exhaustedAt` is the try count from which a pending row is no longer retried.
 */
export async function countEventsByStatus(
  db: Database,
  exhaustedAt: number,
  tenantId?: string,
): Promise<StatusCounts> {
  const rows = await db
    .select({
      pending_count: sql<number>`count(*) filter (where ${outboxEvents.publish_status} = 'pending')`.mapWith(Number),
      failed_count: sql<number>`count(*) filter (where ${outboxEvents.publish_status} = 'failed' or ${outboxEvents.deliver_status} = 'failed')`.mapWith(Number),
      exhausted_count: sql<number>`count(*) filter (where ${outboxEvents.publish_status} = 'pending' and ${outboxEvents.publish_try_count} >= ${exhaustedAt})`.mapWith(Number),
      undelivered_count: sql<number>`count(*) filter (where ${outboxEvents.publish_status} = 'published' and ${outboxEvents.deliver_status} = 'pending')`.mapWith(Number),
    })
    .from(outboxEvents)
    .where(tenantId !== undefined ? eq(outboxEvents.tenant_id, tenantId) : undefined);

  return rows[0] ?? { pending_count: 0, failed_count: 0, exhausted_count: 0, undelivered_count: 0 };
}

export async function pingDatabase(db: Database): Promise<void> {
  await db.execute(sql`select 1`);
}
