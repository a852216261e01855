import { and, eq, inArray, isNull, lte, or, sql } from 'drizzle-orm';
import type { DeliverySettlement, OutboxEvent } from '../../domain/index.js';
import type { Database } from './client.js';
import { outboxEvents } from './schema.js';

/**
 * Write side of the outbox table.
 *
 * Every status change is one `UPDATE ... WHERE <expected prior state>
 * RETURNING *`: the row comes back when the update applied and `undefined`
 * when another caller got there first. No read-then-write.
 *
 * Retry claims also require the row's last-tried stamp to be at or before
 * the lease cutoff, so a row whose send may still be in flight is left alone.
 */

export async function insertEvent(db: Database, event: OutboxEvent): Promise<OutboxEvent> {
  const [row] = await db.insert(outboxEvents).values(event).returning();
  if (row === undefined) {
    throw new Error(`Insert of event ${event.event_id} returned no row`);
  }
  return row;
}

export async function claimForResend(
  db: Database,
  eventId: string,
  expectedTryCount: number,
  at: Date,
  leaseCutoff: Date,
): Promise<OutboxEvent | undefined> {
  const rows = await db
    .update(outboxEvents)
    .set({
      publish_try_count: sql`${outboxEvents.publish_try_count} + 1`,
      publish_last_tried_at: at,
    })
    .where(and(
      eq(outboxEvents.event_id, eventId),
      eq(outboxEvents.publish_status, 'pending'),
      eq(outboxEvents.publish_try_count, expectedTryCount),
      or(
        isNull(outboxEvents.publish_last_tried_at),
        lte(outboxEvents.publish_last_tried_at, leaseCutoff),
      ),
    ))
    .returning();

  return rows[0];
}

export async function claimForRedelivery(
  db: Database,
  eventId: string,
  expectedTryCount: number,
  at: Date,
  leaseCutoff: Date,
): Promise<OutboxEvent | undefined> {
  const rows = await db
    .update(outboxEvents)
    .set({
      deliver_try_count: sql`${outboxEvents.deliver_try_count} + 1`,
      deliver_last_tried_at: at,
    })
    .where(and(
      eq(outboxEvents.event_id, eventId),
      eq(outboxEvents.publish_status, 'published'),
      inArray(outboxEvents.deliver_status, ['pending', 'failed']),
      eq(outboxEvents.deliver_try_count, expectedTryCount),
      or(
        isNull(outboxEvents.deliver_last_tried_at),
        lte(outboxEvents.deliver_last_tried_at, leaseCutoff),
      ),
    ))
    .returning();

  return rows[0];
}

export async function markPublished(
  db: Database,
  eventId: string,
  at: Date,
): Promise<OutboxEvent | undefined> {
  const rows = await db
    .update(outboxEvents)
    .set({
      publish_status: 'published',
      published_at: at,
      publish_failure_reason: null,
    })
    .where(and(
      eq(outboxEvents.event_id, eventId),
      eq(outboxEvents.publish_status, 'pending'),
    ))
    .returning();

  return rows[0];
}

export async function recordPublishFailure(
  db: Database,
  eventId: string,
  reason: string,
): Promise<OutboxEvent | undefined> {
  const rows = await db
    .update(outboxEvents)
    .set({ publish_failure_reason: reason })
    .where(and(
      eq(outboxEvents.event_id, eventId),
      eq(outboxEvents.publish_status, 'pending'),
    ))
    .returning();

  return rows[0];
}

export async function recordRedeliveryFailure(
  db: Database,
  eventId: string,
  reason: string,
): Promise<OutboxEvent | undefined> {
  const rows = await db
    .update(outboxEvents)
    .set({ deliver_failure_reason: reason })
    .where(and(
      eq(outboxEvents.event_id, eventId),
      inArray(outboxEvents.deliver_status, ['pending', 'failed']),
    ))
    .returning();

  return rows[0];
}

/**
 * Moves the delivery status along one allowed transition for the owning
 * tenant. `delivered` stamps `delivered_at` and clears the failure reason.
 */
export async function settleDelivery(
  db: Database,
  eventId: string,
  tenantId: string,
  settlement: DeliverySettlement,
  at: Date,
  failureReason: string | null,
): Promise<OutboxEvent | undefined> {
  const changes = settlement.to === 'delivered'
    ? { deliver_status: 'delivered' as const, delivered_at: at, deliver_failure_reason: null }
    : { deliver_status: 'failed' as const, deliver_failure_reason: failureReason };

  const rows = await db
    .update(outboxEvents)
    .set(changes)
    .where(and(
      eq(outboxEvents.event_id, eventId),
      eq(outboxEvents.tenant_id, tenantId),
      inArray(outboxEvents.deliver_status, [...settlement.from]),
    ))
    .returning();

  return rows[0];
}
