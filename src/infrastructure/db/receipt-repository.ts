import { and, asc, eq } from 'drizzle-orm';
import type { DeliveryReceipt } from '../../domain/index.js';
import type { Database } from './client.js';
import { deliveryReceipts } from './schema.js';

export async function insertReceipt(db: Database, receipt: DeliveryReceipt): Promise<DeliveryReceipt> {
  const [row] = await db.insert(deliveryReceipts).values(receipt).returning();
  if (row === undefined) {
    throw new Error(`Insert of receipt ${receipt.receipt_id} returned no row`);
  }
  return row;
}

/** Receipts for one event as seen by its owning tenant, oldest first. */
export async function findReceiptsForEvent(
  db: Database,
  eventId: string,
  tenantId: string,
): Promise<DeliveryReceipt[]> {
  return db
    .select()
    .from(deliveryReceipts)
    .where(and(
      eq(deliveryReceipts.event_id, eventId),
      eq(deliveryReceipts.tenant_id, tenantId),
    ))
    .orderBy(asc(deliveryReceipts.created_at));
}
