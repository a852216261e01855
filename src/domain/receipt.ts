import type { DeliveryStatus, EventType } from './event.js';

export const RECEIPT_OUTCOMES = ['received', 'processed', 'failed'] as const;

/** What the consumer reports having done with a delivered message. */
export type ReceiptOutcome = (typeof RECEIPT_OUTCOMES)[number];

/**
 * Append-only audit record of one consumer acknowledgment.
 *
 * Several receipts may exist for the same (event, tenant) pair; only the
 * first one that moves the event forward changes the event row.
 */
export interface DeliveryReceipt {
  readonly receipt_id: string;
  readonly event_id: string;
  readonly tenant_id: string;
  readonly event_type: EventType;
  readonly received_at: Date;
  readonly processing_status: ReceiptOutcome;
  readonly processing_failure_reason: string | null;
  readonly created_at: Date;
}

/**
 * A conditional transition of the event's delivery status.
 *
 * `from` lists the statuses the row may be in for the transition to apply.
 * `delivered` is terminal, so it never appears in `from`.
 */
export interface DeliverySettlement {
  readonly to: Exclude<DeliveryStatus, 'pending'>;
  readonly from: readonly DeliveryStatus[];
}

export function isReceiptOutcome(value: string): value is ReceiptOutcome {
  return (RECEIPT_OUTCOMES as readonly string[]).includes(value);
}

/**
 * Maps a consumer outcome to the delivery transition it may cause.
 *
 * received / processed: pending|failed → delivered
 * failed:               pending        → failed
 */
export function settlementFor(outcome: ReceiptOutcome): DeliverySettlement {
  if (outcome === 'failed') {
    return { to: 'failed', from: ['pending'] };
  }
  return { to: 'delivered', from: ['pending', 'failed'] };
}
