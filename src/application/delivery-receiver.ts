import { randomUUID } from 'node:crypto';
import type { DeliveryReceipt, DeliveryStatus, ReceiptOutcome } from '../domain/index.js';
import {
  isReceiptOutcome,
  settlementFor,
  TenantMismatchError,
  UnknownEventError,
  ValidationError,
} from '../domain/index.js';
import type { OutboxDeps } from './ports.js';
import { withStorage } from './storage.js';

export interface ConfirmDeliveryInput {
  event_id: string;
  outcome: ReceiptOutcome;
  failure_reason?: string | null | undefined;
  /** When the consumer received the message; defaults to now. */
  received_at?: Date | undefined;
}

export interface ConfirmDeliveryResult {
  receipt: DeliveryReceipt;
  /** true when this confirmation did not move the event forward. */
  duplicate: boolean;
  deliver_status: DeliveryStatus;
  delivered_at: Date | null;
}

/**
 * Delivery receiver: records a consumer acknowledgment.
 *
 * Every call appends a receipt. The event row only moves when the
 * conditional settlement applies; replays and late, weaker outcomes
 * leave it untouched and come back as `duplicate: true`.
 */
export async function confirmDelivery(
  deps: OutboxDeps,
  tenantId: string,
  input: ConfirmDeliveryInput,
): Promise<ConfirmDeliveryResult> {
  if (!isReceiptOutcome(input.outcome)) {
    throw new ValidationError(`Unknown delivery outcome: ${String(input.outcome)}`);
  }

  const event = await withStorage('event lookup', () => deps.events.findById(input.event_id));
  if (event === undefined) {
    throw new UnknownEventError(input.event_id);
  }
  if (event.tenant_id !== tenantId) {
    deps.log.warn(
      { event_id: input.event_id, tenant_id: tenantId },
      'Delivery confirmation rejected: caller does not own the event',
    );
    throw new TenantMismatchError(input.event_id);
  }

  const now = deps.now();
  const failureReason = input.outcome === 'failed'
    ? input.failure_reason ?? 'consumer reported failure'
    : input.failure_reason ?? null;

  const receipt = await withStorage('insert receipt', () =>
    deps.receipts.insert({
      receipt_id: randomUUID(),
      event_id: event.event_id,
      tenant_id: tenantId,
      event_type: event.event_type,
      received_at: input.received_at ?? now,
      processing_status: input.outcome,
      processing_failure_reason: failureReason,
      created_at: now,
    }),
  );

  const settled = await withStorage('settle delivery', () =>
    deps.events.settleDelivery(
      event.event_id,
      tenantId,
      settlementFor(input.outcome),
      now,
      input.outcome === 'failed' ? failureReason : null,
    ),
  );

  if (settled !== undefined) {
    deps.log.info(
      { event_id: event.event_id, tenant_id: tenantId, deliver_status: settled.deliver_status },
      'Delivery confirmed',
    );
    return {
      receipt,
      duplicate: false,
      deliver_status: settled.deliver_status,
      delivered_at: settled.delivered_at,
    };
  }

  const current = await withStorage('event lookup', () => deps.events.findById(event.event_id));
  deps.log.info(
    { event_id: event.event_id, tenant_id: tenantId, outcome: input.outcome },
    'Duplicate delivery confirmation recorded',
  );
  return {
    receipt,
    duplicate: true,
    deliver_status: current?.deliver_status ?? event.deliver_status,
    delivered_at: current?.delivered_at ?? event.delivered_at,
  };
}
