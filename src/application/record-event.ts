import { randomUUID } from 'node:crypto';
import type { PublishStatus } from '../domain/index.js';
import {
  initialOutboxEvent,
  TenantInactiveError,
  UnknownTenantError,
} from '../domain/index.js';
import type { RecordEventInput } from './event-schema.js';
import type { OutboxDeps } from './ports.js';
import type { PublishOutcome } from './publisher.js';
import { publishEvent } from './publisher.js';
import { withStorage } from './storage.js';

export interface RecordEventResult {
  event_id: string;
  publish_status: PublishStatus;
  publish_failure_reason: string | null;
  created_at: Date;
}

/**
 * Use case: durably record an event for the authenticated tenant, then
 * make the first publish attempt.
 *
 * Failing to store the row fails the call. Anything that goes wrong after
 * the row is stored only leaves it pending for the retry coordinator.
 */
export async function recordEvent(
  deps: OutboxDeps,
  tenantId: string,
  input: RecordEventInput,
): Promise<RecordEventResult> {
  const tenant = await withStorage('tenant lookup', () => deps.tenants.findTenant(tenantId));
  if (tenant === undefined) {
    throw new UnknownTenantError(tenantId);
  }
  if (tenant.status !== 'active') {
    throw new TenantInactiveError(tenantId, tenant.status);
  }

  const row = initialOutboxEvent({
    event_id: randomUUID(),
    entity_id: input.entity_id,
    tenant_id: tenantId,
    event_type: input.event_type,
    origin: input.origin,
    payload: input.payload,
    metadata: input.metadata,
    created_at: deps.now(),
  });

  const stored = await withStorage('record event', () => deps.events.insert(row));

  let outcome: PublishOutcome;
  try {
    outcome = await publishEvent(deps, stored);
  } catch (err: unknown) {
    deps.log.error(
      { err, event_id: stored.event_id },
      'Publish bookkeeping failed after the event was recorded; it stays pending',
    );
    outcome = { status: 'pending', reason: 'publish bookkeeping failed', transient: true };
  }

  deps.log.info(
    {
      event_id: stored.event_id,
      tenant_id: tenantId,
      event_type: stored.event_type,
      publish_status: outcome.status,
    },
    'Event recorded',
  );

  return {
    event_id: stored.event_id,
    publish_status: outcome.status,
    publish_failure_reason: outcome.status === 'pending' ? outcome.reason : null,
    created_at: stored.created_at,
  };
}
