import type { OutboxEvent, Tenant } from '../domain/index.js';
import { buildRoutingKey, PublishTimeoutError, TransientBrokerError } from '../domain/index.js';
import type { BrokerMessage, OutboxDeps } from './ports.js';
import { withStorage } from './storage.js';
import { withTimeout } from './timeout.js';

/** Result of handing one event to the broker. */
export type SendResult =
  | { readonly ok: true; readonly routingKey: string }
  | {
      readonly ok: false;
      readonly reason: string;
      /** true for broker trouble, false when the tenant itself blocks the send. */
      readonly transient: boolean;
    };

export type PublishOutcome =
  | { readonly status: 'published'; readonly routing_key: string }
  | { readonly status: 'pending'; readonly reason: string; readonly transient: boolean };

/**
 * Shapes the broker message for an event.
 *
 * The body mirrors the stored row: payload under `data`, metadata enriched
 * with the creation timestamp. `attempt` is 0 for publish and resend and the
 * delivery try count for redeliveries.
 */
export function buildEventMessage(
  event: OutboxEvent,
  tenant: Tenant,
  exchange: string,
  attempt: number,
  timestamp: Date,
): BrokerMessage {
  return {
    exchange,
    routingKey: buildRoutingKey(event.event_type, tenant.routing_name),
    messageId: event.event_id,
    body: {
      event_id: event.event_id,
      event_type: event.event_type,
      entity_id: event.entity_id,
      tenant_id: event.tenant_id,
      origin: event.origin,
      data: event.payload,
      metadata: {
        ...event.metadata,
        created_at: event.created_at.toISOString(),
      },
    },
    headers: {
      'x-tenant': tenant.routing_name,
      'x-delivery-attempt': attempt,
    },
    timestamp,
  };
}

function describeFailure(err: unknown): string {
  if (err instanceof Error && err.message.length > 0) return err.message;
  return 'unknown broker error';
}

/**
 * Sends one event to the broker under its tenant's routing key.
 *
 * The routing name is resolved at send time, never read from the row.
 * Never throws for broker trouble: timeouts and channel errors come back
 * as `{ ok: false }`. Store failures during the tenant lookup do throw.
 */
export async function sendToBroker(
  deps: OutboxDeps,
  event: OutboxEvent,
  attempt: number,
): Promise<SendResult> {
  const tenant = await withStorage('tenant lookup', () => deps.tenants.findTenant(event.tenant_id));

  if (tenant === undefined) {
    deps.metrics.recordPublish({ event_type: event.event_type, tenant: 'unknown' }, 'failure', null);
    return { ok: false, reason: `tenant ${event.tenant_id} not found`, transient: false };
  }
  const labels = { event_type: event.event_type, tenant: tenant.routing_name };
  if (tenant.status !== 'active') {
    deps.metrics.recordPublish(labels, 'failure', null);
    return { ok: false, reason: `tenant ${tenant.tenant_id} is ${tenant.status}`, transient: false };
  }

  const message = buildEventMessage(
    event,
    tenant,
    deps.settings.topology.exchange,
    attempt,
    deps.now(),
  );

  const start = process.hrtime.bigint();
  const elapsed = (): number => Number(process.hrtime.bigint() - start) / 1e9;
  try {
    await withTimeout(
      deps.broker.publish(message),
      deps.settings.publishTimeoutMs,
      'broker publish',
    );
    deps.metrics.recordPublish(labels, 'success', elapsed());
    deps.log.debug(
      { event_id: event.event_id, routing_key: message.routingKey, attempt },
      'Event handed to broker',
    );
    return { ok: true, routingKey: message.routingKey };
  } catch (err: unknown) {
    const brokerErr = err instanceof TransientBrokerError
      ? err
      : new TransientBrokerError(describeFailure(err), { cause: err });
    deps.metrics.recordPublish(labels, 'failure', elapsed());
    deps.metrics.recordBrokerFailure(brokerErr instanceof PublishTimeoutError ? 'timeout' : 'broker_error');
    deps.log.warn(
      { err: brokerErr, event_id: event.event_id, routing_key: message.routingKey, attempt },
      'Broker publish failed',
    );
    return { ok: false, reason: brokerErr.message, transient: true };
  }
}

/**
 * Publisher: attempts the broker hand-off for a pending event and records
 * the outcome on the row.
 *
 * Success moves the row pending → published. Failure leaves it pending with
 * the reason recorded; the try count is not touched here.
 */
export async function publishEvent(deps: OutboxDeps, event: OutboxEvent): Promise<PublishOutcome> {
  const sent = await sendToBroker(deps, event, 0);

  if (sent.ok) {
    const updated = await withStorage('mark published', () =>
      deps.events.markPublished(event.event_id, deps.now()),
    );
    if (updated === undefined) {
      deps.log.debug({ event_id: event.event_id }, 'Event was no longer pending when marked published');
    }
    return { status: 'published', routing_key: sent.routingKey };
  }

  await withStorage('record publish failure', () =>
    deps.events.recordPublishFailure(event.event_id, sent.reason),
  );
  return { status: 'pending', reason: sent.reason, transient: sent.transient };
}
