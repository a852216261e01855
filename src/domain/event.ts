/**
 * Core domain types for the outbox event model.
 *
 * An outbox event is the durable record of a state change in the service
 * of record. It carries two independent lifecycles over the same row:
 * publish (hand-off to the broker) and delivery (consumer acknowledgment).
 * These types carry no framework dependencies.
 */

/** Fixed vocabulary of event types the entity service may record. */
export const EVENT_TYPES = [
  'entity_creation',
  'entity_deletion',
  'entity_status_change',
  'entity_update',
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

export const PUBLISH_STATUSES = ['pending', 'published', 'failed'] as const;
export type PublishStatus = (typeof PUBLISH_STATUSES)[number];

export const DELIVERY_STATUSES = ['pending', 'delivered', 'failed'] as const;
export type DeliveryStatus = (typeof DELIVERY_STATUSES)[number];

/** Free-form business fact attached to every event. */
export type EventPayload = Record<string, unknown>;

/** Context for the fact: correlation ids, timestamps, actor, ... */
export type EventMetadata = Record<string, unknown>;

/**
 * Canonical outbox row.
 *
 * Created once by `recordEvent`; afterwards only the publish and delivery
 * fields change, and only through the publisher, the retry coordinator and
 * the delivery receiver.
 */
export interface OutboxEvent {
  readonly event_id: string;
  readonly entity_id: string;
  readonly tenant_id: string;
  readonly event_type: EventType;
  readonly origin: string;
  readonly payload: EventPayload;
  readonly metadata: EventMetadata;

  readonly publish_status: PublishStatus;
  readonly publish_try_count: number;
  readonly publish_first_tried_at: Date | null;
  readonly publish_last_tried_at: Date | null;
  readonly published_at: Date | null;
  readonly publish_failure_reason: string | null;

  readonly deliver_status: DeliveryStatus;
  readonly deliver_try_count: number;
  readonly deliver_last_tried_at: Date | null;
  readonly delivered_at: Date | null;
  readonly deliver_failure_reason: string | null;

  readonly created_at: Date;
}

/** Fields supplied when a row is first written. */
export type NewOutboxEvent = Pick<
  OutboxEvent,
  | 'event_id'
  | 'entity_id'
  | 'tenant_id'
  | 'event_type'
  | 'origin'
  | 'payload'
  | 'metadata'
  | 'created_at'
>;

export function isEventType(value: string): value is EventType {
  return (EVENT_TYPES as readonly string[]).includes(value);
}

/**
 * Builds the initial row for a freshly recorded event.
 *
 * The creation-time publish attempt is stamped here. The try count starts
 * at zero: only retry claims increment it.
 */
export function initialOutboxEvent(input: NewOutboxEvent): OutboxEvent {
  return {
    ...input,
    publish_status: 'pending',
    publish_try_count: 0,
    publish_first_tried_at: input.created_at,
    publish_last_tried_at: input.created_at,
    published_at: null,
    publish_failure_reason: null,
    deliver_status: 'pending',
    deliver_try_count: 0,
    deliver_last_tried_at: null,
    delivered_at: null,
    deliver_failure_reason: null,
  };
}
