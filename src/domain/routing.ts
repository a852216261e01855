/**
 * Broker naming contract shared by the publisher and whatever provisions
 * the tenant queues.
 *
 * Every tenant gets one durable queue bound to the shared topic exchange
 * with `*.<routing_name>`, and one dead-letter queue fed through a direct
 * dead-letter exchange. Messages that outlive the TTL or overflow the max
 * length are dead-lettered by the broker.
 */

export interface TopologySettings {
  /** Shared topic exchange every event is published to. */
  readonly exchange: string;
  readonly queuePrefix: string;
  readonly dlqSuffix: string;
  readonly messageTtlMs: number;
  readonly maxLength: number;
}

export interface TenantTopology {
  readonly exchange: string;
  readonly exchange_type: 'topic';
  readonly queue: string;
  readonly binding_key: string;
  readonly queue_arguments: {
    readonly 'x-message-ttl': number;
    readonly 'x-max-length': number;
    readonly 'x-dead-letter-exchange': string;
    readonly 'x-dead-letter-routing-key': string;
  };
  readonly dead_letter_exchange: string;
  readonly dead_letter_exchange_type: 'direct';
  readonly dead_letter_queue: string;
  readonly dead_letter_binding_key: string;
}

/** Lower-cases a segment and collapses every run of characters outside [a-z0-9_] into `_`. */
export function normalizeSegment(segment: string): string {
  return segment.trim().toLowerCase().replace(/[^a-z0-9_]+/g, '_');
}

/**
 * Routing key for an event: `<event_type>.<routing_name>`.
 *
 * Both segments are normalized so neither can contain a `.` and break the
 * two-word shape the tenant binding matches.
 */
export function buildRoutingKey(eventType: string, routingName: string): string {
  return `${normalizeSegment(eventType)}.${normalizeSegment(routingName)}`;
}

export function tenantQueueName(settings: TopologySettings, routingName: string): string {
  return `${settings.queuePrefix}${routingName}`;
}

export function deadLetterQueueName(settings: TopologySettings, routingName: string): string {
  return `${tenantQueueName(settings, routingName)}${settings.dlqSuffix}`;
}

export function deadLetterExchangeName(settings: TopologySettings): string {
  return `${settings.exchange}.dlx`;
}

export function describeTenantTopology(
  settings: TopologySettings,
  routingName: string,
): TenantTopology {
  const dlx = deadLetterExchangeName(settings);
  return {
    exchange: settings.exchange,
    exchange_type: 'topic',
    queue: tenantQueueName(settings, routingName),
    binding_key: `*.${routingName}`,
    queue_arguments: {
      'x-message-ttl': settings.messageTtlMs,
      'x-max-length': settings.maxLength,
      'x-dead-letter-exchange': dlx,
      'x-dead-letter-routing-key': routingName,
    },
    dead_letter_exchange: dlx,
    dead_letter_exchange_type: 'direct',
    dead_letter_queue: deadLetterQueueName(settings, routingName),
    dead_letter_binding_key: routingName,
  };
}
