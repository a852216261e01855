import { describe, it, expect } from 'vitest';
import {
  buildRoutingKey,
  deadLetterQueueName,
  describeTenantTopology,
  normalizeSegment,
  tenantQueueName,
} from '../../src/domain/index.js';
import type { TopologySettings } from '../../src/domain/index.js';

const SETTINGS: TopologySettings = {
  exchange: 'entity_events',
  queuePrefix: 'events_',
  dlqSuffix: '_DLQ',
  messageTtlMs: 86_400_000,
  maxLength: 100_000,
};

describe('normalizeSegment', () => {
  it('lower-cases and collapses runs of other characters into one underscore', () => {
    expect(normalizeSegment('Entity Creation')).toBe('entity_creation');
    expect(normalizeSegment('ACME.Corp--EU')).toBe('acme_corp_eu');
  });

  it('trims surrounding whitespace first', () => {
    expect(normalizeSegment('  acme ')).toBe('acme');
  });

  it('leaves an already-normal segment unchanged', () => {
    expect(normalizeSegment('tenant_42')).toBe('tenant_42');
  });
});

describe('buildRoutingKey', () => {
  it('joins event type and routing name with a dot', () => {
    expect(buildRoutingKey('entity_creation', 'acme')).toBe('entity_creation.acme');
  });

  it('never yields more than two dot-separated words', () => {
    const key = buildRoutingKey('entity.update', 'a.b');
    expect(key).toBe('entity_update.a_b');
    expect(key.split('.')).toHaveLength(2);
  });
});

describe('queue names', () => {
  it('prefixes the routing name for the live queue', () => {
    expect(tenantQueueName(SETTINGS, 'acme')).toBe('events_acme');
  });

  it('appends the dead-letter suffix to the live queue name', () => {
    expect(deadLetterQueueName(SETTINGS, 'acme')).toBe('events_acme_DLQ');
  });
});

describe('describeTenantTopology', () => {
  it('describes the live queue, its binding and dead-lettering', () => {
    expect(describeTenantTopology(SETTINGS, 'acme')).toEqual({
      exchange: 'entity_events',
      exchange_type: 'topic',
      queue: 'events_acme',
      binding_key: '*.acme',
      queue_arguments: {
        'x-message-ttl': 86_400_000,
        'x-max-length': 100_000,
        'x-dead-letter-exchange': 'entity_events.dlx',
        'x-dead-letter-routing-key': 'acme',
      },
      dead_letter_exchange: 'entity_events.dlx',
      dead_letter_exchange_type: 'direct',
      dead_letter_queue: 'events_acme_DLQ',
      dead_letter_binding_key: 'acme',
    });
  });

  it('binds a key that matches every event type routed to the tenant', () => {
    const topology = describeTenantTopology(SETTINGS, 'acme');
    const routingKey = buildRoutingKey('entity_status_change', 'acme');

    const [, tenantWord] = routingKey.split('.');
    expect(topology.binding_key).toBe(`*.${tenantWord}`);
  });
});
