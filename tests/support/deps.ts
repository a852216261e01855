import { randomUUID } from 'node:crypto';
import pino from 'pino';
import { Registry } from 'prom-client';
import type { OutboxDeps, OutboxSettings } from '../../src/application/index.js';
import { initialOutboxEvent } from '../../src/domain/index.js';
import type { OutboxEvent, Tenant } from '../../src/domain/index.js';
import { PrometheusOutboxMetrics } from '../../src/infrastructure/metrics/outbox-metrics.js';
import { FakeBroker } from './fake-broker.js';
import { InMemoryEventStore, InMemoryReceiptStore, InMemoryTenantDirectory } from './in-memory-stores.js';

export const START = new Date('2026-03-01T12:00:00.000Z');

export const TEST_SETTINGS: OutboxSettings = {
  topology: {
    exchange: 'entity_events',
    queuePrefix: 'events_',
    dlqSuffix: '_DLQ',
    messageTtlMs: 86_400_000,
    maxLength: 100_000,
  },
  publishTimeoutMs: 50,
  claimLeaseMs: 100,
  retryBatchLimit: 100,
  defaultMaxTryCount: 10,
  defaultLookbackDays: 1,
  bcryptRounds: 4,
};

export interface TestHarness {
  deps: OutboxDeps;
  events: InMemoryEventStore;
  receipts: InMemoryReceiptStore;
  tenants: InMemoryTenantDirectory;
  broker: FakeBroker;
  /** Fresh per harness; carries only the outbox metrics. */
  registry: Registry;
  /** Moves the fixed clock forward. */
  advance(ms: number): void;
}

export function createHarness(settings: Partial<OutboxSettings> = {}): TestHarness {
  const events = new InMemoryEventStore();
  const receipts = new InMemoryReceiptStore();
  const tenants = new InMemoryTenantDirectory();
  const broker = new FakeBroker();
  const registry = new Registry();
  let current = START.getTime();

  const deps: OutboxDeps = {
    events,
    receipts,
    tenants,
    broker,
    metrics: new PrometheusOutboxMetrics(registry),
    log: pino({ level: 'silent' }),
    settings: { ...TEST_SETTINGS, ...settings },
    now: () => new Date(current),
  };

  return {
    deps,
    events,
    receipts,
    tenants,
    broker,
    registry,
    advance(ms: number) {
      current += ms;
    },
  };
}

export function seedTenant(harness: TestHarness, overrides: Partial<Tenant> = {}): Tenant {
  return harness.tenants.seedTenant({
    tenant_id: randomUUID(),
    routing_name: 'acme',
    description: null,
    status: 'active',
    created_at: START,
    updated_at: START,
    ...overrides,
  });
}

/**
 * Writes a pending row straight into the store. Seeded rows have no send in
 * flight: their last-tried stamps are empty unless overridden.
 */
export function seedEvent(
  harness: TestHarness,
  tenant: Tenant,
  overrides: Partial<OutboxEvent> = {},
): OutboxEvent {
  const base = initialOutboxEvent({
    event_id: randomUUID(),
    entity_id: randomUUID(),
    tenant_id: tenant.tenant_id,
    event_type: 'entity_creation',
    origin: 'api',
    payload: { name: 'Widget' },
    metadata: {},
    created_at: harness.deps.now(),
  });
  return harness.events.seed({
    ...base,
    publish_first_tried_at: null,
    publish_last_tried_at: null,
    ...overrides,
  });
}
