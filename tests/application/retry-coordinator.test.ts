import { describe, it, expect, beforeEach } from 'vitest';
import { recordEvent } from '../../src/application/record-event.js';
import { criteriaFrom, redeliver, resend } from '../../src/application/retry-coordinator.js';
import type { RetryFilter } from '../../src/application/index.js';
import type { Tenant } from '../../src/domain/index.js';
import { createHarness, seedEvent, seedTenant, START } from '../support/deps.js';
import type { TestHarness } from '../support/deps.js';

const DAY_MS = 24 * 60 * 60 * 1000;

function filter(overrides: Partial<RetryFilter> = {}): RetryFilter {
  return { days: 1, max_try_count: 10, ...overrides };
}

let h: TestHarness;
let acme: Tenant;

beforeEach(() => {
  h = createHarness();
  acme = seedTenant(h, { routing_name: 'acme' });
});

describe('criteriaFrom', () => {
  it('derives the lookback window from the clock', () => {
    const criteria = criteriaFrom(h.deps, filter({ days: 3 }));
    expect(criteria.createdSince).toEqual(new Date(START.getTime() - 3 * DAY_MS));
  });

  it('defaults the batch size to the configured ceiling and clamps larger values', () => {
    expect(criteriaFrom(h.deps, filter()).limit).toBe(100);
    expect(criteriaFrom(h.deps, filter({ limit: 5 })).limit).toBe(5);
    expect(criteriaFrom(h.deps, filter({ limit: 5_000 })).limit).toBe(100);
  });
});

describe('resend', () => {
  it('publishes an event recorded while the broker was down', async () => {
    h.broker.mode = 'reject';
    const recorded = await recordEvent(h.deps, acme.tenant_id, {
      entity_id: '3f0c8a1e-5b7d-4c2a-9e6f-1a2b3c4d5e6f',
      event_type: 'entity_creation',
      origin: 'api',
      payload: {},
      metadata: {},
    });
    expect(h.events.get(recorded.event_id)?.publish_try_count).toBe(0);

    h.broker.mode = 'accept';
    h.advance(60_000);
    const result = await resend(h.deps, filter());

    expect(result).toEqual({ attempted: 1, succeeded: 1, failed: 0, skipped: 0 });
    const row = h.events.get(recorded.event_id);
    expect(row?.publish_status).toBe('published');
    expect(row?.publish_try_count).toBe(1);
    expect(row?.publish_last_tried_at).toEqual(new Date(START.getTime() + 60_000));
    expect(row?.publish_first_tried_at).toEqual(START);
    expect(h.broker.published[0]?.routingKey).toBe('entity_creation.acme');
  });

  it('does nothing when max_try_count is 0', async () => {
    const event = seedEvent(h, acme);

    const result = await resend(h.deps, filter({ max_try_count: 0 }));

    expect(result).toEqual({ attempted: 0, succeeded: 0, failed: 0, skipped: 0 });
    expect(h.broker.attempts).toBe(0);
    expect(h.events.get(event.event_id)).toEqual(event);
  });

  it('skips rows that reached max_try_count', async () => {
    const exhausted = seedEvent(h, acme, { publish_try_count: 10 });
    const eligible = seedEvent(h, acme, { publish_try_count: 9 });

    const result = await resend(h.deps, filter({ max_try_count: 10 }));

    expect(result.attempted).toBe(1);
    expect(h.events.get(exhausted.event_id)?.publish_status).toBe('pending');
    expect(h.events.get(eligible.event_id)?.publish_status).toBe('published');
    expect(h.events.get(eligible.event_id)?.publish_try_count).toBe(10);
  });

  it('ignores rows created before the lookback window', async () => {
    const old = seedEvent(h, acme, { created_at: new Date(START.getTime() - 2 * DAY_MS) });
    const recent = seedEvent(h, acme);

    const result = await resend(h.deps, filter({ days: 1 }));

    expect(result.attempted).toBe(1);
    expect(h.events.get(old.event_id)?.publish_status).toBe('pending');
    expect(h.events.get(recent.event_id)?.publish_status).toBe('published');
  });

  it('narrows by event type and tenant', async () => {
    const globex = seedTenant(h, { routing_name: 'globex' });
    const creation = seedEvent(h, acme, { event_type: 'entity_creation' });
    const update = seedEvent(h, acme, { event_type: 'entity_update' });
    const other = seedEvent(h, globex, { event_type: 'entity_creation' });

    const result = await resend(h.deps, filter({
      event_types: ['entity_creation'],
      tenant_id: acme.tenant_id,
    }));

    expect(result.attempted).toBe(1);
    expect(h.events.get(creation.event_id)?.publish_status).toBe('published');
    expect(h.events.get(update.event_id)?.publish_status).toBe('pending');
    expect(h.events.get(other.event_id)?.publish_status).toBe('pending');
  });

  it('takes the oldest rows first up to the limit', async () => {
    const first = seedEvent(h, acme, { created_at: new Date(START.getTime() - 3_000) });
    const second = seedEvent(h, acme, { created_at: new Date(START.getTime() - 2_000) });
    const third = seedEvent(h, acme, { created_at: new Date(START.getTime() - 1_000) });

    const result = await resend(h.deps, filter({ limit: 2 }));

    expect(result.attempted).toBe(2);
    expect(h.events.get(first.event_id)?.publish_status).toBe('published');
    expect(h.events.get(second.event_id)?.publish_status).toBe('published');
    expect(h.events.get(third.event_id)?.publish_status).toBe('pending');
  });

  it('counts every attempt even when the broker stays down', async () => {
    h.broker.mode = 'reject';
    const event = seedEvent(h, acme);

    const result = await resend(h.deps, filter());

    expect(result).toEqual({ attempted: 1, succeeded: 0, failed: 1, skipped: 0 });
    const row = h.events.get(event.event_id);
    expect(row?.publish_status).toBe('pending');
    expect(row?.publish_try_count).toBe(1);
    expect(row?.publish_failure_reason).toBe('connection refused');
  });

  it('stops early after repeated broker failures and leaves the rest untouched', async () => {
    h.broker.mode = 'reject';
    const rows = [1, 2, 3, 4, 5].map((n) =>
      seedEvent(h, acme, { created_at: new Date(START.getTime() - n * 1_000) }),
    );

    const result = await resend(h.deps, filter());

    expect(result).toEqual({ attempted: 3, succeeded: 0, failed: 3, skipped: 2 });
    const tryCounts = rows.map((row) => h.events.get(row.event_id)?.publish_try_count);
    // Oldest three were claimed: rows[4], rows[3], rows[2].
    expect(tryCounts).toEqual([0, 0, 1, 1, 1]);
  });

  it('does not stop early for tenant-side failures', async () => {
    const sleepy = seedTenant(h, { routing_name: 'sleepy', status: 'suspended' });
    for (let n = 0; n < 4; n++) seedEvent(h, sleepy);

    const result = await resend(h.deps, filter());

    expect(result).toEqual({ attempted: 4, succeeded: 0, failed: 4, skipped: 0 });
    expect(h.broker.attempts).toBe(0);
  });

  it('never publishes the same row twice from concurrent batches', async () => {
    const rows = [1, 2, 3].map(() => seedEvent(h, acme));

    const [a, b] = await Promise.all([resend(h.deps, filter()), resend(h.deps, filter())]);

    expect(a.attempted + b.attempted).toBe(3);
    expect(a.skipped + b.skipped).toBe(3);
    expect(h.broker.published).toHaveLength(3);
    for (const row of rows) {
      expect(h.events.get(row.event_id)?.publish_try_count).toBe(1);
    }
  });
});

describe('redeliver', () => {
  it('re-sends published but unacknowledged events with the delivery attempt header', async () => {
    const event = seedEvent(h, acme, { publish_status: 'published', published_at: START });

    const result = await redeliver(h.deps, filter());

    expect(result).toEqual({ attempted: 1, succeeded: 1, failed: 0, skipped: 0 });
    const row = h.events.get(event.event_id);
    expect(row?.deliver_try_count).toBe(1);
    expect(row?.deliver_status).toBe('pending');
    expect(h.broker.published[0]?.headers).toEqual({ 'x-tenant': 'acme', 'x-delivery-attempt': 1 });
  });

  it('includes consumer-reported failures but never delivered rows', async () => {
    const failed = seedEvent(h, acme, { publish_status: 'published', deliver_status: 'failed' });
    const delivered = seedEvent(h, acme, { publish_status: 'published', deliver_status: 'delivered' });
    const unpublished = seedEvent(h, acme);

    const result = await redeliver(h.deps, filter());

    expect(result.attempted).toBe(1);
    expect(h.events.get(failed.event_id)?.deliver_try_count).toBe(1);
    expect(h.events.get(delivered.event_id)?.deliver_try_count).toBe(0);
    expect(h.events.get(unpublished.event_id)?.deliver_try_count).toBe(0);
  });

  it('records the broker failure reason without touching the delivery status', async () => {
    h.broker.mode = 'reject';
    const event = seedEvent(h, acme, { publish_status: 'published' });

    const result = await redeliver(h.deps, filter());

    expect(result).toEqual({ attempted: 1, succeeded: 0, failed: 1, skipped: 0 });
    const row = h.events.get(event.event_id);
    expect(row?.deliver_status).toBe('pending');
    expect(row?.deliver_failure_reason).toBe('connection refused');
  });

  it('does nothing when max_try_count is 0', async () => {
    seedEvent(h, acme, { publish_status: 'published' });

    const result = await redeliver(h.deps, filter({ max_try_count: 0 }));

    expect(result).toEqual({ attempted: 0, succeeded: 0, failed: 0, skipped: 0 });
    expect(h.broker.attempts).toBe(0);
  });

  it('claims each row once across concurrent invocations', async () => {
    const rows = [1, 2, 3, 4].map(() => seedEvent(h, acme, { publish_status: 'published' }));

    const results = await Promise.all([
      redeliver(h.deps, filter()),
      redeliver(h.deps, filter()),
      redeliver(h.deps, filter()),
    ]);

    const attempted = results.reduce((sum, r) => sum + r.attempted, 0);
    expect(attempted).toBe(4);
    expect(h.broker.published).toHaveLength(4);
    for (const row of rows) {
      expect(h.events.get(row.event_id)?.deliver_try_count).toBe(1);
    }
  });
});

describe('claim lease', () => {
  beforeEach(() => {
    h = createHarness({ publishTimeoutMs: 1_000, claimLeaseMs: 2_000 });
    acme = seedTenant(h, { routing_name: 'acme' });
    h.broker.mode = 'hold';
  });

  it('keeps a later redeliver off a row an earlier call is still sending', async () => {
    const event = seedEvent(h, acme, { publish_status: 'published' });

    const held = h.broker.nextHold();
    const first = redeliver(h.deps, filter());
    await held;
    h.advance(5);

    const second = await redeliver(h.deps, filter());
    h.broker.releaseHeld();

    expect(second).toEqual({ attempted: 0, succeeded: 0, failed: 0, skipped: 0 });
    expect(await first).toEqual({ attempted: 1, succeeded: 1, failed: 0, skipped: 0 });
    expect(h.broker.published).toHaveLength(1);
    expect(h.events.get(event.event_id)?.deliver_try_count).toBe(1);
  });

  it('keeps a later resend off a row an earlier resend is still sending', async () => {
    const event = seedEvent(h, acme);

    const held = h.broker.nextHold();
    const first = resend(h.deps, filter());
    await held;
    h.advance(5);

    const second = await resend(h.deps, filter());
    h.broker.releaseHeld();

    expect(second.attempted).toBe(0);
    expect((await first).succeeded).toBe(1);
    expect(h.broker.published).toHaveLength(1);
    expect(h.events.get(event.event_id)?.publish_try_count).toBe(1);
  });

  it('does not resend an event whose first publish is still in flight', async () => {
    const held = h.broker.nextHold();
    const recording = recordEvent(h.deps, acme.tenant_id, {
      entity_id: '3f0c8a1e-5b7d-4c2a-9e6f-1a2b3c4d5e6f',
      event_type: 'entity_creation',
      origin: 'api',
      payload: {},
      metadata: {},
    });
    await held;
    h.advance(5);

    const retried = await resend(h.deps, filter());
    h.broker.releaseHeld();
    const recorded = await recording;

    expect(retried.attempted).toBe(0);
    expect(recorded.publish_status).toBe('published');
    expect(h.broker.published).toHaveLength(1);
    expect(h.events.get(recorded.event_id)?.publish_try_count).toBe(0);
  });

  it('makes the row eligible again once the lease has run out', async () => {
    h.broker.mode = 'accept';
    const event = seedEvent(h, acme, { publish_status: 'published' });
    await redeliver(h.deps, filter());

    h.advance(1_999);
    const early = await redeliver(h.deps, filter());
    h.advance(1);
    const due = await redeliver(h.deps, filter());

    expect(early.attempted).toBe(0);
    expect(due.attempted).toBe(1);
    expect(h.events.get(event.event_id)?.deliver_try_count).toBe(2);
  });
});
