import type { OutboxEvent } from '../domain/index.js';
import type { RetryFilter } from './event-schema.js';
import type { OutboxDeps, RetryCriteria } from './ports.js';
import { publishEvent, sendToBroker } from './publisher.js';
import { withStorage } from './storage.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Consecutive broker failures after which a batch stops early. The rows
 * it did not reach keep their state and are picked up by the next trigger.
 */
export const BROKER_FAILURE_BREAK = 3;

export interface RetryResult {
  /** Rows claimed and re-driven by this call. */
  attempted: number;
  succeeded: number;
  failed: number;
  /** Rows selected but claimed by a concurrent call, or not reached after an early stop. */
  skipped: number;
}

type Claim = (deps: OutboxDeps, candidate: OutboxEvent) => Promise<OutboxEvent | undefined>;
type Drive = (deps: OutboxDeps, claimed: OutboxEvent) => Promise<{ ok: boolean; transient: boolean }>;

function emptyResult(): RetryResult {
  return { attempted: 0, succeeded: 0, failed: 0, skipped: 0 };
}

export function criteriaFrom(deps: OutboxDeps, filter: RetryFilter): RetryCriteria {
  const ceiling = deps.settings.retryBatchLimit;
  const now = deps.now().getTime();
  return {
    createdSince: new Date(now - filter.days * DAY_MS),
    maxTryCount: filter.max_try_count,
    leaseCutoff: new Date(now - deps.settings.claimLeaseMs),
    eventTypes: filter.event_types,
    tenantId: filter.tenant_id,
    limit: Math.min(Math.max(filter.limit ?? ceiling, 1), ceiling),
  };
}

/**
 * Claims and re-drives each candidate in turn.
 *
 * A row is only driven after its claim succeeded, so two replicas working
 * on the same candidate set never both send the same row. The claim stamps
 * the row's last-tried time, which keeps later callers off it until the
 * lease runs out.
 */
async function runBatch(
  deps: OutboxDeps,
  label: 'resend' | 'redeliver',
  candidates: readonly OutboxEvent[],
  claim: Claim,
  drive: Drive,
): Promise<RetryResult> {
  const result = emptyResult();
  let brokerFailures = 0;

  for (const [index, candidate] of candidates.entries()) {
    if (brokerFailures >= BROKER_FAILURE_BREAK) {
      result.skipped += candidates.length - index;
      deps.log.warn(
        { operation: label, remaining: candidates.length - index },
        'Broker looks unavailable, stopping retry batch early',
      );
      break;
    }

    const claimed = await claim(deps, candidate);
    if (claimed === undefined) {
      result.skipped++;
      continue;
    }

    result.attempted++;
    const outcome = await drive(deps, claimed);
    if (outcome.ok) {
      result.succeeded++;
      brokerFailures = 0;
    } else {
      result.failed++;
      brokerFailures = outcome.transient ? brokerFailures + 1 : 0;
    }
  }

  return result;
}

/**
 * Re-drives publishes stuck in `pending`.
 *
 * Each row's try count and last-tried timestamp are bumped by the claim,
 * before the broker is contacted.
 */
export async function resend(deps: OutboxDeps, filter: RetryFilter): Promise<RetryResult> {
  if (filter.max_try_count <= 0) {
    deps.log.info({ filter }, 'Resend skipped: max_try_count leaves no row eligible');
    return emptyResult();
  }

  const criteria = criteriaFrom(deps, filter);
  const candidates = await withStorage('select resend candidates', () =>
    deps.events.findResendCandidates(criteria),
  );

  const result = await runBatch(
    deps,
    'resend',
    candidates,
    (d, candidate) => withStorage('claim for resend', () =>
      d.events.claimForResend(candidate.event_id, candidate.publish_try_count, d.now(), criteria.leaseCutoff),
    ),
    async (d, claimed) => {
      const outcome = await publishEvent(d, claimed);
      return outcome.status === 'published'
        ? { ok: true, transient: false }
        : { ok: false, transient: outcome.transient };
    },
  );

  deps.log.info({ ...result, selected: candidates.length, filter }, 'Resend batch finished');
  return result;
}

/**
 * Re-publishes events that reached the broker but were never acknowledged,
 * so the consumer can process and confirm them again.
 *
 * Delivery status itself is only ever advanced by a consumer confirmation.
 */
export async function redeliver(deps: OutboxDeps, filter: RetryFilter): Promise<RetryResult> {
  if (filter.max_try_count <= 0) {
    deps.log.info({ filter }, 'Redeliver skipped: max_try_count leaves no row eligible');
    return emptyResult();
  }

  const criteria = criteriaFrom(deps, filter);
  const candidates = await withStorage('select redeliver candidates', () =>
    deps.events.findRedeliverCandidates(criteria),
  );

  const result = await runBatch(
    deps,
    'redeliver',
    candidates,
    (d, candidate) => withStorage('claim for redelivery', () =>
      d.events.claimForRedelivery(candidate.event_id, candidate.deliver_try_count, d.now(), criteria.leaseCutoff),
    ),
    async (d, claimed) => {
      const sent = await sendToBroker(d, claimed, claimed.deliver_try_count);
      if (sent.ok) return { ok: true, transient: false };

      await withStorage('record redelivery failure', () =>
        d.events.recordRedeliveryFailure(claimed.event_id, sent.reason),
      );
      return { ok: false, transient: sent.transient };
    },
  );

  deps.log.info({ ...result, selected: candidates.length, filter }, 'Redeliver batch finished');
  return result;
}
