import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import type {
  BrokerFailureReason,
  OutboxMetrics,
  PublishMetricStatus,
  StatusCounts,
} from '../../application/index.js';
import type { EventType } from '../../domain/index.js';

/**
 * Prometheus-backed publish metrics.
 *
 * Every metric is registered on the given registry only, so tests can build
 * as many instances as they like without name clashes.
 */
export class PrometheusOutboxMetrics implements OutboxMetrics {
  private readonly publishTotal: Counter<'event_type' | 'tenant' | 'status'>;
  private readonly publishDuration: Histogram<'event_type' | 'status'>;
  private readonly brokerFailures: Counter<'reason'>;
  private readonly pending: Gauge;
  private readonly failed: Gauge;
  private readonly exhausted: Gauge;
  private readonly undelivered: Gauge;

  constructor(readonly registry: Registry) {
    this.publishTotal = new Counter({
      name: 'outbox_event_publish_total',
      help: 'Broker send attempts by event type, tenant routing name and result',
      labelNames: ['event_type', 'tenant', 'status'] as const,
      registers: [registry],
    });

    this.publishDuration = new Histogram({
      name: 'outbox_event_publish_duration_seconds',
      help: 'Time from broker publish to confirm or failure, in seconds',
      labelNames: ['event_type', 'status'] as const,
      buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
      registers: [registry],
    });

    this.brokerFailures = new Counter({
      name: 'outbox_broker_publish_failures_total',
      help: 'Broker publishes that failed, by reason',
      labelNames: ['reason'] as const,
      registers: [registry],
    });

    this.pending = new Gauge({
      name: 'outbox_events_pending',
      help: 'Events not yet accepted by the broker',
      registers: [registry],
    });
    this.failed = new Gauge({
      name: 'outbox_events_failed',
      help: 'Events whose publish or delivery failed',
      registers: [registry],
    });
    this.exhausted = new Gauge({
      name: 'outbox_events_exhausted',
      help: 'Pending events that have used up their publish tries',
      registers: [registry],
    });
    this.undelivered = new Gauge({
      name: 'outbox_events_undelivered',
      help: 'Published events no consumer has confirmed as delivered',
      registers: [registry],
    });
  }

  recordPublish(
    labels: { event_type: EventType; tenant: string },
    status: PublishMetricStatus,
    durationSeconds: number | null,
  ): void {
    this.publishTotal.inc({ ...labels, status });
    if (durationSeconds !== null) {
      this.publishDuration.observe({ event_type: labels.event_type, status }, durationSeconds);
    }
  }

  recordBrokerFailure(reason: BrokerFailureReason): void {
    this.brokerFailures.inc({ reason });
  }

  setOutboxCounts(counts: StatusCounts): void {
    this.pending.set(counts.pending_count);
    this.failed.set(counts.failed_count);
    this.exhausted.set(counts.exhausted_count);
    this.undelivered.set(counts.undelivered_count);
  }
}

/** A registry carrying the process defaults (CPU, memory, event loop) under the `outbox_` prefix. */
export function createMetricsRegistry(): Registry {
  const registry = new Registry();
  collectDefaultMetrics({ register: registry, prefix: 'outbox_' });
  return registry;
}
