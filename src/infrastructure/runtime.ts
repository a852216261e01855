import type { Logger } from 'pino';
import type { Registry } from 'prom-client';
import type { OutboxDeps } from '../application/index.js';
import type { AppConfig } from './config.js';
import { AmqpBroker } from './broker/amqp-broker.js';
import { PrometheusOutboxMetrics, createMetricsRegistry } from './metrics/outbox-metrics.js';
import {
  createDbClient,
  createEventStore,
  createReceiptStore,
  createTenantDirectory,
  ensureSchema,
} from './db/index.js';

export interface OutboxRuntime {
  deps: OutboxDeps;
  /** Holds the publish metrics and the process defaults. */
  metricsRegistry: Registry;
  /** Closes the broker client and the connection pool. */
  shutdown(): Promise<void>;
}

/**
 * Wires Postgres and RabbitMQ adapters into the use-case dependencies.
 * Shared by the HTTP server and the command-line entry points.
 */
export async function createOutboxRuntime(config: AppConfig, log: Logger): Promise<OutboxRuntime> {
  const { sql, db } = createDbClient(config.databaseUrl);

  if (config.dbBootstrap) {
    await ensureSchema(sql);
    log.info('Database ready (tenants + credentials + outbox + receipts tables)');
  }

  const broker = new AmqpBroker({
    url: config.amqpUrl,
    heartbeatSec: config.amqpHeartbeatSec,
    exchange: config.outbox.topology.exchange,
    log,
  });

  const metricsRegistry = createMetricsRegistry();

  const deps: OutboxDeps = {
    events: createEventStore(db),
    receipts: createReceiptStore(db),
    tenants: createTenantDirectory(db),
    broker,
    metrics: new PrometheusOutboxMetrics(metricsRegistry),
    log,
    settings: config.outbox,
    now: () => new Date(),
  };

  return {
    deps,
    metricsRegistry,
    async shutdown() {
      await broker.close();
      await sql.end();
    },
  };
}
