export {
  createDbClient,
  ensureSchema,
  createEventStore,
  createReceiptStore,
  createTenantDirectory,
  tenants,
  tenantCredentials,
  outboxEvents,
  deliveryReceipts,
} from './db/index.js';
export type { Database, SqlClient } from './db/index.js';
export { AmqpBroker } from './broker/amqp-broker.js';
export type { AmqpBrokerOptions } from './broker/amqp-broker.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export { createOutboxRuntime } from './runtime.js';
export type { OutboxRuntime } from './runtime.js';
export { PrometheusOutboxMetrics, createMetricsRegistry } from './metrics/outbox-metrics.js';
