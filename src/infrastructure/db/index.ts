export { tenants, tenantCredentials, outboxEvents, deliveryReceipts } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, SqlClient } from './client.js';
export { ensureSchema } from './bootstrap.js';
export { createEventStore, createReceiptStore, createTenantDirectory } from './stores.js';
