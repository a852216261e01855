import { sql } from 'drizzle-orm';
import {
  pgTable,
  uuid,
  varchar,
  text,
  integer,
  timestamp,
  jsonb,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import {
  EVENT_TYPES,
  PUBLISH_STATUSES,
  DELIVERY_STATUSES,
  RECEIPT_OUTCOMES,
  TENANT_STATUSES,
  CREDENTIAL_STATUSES,
  ROUTING_NAME_MAX_LENGTH,
} from '../../domain/index.js';
import type { EventPayload, EventMetadata } from '../../domain/index.js';

/**
 * Drizzle schema for the `tenants` table.
 *
 * `routing_name` is part of every broker object name for the tenant.
 * The bootstrap SQL adds a trigger that rejects any update of it.
 */
export const tenants = pgTable('tenants', {
  tenant_id: uuid('tenant_id').primaryKey(),
  routing_name: varchar('routing_name', { length: ROUTING_NAME_MAX_LENGTH }).notNull().unique(),
  description: text('description'),
  status: varchar('status', { length: 20, enum: TENANT_STATUSES }).notNull().default('active'),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_tenants_status').on(table.status),
]);

/**
 * Drizzle schema for the `tenant_credentials` table.
 *
 * Only the bcrypt hash of the secret is stored. The partial unique index
 * allows at most one active credential per tenant.
 */
export const tenantCredentials = pgTable('tenant_credentials', {
  key_id: uuid('key_id').primaryKey(),
  tenant_id: uuid('tenant_id').notNull().references(() => tenants.tenant_id, { onDelete: 'cascade' }),
  secret_hash: varchar('secret_hash', { length: 255 }).notNull(),
  status: varchar('status', { length: 20, enum: CREDENTIAL_STATUSES }).notNull().default('active'),
  expires_at: timestamp('expires_at', { withTimezone: true }),
  last_used_at: timestamp('last_used_at', { withTimezone: true }),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_credentials_tenant_id').on(table.tenant_id),
  uniqueIndex('idx_one_active_credential_per_tenant')
    .on(table.tenant_id)
    .where(sql`status = 'active'`),
]);

/**
 * Drizzle schema for the `outbox_events` table.
 *
 * `event_id` is assigned by the core at record time. Rows are never deleted
 * in normal operation; publish and delivery columns are only changed by
 * conditional updates.
 */
export const outboxEvents = pgTable('outbox_events', {
  event_id: uuid('event_id').primaryKey(),
  entity_id: uuid('entity_id').notNull(),
  tenant_id: uuid('tenant_id').notNull().references(() => tenants.tenant_id, { onDelete: 'restrict' }),
  event_type: varchar('event_type', { length: 100, enum: EVENT_TYPES }).notNull(),
  origin: varchar('origin', { length: 100 }).notNull(),
  payload: jsonb('payload').$type<EventPayload>().notNull().default({}),
  metadata: jsonb('metadata').$type<EventMetadata>().notNull().default({}),

  publish_status: varchar('publish_status', { length: 20, enum: PUBLISH_STATUSES }).notNull().default('pending'),
  publish_try_count: integer('publish_try_count').notNull().default(0),
  publish_first_tried_at: timestamp('publish_first_tried_at', { withTimezone: true }),
  publish_last_tried_at: timestamp('publish_last_tried_at', { withTimezone: true }),
  published_at: timestamp('published_at', { withTimezone: true }),
  publish_failure_reason: text('publish_failure_reason'),

  deliver_status: varchar('deliver_status', { length: 20, enum: DELIVERY_STATUSES }).notNull().default('pending'),
  deliver_try_count: integer('deliver_try_count').notNull().default(0),
  deliver_last_tried_at: timestamp('deliver_last_tried_at', { withTimezone: true }),
  delivered_at: timestamp('delivered_at', { withTimezone: true }),
  deliver_failure_reason: text('deliver_failure_reason'),

  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_outbox_publish_retry').on(table.publish_status, table.created_at, table.publish_try_count),
  index('idx_outbox_deliver_retry').on(table.deliver_status, table.created_at, table.deliver_try_count),
  index('idx_outbox_tenant_deliver').on(table.tenant_id, table.deliver_status),
  index('idx_outbox_entity_id').on(table.entity_id),
]);

/**
 * Drizzle schema for the `delivery_receipts` table.
 *
 * Append-only: one row per acknowledgment call, duplicates included.
 */
export const deliveryReceipts = pgTable('delivery_receipts', {
  receipt_id: uuid('receipt_id').primaryKey(),
  event_id: uuid('event_id').notNull().references(() => outboxEvents.event_id, { onDelete: 'cascade' }),
  tenant_id: uuid('tenant_id').notNull().references(() => tenants.tenant_id, { onDelete: 'restrict' }),
  event_type: varchar('event_type', { length: 100, enum: EVENT_TYPES }).notNull(),
  received_at: timestamp('received_at', { withTimezone: true }).notNull(),
  processing_status: varchar('processing_status', { length: 20, enum: RECEIPT_OUTCOMES }).notNull(),
  processing_failure_reason: text('processing_failure_reason'),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_receipts_event_tenant').on(table.event_id, table.tenant_id),
  index('idx_receipts_tenant_id').on(table.tenant_id),
]);
