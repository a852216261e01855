import type { SqlClient } from './client.js';

/**
 * Idempotent schema bootstrap.
 *
 * In production drizzle-kit migrations own the schema; this guarantees the
 * tables, indexes and the routing-name trigger exist on first run.
 */
const STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS tenants (
    tenant_id     UUID PRIMARY KEY,
    routing_name  VARCHAR(230) NOT NULL UNIQUE,
    description   TEXT,
    status        VARCHAR(20)  NOT NULL DEFAULT 'active',
    created_at    TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
    updated_at    TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
    CONSTRAINT chk_tenant_status CHECK (status IN ('active', 'suspended', 'deactivated')),
    CONSTRAINT chk_tenant_routing_name CHECK (routing_name ~ '^[a-z0-9_]+$')
  )`,

  `CREATE TABLE IF NOT EXISTS tenant_credentials (
    key_id        UUID PRIMARY KEY,
    tenant_id     UUID NOT NULL REFERENCES tenants(tenant_id) ON DELETE CASCADE,
    secret_hash   VARCHAR(255) NOT NULL,
    status        VARCHAR(20)  NOT NULL DEFAULT 'active',
    expires_at    TIMESTAMPTZ,
    last_used_at  TIMESTAMPTZ,
    created_at    TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
    updated_at    TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
    CONSTRAINT chk_credential_status CHECK (status IN ('active', 'expired', 'deactivated'))
  )`,

  `CREATE TABLE IF NOT EXISTS outbox_events (
    event_id                UUID PRIMARY KEY,
    entity_id               UUID         NOT NULL,
    tenant_id               UUID         NOT NULL REFERENCES tenants(tenant_id) ON DELETE RESTRICT,
    event_type              VARCHAR(100) NOT NULL,
    origin                  VARCHAR(100) NOT NULL,
    payload                 JSONB        NOT NULL DEFAULT '{}',
    metadata                JSONB        NOT NULL DEFAULT '{}',
    publish_status          VARCHAR(20)  NOT NULL DEFAULT 'pending',
    publish_try_count       INTEGER      NOT NULL DEFAULT 0,
    publish_first_tried_at  TIMESTAMPTZ,
    publish_last_tried_at   TIMESTAMPTZ,
    published_at            TIMESTAMPTZ,
    publish_failure_reason  TEXT,
    deliver_status          VARCHAR(20)  NOT NULL DEFAULT 'pending',
    deliver_try_count       INTEGER      NOT NULL DEFAULT 0,
    deliver_last_tried_at   TIMESTAMPTZ,
    delivered_at            TIMESTAMPTZ,
    deliver_failure_reason  TEXT,
    created_at              TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
    CONSTRAINT chk_publish_status CHECK (publish_status IN ('pending', 'published', 'failed')),
    CONSTRAINT chk_deliver_status CHECK (deliver_status IN ('pending', 'delivered', 'failed'))
  )`,

  `CREATE TABLE IF NOT EXISTS delivery_receipts (
    receipt_id                 UUID PRIMARY KEY,
    event_id                   UUID         NOT NULL REFERENCES outbox_events(event_id) ON DELETE CASCADE,
    tenant_id                  UUID         NOT NULL REFERENCES tenants(tenant_id) ON DELETE RESTRICT,
    event_type                 VARCHAR(100) NOT NULL,
    received_at                TIMESTAMPTZ  NOT NULL,
    processing_status          VARCHAR(20)  NOT NULL,
    processing_failure_reason  TEXT,
    created_at                 TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
    CONSTRAINT chk_processing_status CHECK (processing_status IN ('received', 'processed', 'failed'))
  )`,

  `CREATE INDEX IF NOT EXISTS idx_tenants_status ON tenants (status)`,
  `CREATE INDEX IF NOT EXISTS idx_credentials_tenant_id ON tenant_credentials (tenant_id)`,
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_one_active_credential_per_tenant
     ON tenant_credentials (tenant_id) WHERE status = 'active'`,
  `CREATE INDEX IF NOT EXISTS idx_outbox_publish_retry
     ON outbox_events (publish_status, created_at, publish_try_count)`,
  `CREATE INDEX IF NOT EXISTS idx_outbox_deliver_retry
     ON outbox_events (deliver_status, created_at, deliver_try_count)`,
  `CREATE INDEX IF NOT EXISTS idx_outbox_tenant_deliver ON outbox_events (tenant_id, deliver_status)`,
  `CREATE INDEX IF NOT EXISTS idx_outbox_entity_id ON outbox_events (entity_id)`,
  `CREATE INDEX IF NOT EXISTS idx_receipts_event_tenant ON delivery_receipts (event_id, tenant_id)`,
  `CREATE INDEX IF NOT EXISTS idx_receipts_tenant_id ON delivery_receipts (tenant_id)`,

  `CREATE OR REPLACE FUNCTION prevent_routing_name_update()
   RETURNS TRIGGER AS $$
   BEGIN
     IF OLD.routing_name IS DISTINCT FROM NEW.routing_name THEN
       RAISE EXCEPTION 'Tenant routing name cannot be changed: queue names depend on it';
     END IF;
     RETURN NEW;
   END;
   $$ LANGUAGE plpgsql`,
  `DROP TRIGGER IF EXISTS trg_prevent_routing_name_update ON tenants`,
  `CREATE TRIGGER trg_prevent_routing_name_update
     BEFORE UPDATE ON tenants
     FOR EACH ROW
     EXECUTE FUNCTION prevent_routing_name_update()`,
];

export async function ensureSchema(sql: SqlClient): Promise<void> {
  for (const statement of STATEMENTS) {
    await sql.unsafe(statement);
  }
}
