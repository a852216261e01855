import { and, eq } from 'drizzle-orm';
import postgres from 'postgres';
import type { Credential, Tenant, TenantStatus } from '../../domain/index.js';
import { RoutingNameTakenError } from '../../domain/index.js';
import type { Database } from './client.js';
import { tenantCredentials, tenants } from './schema.js';

const UNIQUE_VIOLATION = '23505';

export async function findTenantById(db: Database, tenantId: string): Promise<Tenant | undefined> {
  const rows = await db.select().from(tenants).where(eq(tenants.tenant_id, tenantId)).limit(1);
  return rows[0];
}

export async function findTenantByRoutingName(
  db: Database,
  routingName: string,
): Promise<Tenant | undefined> {
  const rows = await db.select().from(tenants).where(eq(tenants.routing_name, routingName)).limit(1);
  return rows[0];
}

/**
 * Inserts a tenant. A concurrent registration of the same routing name
 * surfaces as RoutingNameTakenError rather than a storage failure.
 */
export async function insertTenant(db: Database, tenant: Tenant): Promise<Tenant> {
  try {
    const [row] = await db.insert(tenants).values(tenant).returning();
    if (row === undefined) {
      throw new Error(`Insert of tenant ${tenant.tenant_id} returned no row`);
    }
    return row;
  } catch (err: unknown) {
    if (err instanceof postgres.PostgresError && err.code === UNIQUE_VIOLATION) {
      throw new RoutingNameTakenError(tenant.routing_name);
    }
    throw err;
  }
}

/** Only status and updated_at are writable; routing_name is guarded by a trigger. */
export async function updateTenantStatus(
  db: Database,
  tenantId: string,
  status: TenantStatus,
  at: Date,
): Promise<Tenant | undefined> {
  const rows = await db
    .update(tenants)
    .set({ status, updated_at: at })
    .where(eq(tenants.tenant_id, tenantId))
    .returning();

  return rows[0];
}

export async function findCredentialByKeyId(
  db: Database,
  keyId: string,
): Promise<Credential | undefined> {
  const rows = await db
    .select()
    .from(tenantCredentials)
    .where(eq(tenantCredentials.key_id, keyId))
    .limit(1);

  return rows[0];
}

/**
 * Deactivates the tenant's current active credential and inserts the new one in
 * one transaction. The partial unique index rejects a second active key if
 * two rotations race.
 */
export async function replaceActiveCredential(
  db: Database,
  credential: Credential,
  at: Date,
): Promise<Credential> {
  return db.transaction(async (tx) => {
    await tx
      .update(tenantCredentials)
      .set({ status: 'deactivated', updated_at: at })
      .where(and(
        eq(tenantCredentials.tenant_id, credential.tenant_id),
        eq(tenantCredentials.status, 'active'),
      ));

    const [row] = await tx.insert(tenantCredentials).values(credential).returning();
    if (row === undefined) {
      throw new Error(`Insert of credential ${credential.key_id} returned no row`);
    }
    return row;
  });
}

export async function touchCredential(db: Database, keyId: string, at: Date): Promise<void> {
  await db
    .update(tenantCredentials)
    .set({ last_used_at: at })
    .where(eq(tenantCredentials.key_id, keyId));
}
