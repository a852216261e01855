import { randomBytes, randomUUID } from 'node:crypto';
import bcrypt from 'bcryptjs';
import type { Credential, Tenant, TenantStatus } from '../domain/index.js';
import {
  AuthenticationError,
  InvalidRoutingNameError,
  isCredentialUsable,
  routingNameProblem,
  RoutingNameTakenError,
  TenantInactiveError,
  UnknownTenantError,
} from '../domain/index.js';
import type { OutboxDeps } from './ports.js';
import { withStorage } from './storage.js';

/** Keys shorter than this are rejected before any lookup. */
export const MIN_API_KEY_LENGTH = 32;

const KEY_ID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export interface IssuedCredential {
  /** Plaintext key, shown once. Format: `<key_id>.<secret>`. */
  api_key: string;
  credential: Credential;
}

export interface RegisteredTenant extends IssuedCredential {
  tenant: Tenant;
}

export function formatApiKey(keyId: string, secret: string): string {
  return `${keyId}.${secret}`;
}

export function parseApiKey(raw: string): { keyId: string; secret: string } | null {
  const dot = raw.indexOf('.');
  if (dot <= 0) return null;
  const keyId = raw.slice(0, dot);
  const secret = raw.slice(dot + 1);
  if (!KEY_ID_RE.test(keyId) || secret.length === 0) return null;
  return { keyId: keyId.toLowerCase(), secret };
}

/**
 * Issues a fresh credential for a tenant and retires the previous active one
 * in the same store operation, so a tenant never holds two active keys.
 */
export async function issueCredential(
  deps: OutboxDeps,
  tenantId: string,
  options: { expiresAt?: Date | null } = {},
): Promise<IssuedCredential> {
  const tenant = await withStorage('tenant lookup', () => deps.tenants.findTenant(tenantId));
  if (tenant === undefined) throw new UnknownTenantError(tenantId);

  const now = deps.now();
  const keyId = randomUUID();
  const secret = randomBytes(24).toString('base64url');
  const secretHash = await bcrypt.hash(secret, deps.settings.bcryptRounds);

  const credential = await withStorage('store credential', () =>
    deps.tenants.replaceActiveCredential(
      {
        key_id: keyId,
        tenant_id: tenantId,
        secret_hash: secretHash,
        status: 'active',
        expires_at: options.expiresAt ?? null,
        last_used_at: null,
        created_at: now,
        updated_at: now,
      },
      now,
    ),
  );

  deps.log.info({ tenant_id: tenantId, key_id: keyId }, 'Credential issued');
  return { api_key: formatApiKey(keyId, secret), credential };
}

/** Creates an active tenant with an immutable routing name and its first credential. */
export async function registerTenant(
  deps: OutboxDeps,
  input: { routing_name: string; description?: string | null },
): Promise<RegisteredTenant> {
  const problem = routingNameProblem(input.routing_name);
  if (problem !== null) throw new InvalidRoutingNameError(problem);

  const existing = await withStorage('tenant lookup', () =>
    deps.tenants.findTenantByRoutingName(input.routing_name),
  );
  if (existing !== undefined) throw new RoutingNameTakenError(input.routing_name);

  const now = deps.now();
  const tenant = await withStorage('insert tenant', () =>
    deps.tenants.insertTenant({
      tenant_id: randomUUID(),
      routing_name: input.routing_name,
      description: input.description ?? null,
      status: 'active',
      created_at: now,
      updated_at: now,
    }),
  );

  deps.log.info({ tenant_id: tenant.tenant_id, routing_name: tenant.routing_name }, 'Tenant registered');
  const issued = await issueCredential(deps, tenant.tenant_id);
  return { tenant, ...issued };
}

export async function changeTenantStatus(
  deps: OutboxDeps,
  tenantId: string,
  status: TenantStatus,
): Promise<Tenant> {
  const updated = await withStorage('update tenant status', () =>
    deps.tenants.setTenantStatus(tenantId, status, deps.now()),
  );
  if (updated === undefined) throw new UnknownTenantError(tenantId);

  deps.log.info({ tenant_id: tenantId, status }, 'Tenant status changed');
  return updated;
}

/**
 * Resolves an `X-API-Key` value to its active tenant.
 *
 * Unknown, malformed, expired and mismatching keys all fail with the same
 * message. A valid key for a non-active tenant fails with TenantInactiveError.
 */
export async function authenticateApiKey(deps: OutboxDeps, rawKey: string): Promise<Tenant> {
  if (rawKey.length < MIN_API_KEY_LENGTH) {
    throw new AuthenticationError('Invalid API key format');
  }
  const parsed = parseApiKey(rawKey);
  if (parsed === null) {
    throw new AuthenticationError('Invalid API key format');
  }

  const credential = await withStorage('credential lookup', () =>
    deps.tenants.findCredential(parsed.keyId),
  );
  const now = deps.now();
  if (credential === undefined || !isCredentialUsable(credential, now)) {
    throw new AuthenticationError('Invalid or expired API key');
  }

  const matches = await bcrypt.compare(parsed.secret, credential.secret_hash);
  if (!matches) {
    throw new AuthenticationError('Invalid or expired API key');
  }

  const tenant = await withStorage('tenant lookup', () => deps.tenants.findTenant(credential.tenant_id));
  if (tenant === undefined) {
    throw new AuthenticationError('Invalid or expired API key');
  }
  if (tenant.status !== 'active') {
    throw new TenantInactiveError(tenant.tenant_id, tenant.status);
  }

  await withStorage('touch credential', () => deps.tenants.touchCredential(credential.key_id, now));
  return tenant;
}
