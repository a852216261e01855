/**
 * Tenant (consumer) identities and their API credentials.
 *
 * The routing name is part of every broker object bound for the tenant,
 * so it is fixed at creation: nothing in this codebase updates it.
 */

export const TENANT_STATUSES = ['active', 'suspended', 'deactivated'] as const;
export type TenantStatus = (typeof TENANT_STATUSES)[number];

export const CREDENTIAL_STATUSES = ['active', 'expired', 'deactivated'] as const;
export type CredentialStatus = (typeof CREDENTIAL_STATUSES)[number];

export const ROUTING_NAME_PATTERN = /^[a-z0-9_]+$/;
export const ROUTING_NAME_MAX_LENGTH = 230;

export interface Tenant {
  readonly tenant_id: string;
  readonly routing_name: string;
  readonly description: string | null;
  readonly status: TenantStatus;
  readonly created_at: Date;
  readonly updated_at: Date;
}

/** Stored API credential. Only the bcrypt hash of the secret is kept. */
export interface Credential {
  readonly key_id: string;
  readonly tenant_id: string;
  readonly secret_hash: string;
  readonly status: CredentialStatus;
  readonly expires_at: Date | null;
  readonly last_used_at: Date | null;
  readonly created_at: Date;
  readonly updated_at: Date;
}

export function isTenantStatus(value: string): value is TenantStatus {
  return (TENANT_STATUSES as readonly string[]).includes(value);
}

/** Returns null when the name is usable as a routing name, otherwise the reason. */
export function routingNameProblem(name: string): string | null {
  if (name.length === 0) return 'routing name must not be empty';
  if (name.length > ROUTING_NAME_MAX_LENGTH) {
    return `routing name must be at most ${ROUTING_NAME_MAX_LENGTH} characters`;
  }
  if (!ROUTING_NAME_PATTERN.test(name)) {
    return 'routing name may only contain lowercase letters, digits and underscores';
  }
  return null;
}

export function isCredentialUsable(credential: Credential, now: Date): boolean {
  if (credential.status !== 'active') return false;
  if (credential.expires_at !== null && credential.expires_at.getTime() <= now.getTime()) return false;
  return true;
}
