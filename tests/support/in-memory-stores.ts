import type {
  EventListFilters,
  EventStore,
  PaginationParams,
  ReceiptStore,
  RetryCriteria,
  StatusCounts,
  TenantDirectory,
} from '../../src/application/index.js';
import type {
  Credential,
  DeliveryReceipt,
  DeliverySettlement,
  OutboxEvent,
  Tenant,
  TenantStatus,
} from '../../src/domain/index.js';

/**
 * In-process stand-ins for the Postgres stores.
 *
 * Conditional updates follow the same WHERE clauses as the SQL, and rows
 * are copied on the way in and out so callers never share state with the
 * store, which is what lets concurrent-claim tests mean something.
 */

/** Set `failure` to make every call reject, as a lost connection would. */
abstract class FailableStore {
  failure: Error | null = null;

  protected guard(): void {
    if (this.failure !== null) throw this.failure;
  }
}

function byCreatedAsc(a: OutboxEvent, b: OutboxEvent): number {
  return a.created_at.getTime() - b.created_at.getTime();
}

function leaseExpired(lastTriedAt: Date | null, cutoff: Date): boolean {
  return lastTriedAt === null || lastTriedAt.getTime() <= cutoff.getTime();
}

function matchesRetryWindow(row: OutboxEvent, criteria: RetryCriteria): boolean {
  if (row.created_at.getTime() < criteria.createdSince.getTime()) return false;
  if (criteria.eventTypes !== undefined && criteria.eventTypes.length > 0
    && !criteria.eventTypes.includes(row.event_type)) return false;
  if (criteria.tenantId !== undefined && row.tenant_id !== criteria.tenantId) return false;
  return true;
}

export class InMemoryEventStore extends FailableStore implements EventStore {
  private readonly rows = new Map<string, OutboxEvent>();

  /** Current copy of a row, for assertions. */
  get(eventId: string): OutboxEvent | undefined {
    const row = this.rows.get(eventId);
    return row === undefined ? undefined : { ...row };
  }

  all(): OutboxEvent[] {
    return [...this.rows.values()].map((row) => ({ ...row }));
  }

  /** Writes a row directly, bypassing the insert guard. */
  seed(row: OutboxEvent): OutboxEvent {
    this.rows.set(row.event_id, { ...row });
    return { ...row };
  }

  async insert(event: OutboxEvent): Promise<OutboxEvent> {
    this.guard();
    if (this.rows.has(event.event_id)) {
      throw new Error(`duplicate key value violates unique constraint "outbox_events_pkey"`);
    }
    this.rows.set(event.event_id, { ...event });
    return { ...event };
  }

  async findById(eventId: string): Promise<OutboxEvent | undefined> {
    this.guard();
    return this.get(eventId);
  }

  async list(filters: EventListFilters, pagination: PaginationParams): Promise<OutboxEvent[]> {
    this.guard();
    return this.all()
      .filter((row) => row.tenant_id === filters.tenant_id)
      .filter((row) => filters.event_type === undefined || row.event_type === filters.event_type)
      .filter((row) => filters.publish_status === undefined || row.publish_status === filters.publish_status)
      .filter((row) => filters.deliver_status === undefined || row.deliver_status === filters.deliver_status)
      .filter((row) => filters.entity_id === undefined || row.entity_id === filters.entity_id)
      .sort((a, b) => byCreatedAsc(b, a))
      .slice(pagination.offset, pagination.offset + pagination.limit);
  }

  async findResendCandidates(criteria: RetryCriteria): Promise<OutboxEvent[]> {
    this.guard();
    return this.all()
      .filter((row) => row.publish_status === 'pending')
      .filter((row) => row.publish_try_count < criteria.maxTryCount)
      .filter((row) => leaseExpired(row.publish_last_tried_at, criteria.leaseCutoff))
      .filter((row) => matchesRetryWindow(row, criteria))
      .sort(byCreatedAsc)
      .slice(0, criteria.limit);
  }

  async findRedeliverCandidates(criteria: RetryCriteria): Promise<OutboxEvent[]> {
    this.guard();
    return this.all()
      .filter((row) => row.publish_status === 'published')
      .filter((row) => row.deliver_status === 'pending' || row.deliver_status === 'failed')
      .filter((row) => row.deliver_try_count < criteria.maxTryCount)
      .filter((row) => leaseExpired(row.deliver_last_tried_at, criteria.leaseCutoff))
      .filter((row) => matchesRetryWindow(row, criteria))
      .sort(byCreatedAsc)
      .slice(0, criteria.limit);
  }

  async claimForResend(
    eventId: string,
    expectedTryCount: number,
    at: Date,
    leaseCutoff: Date,
  ): Promise<OutboxEvent | undefined> {
    return this.update(eventId, (row) =>
      row.publish_status === 'pending'
      && row.publish_try_count === expectedTryCount
      && leaseExpired(row.publish_last_tried_at, leaseCutoff)
        ? { ...row, publish_try_count: row.publish_try_count + 1, publish_last_tried_at: at }
        : undefined,
    );
  }

  async claimForRedelivery(
    eventId: string,
    expectedTryCount: number,
    at: Date,
    leaseCutoff: Date,
  ): Promise<OutboxEvent | undefined> {
    return this.update(eventId, (row) =>
      row.publish_status === 'published'
      && (row.deliver_status === 'pending' || row.deliver_status === 'failed')
      && row.deliver_try_count === expectedTryCount
      && leaseExpired(row.deliver_last_tried_at, leaseCutoff)
        ? { ...row, deliver_try_count: row.deliver_try_count + 1, deliver_last_tried_at: at }
        : undefined,
    );
  }

  async markPublished(eventId: string, at: Date): Promise<OutboxEvent | undefined> {
    return this.update(eventId, (row) =>
      row.publish_status === 'pending'
        ? { ...row, publish_status: 'published', published_at: at, publish_failure_reason: null }
        : undefined,
    );
  }

  async recordPublishFailure(eventId: string, reason: string): Promise<OutboxEvent | undefined> {
    return this.update(eventId, (row) =>
      row.publish_status === 'pending' ? { ...row, publish_failure_reason: reason } : undefined,
    );
  }

  async recordRedeliveryFailure(eventId: string, reason: string): Promise<OutboxEvent | undefined> {
    return this.update(eventId, (row) =>
      row.deliver_status === 'pending' || row.deliver_status === 'failed'
        ? { ...row, deliver_failure_reason: reason }
        : undefined,
    );
  }

  async settleDelivery(
    eventId: string,
    tenantId: string,
    settlement: DeliverySettlement,
    at: Date,
    failureReason: string | null,
  ): Promise<OutboxEvent | undefined> {
    return this.update(eventId, (row) => {
      if (row.tenant_id !== tenantId || !settlement.from.includes(row.deliver_status)) return undefined;
      return settlement.to === 'delivered'
        ? { ...row, deliver_status: 'delivered', delivered_at: at, deliver_failure_reason: null }
        : { ...row, deliver_status: 'failed', deliver_failure_reason: failureReason };
    });
  }

  async countByStatus(exhaustedAt: number, tenantId?: string): Promise<StatusCounts> {
    this.guard();
    const rows = this.all().filter((row) => tenantId === undefined || row.tenant_id === tenantId);
    return {
      pending_count: rows.filter((r) => r.publish_status === 'pending').length,
      failed_count: rows.filter((r) => r.publish_status === 'failed' || r.deliver_status === 'failed').length,
      exhausted_count: rows.filter((r) => r.publish_status === 'pending' && r.publish_try_count >= exhaustedAt).length,
      undelivered_count: rows.filter((r) => r.publish_status === 'published' && r.deliver_status === 'pending').length,
    };
  }

  async ping(): Promise<void> {
    this.guard();
  }

  private update(
    eventId: string,
    apply: (row: OutboxEvent) => OutboxEvent | undefined,
  ): OutboxEvent | undefined {
    this.guard();
    const row = this.rows.get(eventId);
    if (row === undefined) return undefined;
    const next = apply(row);
    if (next === undefined) return undefined;
    this.rows.set(eventId, next);
    return { ...next };
  }
}

export class InMemoryReceiptStore extends FailableStore implements ReceiptStore {
  readonly receipts: DeliveryReceipt[] = [];

  async insert(receipt: DeliveryReceipt): Promise<DeliveryReceipt> {
    this.guard();
    this.receipts.push({ ...receipt });
    return { ...receipt };
  }

  async listForEvent(eventId: string, tenantId: string): Promise<DeliveryReceipt[]> {
    this.guard();
    return this.receipts
      .filter((r) => r.event_id === eventId && r.tenant_id === tenantId)
      .map((r) => ({ ...r }));
  }
}

export class InMemoryTenantDirectory extends FailableStore implements TenantDirectory {
  private readonly tenants = new Map<string, Tenant>();
  private readonly credentials = new Map<string, Credential>();

  seedTenant(tenant: Tenant): Tenant {
    this.tenants.set(tenant.tenant_id, { ...tenant });
    return { ...tenant };
  }

  credentialsFor(tenantId: string): Credential[] {
    return [...this.credentials.values()]
      .filter((c) => c.tenant_id === tenantId)
      .map((c) => ({ ...c }));
  }

  async findTenant(tenantId: string): Promise<Tenant | undefined> {
    this.guard();
    const tenant = this.tenants.get(tenantId);
    return tenant === undefined ? undefined : { ...tenant };
  }

  async findTenantByRoutingName(routingName: string): Promise<Tenant | undefined> {
    this.guard();
    const tenant = [...this.tenants.values()].find((t) => t.routing_name === routingName);
    return tenant === undefined ? undefined : { ...tenant };
  }

  async insertTenant(tenant: Tenant): Promise<Tenant> {
    this.guard();
    this.tenants.set(tenant.tenant_id, { ...tenant });
    return { ...tenant };
  }

  async setTenantStatus(tenantId: string, status: TenantStatus, at: Date): Promise<Tenant | undefined> {
    this.guard();
    const tenant = this.tenants.get(tenantId);
    if (tenant === undefined) return undefined;
    const next: Tenant = { ...tenant, status, updated_at: at };
    this.tenants.set(tenantId, next);
    return { ...next };
  }

  async findCredential(keyId: string): Promise<Credential | undefined> {
    this.guard();
    const credential = this.credentials.get(keyId);
    return credential === undefined ? undefined : { ...credential };
  }

  async replaceActiveCredential(credential: Credential, at: Date): Promise<Credential> {
    this.guard();
    for (const existing of this.credentials.values()) {
      if (existing.tenant_id === credential.tenant_id && existing.status === 'active') {
        this.credentials.set(existing.key_id, { ...existing, status: 'deactivated', updated_at: at });
      }
    }
    this.credentials.set(credential.key_id, { ...credential });
    return { ...credential };
  }

  async touchCredential(keyId: string, at: Date): Promise<void> {
    this.guard();
    const credential = this.credentials.get(keyId);
    if (credential !== undefined) {
      this.credentials.set(keyId, { ...credential, last_used_at: at });
    }
  }
}
