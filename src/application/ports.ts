import type { Logger } from 'pino';
import type {
  OutboxEvent,
  EventType,
  PublishStatus,
  DeliveryStatus,
  DeliveryReceipt,
  DeliverySettlement,
  Tenant,
  TenantStatus,
  Credential,
  TopologySettings,
} from '../domain/index.js';

/** Selection shared by the resend and redeliver scans. */
export interface RetryCriteria {
  /** Only rows created at or after this instant. */
  createdSince: Date;
  /** Only rows whose relevant try count is strictly below this. */
  maxTryCount: number;
  /**
   * Only rows last tried at or before this instant. A row tried later may
   * still have a send in flight from another caller.
   */
  leaseCutoff: Date;
  eventTypes?: readonly EventType[] | undefined;
  tenantId?: string | undefined;
  limit: number;
}

export interface EventListFilters {
  tenant_id: string;
  event_type?: EventType | undefined;
  publish_status?: PublishStatus | undefined;
  deliver_status?: DeliveryStatus | undefined;
  entity_id?: string | undefined;
}

export interface PaginationParams {
  limit: number;
  offset: number;
}

export interface StatusCounts {
  pending_count: number;
  failed_count: number;
  exhausted_count: number;
  undelivered_count: number;
}

/**
 * Durable event store, the only shared mutable resource.
 *
 * Every status-changing method is a single conditional update: it applies
 * only when the row is still in the expected prior state and returns the
 * updated row, or `undefined` when the condition no longer held.
 */
export interface EventStore {
  insert(event: OutboxEvent): Promise<OutboxEvent>;
  findById(eventId: string): Promise<OutboxEvent | undefined>;
  list(filters: EventListFilters, pagination: PaginationParams): Promise<OutboxEvent[]>;

  /** publish_status = pending, publish_try_count < max, publish lease expired. Oldest first. */
  findResendCandidates(criteria: RetryCriteria): Promise<OutboxEvent[]>;
  /** publish_status = published, deliver_status in (pending, failed), deliver_try_count < max, delivery lease expired. */
  findRedeliverCandidates(criteria: RetryCriteria): Promise<OutboxEvent[]>;

  /**
   * Increments publish_try_count and stamps publish_last_tried_at iff the row
   * is pending with exactly `expectedTryCount` and was last tried at or
   * before `leaseCutoff` (or never).
   */
  claimForResend(
    eventId: string,
    expectedTryCount: number,
    at: Date,
    leaseCutoff: Date,
  ): Promise<OutboxEvent | undefined>;
  /** Same as `claimForResend` for the delivery side of a published, undelivered row. */
  claimForRedelivery(
    eventId: string,
    expectedTryCount: number,
    at: Date,
    leaseCutoff: Date,
  ): Promise<OutboxEvent | undefined>;

  /** pending → published. */
  markPublished(eventId: string, at: Date): Promise<OutboxEvent | undefined>;
  /** Records the failure reason on a row that is still pending. */
  recordPublishFailure(eventId: string, reason: string): Promise<OutboxEvent | undefined>;
  /** Records a broker failure during redelivery on a row that is not yet delivered. */
  recordRedeliveryFailure(eventId: string, reason: string): Promise<OutboxEvent | undefined>;
  /** Applies a delivery transition for the owning tenant when the row is in one of `settlement.from`. */
  settleDelivery(
    eventId: string,
    tenantId: string,
    settlement: DeliverySettlement,
    at: Date,
    failureReason: string | null,
  ): Promise<OutboxEvent | undefined>;

  countByStatus(exhaustedAt: number, tenantId?: string): Promise<StatusCounts>;
  ping(): Promise<void>;
}

export interface ReceiptStore {
  insert(receipt: DeliveryReceipt): Promise<DeliveryReceipt>;
  listForEvent(eventId: string, tenantId: string): Promise<DeliveryReceipt[]>;
}

/** Tenant registry: tenants and their credentials. Routing names are never updated. */
export interface TenantDirectory {
  findTenant(tenantId: string): Promise<Tenant | undefined>;
  findTenantByRoutingName(routingName: string): Promise<Tenant | undefined>;
  insertTenant(tenant: Tenant): Promise<Tenant>;
  setTenantStatus(tenantId: string, status: TenantStatus, at: Date): Promise<Tenant | undefined>;

  findCredential(keyId: string): Promise<Credential | undefined>;
  /** Deactivates the tenant's active credential (if any) and stores `credential`, atomically. */
  replaceActiveCredential(credential: Credential, at: Date): Promise<Credential>;
  touchCredential(keyId: string, at: Date): Promise<void>;
}

/** One message as handed to the broker. */
export interface BrokerMessage {
  exchange: string;
  routingKey: string;
  messageId: string;
  body: Record<string, unknown>;
  headers: Record<string, string | number>;
  timestamp: Date;
}

/**
 * Per-process broker client.
 *
 * `publish` resolves once the broker has accepted the message and rejects
 * with TransientBrokerError otherwise.
 */
export interface MessageBroker {
  publish(message: BrokerMessage): Promise<void>;
  close(): Promise<void>;
}

export type PublishMetricStatus = 'success' | 'failure';
export type BrokerFailureReason = 'timeout' | 'broker_error';

/** Operational counters for the publish path. Implementations must not throw. */
export interface OutboxMetrics {
  /** One send attempt; `durationSeconds` is null when the broker was never contacted. */
  recordPublish(
    labels: { event_type: EventType; tenant: string },
    status: PublishMetricStatus,
    durationSeconds: number | null,
  ): void;
  recordBrokerFailure(reason: BrokerFailureReason): void;
  setOutboxCounts(counts: StatusCounts): void;
}

export interface OutboxSettings {
  topology: TopologySettings;
  publishTimeoutMs: number;
  /** How long a claimed or freshly recorded row is left to its current sender. */
  claimLeaseMs: number;
  retryBatchLimit: number;
  defaultMaxTryCount: number;
  defaultLookbackDays: number;
  bcryptRounds: number;
}

/** Everything a use case needs, bundled the same way for the server, the CLIs and the tests. */
export interface OutboxDeps {
  events: EventStore;
  receipts: ReceiptStore;
  tenants: TenantDirectory;
  broker: MessageBroker;
  metrics: OutboxMetrics;
  log: Logger;
  settings: OutboxSettings;
  now: () => Date;
}
