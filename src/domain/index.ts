export type {
  OutboxEvent,
  NewOutboxEvent,
  EventType,
  PublishStatus,
  DeliveryStatus,
  EventPayload,
  EventMetadata,
} from './event.js';
export {
  EVENT_TYPES,
  PUBLISH_STATUSES,
  DELIVERY_STATUSES,
  isEventType,
  initialOutboxEvent,
} from './event.js';
export type { DeliveryReceipt, ReceiptOutcome, DeliverySettlement } from './receipt.js';
export { RECEIPT_OUTCOMES, isReceiptOutcome, settlementFor } from './receipt.js';
export type { Tenant, TenantStatus, Credential, CredentialStatus } from './tenant.js';
export {
  TENANT_STATUSES,
  CREDENTIAL_STATUSES,
  ROUTING_NAME_PATTERN,
  ROUTING_NAME_MAX_LENGTH,
  isTenantStatus,
  routingNameProblem,
  isCredentialUsable,
} from './tenant.js';
export type { TopologySettings, TenantTopology } from './routing.js';
export {
  normalizeSegment,
  buildRoutingKey,
  tenantQueueName,
  deadLetterQueueName,
  deadLetterExchangeName,
  describeTenantTopology,
} from './routing.js';
export {
  OutboxError,
  TransientBrokerError,
  PublishTimeoutError,
  StorageFailureError,
  UnknownEventError,
  TenantMismatchError,
  UnknownTenantError,
  TenantInactiveError,
  InvalidRoutingNameError,
  AuthenticationError,
  RoutingNameTakenError,
  ValidationError,
} from './errors.js';
