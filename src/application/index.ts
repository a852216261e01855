export type {
  OutboxDeps,
  OutboxSettings,
  EventStore,
  ReceiptStore,
  TenantDirectory,
  MessageBroker,
  OutboxMetrics,
  PublishMetricStatus,
  BrokerFailureReason,
  BrokerMessage,
  RetryCriteria,
  EventListFilters,
  PaginationParams,
  StatusCounts,
} from './ports.js';
export {
  recordEventSchema,
  confirmDeliverySchema,
  retryFilterSchema,
  listEventsQuerySchema,
  eventIdParamsSchema,
  healthQuerySchema,
} from './event-schema.js';
export type {
  RecordEventInput,
  ConfirmDeliveryBody,
  RetryFilter,
  RetryFilterDefaults,
  ListEventsQuery,
} from './event-schema.js';
export { recordEvent } from './record-event.js';
export type { RecordEventResult } from './record-event.js';
export { publishEvent, sendToBroker, buildEventMessage } from './publisher.js';
export type { PublishOutcome, SendResult } from './publisher.js';
export { resend, redeliver, criteriaFrom, BROKER_FAILURE_BREAK } from './retry-coordinator.js';
export type { RetryResult } from './retry-coordinator.js';
export { confirmDelivery } from './delivery-receiver.js';
export type { ConfirmDeliveryInput, ConfirmDeliveryResult } from './delivery-receiver.js';
export { getOutboxHealth } from './health.js';
export { listEvents, getEvent, getEventDetail } from './query-events.js';
export type { EventDetail } from './query-events.js';
export {
  registerTenant,
  issueCredential,
  changeTenantStatus,
  authenticateApiKey,
  parseApiKey,
  formatApiKey,
  MIN_API_KEY_LENGTH,
} from './tenant-registry.js';
export type { IssuedCredential, RegisteredTenant } from './tenant-registry.js';
export { withStorage } from './storage.js';
export { withTimeout } from './timeout.js';
