/**
 * Error taxonomy of the outbox core.
 *
 * Broker errors never leave the publisher; they become row state.
 * Storage errors always reach the immediate caller.
 */
export class OutboxError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Connection, channel or timeout failure while handing a message to the broker. */
export class TransientBrokerError extends OutboxError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSIENT_BROKER_ERROR', message, options);
  }
}

/** The broker did not confirm within the publish timeout. */
export class PublishTimeoutError extends TransientBrokerError {}

/** The store could not be read or written. */
export class StorageFailureError extends OutboxError {
  readonly operation: string;

  constructor(operation: string, options?: { cause?: unknown }) {
    super('STORAGE_FAILURE', `Storage failure during ${operation}`, options);
    this.operation = operation;
  }
}

export class UnknownEventError extends OutboxError {
  readonly eventId: string;

  constructor(eventId: string, code = 'UNKNOWN_EVENT') {
    super(code, `Event ${eventId} not found`);
    this.eventId = eventId;
  }
}

/**
 * The event exists but belongs to another tenant.
 *
 * Carries the same message as UnknownEventError so callers cannot tell
 * the two apart; the owning tenant is never attached.
 */
export class TenantMismatchError extends UnknownEventError {
  constructor(eventId: string) {
    super(eventId, 'TENANT_MISMATCH');
  }
}

export class UnknownTenantError extends OutboxError {
  constructor(tenantId: string) {
    super('UNKNOWN_TENANT', `Tenant ${tenantId} not found`);
  }
}

export class TenantInactiveError extends OutboxError {
  constructor(tenantId: string, status: string) {
    super('TENANT_INACTIVE', `Tenant ${tenantId} is ${status}`);
  }
}

export class InvalidRoutingNameError extends OutboxError {
  constructor(reason: string) {
    super('INVALID_ROUTING_NAME', reason);
  }
}

export class AuthenticationError extends OutboxError {
  constructor(message: string) {
    super('AUTHENTICATION_FAILED', message);
  }
}

export class RoutingNameTakenError extends OutboxError {
  constructor(routingName: string) {
    super('ROUTING_NAME_TAKEN', `Routing name ${routingName} is already registered`);
  }
}

/** Input that passed transport validation but is still not acceptable to the core. */
export class ValidationError extends OutboxError {
  constructor(message: string) {
    super('VALIDATION_FAILED', message);
  }
}
