import type { EventStore, ReceiptStore, TenantDirectory } from '../../application/index.js';
import type { Database } from './client.js';
import {
  claimForRedelivery,
  claimForResend,
  insertEvent,
  markPublished,
  recordPublishFailure,
  recordRedeliveryFailure,
  settleDelivery,
} from './event-repository.js';
import {
  countEventsByStatus,
  findEventById,
  findRedeliverCandidates,
  findResendCandidates,
  pingDatabase,
  queryEvents,
} from './event-query-repository.js';
import { findReceiptsForEvent, insertReceipt } from './receipt-repository.js';
import {
  findCredentialByKeyId,
  findTenantById,
  findTenantByRoutingName,
  insertTenant,
  replaceActiveCredential,
  touchCredential,
  updateTenantStatus,
} from './tenant-repository.js';

/** Binds the Postgres repository functions to the core's store ports. */
export function createEventStore(db: Database): EventStore {
  return {
    insert: (event) => insertEvent(db, event),
    findById: (eventId) => findEventById(db, eventId),
    list: (filters, pagination) => queryEvents(db, filters, pagination),
    findResendCandidates: (criteria) => findResendCandidates(db, criteria),
    findRedeliverCandidates: (criteria) => findRedeliverCandidates(db, criteria),
    claimForResend: (eventId, expected, at, cutoff) => claimForResend(db, eventId, expected, at, cutoff),
    claimForRedelivery: (eventId, expected, at, cutoff) => claimForRedelivery(db, eventId, expected, at, cutoff),
    markPublished: (eventId, at) => markPublished(db, eventId, at),
    recordPublishFailure: (eventId, reason) => recordPublishFailure(db, eventId, reason),
    recordRedeliveryFailure: (eventId, reason) => recordRedeliveryFailure(db, eventId, reason),
    settleDelivery: (eventId, tenantId, settlement, at, reason) =>
      settleDelivery(db, eventId, tenantId, settlement, at, reason),
    countByStatus: (exhaustedAt, tenantId) => countEventsByStatus(db, exhaustedAt, tenantId),
    ping: () => pingDatabase(db),
  };
}

export function createReceiptStore(db: Database): ReceiptStore {
  return {
    insert: (receipt) => insertReceipt(db, receipt),
    listForEvent: (eventId, tenantId) => findReceiptsForEvent(db, eventId, tenantId),
  };
}

export function createTenantDirectory(db: Database): TenantDirectory {
  return {
    findTenant: (tenantId) => findTenantById(db, tenantId),
    findTenantByRoutingName: (routingName) => findTenantByRoutingName(db, routingName),
    insertTenant: (tenant) => insertTenant(db, tenant),
    setTenantStatus: (tenantId, status, at) => updateTenantStatus(db, tenantId, status, at),
    findCredential: (keyId) => findCredentialByKeyId(db, keyId),
    replaceActiveCredential: (credential, at) => replaceActiveCredential(db, credential, at),
    touchCredential: (keyId, at) => touchCredential(db, keyId, at),
  };
}
