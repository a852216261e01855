import type { OutboxDeps, StatusCounts } from './ports.js';
import { withStorage } from './storage.js';

/**
 * Use case: pipeline counts for monitoring, across all tenants or one.
 *
 * Rows at or above the configured max try count are reported as
 * exhausted; they are never auto-selected for retry again.
 */
export async function getOutboxHealth(deps: OutboxDeps, tenantId?: string): Promise<StatusCounts> {
  return withStorage('count by status', () =>
    deps.events.countByStatus(deps.settings.defaultMaxTryCount, tenantId),
  );
}
