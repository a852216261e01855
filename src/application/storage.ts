import { OutboxError, StorageFailureError } from '../domain/index.js';

/**
 * Runs a store operation and turns any non-domain failure into
 * StorageFailureError, keeping the original error as `cause`.
 */
export async function withStorage<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err: unknown) {
    if (err instanceof OutboxError) throw err;
    throw new StorageFailureError(operation, { cause: err });
  }
}
