import { describe, it, expect, vi, afterEach } from 'vitest';
import { withStorage } from '../../src/application/storage.js';
import { withTimeout } from '../../src/application/timeout.js';
import {
  PublishTimeoutError,
  StorageFailureError,
  TransientBrokerError,
  UnknownEventError,
} from '../../src/domain/index.js';

afterEach(() => {
  vi.useRealTimers();
});

describe('withStorage', () => {
  it('returns the operation result', async () => {
    await expect(withStorage('read', async () => 42)).resolves.toBe(42);
  });

  it('wraps a driver error and keeps it as the cause', async () => {
    const driverError = new Error('ECONNREFUSED');

    const error: unknown = await withStorage('read', async () => {
      throw driverError;
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(StorageFailureError);
    expect(error).toMatchObject({ message: 'Storage failure during read', cause: driverError });
  });

  it('lets domain errors through unchanged', async () => {
    const domainError = new UnknownEventError('e-1');

    await expect(withStorage('read', async () => {
      throw domainError;
    })).rejects.toBe(domainError);
  });
});

describe('withTimeout', () => {
  it('resolves with the value when it settles in time', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 1_000, 'op')).resolves.toBe('ok');
  });

  it('rejects with a transient broker error when the timer fires first', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => undefined), 200, 'broker publish');
    const assertion = expect(pending).rejects.toThrow(
      new TransientBrokerError('broker publish timed out after 200ms'),
    );

    await vi.advanceTimersByTimeAsync(200);
    await assertion;
  });

  it('marks a timeout apart from other broker failures', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => undefined), 200, 'broker publish');
    const assertion = expect(pending).rejects.toBeInstanceOf(PublishTimeoutError);

    await vi.advanceTimersByTimeAsync(200);
    await assertion;
  });

  it('clears its timer once settled', async () => {
    vi.useFakeTimers();

    await withTimeout(Promise.resolve(1), 5_000, 'op');

    expect(vi.getTimerCount()).toBe(0);
  });
});
