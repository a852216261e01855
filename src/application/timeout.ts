import { PublishTimeoutError } from '../domain/index.js';

/**
 * Races `promise` against a timer.
 *
 * Rejects with PublishTimeoutError when the timer wins. The timer is
 * always cleared so nothing is left scheduled after settlement.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new PublishTimeoutError(`${label} timed out after ${ms}ms`));
    }, ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
  }
}
