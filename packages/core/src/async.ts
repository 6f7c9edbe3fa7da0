/**
 * @fileoverview Async helpers for handler calls: a timeout wrapper and a
 * bounded worker pool.
 */

/**
 * Thrown by withTimeout when the wrapped promise does not settle in time.
 */
export class TimeoutError extends Error {
  constructor(label: string, readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Races a promise against a timer. The timer is cleared once the promise
 * settles, so nothing is left scheduled.
 *
 * @example
 * await withTimeout(loader.loadDeposits('LTC'), 30000, 'loadDeposits(LTC)');
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Outcome of one item of a settled batch.
 */
export type Settled<T> =
  | { ok: true; value: T }
  | { ok: false; error: Error };

/**
 * Normalises anything thrown into an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Maps `items` through `fn` with at most `limit` calls in flight.
 * Results keep the input order. A rejection does not stop the other items;
 * it is reported in that item's slot.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<Settled<R>[]> {
  const results = new Array<Settled<R>>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = { ok: true, value: await fn(items[index], index) };
      } catch (err) {
        results[index] = { ok: false, error: toError(err) };
      }
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}
