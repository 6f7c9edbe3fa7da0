import { describe, it, expect, vi, afterEach } from 'vitest';
import { mapWithConcurrency, withTimeout, TimeoutError } from '../src/async';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves with the wrapped value', async () => {
    await expect(withTimeout(Promise.resolve(42), 1000, 'answer')).resolves.toBe(42);
  });

  it('rejects with a TimeoutError when the promise hangs', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => undefined), 500, 'loadDeposits(LTC)');
    const assertion = expect(pending).rejects.toThrow('loadDeposits(LTC) timed out after 500ms');
    await vi.advanceTimersByTimeAsync(500);
    await assertion;
  });

  it('exposes the timeout on the error', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => undefined), 250, 'send').catch(err => err);
    await vi.advanceTimersByTimeAsync(250);
    const err = await pending;
    expect(err).toBeInstanceOf(TimeoutError);
    expect(err.timeoutMs).toBe(250);
  });
});

describe('mapWithConcurrency', () => {
  it('keeps input order and isolates failures', async () => {
    const results = await mapWithConcurrency([1, 2, 3], 2, async n => {
      if (n === 2) throw new Error('boom');
      return n * 10;
    });

    expect(results[0]).toEqual({ ok: true, value: 10 });
    expect(results[1].ok).toBe(false);
    expect(results[2]).toEqual({ ok: true, value: 30 });
  });

  it('never runs more than the limit at once', async () => {
    let active = 0;
    let peak = 0;
    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise(resolve => setTimeout(resolve, 5));
      active--;
    });

    expect(peak).toBe(2);
  });

  it('handles an empty list', async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });
});
