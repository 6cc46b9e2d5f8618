import { describe, it, expect, vi } from 'vitest';
import {
  ExhaustedRetryError,
  FatalExternalError,
  KeyedMutex,
  RunDeadlineError,
  TransientExternalError,
  backoffDelay,
  defaultRetryPolicy,
  mapWithConcurrency,
  retryWithBackoff,
  withTimeout,
} from '../src';

const recordingSleep = () => {
  const waits: number[] = [];
  return { waits, sleepFn: async (ms: number) => void waits.push(ms) };
};

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

// =======================================================
// 1) retryWithBackoff
// =======================================================
describe('retryWithBackoff', () => {
  it('retries transient failures with exponential delays', async () => {
    const { waits, sleepFn } = recordingSleep();
    const onRetry = vi.fn();
    let calls = 0;
    const fn = async () => {
      calls++;
      if (calls < 3) throw new TransientExternalError(`flaky ${calls}`);
      return 'ok';
    };

    await expect(retryWithBackoff('calendar.create', fn, { sleepFn, onRetry })).resolves.toBe('ok');
    expect(calls).toBe(3);
    expect(waits).toEqual([500, 1000]);
    expect(onRetry.mock.calls.map(([info]) => info.attempt)).toEqual([1, 2]);
  });

  it('rethrows non-retryable errors at once', async () => {
    const { waits, sleepFn } = recordingSleep();
    const fn = vi.fn(async () => {
      throw new FatalExternalError('401 unauthorized');
    });

    await expect(retryWithBackoff('calendar.create', fn, { sleepFn })).rejects.toBeInstanceOf(
      FatalExternalError,
    );
    expect(fn).toHaveBeenCalledTimes(1);
    expect(waits).toEqual([]);
  });

  it('gives up after the last attempt', async () => {
    const { waits, sleepFn } = recordingSleep();
    const policy = { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 250 };
    const fn = async () => {
      throw new TransientExternalError('boom');
    };

    const err = await retryWithBackoff('store.list', fn, { policy, sleepFn }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ExhaustedRetryError);
    if (!(err instanceof ExhaustedRetryError)) return;
    expect(err.message).toBe('store.list failed after 3 attempts: boom');
    expect(err.attempts).toBe(3);
    expect(err.operation).toBe('store.list');
    expect(err.cause).toBeInstanceOf(TransientExternalError);
    expect(waits).toEqual([100, 200]);
  });

  it('caps the delay', () => {
    expect(backoffDelay(1, defaultRetryPolicy)).toBe(500);
    expect(backoffDelay(3, defaultRetryPolicy)).toBe(2000);
    expect(backoffDelay(6, defaultRetryPolicy)).toBe(8000);
  });

  it('stops once the run deadline has passed', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn(async () => 'never');

    await expect(
      retryWithBackoff('notify', fn, { signal: controller.signal }),
    ).rejects.toBeInstanceOf(RunDeadlineError);
    expect(fn).not.toHaveBeenCalled();
  });

  it('treats a timed-out attempt as transient', async () => {
    let calls = 0;
    const fn = () => {
      calls++;
      return calls === 1 ? new Promise<string>(() => undefined) : Promise.resolve('late ok');
    };

    await expect(
      retryWithBackoff('calendar.update', fn, { timeoutMs: 5, sleepFn: async () => undefined }),
    ).resolves.toBe('late ok');
    expect(calls).toBe(2);
  });

  it('withTimeout rejects with the operation name', async () => {
    await expect(withTimeout('mapping.get', new Promise(() => undefined), 5)).rejects.toThrow(
      'mapping.get timed out after 5ms',
    );
  });
});

// =======================================================
// 2) KeyedMutex
// =======================================================
describe('KeyedMutex', () => {
  it('runs work for one key in submission order', async () => {
    const mutex = new KeyedMutex();
    const log: string[] = [];
    let open: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      open = resolve;
    });

    const a = mutex.runExclusive('employee:emp-1', async () => {
      log.push('a:start');
      await gate;
      log.push('a:end');
    });
    const b = mutex.runExclusive('employee:emp-1', async () => {
      log.push('b:start');
      log.push('b:end');
    });

    await tick();
    expect(log).toEqual(['a:start']);
    expect(mutex.isLocked('employee:emp-1')).toBe(true);

    open();
    await Promise.all([a, b]);
    expect(log).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    expect(mutex.isLocked('employee:emp-1')).toBe(false);
  });

  it('lets different keys run side by side', async () => {
    const mutex = new KeyedMutex();
    let open: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      open = resolve;
    });

    const slow = mutex.runExclusive('a', () => gate);
    await expect(mutex.runExclusive('b', async () => 'b done')).resolves.toBe('b done');

    open();
    await slow;
  });

  it('releases the key when the work throws', async () => {
    const mutex = new KeyedMutex();
    const failed = mutex.runExclusive('k', async () => {
      throw new Error('nope');
    });
    await expect(failed).rejects.toThrow('nope');
    await expect(mutex.runExclusive('k', async () => 2)).resolves.toBe(2);
  });
});

describe('mapWithConcurrency', () => {
  it('bounds the calls in flight and keeps input order', async () => {
    let inFlight = 0;
    let peak = 0;

    const out = await mapWithConcurrency([1, 2, 3, 4, 5], 2, async (n) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 6 - n));
      inFlight--;
      return n * 2;
    });

    expect(out).toEqual([2, 4, 6, 8, 10]);
    expect(peak).toBe(2);
  });

  it('handles an empty list', async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });
});
