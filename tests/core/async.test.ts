import { describe, it, expect } from 'vitest';

import { backoffDelay, KeyedMutex, Mutex, retryWithBackoff, sleep, withTimeout } from '../../src/core/async.js';

describe('withTimeout', () => {
  it('resolves with the task when it finishes first', async () => {
    await expect(withTimeout(Promise.resolve('done'), 50, () => new Error('late'))).resolves.toBe('done');
  });

  it('rejects with the timeout error when the task hangs', async () => {
    await expect(withTimeout(new Promise(() => undefined), 10, () => new Error('late'))).rejects.toThrow('late');
  });
});

describe('sleep', () => {
  it('rejects when aborted', async () => {
    const controller = new AbortController();
    const pending = sleep(1_000, controller.signal);
    controller.abort(new Error('stop'));

    await expect(pending).rejects.toThrow('stop');
  });
});

describe('retryWithBackoff', () => {
  const policy = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 };

  it('doubles the delay up to the cap', () => {
    const capped = { maxAttempts: 5, baseDelayMs: 500, maxDelayMs: 1_500 };

    expect([1, 2, 3, 4].map((attempt) => backoffDelay(capped, attempt))).toEqual([500, 1_000, 1_500, 1_500]);
  });

  it('retries until the task succeeds', async () => {
    const attempts: number[] = [];

    const result = await retryWithBackoff(
      async (attempt) => {
        attempts.push(attempt);
        if (attempt < 3) throw new Error('flaky');
        return 'ok';
      },
      { ...policy, shouldRetry: () => true }
    );

    expect(result).toBe('ok');
    expect(attempts).toEqual([1, 2, 3]);
  });

  it('stops at the first error the predicate refuses', async () => {
    let calls = 0;

    await expect(
      retryWithBackoff(
        async () => {
          calls += 1;
          throw new Error('fatal');
        },
        { ...policy, shouldRetry: (error) => error instanceof Error && error.message !== 'fatal' }
      )
    ).rejects.toThrow('fatal');
    expect(calls).toBe(1);
  });
});

describe('Mutex', () => {
  it('runs tasks in arrival order', async () => {
    const mutex = new Mutex();
    const order: number[] = [];

    await Promise.all(
      [30, 10, 0].map((delay, index) =>
        mutex.runExclusive(async () => {
          await sleep(delay);
          order.push(index);
        })
      )
    );

    expect(order).toEqual([0, 1, 2]);
    expect(mutex.isLocked()).toBe(false);
  });

  it('releases the lock when a task throws', async () => {
    const mutex = new Mutex();

    await expect(mutex.runExclusive(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(mutex.runExclusive(() => 'next')).resolves.toBe('next');
  });
});

describe('KeyedMutex', () => {
  it('lets different keys run concurrently', async () => {
    const locks = new KeyedMutex();
    let release: () => void = () => undefined;
    const held = locks.runExclusive('a', () => new Promise<void>((resolve) => (release = resolve)));

    await expect(locks.runExclusive('b', () => 'free')).resolves.toBe('free');
    expect(locks.isLocked('a')).toBe(true);

    release();
    await held;
    expect(locks.isLocked('a')).toBe(false);
  });
});
