export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason ?? new Error('Aborted'));
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason ?? new Error('Aborted'));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settles with `promise`, or rejects with `onTimeout()` once `timeoutMs`
 * elapses. The underlying work is not cancelled; callers that own an
 * AbortController abort it from `onTimeout`.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }
  let timeout: NodeJS.Timeout | null = null;
  const timer = new Promise<never>((_, reject) => {
    timeout = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  return Promise.race([promise, timer]).finally(() => {
    if (timeout) {
      clearTimeout(timeout);
    }
  });
}

export type BackoffPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export function backoffDelay(policy: BackoffPolicy, attempt: number): number {
  const exp = policy.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  return Math.min(exp, policy.maxDelayMs);
}

export async function retryWithBackoff<T>(
  task: (attempt: number) => Promise<T>,
  policy: BackoffPolicy & {
    shouldRetry: (error: unknown) => boolean;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  }
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  let attempt = 1;
  for (;;) {
    try {
      return await task(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !policy.shouldRetry(error)) {
        throw error;
      }
      const delayMs = backoffDelay(policy, attempt);
      policy.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
      attempt += 1;
    }
  }
}

/**
 * FIFO mutual exclusion. Tasks run one at a time in arrival order.
 */
export class Mutex {
  private queue: Array<() => void> = [];
  private locked = false;

  isLocked(): boolean {
    return this.locked;
  }

  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
      return;
    }
    this.locked = false;
  }
}

/**
 * One Mutex per key, dropped once nobody holds or waits on it.
 */
export class KeyedMutex {
  private locks = new Map<string, { mutex: Mutex; refs: number }>();

  isLocked(key: string): boolean {
    return this.locks.get(key)?.mutex.isLocked() ?? false;
  }

  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    let entry = this.locks.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), refs: 0 };
      this.locks.set(key, entry);
    }
    entry.refs += 1;
    try {
      return await entry.mutex.runExclusive(task);
    } finally {
      entry.refs -= 1;
      if (entry.refs === 0) {
        this.locks.delete(key);
      }
    }
  }
}
