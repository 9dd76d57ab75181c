/**
 * One FIFO lock per key. Entries are dropped once a key has no holder and no
 * waiters, so the map only holds keys that are currently busy.
 */
export class KeyedMutex {
  private readonly waiters = new Map<string, Array<() => void>>();

  /** Rejects with the signal's reason if it aborts before the lock is granted. */
  async runExclusive<T>(key: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(key, signal);
    try {
      return await fn();
    } finally {
      this.release(key);
    }
  }

  isLocked(key: string): boolean {
    return this.waiters.has(key);
  }

  private acquire(key: string, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(signal.reason);
    const queue = this.waiters.get(key);
    if (!queue) {
      this.waiters.set(key, []);
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = queue.indexOf(grant);
        if (index >= 0) queue.splice(index, 1);
        reject(signal?.reason);
      };
      const grant = () => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };
      queue.push(grant);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private release(key: string): void {
    const queue = this.waiters.get(key);
    const next = queue?.shift();
    if (next) {
      // ownership passes straight to the next waiter
      next();
    } else {
      this.waiters.delete(key);
    }
  }
}
