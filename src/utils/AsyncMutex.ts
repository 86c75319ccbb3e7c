/**
 * Simple async mutex for synchronizing asynchronous operations
 *
 * Usage:
 *   const mutex = new AsyncMutex();
 *   await mutex.runExclusive(async () => {
 *     // Critical section - only one execution at a time
 *   });
 */
export class AsyncMutex {
  private queue: Array<() => void> = [];
  private locked = false;

  private async acquire(): Promise<void> {
    return new Promise<void>((resolve) => {
      if (!this.locked) {
        this.locked = true;
        resolve();
      } else {
        this.queue.push(resolve);
      }
    });
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }

  /**
   * Run a function exclusively (with mutex lock)
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }
}

/**
 * One AsyncMutex per key, created on demand and dropped once idle.
 * Work on different keys never waits on each other.
 */
export class KeyedMutex {
  private readonly mutexes = new Map<string, AsyncMutex>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let mutex = this.mutexes.get(key);
    if (!mutex) {
      mutex = new AsyncMutex();
      this.mutexes.set(key, mutex);
    }

    try {
      return await mutex.runExclusive(fn);
    } finally {
      if (!mutex.isLocked() && this.mutexes.get(key) === mutex) {
        this.mutexes.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.mutexes.get(key)?.isLocked() ?? false;
  }

  /**
   * Number of keys with a held or queued lock
   */
  get size(): number {
    return this.mutexes.size;
  }
}
