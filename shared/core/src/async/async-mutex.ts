/**
 * AsyncMutex and KeyedMutex
 *
 * Mutual exclusion for async sections. KeyedMutex gives every key its own
 * AsyncMutex so unrelated keys never wait on each other; the store uses it
 * per fingerprint, the task pool's callers per application.
 *
 * @example
 * ```ts
 * const locks = new KeyedMutex();
 * await locks.runExclusive(fingerprint, async () => {
 *   const existing = await repo.getByFingerprint(fingerprint);
 *   ...
 * });
 * ```
 */

export interface MutexStats {
  acquireCount: number;
  /** Acquisitions that had to wait */
  contentionCount: number;
  totalWaitTimeMs: number;
  isLocked: boolean;
  waitingCount: number;
}

interface Waiter {
  resolve: () => void;
}

export class AsyncMutex {
  private locked = false;
  private waitQueue: Waiter[] = [];
  private stats: MutexStats = {
    acquireCount: 0,
    contentionCount: 0,
    totalWaitTimeMs: 0,
    isLocked: false,
    waitingCount: 0,
  };

  /**
   * Acquire the mutex, waiting if it is held.
   *
   * @returns A release function that MUST be called when done
   */
  async acquire(): Promise<() => void> {
    const startTime = Date.now();

    if (this.locked) {
      this.stats.contentionCount++;
      this.stats.waitingCount++;
      await new Promise<void>(resolve => {
        this.waitQueue.push({ resolve });
      });
      this.stats.waitingCount--;
      this.stats.totalWaitTimeMs += Date.now() - startTime;
    }

    this.locked = true;
    this.stats.isLocked = true;
    this.stats.acquireCount++;
    return this.createRelease();
  }

  /**
   * @returns Release function if acquired, null if the mutex is held
   */
  tryAcquire(): (() => void) | null {
    if (this.locked) {
      return null;
    }
    this.locked = true;
    this.stats.isLocked = true;
    this.stats.acquireCount++;
    return this.createRelease();
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  hasWaiters(): boolean {
    return this.waitQueue.length > 0;
  }

  getStats(): MutexStats {
    return { ...this.stats };
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      // Direct handoff: the lock stays held while the next waiter wakes, so a
      // newcomer cannot slip in between release and wake-up.
      const next = this.waitQueue.shift();
      if (next) {
        next.resolve();
      } else {
        this.locked = false;
        this.stats.isLocked = false;
      }
    };
  }
}

/**
 * One AsyncMutex per key, created on demand and dropped once it is free with
 * nobody waiting.
 */
export class KeyedMutex {
  private readonly mutexes = new Map<string, AsyncMutex>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let mutex = this.mutexes.get(key);
    if (!mutex) {
      mutex = new AsyncMutex();
      this.mutexes.set(key, mutex);
    }

    const release = await mutex.acquire();
    try {
      return await fn();
    } finally {
      release();
      if (!mutex.isLocked() && !mutex.hasWaiters()) {
        this.mutexes.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.mutexes.get(key)?.isLocked() ?? false;
  }

  /** Number of keys currently held or awaited */
  get size(): number {
    return this.mutexes.size;
  }
}
