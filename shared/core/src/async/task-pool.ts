/**
 * Keyed Priority Task Pool
 *
 * Bounded in-process pool for short async steps. Each task carries a key;
 * two tasks with the same key never run at the same time, tasks with
 * different keys interleave freely. Among runnable tasks, higher priority
 * runs first, then submission order.
 *
 * Tasks should not await slow collaborators inside a slot: hand the slow
 * call off and schedule a continuation task when it returns.
 */

import { MinHeap } from '../data-structures/min-heap';
import { getErrorMessage } from '../error-handling';
import type { ILogger } from '../logging';

export interface TaskPoolConfig {
  /** Maximum tasks running at once */
  size: number;
  name?: string;
}

export interface TaskPoolStats {
  running: number;
  queued: number;
  /** Tasks waiting because another task with the same key is running */
  parked: number;
  completed: number;
  failed: number;
}

interface PoolEntry {
  key: string;
  priority: number;
  seq: number;
  /** Runs the task and settles the submitter's promise with its result */
  execute: () => Promise<void>;
  fail: (error: unknown) => void;
}

export class TaskPoolStoppedError extends Error {
  constructor(poolName: string) {
    super(`Task pool '${poolName}' is stopped`);
    this.name = 'TaskPoolStoppedError';
  }
}

export class KeyedTaskPool {
  private readonly size: number;
  private readonly name: string;
  private readonly queue = new MinHeap<PoolEntry>((a, b) => b.priority - a.priority || a.seq - b.seq);
  private readonly parked = new Map<string, PoolEntry[]>();
  private readonly activeKeys = new Set<string>();
  private idleWaiters: Array<() => void> = [];
  private seq = 0;
  private running = 0;
  private completed = 0;
  private failed = 0;
  private stopped = false;

  constructor(config: TaskPoolConfig, private readonly logger: ILogger) {
    if (!Number.isInteger(config.size) || config.size < 1) {
      throw new RangeError(`Task pool size must be a positive integer, got ${config.size}`);
    }
    this.size = config.size;
    this.name = config.name ?? 'task-pool';
  }

  /**
   * Queue a task and wait for its result.
   */
  submit<T>(key: string, priority: number, run: () => Promise<T>): Promise<T> {
    if (this.stopped) {
      return Promise.reject(new TaskPoolStoppedError(this.name));
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        key,
        priority,
        seq: this.seq++,
        execute: () => run().then(resolve),
        fail: reject,
      });
      this.pump();
    });
  }

  /**
   * Queue a task without waiting. Failures are logged, never thrown.
   */
  schedule(key: string, priority: number, run: () => Promise<void>): void {
    this.submit(key, priority, run).catch((error: unknown) => {
      if (error instanceof TaskPoolStoppedError) {
        this.logger.debug('Task dropped, pool stopped', { pool: this.name, key });
        return;
      }
      this.logger.error('Pool task failed', { pool: this.name, key, error: getErrorMessage(error) });
    });
  }

  getStats(): TaskPoolStats {
    let parked = 0;
    for (const entries of this.parked.values()) parked += entries.length;
    return {
      running: this.running,
      queued: this.queue.size,
      parked,
      completed: this.completed,
      failed: this.failed,
    };
  }

  /**
   * Resolves once nothing is running, queued or parked.
   */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  /**
   * Reject queued and parked tasks. Running tasks finish normally.
   */
  stop(): void {
    this.stopped = true;
    const dropped = this.queue.extractAll();
    for (const entries of this.parked.values()) dropped.push(...entries);
    this.parked.clear();
    for (const entry of dropped) {
      entry.fail(new TaskPoolStoppedError(this.name));
    }
    this.notifyIdle();
  }

  private isIdle(): boolean {
    return this.running === 0 && this.queue.isEmpty && this.parked.size === 0;
  }

  private pump(): void {
    while (this.running < this.size) {
      const entry = this.queue.pop();
      if (!entry) break;

      if (this.activeKeys.has(entry.key)) {
        const waiting = this.parked.get(entry.key);
        if (waiting) waiting.push(entry);
        else this.parked.set(entry.key, [entry]);
        continue;
      }

      this.start(entry);
    }
  }

  private start(entry: PoolEntry): void {
    this.running++;
    this.activeKeys.add(entry.key);

    const finish = (): void => {
      this.running--;
      this.activeKeys.delete(entry.key);
      const waiting = this.parked.get(entry.key);
      if (waiting) {
        this.parked.delete(entry.key);
        for (const parked of waiting) this.queue.push(parked);
      }
      this.pump();
      this.notifyIdle();
    };

    // Start on a fresh microtask so a synchronous throw in run() becomes a rejection.
    void Promise.resolve()
      .then(entry.execute)
      .then(
        () => {
          this.completed++;
          finish();
        },
        (error: unknown) => {
          this.failed++;
          entry.fail(error);
          finish();
        }
      );
  }

  private notifyIdle(): void {
    if (!this.isIdle() || this.idleWaiters.length === 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
