/**
 * KeyedTaskPool Unit Tests
 *
 * Covers per-key exclusivity, priority ordering, idle tracking and stop().
 */

import { describe, it, expect, beforeEach } from '@jest/globals';

import { createDeferred, KeyedTaskPool, RecordingLogger, sleep, TaskPoolStoppedError } from '@pipeline/core';

describe('KeyedTaskPool', () => {
  let logger: RecordingLogger;

  beforeEach(() => {
    logger = new RecordingLogger();
  });

  it('should reject a non-positive size', () => {
    expect(() => new KeyedTaskPool({ size: 0 }, logger)).toThrow(RangeError);
  });

  it('should resolve submit with the task result', async () => {
    const pool = new KeyedTaskPool({ size: 2 }, logger);
    await expect(pool.submit('app_1', 0, async () => 'scored')).resolves.toBe('scored');
    expect(pool.getStats().completed).toBe(1);
  });

  it('should never run two tasks with the same key at once', async () => {
    const pool = new KeyedTaskPool({ size: 4 }, logger);
    let concurrent = 0;
    let maxConcurrent = 0;

    const task = async (): Promise<void> => {
      concurrent++;
      maxConcurrent = Math.max(maxConcurrent, concurrent);
      await sleep(2);
      concurrent--;
    };

    await Promise.all([
      pool.submit('app_1', 0, task),
      pool.submit('app_1', 0, task),
      pool.submit('app_1', 0, task),
    ]);

    expect(maxConcurrent).toBe(1);
  });

  it('should park a task whose key is busy and run it afterwards', async () => {
    const pool = new KeyedTaskPool({ size: 2 }, logger);
    const gate = createDeferred();
    const order: string[] = [];

    const first = pool.submit('app_1', 0, async () => {
      await gate.promise;
      order.push('first');
    });
    const second = pool.submit('app_1', 0, async () => {
      order.push('second');
    });

    expect(pool.getStats()).toMatchObject({ running: 1, parked: 1, queued: 0 });

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first', 'second']);
  });

  it('should run higher priority tasks first', async () => {
    const pool = new KeyedTaskPool({ size: 1 }, logger);
    const gate = createDeferred();
    const order: string[] = [];

    const blocker = pool.submit('blocker', 0, () => gate.promise);
    const low = pool.submit('app_low', 1, async () => { order.push('low'); });
    const high = pool.submit('app_high', 10, async () => { order.push('high'); });
    const mid = pool.submit('app_mid', 5, async () => { order.push('mid'); });

    gate.resolve();
    await Promise.all([blocker, low, high, mid]);

    expect(order).toEqual(['high', 'mid', 'low']);
  });

  it('should keep submission order within one priority', async () => {
    const pool = new KeyedTaskPool({ size: 1 }, logger);
    const gate = createDeferred();
    const order: number[] = [];

    const blocker = pool.submit('blocker', 0, () => gate.promise);
    const tasks = [1, 2, 3].map(n => pool.submit(`app_${n}`, 3, async () => { order.push(n); }));

    gate.resolve();
    await Promise.all([blocker, ...tasks]);

    expect(order).toEqual([1, 2, 3]);
  });

  it('should resolve onIdle once all work is done', async () => {
    const pool = new KeyedTaskPool({ size: 2 }, logger);
    let done = 0;

    pool.schedule('a', 0, async () => { await sleep(2); done++; });
    pool.schedule('b', 0, async () => { await sleep(2); done++; });
    await pool.onIdle();

    expect(done).toBe(2);
    expect(pool.getStats()).toEqual({ running: 0, queued: 0, parked: 0, completed: 2, failed: 0 });
  });

  it('should log failures of scheduled tasks', async () => {
    const pool = new KeyedTaskPool({ size: 1, name: 'workflow' }, logger);

    pool.schedule('app_1', 0, async () => {
      throw new Error('boom');
    });
    await pool.onIdle();
    await new Promise(resolve => setImmediate(resolve));

    expect(pool.getStats().failed).toBe(1);
    expect(logger.hasLogWithMeta('error', { pool: 'workflow', key: 'app_1', error: 'boom' })).toBe(true);
  });

  it('should reject queued tasks on stop and refuse new ones', async () => {
    const pool = new KeyedTaskPool({ size: 1 }, logger);
    const gate = createDeferred();

    const running = pool.submit('a', 0, () => gate.promise);
    const queued = pool.submit('b', 0, async () => 'never');

    pool.stop();
    await expect(queued).rejects.toBeInstanceOf(TaskPoolStoppedError);
    await expect(pool.submit('c', 0, async () => 'late')).rejects.toBeInstanceOf(TaskPoolStoppedError);

    gate.resolve();
    await running;
    await pool.onIdle();
    expect(pool.getStats().running).toBe(0);
  });
});
