/**
 * Async utility tests: withTimeout, createDeferred, gracefulShutdown.
 */

import { describe, it, expect, jest } from '@jest/globals';

import {
  createDeferred,
  gracefulShutdown,
  TimeoutError,
  TransientError,
  withTimeout,
} from '@pipeline/core';

describe('withTimeout', () => {
  it('should resolve with the value when the promise settles in time', async () => {
    await expect(withTimeout(Promise.resolve(42), 50)).resolves.toBe(42);
  });

  it('should reject with a transient TimeoutError when the deadline passes', async () => {
    const never = new Promise<number>(() => undefined);

    const error = await withTimeout(never, 10, 'generate').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toBeInstanceOf(TransientError);
    expect(error instanceof TimeoutError && error.message).toBe("Operation 'generate' timed out after 10ms");
  });

  it('should pass through the original rejection', async () => {
    await expect(withTimeout(Promise.reject(new Error('upstream')), 50)).rejects.toThrow('upstream');
  });

  it('should reject invalid timeouts', async () => {
    await expect(withTimeout(Promise.resolve(1), -1)).rejects.toThrow(TypeError);
  });
});

describe('createDeferred', () => {
  it('should resolve from outside', async () => {
    const deferred = createDeferred<string>();
    deferred.resolve('done');
    await expect(deferred.promise).resolves.toBe('done');
  });
});

describe('gracefulShutdown', () => {
  it('should run every cleanup even when one fails', async () => {
    const warn = jest.fn();
    const second = jest.fn(async () => undefined);

    await gracefulShutdown(
      [
        { name: 'first', cleanup: async () => { throw new Error('close failed'); } },
        { name: 'second', cleanup: second },
      ],
      50,
      { warn }
    );

    expect(second).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('first cleanup failed', { error: 'close failed' });
  });
});
