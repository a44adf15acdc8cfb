/**
 * Polling helpers for background work that the test cannot await directly.
 */

export interface WaitOptions {
  /** Give up after this many ms */
  timeout?: number;
  /** Poll every this many ms */
  interval?: number;
  /** Included in the timeout error */
  description?: string;
}

/**
 * Resolve once `condition` returns true; reject on timeout.
 *
 * @example
 * await waitForCondition(() => orchestrator.getApplication(id)?.state === ApplicationState.Generated);
 */
export async function waitForCondition(
  condition: () => boolean | Promise<boolean>,
  options: WaitOptions = {}
): Promise<void> {
  const { timeout = 2000, interval = 5, description } = options;
  const startTime = Date.now();

  while (!(await condition())) {
    if (Date.now() - startTime > timeout) {
      throw new Error(`Condition not met within ${timeout}ms${description ? `: ${description}` : ''}`);
    }
    await new Promise(resolve => setTimeout(resolve, interval));
  }
}

/**
 * Poll `read` until it returns a value other than undefined.
 */
export async function waitForValue<T>(read: () => T | undefined, options: WaitOptions = {}): Promise<T> {
  let value: T | undefined;
  await waitForCondition(() => {
    value = read();
    return value !== undefined;
  }, options);
  if (value === undefined) {
    throw new Error('Value disappeared after condition was met');
  }
  return value;
}
