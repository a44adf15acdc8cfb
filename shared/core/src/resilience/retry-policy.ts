/**
 * Unified Retry Policy
 *
 * One retry model (attempt cap, exponential backoff, optional jitter, retry
 * condition, optional per-attempt timeout) shared by generation, submission
 * and feedback publishing. Each component builds its own RetryPolicy from
 * configuration; the backoff arithmetic lives only here.
 *
 * Two ways to use it:
 * - execute(): retry in-line, sleeping between attempts (generation, publishing)
 * - delayFor() / shouldRetry(): let a scheduler own the waiting (submission queue)
 */

import { sleep, withTimeout } from '../async/async-utils';
import { TerminalError, getErrorMessage, isRetryableError } from '../error-handling';
import type { ILogger } from '../logging';

export interface RetryPolicyConfig {
  /** Total attempts including the first */
  maxAttempts: number;
  /** Delay after the first failure */
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Add 0-25% random jitter to each delay */
  jitter: boolean;
  /** Bound each attempt; a timeout counts as a transient failure */
  attemptTimeoutMs?: number;
  retryCondition: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

export type RetryResult<T> =
  | { success: true; value: T; attempts: number; totalDelayMs: number }
  | { success: false; error: unknown; attempts: number; totalDelayMs: number; retryable: boolean };

export interface RetryPolicyDeps {
  logger?: ILogger;
  /** Replaces the real delay; tests pass a no-op */
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

const DEFAULT_CONFIG: RetryPolicyConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30_000,
  backoffMultiplier: 2,
  jitter: true,
  retryCondition: isRetryableError,
};

/**
 * Delay before the retry that follows failed attempt number `attempt` (1-based):
 * `initialDelayMs * backoffMultiplier^(attempt - 1)`, capped at `maxDelayMs`.
 *
 * @example
 * // base 30s, multiplier 2: 30s, 60s, 120s, 240s, 480s
 * computeBackoffDelay(3, { initialDelayMs: 30_000, backoffMultiplier: 2, maxDelayMs: 1_800_000, jitter: false });
 * // 120000
 */
export function computeBackoffDelay(
  attempt: number,
  config: Pick<RetryPolicyConfig, 'initialDelayMs' | 'backoffMultiplier' | 'maxDelayMs' | 'jitter'>,
  random: () => number = Math.random
): number {
  let delay = config.initialDelayMs * Math.pow(config.backoffMultiplier, Math.max(0, attempt - 1));
  delay = Math.min(delay, config.maxDelayMs);

  if (config.jitter) {
    delay += delay * 0.25 * random();
  }

  return Math.floor(delay);
}

export class RetryPolicy {
  readonly config: Readonly<RetryPolicyConfig>;
  private readonly logger?: ILogger;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(config: Partial<RetryPolicyConfig> = {}, deps: RetryPolicyDeps = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (!Number.isInteger(this.config.maxAttempts) || this.config.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${this.config.maxAttempts}`);
    }
    this.logger = deps.logger;
    this.sleepFn = deps.sleep ?? sleep;
    this.random = deps.random ?? Math.random;
  }

  delayFor(attempt: number): number {
    return computeBackoffDelay(attempt, this.config, this.random);
  }

  /**
   * Whether a failure on attempt number `attempt` should be followed by another try.
   */
  shouldRetry(error: unknown, attempt: number): boolean {
    return attempt < this.config.maxAttempts && this.config.retryCondition(error);
  }

  /**
   * Run `fn` until it succeeds, fails permanently or the attempt cap is hit.
   * Never throws; the outcome is in the result.
   */
  async execute<T>(fn: (attempt: number) => Promise<T>, operationName = 'operation'): Promise<RetryResult<T>> {
    let totalDelayMs = 0;
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      try {
        const pending = fn(attempt);
        const value = this.config.attemptTimeoutMs !== undefined
          ? await withTimeout(pending, this.config.attemptTimeoutMs, operationName)
          : await pending;
        return { success: true, value, attempts: attempt, totalDelayMs };
      } catch (error) {
        lastError = error;

        if (!this.config.retryCondition(error)) {
          this.logger?.debug(`${operationName} failed with a non-retryable error`, {
            attempt,
            error: getErrorMessage(error),
          });
          return { success: false, error, attempts: attempt, totalDelayMs, retryable: false };
        }

        if (attempt === this.config.maxAttempts) {
          break;
        }

        const delay = this.delayFor(attempt);
        this.logger?.warn(`${operationName} attempt ${attempt} failed, retrying in ${delay}ms`, {
          attempt,
          maxAttempts: this.config.maxAttempts,
          error: getErrorMessage(error),
        });
        this.config.onRetry?.(attempt, error, delay);

        await this.sleepFn(delay);
        totalDelayMs += delay;
      }
    }

    return { success: false, error: lastError, attempts: this.config.maxAttempts, totalDelayMs, retryable: true };
  }

  /**
   * Like execute(), but throws: the original error when it was permanent,
   * a TerminalError wrapping the last error when the budget ran out.
   */
  async run<T>(fn: (attempt: number) => Promise<T>, operationName = 'operation'): Promise<T> {
    const result = await this.execute(fn, operationName);
    if (result.success) {
      return result.value;
    }
    if (!result.retryable) {
      throw result.error;
    }
    throw new TerminalError(
      `${operationName} failed after ${result.attempts} attempts: ${getErrorMessage(result.error)}`,
      result.attempts,
      { cause: result.error, context: { operationName } }
    );
  }
}
