/**
 * Token bucket rate limiter, one per submission platform.
 *
 * - Tokens refill continuously at `tokensPerSecond`
 * - Tokens cap at `maxBurst`
 * - Each delivery consumes one token
 * - tryAcquire() never blocks; msUntilNextToken() tells a scheduler how long
 *   to wait before trying again
 */

import { Clock, systemClock } from '../clock';

export interface RateLimiterConfig {
  tokensPerSecond: number;
  maxBurst: number;
  /** Platform name, for stats and logs */
  identifier?: string;
}

export interface RateLimiterStats {
  identifier: string;
  allowedRequests: number;
  throttledRequests: number;
  availableTokens: number;
  /** throttled / (allowed + throttled) */
  throttleRate: number;
}

export class TokenBucketRateLimiter {
  private readonly config: Required<RateLimiterConfig>;
  private tokens: number;
  private lastRefillTime: number;
  private allowedRequests = 0;
  private throttledRequests = 0;

  constructor(config: RateLimiterConfig, private readonly clock: Clock = systemClock) {
    if (!(config.tokensPerSecond > 0) || !(config.maxBurst >= 1)) {
      throw new RangeError(
        `Token bucket needs tokensPerSecond > 0 and maxBurst >= 1, got ${config.tokensPerSecond}/${config.maxBurst}`
      );
    }
    this.config = {
      tokensPerSecond: config.tokensPerSecond,
      maxBurst: config.maxBurst,
      identifier: config.identifier ?? 'default',
    };

    // Start with a full bucket
    this.tokens = this.config.maxBurst;
    this.lastRefillTime = clock.now();
  }

  /**
   * Consume a token if one is available.
   *
   * @returns true if allowed, false if throttled
   */
  tryAcquire(): boolean {
    this.refillTokens();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      this.allowedRequests++;
      return true;
    }

    this.throttledRequests++;
    return false;
  }

  /**
   * Milliseconds until at least one token is available (0 if one is now).
   */
  msUntilNextToken(): number {
    this.refillTokens();
    if (this.tokens >= 1) return 0;
    return Math.ceil(((1 - this.tokens) / this.config.tokensPerSecond) * 1000);
  }

  getAvailableTokens(): number {
    this.refillTokens();
    return this.tokens;
  }

  getStats(): RateLimiterStats {
    const total = this.allowedRequests + this.throttledRequests;
    return {
      identifier: this.config.identifier,
      allowedRequests: this.allowedRequests,
      throttledRequests: this.throttledRequests,
      availableTokens: Math.floor(this.getAvailableTokens()),
      throttleRate: total > 0 ? this.throttledRequests / total : 0,
    };
  }

  private refillTokens(): void {
    const now = this.clock.now();
    const elapsedMs = now - this.lastRefillTime;

    if (elapsedMs > 0) {
      const tokensToAdd = (elapsedMs / 1000) * this.config.tokensPerSecond;
      this.tokens = Math.min(this.config.maxBurst, this.tokens + tokensToAdd);
      this.lastRefillTime = now;
    }
  }
}
