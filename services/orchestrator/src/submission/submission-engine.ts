/**
 * Submission Engine
 *
 * One lane per platform: a bounded priority queue (tier, then nearest
 * deadline, then arrival), a token bucket and a concurrency cap. Queue
 * operations are synchronous, so concurrent producers never interleave
 * inside one.
 *
 * Failed deliveries are retried with exponential backoff under the shared
 * RetryPolicy; every retry reuses the attempt's idempotency key. An adapter
 * call that outlives the lane's delivery timeout fails as a TimeoutError and
 * is retried like any transient failure. Each attempt reports its terminal
 * result exactly once. Cancelled attempts are never reported.
 *
 * Terminal attempts are kept for lookups and stats up to `retainedAttempts`,
 * oldest retired first.
 */

import { randomUUID } from 'crypto';
import {
  ErrorCode,
  MinHeap,
  PipelineError,
  RetryPolicy,
  TokenBucketRateLimiter,
  ValidationError,
  getErrorMessage,
  systemClock,
  withTimeout,
} from '@pipeline/core';
import type { Clock, ILogger, RateLimiterStats } from '@pipeline/core';
import { TERMINAL_SUBMISSION_STATUSES } from '@pipeline/types';
import type {
  AttemptLogEntry,
  DeliveryReceipt,
  PlatformAdapter,
  SubmissionAttempt,
  SubmissionRequest,
  SubmissionResult,
  SubmissionStatus,
  Tier,
} from '@pipeline/types';
import { idempotencyKeyFor } from './idempotency';

// =============================================================================
// Types
// =============================================================================

export interface PlatformOptions {
  /** Deliveries in flight at once */
  concurrency: number;
  tokensPerSecond: number;
  maxBurst: number;
  /** Queued attempts beyond this wait one base delay before enqueueing */
  queueCapacity: number;
  /** Bound on one adapter call; unbounded when unset */
  deliveryTimeoutMs?: number;
}

export interface SubmissionEngineConfig {
  retryBaseMs: number;
  retryMultiplier: number;
  /** Adapter calls per attempt, including the first */
  maxAttempts: number;
  retryMaxDelayMs: number;
  /** @default true */
  jitter?: boolean;
  platformDefaults: PlatformOptions;
  /** @default 1000 */
  retainedAttempts?: number;
}

export interface SubmissionEngineDeps {
  logger: ILogger;
  clock?: Clock;
  random?: () => number;
}

export type SubmissionResultListener = (result: SubmissionResult) => void;

export interface PlatformStats {
  queued: number;
  inFlight: number;
  rateLimiter: RateLimiterStats;
}

export interface SubmissionEngineStats {
  platforms: Record<string, PlatformStats>;
  attempts: number;
  delivered: number;
  failed: number;
  expired: number;
  cancelled: number;
  retriesScheduled: number;
}

interface QueueEntry {
  attemptId: string;
  tier: Tier;
  /** Epoch ms; Infinity when the request has no deadline */
  deadline: number;
  seq: number;
}

interface PlatformLane {
  name: string;
  adapter: PlatformAdapter;
  options: PlatformOptions;
  queue: MinHeap<QueueEntry>;
  limiter: TokenBucketRateLimiter;
  inFlight: number;
  wakeTimer?: NodeJS.Timeout;
}

interface AttemptEntry {
  attempt: SubmissionAttempt;
  request: SubmissionRequest;
  lane: PlatformLane;
  reported: boolean;
}

const DEFAULT_RETAINED_ATTEMPTS = 1_000;

function compareQueueEntries(a: QueueEntry, b: QueueEntry): number {
  if (a.tier !== b.tier) return a.tier - b.tier;
  if (a.deadline !== b.deadline) return a.deadline < b.deadline ? -1 : 1;
  return a.seq - b.seq;
}

// =============================================================================
// Engine
// =============================================================================

export class SubmissionEngine {
  private readonly lanes = new Map<string, PlatformLane>();
  private readonly entries = new Map<string, AttemptEntry>();
  private readonly attemptByKey = new Map<string, string>();
  private readonly timers = new Map<string, NodeJS.Timeout>();
  /** Terminal attempt ids, oldest first */
  private readonly retired: string[] = [];
  private readonly listeners: SubmissionResultListener[] = [];
  private readonly retryPolicy: RetryPolicy;
  private readonly clock: Clock;
  private readonly logger: ILogger;
  private seq = 0;
  private retriesScheduled = 0;
  private stopped = false;

  constructor(private readonly config: SubmissionEngineConfig, deps: SubmissionEngineDeps) {
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
    this.retryPolicy = new RetryPolicy(
      {
        maxAttempts: config.maxAttempts,
        initialDelayMs: config.retryBaseMs,
        backoffMultiplier: config.retryMultiplier,
        maxDelayMs: config.retryMaxDelayMs,
        jitter: config.jitter ?? true,
      },
      { logger: deps.logger, random: deps.random }
    );
  }

  registerPlatform(platform: string, adapter: PlatformAdapter, options: Partial<PlatformOptions> = {}): void {
    if (this.lanes.has(platform)) {
      throw new ValidationError(`Platform already registered: ${platform}`, { code: ErrorCode.INVALID_CONFIG });
    }
    const resolved: PlatformOptions = { ...this.config.platformDefaults, ...options };
    this.lanes.set(platform, {
      name: platform,
      adapter,
      options: resolved,
      queue: new MinHeap<QueueEntry>(compareQueueEntries),
      limiter: new TokenBucketRateLimiter(
        { tokensPerSecond: resolved.tokensPerSecond, maxBurst: resolved.maxBurst, identifier: platform },
        this.clock
      ),
      inFlight: 0,
    });
    this.logger.info('Registered submission platform', { platform, ...resolved });
  }

  hasPlatform(platform: string): boolean {
    return this.lanes.has(platform);
  }

  /**
   * Register a result listener.
   *
   * @returns A function that removes the listener
   */
  onResult(listener: SubmissionResultListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) this.listeners.splice(index, 1);
    };
  }

  /**
   * Queue a delivery. A second call for the same (application, platform)
   * returns the existing attempt while it is live or delivered; after a
   * failure, expiry or cancellation a fresh attempt is created under the
   * same idempotency key.
   *
   * @returns The attempt id
   */
  submit(request: SubmissionRequest, platform: string): string {
    if (this.stopped) {
      throw new PipelineError('Submission engine is stopped', ErrorCode.INVALID_STATE);
    }
    const lane = this.lanes.get(platform);
    if (!lane) {
      throw new ValidationError(`Unknown submission platform: ${platform}`, {
        context: { platform, applicationId: request.applicationId },
      });
    }

    const idempotencyKey = idempotencyKeyFor(request.applicationId, platform);
    const existingId = this.attemptByKey.get(idempotencyKey);
    const existing = existingId === undefined ? undefined : this.entries.get(existingId);
    if (existing && (!TERMINAL_SUBMISSION_STATUSES.has(existing.attempt.status) || existing.attempt.status === 'Delivered')) {
      this.logger.debug('Submission already known', {
        attemptId: existing.attempt.id,
        applicationId: request.applicationId,
        status: existing.attempt.status,
      });
      return existing.attempt.id;
    }

    const now = this.clock.now();
    const attempt: SubmissionAttempt = {
      id: `sub_${randomUUID()}`,
      applicationId: request.applicationId,
      platform,
      idempotencyKey,
      status: 'Queued',
      attemptNumber: 0,
      createdAt: now,
      updatedAt: now,
      history: [],
    };
    this.entries.set(attempt.id, { attempt, request, lane, reported: false });
    this.attemptByKey.set(idempotencyKey, attempt.id);

    this.logger.info('Submission queued', {
      attemptId: attempt.id,
      applicationId: request.applicationId,
      platform,
      tier: request.tier,
    });
    this.enqueue(attempt.id);
    return attempt.id;
  }

  /**
   * Withdraw an attempt. Queued and retry-scheduled attempts leave the
   * queue; an in-flight call completes but its result is not reported.
   *
   * @returns false when the attempt is unknown or already terminal
   */
  cancel(attemptId: string): boolean {
    const entry = this.entries.get(attemptId);
    if (!entry || TERMINAL_SUBMISSION_STATUSES.has(entry.attempt.status)) {
      return false;
    }

    this.clearTimer(attemptId);
    entry.lane.queue.remove(queued => queued.attemptId === attemptId);
    this.update(entry, { status: 'Cancelled', nextRetryAt: undefined });
    this.logger.info('Submission cancelled', {
      attemptId,
      applicationId: entry.attempt.applicationId,
      platform: entry.lane.name,
    });
    this.retire(attemptId);
    return true;
  }

  getAttempt(attemptId: string): SubmissionAttempt | undefined {
    return this.entries.get(attemptId)?.attempt;
  }

  getStats(): SubmissionEngineStats {
    const platforms: Record<string, PlatformStats> = {};
    for (const lane of this.lanes.values()) {
      platforms[lane.name] = {
        queued: lane.queue.size,
        inFlight: lane.inFlight,
        rateLimiter: lane.limiter.getStats(),
      };
    }

    const count = (status: SubmissionStatus): number => {
      let n = 0;
      for (const entry of this.entries.values()) {
        if (entry.attempt.status === status) n++;
      }
      return n;
    };

    return {
      platforms,
      attempts: this.entries.size,
      delivered: count('Delivered'),
      failed: count('Failed'),
      expired: count('Expired'),
      cancelled: count('Cancelled'),
      retriesScheduled: this.retriesScheduled,
    };
  }

  /**
   * Stop dispatching and clear every timer. Queued attempts stay queued and
   * are not reported.
   */
  stop(): void {
    this.stopped = true;
    for (const timer of this.timers.values()) clearTimeout(timer);
    this.timers.clear();
    for (const lane of this.lanes.values()) {
      if (lane.wakeTimer) clearTimeout(lane.wakeTimer);
      lane.wakeTimer = undefined;
    }
  }

  // ===========================================================================
  // Queue & dispatch
  // ===========================================================================

  private enqueue(attemptId: string): void {
    const entry = this.entries.get(attemptId);
    if (!entry || entry.attempt.status !== 'Queued' || this.stopped) return;

    const { lane, request } = entry;
    if (lane.queue.size >= lane.options.queueCapacity) {
      this.logger.warn('Submission queue full, deferring enqueue', {
        attemptId,
        platform: lane.name,
        capacity: lane.options.queueCapacity,
        retryInMs: this.config.retryBaseMs,
      });
      this.setTimer(attemptId, this.config.retryBaseMs, () => this.enqueue(attemptId));
      return;
    }

    lane.queue.push({
      attemptId,
      tier: request.tier,
      deadline: request.deadline ?? Number.POSITIVE_INFINITY,
      seq: this.seq++,
    });
    this.pump(lane);
  }

  private pump(lane: PlatformLane): void {
    while (!this.stopped && lane.inFlight < lane.options.concurrency) {
      const next = lane.queue.peek();
      if (!next) return;

      const entry = this.entries.get(next.attemptId);
      if (!entry || entry.attempt.status !== 'Queued') {
        lane.queue.pop();
        continue;
      }

      const deadline = entry.request.deadline;
      if (deadline !== undefined && this.clock.now() > deadline) {
        lane.queue.pop();
        this.finish(entry, 'Expired', { lastError: 'Deadline passed before dispatch' });
        continue;
      }

      if (!lane.limiter.tryAcquire()) {
        this.scheduleWake(lane);
        return;
      }

      lane.queue.pop();
      this.dispatch(entry);
    }
  }

  private scheduleWake(lane: PlatformLane): void {
    if (lane.wakeTimer) return;
    const delay = Math.max(1, lane.limiter.msUntilNextToken());
    lane.wakeTimer = setTimeout(() => {
      lane.wakeTimer = undefined;
      this.pump(lane);
    }, delay);
    lane.wakeTimer.unref();
  }

  private dispatch(entry: AttemptEntry): void {
    const attemptNumber = entry.attempt.attemptNumber + 1;
    this.update(entry, { status: 'InFlight', attemptNumber, nextRetryAt: undefined });
    entry.lane.inFlight++;

    this.deliver(entry, attemptNumber).catch((error: unknown) => {
      this.logger.error('Unexpected error in delivery loop', {
        attemptId: entry.attempt.id,
        error: getErrorMessage(error),
      });
    });
  }

  private async deliver(entry: AttemptEntry, attemptNumber: number): Promise<void> {
    const { lane } = entry;
    const timeoutMs = lane.options.deliveryTimeoutMs;
    try {
      const delivery = lane.adapter.deliver(entry.request.package, entry.attempt.idempotencyKey);
      const receipt = timeoutMs === undefined
        ? await delivery
        : await withTimeout(delivery, timeoutMs, `deliver to ${lane.name}`);
      this.handleDelivered(entry, attemptNumber, receipt);
    } catch (error) {
      this.handleFailure(entry, attemptNumber, error);
    } finally {
      lane.inFlight--;
      this.pump(lane);
    }
  }

  private handleDelivered(entry: AttemptEntry, attemptNumber: number, receipt: DeliveryReceipt): void {
    if (entry.attempt.status === 'Cancelled') {
      this.logger.info('Delivery completed after cancellation, not reported', {
        attemptId: entry.attempt.id,
        deliveryId: receipt.deliveryId,
      });
      return;
    }

    this.appendHistory(entry, { attemptNumber, at: this.clock.now(), result: 'delivered' });
    this.finish(entry, 'Delivered', { deliveryId: receipt.deliveryId });
  }

  private handleFailure(entry: AttemptEntry, attemptNumber: number, error: unknown): void {
    const message = getErrorMessage(error);
    if (entry.attempt.status === 'Cancelled') {
      this.logger.debug('Delivery failed after cancellation', { attemptId: entry.attempt.id, error: message });
      return;
    }

    this.appendHistory(entry, { attemptNumber, at: this.clock.now(), result: 'failed', error: message });

    if (this.stopped || !this.retryPolicy.shouldRetry(error, attemptNumber)) {
      this.finish(entry, 'Failed', { lastError: message });
      return;
    }

    const delay = this.retryPolicy.delayFor(attemptNumber);
    const nextRetryAt = this.clock.now() + delay;
    this.update(entry, { status: 'RetryScheduled', lastError: message, nextRetryAt });
    this.retriesScheduled++;

    this.logger.warn('Delivery failed, retry scheduled', {
      attemptId: entry.attempt.id,
      applicationId: entry.attempt.applicationId,
      platform: entry.lane.name,
      attemptNumber,
      delayMs: delay,
      error: message,
    });

    this.setTimer(entry.attempt.id, delay, () => {
      if (entry.attempt.status !== 'RetryScheduled') return;
      this.update(entry, { status: 'Queued' });
      this.enqueue(entry.attempt.id);
    });
  }

  // ===========================================================================
  // State
  // ===========================================================================

  private finish(
    entry: AttemptEntry,
    status: SubmissionResult['status'],
    details: { deliveryId?: string; lastError?: string }
  ): void {
    this.update(entry, { status, nextRetryAt: undefined, ...details });
    const attempt = entry.attempt;

    const log = status === 'Delivered' ? this.logger.info.bind(this.logger) : this.logger.warn.bind(this.logger);
    log(`Submission ${status.toLowerCase()}`, {
      attemptId: attempt.id,
      applicationId: attempt.applicationId,
      platform: attempt.platform,
      attempts: attempt.attemptNumber,
      deliveryId: attempt.deliveryId,
      lastError: attempt.lastError,
    });

    this.report(entry, {
      attemptId: attempt.id,
      applicationId: attempt.applicationId,
      platform: attempt.platform,
      status,
      deliveryId: attempt.deliveryId,
      lastError: attempt.lastError,
    });
  }

  private report(entry: AttemptEntry, result: SubmissionResult): void {
    if (entry.reported) return;
    entry.reported = true;

    for (const listener of [...this.listeners]) {
      try {
        listener(result);
      } catch (error) {
        this.logger.error('Submission result listener failed', {
          attemptId: result.attemptId,
          error: getErrorMessage(error),
        });
      }
    }
    this.retire(result.attemptId);
  }

  /** Record a terminal attempt and drop the oldest beyond the retention cap. */
  private retire(attemptId: string): void {
    this.retired.push(attemptId);
    const limit = this.config.retainedAttempts ?? DEFAULT_RETAINED_ATTEMPTS;
    while (this.retired.length > limit) {
      const oldest = this.retired.shift();
      if (oldest === undefined) break;
      const entry = this.entries.get(oldest);
      this.entries.delete(oldest);
      if (entry && this.attemptByKey.get(entry.attempt.idempotencyKey) === oldest) {
        this.attemptByKey.delete(entry.attempt.idempotencyKey);
      }
    }
  }

  private update(entry: AttemptEntry, patch: Partial<Omit<SubmissionAttempt, 'id' | 'history'>>): void {
    entry.attempt = Object.freeze({ ...entry.attempt, ...patch, updatedAt: this.clock.now() });
  }

  private appendHistory(entry: AttemptEntry, log: AttemptLogEntry): void {
    entry.attempt = Object.freeze({ ...entry.attempt, history: Object.freeze([...entry.attempt.history, log]) });
  }

  private setTimer(attemptId: string, delayMs: number, fn: () => void): void {
    this.clearTimer(attemptId);
    const timer = setTimeout(() => {
      this.timers.delete(attemptId);
      fn();
    }, delayMs);
    timer.unref();
    this.timers.set(attemptId, timer);
  }

  private clearTimer(attemptId: string): void {
    const timer = this.timers.get(attemptId);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(attemptId);
    }
  }
}
