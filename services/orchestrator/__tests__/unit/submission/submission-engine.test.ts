/**
 * SubmissionEngine Unit Tests
 *
 * Covers delivery and idempotency, retry with backoff until the attempt cap,
 * per-platform priority, deadline expiry, rate limiting, backpressure,
 * cancellation, delivery timeouts and bounded attempt history.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';

import { PipelineError, ValidationError } from '@pipeline/core';
import type { SubmissionRequest, SubmissionResult, Tier } from '@pipeline/types';
import {
  ManualClock,
  RecordingLogger,
  ScriptedPlatformAdapter,
  waitForCondition,
} from '@pipeline/test-utils';
import { SubmissionEngine } from '../../../src/submission/submission-engine';
import type { PlatformOptions, SubmissionEngineConfig } from '../../../src/submission/submission-engine';
import { idempotencyKeyFor } from '../../../src/submission/idempotency';

const PLATFORM = 'email';

const DEFAULTS: PlatformOptions = {
  concurrency: 2,
  tokensPerSecond: 1_000,
  maxBurst: 100,
  queueCapacity: 100,
};

function config(overrides: Partial<PlatformOptions> = {}): SubmissionEngineConfig {
  return {
    retryBaseMs: 1,
    retryMultiplier: 1,
    maxAttempts: 6,
    retryMaxDelayMs: 10,
    jitter: false,
    platformDefaults: { ...DEFAULTS, ...overrides },
  };
}

function request(applicationId: string, tier: Tier = 2, deadline?: number): SubmissionRequest {
  return {
    applicationId,
    tier,
    deadline,
    package: {
      applicationId,
      userId: 'user-1',
      opportunityId: `opp_${applicationId}`,
      title: 'Backend Engineer',
      organization: 'Example Labs',
      content: 'Draft',
    },
  };
}

describe('SubmissionEngine', () => {
  let logger: RecordingLogger;
  let adapter: ScriptedPlatformAdapter;
  let engine: SubmissionEngine;
  let results: SubmissionResult[];

  function build(overrides: Partial<PlatformOptions> = {}, clock?: ManualClock): SubmissionEngine {
    const created = new SubmissionEngine(config(overrides), { logger, clock });
    created.registerPlatform(PLATFORM, adapter);
    created.onResult(result => results.push(result));
    return created;
  }

  beforeEach(() => {
    logger = new RecordingLogger();
    adapter = new ScriptedPlatformAdapter();
    results = [];
    engine = build();
  });

  afterEach(() => {
    adapter.resume();
    engine.stop();
  });

  describe('registration', () => {
    it('should reject a duplicate platform', () => {
      expect(() => engine.registerPlatform(PLATFORM, adapter)).toThrow(ValidationError);
      expect(engine.hasPlatform(PLATFORM)).toBe(true);
    });

    it('should reject submissions to an unknown platform', () => {
      expect(() => engine.submit(request('app_1'), 'fax')).toThrow(ValidationError);
    });

    it('should refuse submissions once stopped', () => {
      engine.stop();
      expect(() => engine.submit(request('app_1'), PLATFORM)).toThrow(PipelineError);
    });
  });

  describe('delivery', () => {
    it('should deliver and report exactly once', async () => {
      const attemptId = engine.submit(request('app_1'), PLATFORM);

      await waitForCondition(() => results.length === 1);

      const key = idempotencyKeyFor('app_1', PLATFORM);
      expect(results[0]).toEqual({
        attemptId,
        applicationId: 'app_1',
        platform: PLATFORM,
        status: 'Delivered',
        deliveryId: `dlv_${key.slice(0, 8)}`,
        lastError: undefined,
      });
      const attempt = engine.getAttempt(attemptId);
      expect(attempt?.status).toBe('Delivered');
      expect(attempt?.attemptNumber).toBe(1);
      expect(attempt?.history).toHaveLength(1);
      expect(engine.getStats().delivered).toBe(1);
    });

    it('should return the delivered attempt for a repeated submit', async () => {
      const first = engine.submit(request('app_1'), PLATFORM);
      await waitForCondition(() => results.length === 1);

      const second = engine.submit(request('app_1'), PLATFORM);

      expect(second).toBe(first);
      expect(adapter.calls).toHaveLength(1);
    });

    it('should return the live attempt while it is still queued', () => {
      adapter.pause();
      const first = engine.submit(request('app_1'), PLATFORM);
      expect(engine.submit(request('app_1'), PLATFORM)).toBe(first);
    });

    it('should keep listening after a listener throws', async () => {
      const seen: string[] = [];
      engine.onResult(() => {
        throw new Error('listener broke');
      });
      engine.onResult(result => seen.push(result.status));

      engine.submit(request('app_1'), PLATFORM);
      await waitForCondition(() => seen.length === 1);

      expect(seen).toEqual(['Delivered']);
      expect(logger.hasLogMatching('error', 'Submission result listener failed')).toBe(true);
    });

    it('should stop notifying a removed listener', async () => {
      const seen: string[] = [];
      const unsubscribe = engine.onResult(result => seen.push(result.attemptId));
      unsubscribe();

      engine.submit(request('app_1'), PLATFORM);
      await waitForCondition(() => results.length === 1);

      expect(seen).toEqual([]);
    });
  });

  describe('retries', () => {
    it('should retry transient failures with the same idempotency key', async () => {
      adapter.failWith(new Error('HTTP 503'), new Error('HTTP 503'));

      const attemptId = engine.submit(request('app_1'), PLATFORM);
      await waitForCondition(() => results.length === 1);

      expect(results[0].status).toBe('Delivered');
      expect(adapter.calls).toHaveLength(3);
      expect(new Set(adapter.calls.map(c => c.idempotencyKey)).size).toBe(1);
      expect(adapter.deliveryCount).toBe(1);

      const attempt = engine.getAttempt(attemptId);
      expect(attempt?.attemptNumber).toBe(3);
      expect(attempt?.history.map(h => h.result)).toEqual(['failed', 'failed', 'delivered']);
      expect(engine.getStats().retriesScheduled).toBe(2);
    });

    it('should fail with the last error after the attempt cap', async () => {
      adapter.failWith(...[1, 2, 3, 4, 5, 6].map(n => new Error(`timeout #${n}`)));

      const attemptId = engine.submit(request('app_1'), PLATFORM);
      await waitForCondition(() => results.length === 1);

      expect(results[0].status).toBe('Failed');
      expect(results[0].lastError).toBe('timeout #6');
      expect(adapter.calls).toHaveLength(6);
      expect(engine.getAttempt(attemptId)?.history).toHaveLength(6);
      expect(engine.getStats().retriesScheduled).toBe(5);
    });

    it('should not retry a permanent rejection', async () => {
      adapter.failWith(new ValidationError('Delivery rejected with HTTP 422'));

      engine.submit(request('app_1'), PLATFORM);
      await waitForCondition(() => results.length === 1);

      expect(results[0].status).toBe('Failed');
      expect(results[0].lastError).toBe('Delivery rejected with HTTP 422');
      expect(adapter.calls).toHaveLength(1);
    });

    it('should open a fresh attempt under the same key after a failure', async () => {
      adapter.failWith(new ValidationError('rejected'));
      const first = engine.submit(request('app_1'), PLATFORM);
      await waitForCondition(() => results.length === 1);

      const second = engine.submit(request('app_1'), PLATFORM);
      await waitForCondition(() => results.length === 2);

      expect(second).not.toBe(first);
      expect(engine.getAttempt(second)?.idempotencyKey).toBe(engine.getAttempt(first)?.idempotencyKey);
      expect(results[1].status).toBe('Delivered');
    });
  });

  describe('ordering', () => {
    it('should dispatch by tier, then nearest deadline, then arrival', async () => {
      engine.stop();
      engine = build({ concurrency: 1 });
      adapter.pause();

      engine.submit(request('first'), PLATFORM);
      engine.submit(request('tier3', 3), PLATFORM);
      engine.submit(request('tier2-open', 2), PLATFORM);
      engine.submit(request('tier2-due', 2, Date.now() + 60_000), PLATFORM);
      engine.submit(request('tier1', 1), PLATFORM);

      expect(engine.getStats().platforms[PLATFORM].queued).toBe(4);
      adapter.resume();
      await waitForCondition(() => results.length === 5);

      expect(adapter.calls.map(c => c.applicationId)).toEqual(['first', 'tier1', 'tier2-due', 'tier2-open', 'tier3']);
    });
  });

  describe('deadlines', () => {
    it('should expire a request whose deadline passed while queued', async () => {
      const clock = new ManualClock(1_000);
      engine.stop();
      engine = build({ concurrency: 1 }, clock);
      adapter.pause();

      engine.submit(request('blocker'), PLATFORM);
      const late = engine.submit(request('late', 2, 1_500), PLATFORM);
      clock.set(2_000);
      adapter.resume();

      await waitForCondition(() => results.length === 2);

      const expired = results.find(r => r.attemptId === late);
      expect(expired?.status).toBe('Expired');
      expect(expired?.lastError).toBe('Deadline passed before dispatch');
      expect(adapter.calls.map(c => c.applicationId)).toEqual(['blocker']);
    });
  });

  describe('rate limiting', () => {
    it('should hold dispatch until a token is available', async () => {
      const clock = new ManualClock(0);
      engine.stop();
      engine = build({ maxBurst: 1 }, clock);

      engine.submit(request('app_1'), PLATFORM);
      const throttled = engine.submit(request('app_2'), PLATFORM);
      await waitForCondition(() => results.length === 1);

      expect(engine.getAttempt(throttled)?.status).toBe('Queued');
      expect(engine.getStats().platforms[PLATFORM].rateLimiter.throttledRequests).toBeGreaterThan(0);

      clock.advance(1);
      await waitForCondition(() => results.length === 2);
      expect(results[1].attemptId).toBe(throttled);
    });
  });

  describe('backpressure', () => {
    it('should defer enqueue when the queue is full and deliver everything later', async () => {
      engine.stop();
      engine = build({ concurrency: 1, queueCapacity: 1 });
      adapter.pause();

      engine.submit(request('app_1'), PLATFORM);
      engine.submit(request('app_2'), PLATFORM);
      engine.submit(request('app_3'), PLATFORM);

      expect(logger.hasLogMatching('warn', 'Submission queue full')).toBe(true);
      adapter.resume();
      await waitForCondition(() => results.length === 3);

      expect(results.every(r => r.status === 'Delivered')).toBe(true);
    });
  });

  describe('cancel', () => {
    it('should withdraw a queued attempt without reporting it', async () => {
      engine.stop();
      engine = build({ concurrency: 1 });
      adapter.pause();

      const kept = engine.submit(request('app_1'), PLATFORM);
      const withdrawn = engine.submit(request('app_2'), PLATFORM);

      expect(engine.cancel(withdrawn)).toBe(true);
      expect(engine.cancel(withdrawn)).toBe(false);
      adapter.resume();
      await waitForCondition(() => results.length === 1);

      expect(results[0].attemptId).toBe(kept);
      expect(engine.getAttempt(withdrawn)?.status).toBe('Cancelled');
      expect(adapter.calls.map(c => c.applicationId)).toEqual(['app_1']);
      expect(engine.getStats().cancelled).toBe(1);
    });

    it('should not report an in-flight delivery that completes after cancel', async () => {
      adapter.pause();
      const attemptId = engine.submit(request('app_1'), PLATFORM);
      expect(engine.getAttempt(attemptId)?.status).toBe('InFlight');

      expect(engine.cancel(attemptId)).toBe(true);
      adapter.resume();
      await waitForCondition(() => logger.hasLogMatching('info', 'Delivery completed after cancellation'));

      expect(results).toEqual([]);
      expect(engine.getAttempt(attemptId)?.status).toBe('Cancelled');
    });

    it('should return false for an unknown attempt', () => {
      expect(engine.cancel('sub_missing')).toBe(false);
    });
  });

  describe('delivery timeout', () => {
    it('should fail a delivery whose adapter never answers and free its slot', async () => {
      engine.stop();
      engine = build({ concurrency: 1, deliveryTimeoutMs: 20 });
      adapter.pause();

      const attemptId = engine.submit(request('app_1'), PLATFORM);
      await waitForCondition(() => results.length === 1);

      expect(results[0].status).toBe('Failed');
      expect(results[0].lastError).toBe("Operation 'deliver to email' timed out after 20ms");
      expect(adapter.calls).toHaveLength(6);
      expect(engine.getAttempt(attemptId)?.history.map(h => h.result)).toEqual(Array(6).fill('failed'));
      expect(engine.getStats().platforms[PLATFORM].inFlight).toBe(0);
    });
  });

  describe('history', () => {
    it('should retire the oldest terminal attempts beyond the retention cap', async () => {
      engine.stop();
      engine = new SubmissionEngine({ ...config(), retainedAttempts: 2 }, { logger });
      engine.registerPlatform(PLATFORM, adapter);
      engine.onResult(result => results.push(result));

      const first = engine.submit(request('app_1'), PLATFORM);
      await waitForCondition(() => results.length === 1);
      const second = engine.submit(request('app_2'), PLATFORM);
      await waitForCondition(() => results.length === 2);
      const third = engine.submit(request('app_3'), PLATFORM);
      await waitForCondition(() => results.length === 3);

      expect(engine.getAttempt(first)).toBeUndefined();
      expect(engine.getAttempt(second)?.status).toBe('Delivered');
      expect(engine.getAttempt(third)?.status).toBe('Delivered');
      expect(engine.getStats().attempts).toBe(2);

      const again = engine.submit(request('app_1'), PLATFORM);
      await waitForCondition(() => results.length === 4);

      expect(again).not.toBe(first);
      expect(adapter.deliveryCount).toBe(3);
    });
  });
});
