/**
 * Pipeline configuration and payload schema tests.
 */

import { describe, it, expect, jest, afterEach } from '@jest/globals';

import {
  loadPipelineConfig,
  parseKeyValueList,
  safeParseEnum,
  safeParseFloatBounded,
  safeParseIntBounded,
  RawOpportunitySchema,
  WeightsInstallSchema,
  UserProfileSchema,
  validateWithDetails,
  validateOrThrow,
} from '@pipeline/config';

describe('env parsing', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('clamps integers below the minimum', () => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(safeParseIntBounded('0', 8, 1, 'WORKER_POOL_SIZE')).toBe(1);
    expect(safeParseIntBounded('12', 8, 1)).toBe(12);
    expect(safeParseIntBounded('abc', 8, 1)).toBe(8);
    expect(safeParseIntBounded(undefined, 8, 1)).toBe(8);
  });

  it('falls back to the default for out-of-range floats', () => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(safeParseFloatBounded('1.5', 0.7, 0, 1, 'THRESHOLD')).toBe(0.7);
    expect(safeParseFloatBounded('0.9', 0.7, 0, 1)).toBe(0.9);
  });

  it('matches enum values case-insensitively', () => {
    expect(safeParseEnum('DEFER', ['skip', 'defer'] as const, 'skip')).toBe('defer');
    expect(safeParseEnum('never', ['skip', 'defer'] as const, 'skip')).toBe('skip');
  });

  it('parses key=value lists and skips malformed entries', () => {
    expect(parseKeyValueList('email=https://a.example/hook, =x,broken, board=https://b.example/hook')).toEqual({
      email: 'https://a.example/hook',
      board: 'https://b.example/hook',
    });
  });
});

describe('loadPipelineConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadPipelineConfig({});

    expect(config.port).toBe(3100);
    expect(config.persistence).toBe('memory');
    expect(config.workerPoolSize).toBe(8);
    expect(config.dailyApplicationQuota).toBe(20);
    expect(config.quotaExhaustedPolicy).toBe('skip');
    expect(config.automationLevel).toBe('review');
    expect(config.autoApproveQualityThreshold).toBe(0.7);
    expect(config.generation).toEqual({ timeoutMs: 120_000, maxAttempts: 3, retryDelayMs: 5_000 });
    expect(config.submission.retryBaseMs).toBe(30_000);
    expect(config.submission.retryMultiplier).toBe(2);
    expect(config.submission.maxAttempts).toBe(6);
    expect(config.submission.defaultPlatform).toBe('email');
    expect(config.submission.deliveryTimeoutMs).toBe(30_000);
    expect(config.shutdownTimeoutMs).toBe(10_000);
    expect(config.noResponseWindowMs).toBe(30 * 24 * 60 * 60 * 1000);
    expect(config.opportunityRetentionMs).toBe(90 * 24 * 60 * 60 * 1000);
    expect(config.feedbackLearningRate).toBe(0.05);
    expect(config.generatorUrl).toBeUndefined();
  });

  it('reads overrides from the given environment', () => {
    const config = loadPipelineConfig({
      AUTOMATION_LEVEL: 'full-auto',
      QUOTA_EXHAUSTED_POLICY: 'defer',
      NO_RESPONSE_WINDOW_DAYS: '10',
      PLATFORM_WEBHOOKS: 'email=https://hooks.example/email',
      GENERATOR_URL: 'https://generator.example/v1/drafts',
      DELIVERY_TIMEOUT_MS: '5000',
    });

    expect(config.automationLevel).toBe('full-auto');
    expect(config.quotaExhaustedPolicy).toBe('defer');
    expect(config.noResponseWindowMs).toBe(10 * 24 * 60 * 60 * 1000);
    expect(config.submission.webhooks).toEqual({ email: 'https://hooks.example/email' });
    expect(config.generatorUrl).toBe('https://generator.example/v1/drafts');
    expect(config.submission.deliveryTimeoutMs).toBe(5_000);
  });

  it('rejects an invalid webhook URL', () => {
    expect(() => loadPipelineConfig({ PLATFORM_WEBHOOKS: 'email=not-a-url' })).toThrow(
      /Config validation failed for PipelineConfig/
    );
  });
});

describe('payload schemas', () => {
  it('requires a url or a description on raw opportunities', () => {
    const result = validateWithDetails(RawOpportunitySchema, {
      source: 'board-a',
      title: 'Data Engineer',
      organization: 'Acme',
    });

    expect(result).toEqual({
      success: false,
      errors: [{ path: 'url', message: 'Either url or description is required' }],
    });
  });

  it('accepts a minimal raw opportunity with a description', () => {
    const result = validateWithDetails(RawOpportunitySchema, {
      source: 'board-a',
      title: 'Data Engineer',
      organization: 'Acme',
      description: 'Build pipelines',
    });

    expect(result.success).toBe(true);
  });

  it('fills profile defaults', () => {
    const profile = validateOrThrow(UserProfileSchema, { userId: 'user-1' }, 'UserProfile');
    expect(profile).toEqual({ userId: 'user-1', skills: [], experienceYears: 0, pastRoles: [], interests: [] });
  });

  it('rejects weights with inverted thresholds or unknown features', () => {
    const inverted = validateWithDetails(WeightsInstallSchema, {
      weights: { skillMatch: 1 },
      thresholds: { tier1: 0.4, tier2: 0.6 },
    });
    const unknown = validateWithDetails(WeightsInstallSchema, { weights: { luck: 1 } });
    const allZero = validateWithDetails(WeightsInstallSchema, { weights: { skillMatch: 0 } });

    expect(inverted.success).toBe(false);
    expect(unknown.success).toBe(false);
    expect(allZero.success).toBe(false);
  });
});
