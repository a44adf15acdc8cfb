/**
 * Pipeline Runtime Configuration
 *
 * Every setting is read from the environment once, at module load, into
 * PIPELINE_CONFIG. Tests and tools that need a different environment call
 * loadPipelineConfig() directly.
 */

import type { AutomationLevel } from '@pipeline/types';
import { PipelineConfigSchema, validateOrThrow } from './schemas';
import {
  parseKeyValueList,
  safeParseEnum,
  safeParseFloatBounded,
  safeParseInt,
  safeParseIntBounded,
} from './utils/env-parsing';

export type QuotaExhaustedPolicy = 'skip' | 'defer';
export type PersistenceMode = 'memory' | 'redis';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface GenerationSettings {
  timeoutMs: number;
  maxAttempts: number;
  retryDelayMs: number;
}

export interface SubmissionSettings {
  retryBaseMs: number;
  retryMultiplier: number;
  maxAttempts: number;
  retryMaxDelayMs: number;
  platformConcurrency: number;
  tokensPerSecond: number;
  maxBurst: number;
  queueCapacity: number;
  /** Bound on one adapter delivery call */
  deliveryTimeoutMs: number;
  defaultPlatform: string;
  /** platform name -> webhook URL */
  webhooks: Record<string, string>;
}

export interface PipelineConfig {
  port: number;
  logLevel: string;
  persistence: PersistenceMode;
  redisUrl: string;
  workerPoolSize: number;
  dailyApplicationQuota: number;
  quotaExhaustedPolicy: QuotaExhaustedPolicy;
  automationLevel: AutomationLevel;
  autoApproveQualityThreshold: number;
  generation: GenerationSettings;
  submission: SubmissionSettings;
  noResponseWindowMs: number;
  opportunityRetentionMs: number;
  sweepIntervalMs: number;
  feedbackLearningRate: number;
  generatorUrl?: string;
  /** Bound on each shutdown step */
  shutdownTimeoutMs: number;
}

export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const config: PipelineConfig = {
    port: safeParseInt(env.PORT, 3100),
    logLevel: env.LOG_LEVEL ?? 'info',
    persistence: safeParseEnum<PersistenceMode>(env.PERSISTENCE, ['memory', 'redis'], 'memory', 'PERSISTENCE'),
    redisUrl: env.REDIS_URL ?? 'redis://localhost:6379',
    workerPoolSize: safeParseIntBounded(env.WORKER_POOL_SIZE, 8, 1, 'WORKER_POOL_SIZE'),
    dailyApplicationQuota: safeParseIntBounded(env.DAILY_APPLICATION_QUOTA, 20, 0, 'DAILY_APPLICATION_QUOTA'),
    quotaExhaustedPolicy: safeParseEnum<QuotaExhaustedPolicy>(
      env.QUOTA_EXHAUSTED_POLICY, ['skip', 'defer'], 'skip', 'QUOTA_EXHAUSTED_POLICY'
    ),
    automationLevel: safeParseEnum<AutomationLevel>(
      env.AUTOMATION_LEVEL, ['full-auto', 'review'], 'review', 'AUTOMATION_LEVEL'
    ),
    autoApproveQualityThreshold: safeParseFloatBounded(
      env.AUTO_APPROVE_QUALITY_THRESHOLD, 0.7, 0, 1, 'AUTO_APPROVE_QUALITY_THRESHOLD'
    ),
    generation: {
      timeoutMs: safeParseIntBounded(env.GENERATION_TIMEOUT_MS, 120_000, 1, 'GENERATION_TIMEOUT_MS'),
      maxAttempts: safeParseIntBounded(env.GENERATION_MAX_ATTEMPTS, 3, 1, 'GENERATION_MAX_ATTEMPTS'),
      retryDelayMs: safeParseIntBounded(env.GENERATION_RETRY_DELAY_MS, 5_000, 0, 'GENERATION_RETRY_DELAY_MS'),
    },
    submission: {
      retryBaseMs: safeParseIntBounded(env.SUBMISSION_RETRY_BASE_MS, 30_000, 0, 'SUBMISSION_RETRY_BASE_MS'),
      retryMultiplier: safeParseFloatBounded(env.SUBMISSION_RETRY_MULTIPLIER, 2, 1, 10, 'SUBMISSION_RETRY_MULTIPLIER'),
      maxAttempts: safeParseIntBounded(env.SUBMISSION_MAX_ATTEMPTS, 6, 1, 'SUBMISSION_MAX_ATTEMPTS'),
      retryMaxDelayMs: safeParseIntBounded(
        env.SUBMISSION_RETRY_MAX_DELAY_MS, 30 * 60_000, 0, 'SUBMISSION_RETRY_MAX_DELAY_MS'
      ),
      platformConcurrency: safeParseIntBounded(env.PLATFORM_CONCURRENCY, 2, 1, 'PLATFORM_CONCURRENCY'),
      tokensPerSecond: safeParseFloatBounded(env.PLATFORM_TOKENS_PER_SECOND, 1, 0.001, 10_000, 'PLATFORM_TOKENS_PER_SECOND'),
      maxBurst: safeParseIntBounded(env.PLATFORM_MAX_BURST, 5, 1, 'PLATFORM_MAX_BURST'),
      queueCapacity: safeParseIntBounded(env.PLATFORM_QUEUE_CAPACITY, 500, 1, 'PLATFORM_QUEUE_CAPACITY'),
      deliveryTimeoutMs: safeParseIntBounded(env.DELIVERY_TIMEOUT_MS, 30_000, 1, 'DELIVERY_TIMEOUT_MS'),
      defaultPlatform: env.DEFAULT_PLATFORM ?? 'email',
      webhooks: parseKeyValueList(env.PLATFORM_WEBHOOKS),
    },
    noResponseWindowMs: safeParseIntBounded(env.NO_RESPONSE_WINDOW_DAYS, 30, 1, 'NO_RESPONSE_WINDOW_DAYS') * DAY_MS,
    opportunityRetentionMs:
      safeParseIntBounded(env.OPPORTUNITY_RETENTION_DAYS, 90, 1, 'OPPORTUNITY_RETENTION_DAYS') * DAY_MS,
    sweepIntervalMs: safeParseIntBounded(env.SWEEP_INTERVAL_MS, 60_000, 100, 'SWEEP_INTERVAL_MS'),
    feedbackLearningRate: safeParseFloatBounded(env.FEEDBACK_LEARNING_RATE, 0.05, 0, 1, 'FEEDBACK_LEARNING_RATE'),
    generatorUrl: env.GENERATOR_URL || undefined,
    shutdownTimeoutMs: safeParseIntBounded(env.SHUTDOWN_TIMEOUT_MS, 10_000, 1, 'SHUTDOWN_TIMEOUT_MS'),
  };

  return validateOrThrow(PipelineConfigSchema, config, 'PipelineConfig');
}

export const PIPELINE_CONFIG: Readonly<PipelineConfig> = Object.freeze(loadPipelineConfig());
