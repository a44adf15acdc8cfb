/**
 * Pipeline Service
 *
 * Composition root: builds every component from PipelineConfig, wires the
 * collaborators (Redis or in-memory persistence, HTTP or template
 * generation, webhook or outbox platforms) and owns the HTTP server.
 *
 * In Redis mode every piece of state a restart needs lives in Redis:
 * application records, opportunities, drafts and profiles. start() resumes
 * the records a previous process left mid-flight.
 */

import type { Server } from 'http';
import type { Express } from 'express';
import type Redis from 'ioredis';
import type { PipelineConfig } from '@pipeline/config';
import {
  RedisCommandClient,
  closeRedisClient,
  closeServer,
  createLogger,
  createRedisClient,
  gracefulShutdown,
  systemClock,
} from '@pipeline/core';
import type { Clock, ILogger, RedisCommands } from '@pipeline/core';
import type { Generator, LearningSink, PlatformAdapter } from '@pipeline/types';
import {
  HttpGeneratorClient,
  OutboxPlatformAdapter,
  RedisStreamPublisher,
  TemplateGenerator,
  WebhookPlatformAdapter,
} from './adapters';
import { createApp } from './api';
import { OutcomeFeedbackAdapter, SignalLog } from './feedback';
import { OpportunityStore } from './opportunities';
import {
  RedisApplicationRepository,
  RedisContentStore,
  RedisOpportunityRepository,
  RedisProfileStore,
} from './persistence';
import { ScoringEngine, WeightsRegistry } from './scoring';
import { SubmissionEngine } from './submission';
import { StatusTracker } from './tracking';
import { DailyQuota, InMemoryApplicationRepository, WorkflowOrchestrator } from './workflow';
import type { ApplicationRepository } from './workflow';

export interface PipelineServiceDeps {
  logger?: ILogger;
  /** Redis commands to use instead of dialing REDIS_URL */
  redis?: RedisCommands;
  generator?: Generator;
  /** Platform adapters by name; override the configured webhooks */
  adapters?: Record<string, PlatformAdapter>;
  clock?: Clock;
  fetchImpl?: typeof fetch;
}

export class PipelineService {
  readonly orchestrator: WorkflowOrchestrator;
  readonly tracker: StatusTracker;
  readonly weights: WeightsRegistry;
  readonly submissions: SubmissionEngine;
  readonly store: OpportunityStore;
  readonly app: Express;

  private readonly logger: ILogger;
  private readonly redisClient?: Redis;
  private server: Server | null = null;

  constructor(private readonly config: PipelineConfig, deps: PipelineServiceDeps = {}) {
    const logger = deps.logger ?? createLogger('orchestrator');
    const clock = deps.clock ?? systemClock;
    this.logger = logger;

    let redis = deps.redis;
    if (!redis && config.persistence === 'redis') {
      this.redisClient = createRedisClient({ url: config.redisUrl, name: 'orchestrator' }, logger);
      redis = new RedisCommandClient(this.redisClient, logger.child({ component: 'redis' }));
    }

    const applications: ApplicationRepository = redis
      ? new RedisApplicationRepository(redis, logger.child({ component: 'applications' }))
      : new InMemoryApplicationRepository();
    const publisher = redis ? new RedisStreamPublisher(redis, logger.child({ component: 'streams' })) : undefined;
    const learningSink: LearningSink = publisher ?? new SignalLog(logger.child({ component: 'signals' }));

    this.store = new OpportunityStore(
      { retentionMs: config.opportunityRetentionMs },
      {
        logger: logger.child({ component: 'opportunity-store' }),
        repository: redis ? new RedisOpportunityRepository(redis) : undefined,
        clock,
      }
    );
    this.weights = new WeightsRegistry(logger.child({ component: 'weights' }), clock);
    this.tracker = new StatusTracker(
      { noResponseWindowMs: config.noResponseWindowMs },
      { logger: logger.child({ component: 'status-tracker' }), notifier: publisher, clock }
    );

    const { submission } = config;
    this.submissions = new SubmissionEngine(
      {
        retryBaseMs: submission.retryBaseMs,
        retryMultiplier: submission.retryMultiplier,
        maxAttempts: submission.maxAttempts,
        retryMaxDelayMs: submission.retryMaxDelayMs,
        platformDefaults: {
          concurrency: submission.platformConcurrency,
          tokensPerSecond: submission.tokensPerSecond,
          maxBurst: submission.maxBurst,
          queueCapacity: submission.queueCapacity,
          deliveryTimeoutMs: submission.deliveryTimeoutMs,
        },
      },
      { logger: logger.child({ component: 'submission-engine' }), clock }
    );
    this.registerPlatforms(deps);

    const feedback = new OutcomeFeedbackAdapter(
      { learningRate: config.feedbackLearningRate },
      { sink: learningSink, weights: this.weights, logger: logger.child({ component: 'feedback' }) }
    );

    const generator = deps.generator ?? (config.generatorUrl
      ? new HttpGeneratorClient(
          { url: config.generatorUrl },
          { logger: logger.child({ component: 'generator' }), fetchImpl: deps.fetchImpl }
        )
      : new TemplateGenerator());

    this.orchestrator = new WorkflowOrchestrator(
      {
        automationLevel: config.automationLevel,
        autoApproveQualityThreshold: config.autoApproveQualityThreshold,
        quotaExhaustedPolicy: config.quotaExhaustedPolicy,
        defaultPlatform: submission.defaultPlatform,
        workerPoolSize: config.workerPoolSize,
        generation: config.generation,
        sweepIntervalMs: config.sweepIntervalMs,
      },
      {
        store: this.store,
        scorer: new ScoringEngine(),
        weights: this.weights,
        applications,
        submissions: this.submissions,
        tracker: this.tracker,
        feedback,
        generator,
        quota: new DailyQuota(config.dailyApplicationQuota, clock),
        contentStore: redis ? new RedisContentStore(redis) : undefined,
        profiles: redis ? new RedisProfileStore(redis) : undefined,
        logger: logger.child({ component: 'workflow' }),
        clock,
      }
    );

    const pingTarget = redis;
    this.app = createApp({
      orchestrator: this.orchestrator,
      tracker: this.tracker,
      weights: this.weights,
      submissions: this.submissions,
      logger: logger.child({ component: 'api' }),
      healthCheck: pingTarget ? async () => (await pingTarget.ping()) === 'PONG' : undefined,
    });
  }

  async start(): Promise<void> {
    await this.orchestrator.recover();
    this.orchestrator.start();
    const server = this.app.listen(this.config.port);
    this.server = server;
    await new Promise<void>((resolve, reject) => {
      server.once('listening', () => resolve());
      server.once('error', reject);
    });
    this.logger.info('Pipeline service listening', {
      port: this.config.port,
      persistence: this.config.persistence,
      automationLevel: this.config.automationLevel,
    });
  }

  /** Close the server, drain the orchestrator, then quit Redis; each step is bounded. */
  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    const redisClient = this.redisClient;

    await gracefulShutdown(
      [
        { name: 'http server', cleanup: () => closeServer(server) },
        { name: 'orchestrator', cleanup: () => this.orchestrator.stop() },
        ...(redisClient
          ? [{ name: 'redis', cleanup: () => closeRedisClient(redisClient, this.logger) }]
          : []),
      ],
      this.config.shutdownTimeoutMs,
      this.logger
    );
    this.logger.info('Pipeline service stopped');
  }

  private registerPlatforms(deps: PipelineServiceDeps): void {
    const adapters = new Map<string, PlatformAdapter>();
    for (const [platform, url] of Object.entries(this.config.submission.webhooks)) {
      adapters.set(
        platform,
        new WebhookPlatformAdapter(
          { platform, url, timeoutMs: this.config.submission.deliveryTimeoutMs },
          { logger: this.logger.child({ component: 'webhook', platform }), fetchImpl: deps.fetchImpl }
        )
      );
    }
    for (const [platform, adapter] of Object.entries(deps.adapters ?? {})) {
      adapters.set(platform, adapter);
    }

    const defaultPlatform = this.config.submission.defaultPlatform;
    if (!adapters.has(defaultPlatform)) {
      adapters.set(defaultPlatform, new OutboxPlatformAdapter(defaultPlatform, this.logger.child({ component: 'outbox' })));
    }

    for (const [platform, adapter] of adapters) {
      this.submissions.registerPlatform(platform, adapter);
    }
  }
}
