/**
 * @pipeline/core - Core Library
 *
 * Infrastructure shared by the pipeline services:
 *
 * 1. Logging (pino behind ILogger)
 * 2. Error taxonomy and classification
 * 3. Async primitives (mutexes, timeouts, keyed task pool)
 * 4. Data structures
 * 5. Resilience (unified retry policy) and rate limiting
 * 6. Redis client factory
 * 7. Service lifecycle
 *
 * @module @pipeline/core
 */

// =============================================================================
// 1. Logging
// =============================================================================

export {
  createLogger,
  createPinoLogger,
  formatLogObject,
  getLogger,
  resetLoggerCache,
  RecordingLogger,
  NullLogger,
} from './logging';
export type { ILogger, LoggerConfig, LogLevel, LogMeta, LogEntry } from './logging';

// =============================================================================
// 2. Errors
// =============================================================================

export {
  ErrorCode,
  ErrorSeverity,
  ErrorCategory,
  PipelineError,
  ValidationError,
  TransientError,
  TimeoutError,
  ConflictError,
  TerminalError,
  NotFoundError,
  getErrorMessage,
  formatErrorForResponse,
  classifyError,
  isRetryableError,
} from './error-handling';
export type { PipelineErrorOptions, ValidationIssueDetail } from './error-handling';

// =============================================================================
// 3. Async
// =============================================================================

export {
  AsyncMutex,
  KeyedMutex,
  withTimeout,
  sleep,
  createDeferred,
  gracefulShutdown,
  KeyedTaskPool,
  TaskPoolStoppedError,
} from './async';
export type { MutexStats, Deferred, TaskPoolConfig, TaskPoolStats } from './async';

export { systemClock, ManualClock, DAY_MS } from './clock';
export type { Clock } from './clock';

// =============================================================================
// 4. Data Structures
// =============================================================================

export { MinHeap } from './data-structures';

// =============================================================================
// 5. Resilience & Rate Limiting
// =============================================================================

export { RetryPolicy, computeBackoffDelay } from './resilience';
export type { RetryPolicyConfig, RetryPolicyDeps, RetryResult } from './resilience';

export { TokenBucketRateLimiter } from './rate-limiting';
export type { RateLimiterConfig, RateLimiterStats } from './rate-limiting';

// =============================================================================
// 6. Redis
// =============================================================================

export {
  createRedisClient,
  closeRedisClient,
  resolveRedisPassword,
  RedisCommandClient,
  RedisOperationError,
} from './redis';
export type { RedisClientOptions, RedisCommands, XAddOptions } from './redis';

// =============================================================================
// 7. Service Lifecycle
// =============================================================================

export { setupServiceShutdown, runServiceMain, closeServer } from './service-lifecycle';
export type { ServiceShutdownConfig, ServiceShutdownCleanup, RunServiceMainConfig } from './service-lifecycle';
