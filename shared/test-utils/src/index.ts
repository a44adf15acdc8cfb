/**
 * Test utilities for the pipeline packages.
 *
 * ```typescript
 * import {
 *   RedisMock, ScriptedGenerator, ScriptedPlatformAdapter,
 *   rawOpportunity, userProfile,
 *   waitForCondition, RecordingLogger, ManualClock,
 * } from '@pipeline/test-utils';
 * ```
 */

// =============================================================================
// Mocks
// =============================================================================

export {
  RedisMock,
  createRedisMock,
  DEFAULT_DRAFT,
  RecordingLearningSink,
  RecordingNotifier,
  ScriptedGenerator,
  ScriptedPlatformAdapter,
} from './mocks';
export type { GeneratorStep, RedisMockOptions, RedisOperation, ScriptHandler, StreamEntry } from './mocks';

// =============================================================================
// Builders
// =============================================================================

export {
  ApplicationRecordBuilder,
  RawOpportunityBuilder,
  UserProfileBuilder,
  applicationRecord,
  rawOpportunity,
  userProfile,
} from './builders';

// =============================================================================
// Helpers
// =============================================================================

export { waitForCondition, waitForValue } from './helpers';
export type { WaitOptions } from './helpers';

// Re-exported so tests need a single import for their doubles
export { ManualClock, NullLogger, RecordingLogger } from '@pipeline/core';
export type { LogEntry } from '@pipeline/core';
