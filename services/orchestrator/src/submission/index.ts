export { SubmissionEngine } from './submission-engine';
export type {
  PlatformOptions,
  PlatformStats,
  SubmissionEngineConfig,
  SubmissionEngineDeps,
  SubmissionEngineStats,
  SubmissionResultListener,
} from './submission-engine';
export { idempotencyKeyFor } from './idempotency';
