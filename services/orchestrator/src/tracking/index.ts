export { StatusTracker } from './status-tracker';
export type { NoResponseHandler, StatusTrackerConfig, StatusTrackerDeps, SweepResult } from './status-tracker';
export { DEFAULT_FOLLOW_UP_RULES } from './follow-up-rules';
export type { FollowUpRule } from './follow-up-rules';
