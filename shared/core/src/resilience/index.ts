export { RetryPolicy, computeBackoffDelay } from './retry-policy';
export type { RetryPolicyConfig, RetryPolicyDeps, RetryResult } from './retry-policy';
