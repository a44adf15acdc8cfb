export { TokenBucketRateLimiter } from './token-bucket';
export type { RateLimiterConfig, RateLimiterStats } from './token-bucket';
