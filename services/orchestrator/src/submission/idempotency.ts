import { createHash } from 'crypto';

/**
 * Idempotency key of a delivery: SHA-256 of `applicationId:platform`. Every
 * retry of one (application, platform) pair sends the same key, so an
 * adapter can drop repeats.
 */
export function idempotencyKeyFor(applicationId: string, platform: string): string {
  return createHash('sha256').update(`${applicationId}:${platform}`).digest('hex');
}
