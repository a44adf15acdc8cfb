/**
 * DailyQuota Unit Tests
 */

import { describe, it, expect } from '@jest/globals';

import { DAY_MS } from '@pipeline/core';
import { ManualClock } from '@pipeline/test-utils';
import { DailyQuota } from '../../../src/workflow/quota';

describe('DailyQuota', () => {
  const midnight = Date.UTC(2026, 2, 1);

  it('should admit up to the limit per user', () => {
    const quota = new DailyQuota(2, new ManualClock(midnight));

    expect(quota.tryConsume('user-1')).toBe(true);
    expect(quota.tryConsume('user-1')).toBe(true);
    expect(quota.tryConsume('user-1')).toBe(false);
    expect(quota.tryConsume('user-2')).toBe(true);
    expect(quota.remaining('user-1')).toBe(0);
  });

  it('should return a released slot', () => {
    const quota = new DailyQuota(1, new ManualClock(midnight));
    quota.tryConsume('user-1');

    quota.release('user-1');

    expect(quota.remaining('user-1')).toBe(1);
  });

  it('should reset at the next UTC day', () => {
    const clock = new ManualClock(midnight + DAY_MS - 1);
    const quota = new DailyQuota(1, clock);
    quota.tryConsume('user-1');

    clock.advance(1);

    expect(quota.tryConsume('user-1')).toBe(true);
  });

  it('should admit nothing with a zero limit', () => {
    expect(new DailyQuota(0, new ManualClock(midnight)).tryConsume('user-1')).toBe(false);
  });
});
