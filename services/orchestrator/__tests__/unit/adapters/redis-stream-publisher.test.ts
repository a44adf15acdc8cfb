import { describe, it, expect } from '@jest/globals';

import { NullLogger, createRedisMock } from '@pipeline/test-utils';
import {
  FOLLOW_UP_STREAM,
  RedisStreamPublisher,
  WEIGHT_ADJUSTMENT_STREAM,
} from '../../../src/adapters/redis-stream-publisher';
import type { FollowUpTask, WeightAdjustmentSignal } from '@pipeline/types';

const SIGNAL: WeightAdjustmentSignal = {
  applicationId: 'app_1',
  weightsVersion: 3,
  outcome: 'Accepted',
  predictedScore: 0.6,
  error: 0.4,
  featureDeltas: { skillMatch: 0.04 },
  observedAt: 5000,
};

const TASK: FollowUpTask = {
  id: 'fu_1',
  applicationId: 'app_1',
  dueAt: 9000,
  kind: 'status_check',
  completed: false,
};

describe('RedisStreamPublisher', () => {
  it('should append signals as JSON entries', async () => {
    const redis = createRedisMock();
    const publisher = new RedisStreamPublisher(redis, new NullLogger());

    await publisher.publish(SIGNAL);

    const entries = redis.xrange(WEIGHT_ADJUSTMENT_STREAM);
    expect(entries).toHaveLength(1);
    expect(JSON.parse(entries[0].fields.data)).toEqual(SIGNAL);
  });

  it('should append follow-ups to their own stream', async () => {
    const redis = createRedisMock();
    const publisher = new RedisStreamPublisher(redis, new NullLogger());

    await publisher.notify(TASK);

    expect(redis.xrange(WEIGHT_ADJUSTMENT_STREAM)).toEqual([]);
    expect(JSON.parse(redis.xrange(FOLLOW_UP_STREAM)[0].fields.data)).toEqual(TASK);
  });

  it('should cap the stream length', async () => {
    const redis = createRedisMock();
    const publisher = new RedisStreamPublisher(redis, new NullLogger(), { maxLen: 2 });

    for (const observedAt of [1, 2, 3]) {
      await publisher.publish({ ...SIGNAL, observedAt });
    }

    expect(redis.xrange(WEIGHT_ADJUSTMENT_STREAM).map(entry => entry.id)).toEqual(['2-0', '3-0']);
  });

  it('should surface Redis failures to the caller', async () => {
    const redis = createRedisMock();
    redis.failCommand('xadd', new Error('READONLY'));
    const publisher = new RedisStreamPublisher(redis, new NullLogger());

    await expect(publisher.publish(SIGNAL)).rejects.toThrow('READONLY');
  });
});
