/**
 * Publishes weight adjustment signals and due follow-ups to Redis Streams.
 * Each entry carries the JSON payload in its `data` field.
 */

import type { ILogger, RedisCommands } from '@pipeline/core';
import type { FollowUpNotifier, FollowUpTask, LearningSink, WeightAdjustmentSignal } from '@pipeline/types';

export const WEIGHT_ADJUSTMENT_STREAM = 'stream:weight-adjustments';
export const FOLLOW_UP_STREAM = 'stream:follow-ups';

export interface RedisStreamPublisherOptions {
  /** Approximate stream length cap */
  maxLen?: number;
}

export class RedisStreamPublisher implements LearningSink, FollowUpNotifier {
  private readonly maxLen: number;

  constructor(
    private readonly redis: RedisCommands,
    private readonly logger: ILogger,
    options: RedisStreamPublisherOptions = {}
  ) {
    this.maxLen = options.maxLen ?? 10_000;
  }

  async publish(signal: WeightAdjustmentSignal): Promise<void> {
    const id = await this.redis.xadd(WEIGHT_ADJUSTMENT_STREAM, { data: JSON.stringify(signal) }, { maxLen: this.maxLen });
    this.logger.debug('Weight adjustment published', { applicationId: signal.applicationId, streamId: id });
  }

  async notify(task: FollowUpTask): Promise<void> {
    const id = await this.redis.xadd(FOLLOW_UP_STREAM, { data: JSON.stringify(task) }, { maxLen: this.maxLen });
    this.logger.debug('Follow-up published', { taskId: task.id, applicationId: task.applicationId, streamId: id });
  }
}
