import type { ILogger } from '@pipeline/core';
import type { LearningSink, WeightAdjustmentSignal } from '@pipeline/types';

/**
 * In-process learning sink for memory persistence: keeps the most recent
 * signals so operators can inspect them.
 */
export class SignalLog implements LearningSink {
  private readonly signals: WeightAdjustmentSignal[] = [];

  constructor(private readonly logger: ILogger, private readonly capacity = 1000) {}

  async publish(signal: WeightAdjustmentSignal): Promise<void> {
    this.signals.push(signal);
    if (this.signals.length > this.capacity) {
      this.signals.splice(0, this.signals.length - this.capacity);
    }
    this.logger.debug('Weight adjustment recorded', { applicationId: signal.applicationId, error: signal.error });
  }

  recent(): WeightAdjustmentSignal[] {
    return [...this.signals];
  }
}
