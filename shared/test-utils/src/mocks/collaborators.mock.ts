/**
 * Scriptable stand-ins for the orchestrator's external collaborators.
 */

import { createDeferred } from '@pipeline/core';
import type { Deferred } from '@pipeline/core';
import type {
  ApplicationPackage,
  DeliveryReceipt,
  FollowUpNotifier,
  FollowUpTask,
  GeneratedDraft,
  GenerationConstraints,
  Generator,
  LearningSink,
  Opportunity,
  PlatformAdapter,
  UserProfile,
  WeightAdjustmentSignal,
} from '@pipeline/types';

export type GeneratorStep =
  | { kind: 'draft'; draft: GeneratedDraft }
  | { kind: 'error'; error: Error }
  /** Never settles; only a timeout ends the call */
  | { kind: 'hang' }
  /** Settles with the given promise, e.g. a Deferred the test resolves */
  | { kind: 'pending'; draft: Promise<GeneratedDraft> };

export const DEFAULT_DRAFT: GeneratedDraft = Object.freeze({
  content: 'Dear hiring team, I would like to apply.',
  qualityScore: 0.9,
});

/**
 * Plays `steps` in order, one per call, then returns the fallback draft.
 */
export class ScriptedGenerator implements Generator {
  readonly calls: GenerationConstraints[] = [];

  constructor(private readonly steps: GeneratorStep[] = [], private readonly fallback: GeneratedDraft = DEFAULT_DRAFT) {}

  async generate(_profile: UserProfile, _opportunity: Opportunity, constraints: GenerationConstraints): Promise<GeneratedDraft> {
    this.calls.push(constraints);
    const step = this.steps.shift();
    if (!step) return this.fallback;

    switch (step.kind) {
      case 'draft':
        return step.draft;
      case 'error':
        throw step.error;
      case 'hang':
        return new Promise<GeneratedDraft>(() => undefined);
      case 'pending':
        return step.draft;
    }
  }
}

/**
 * Records deliveries by idempotency key: a repeated key succeeds without a
 * second delivery. Queued failures are thrown before anything is recorded.
 */
export class ScriptedPlatformAdapter implements PlatformAdapter {
  readonly calls: Array<{ applicationId: string; idempotencyKey: string }> = [];
  readonly deliveries = new Map<string, ApplicationPackage>();
  private readonly failures: Error[] = [];
  private gate?: Deferred<void>;

  failWith(...errors: Error[]): this {
    this.failures.push(...errors);
    return this;
  }

  /** Hold every call until resume() */
  pause(): void {
    this.gate = createDeferred<void>();
  }

  resume(): void {
    this.gate?.resolve();
    this.gate = undefined;
  }

  get deliveryCount(): number {
    return this.deliveries.size;
  }

  async deliver(pkg: ApplicationPackage, idempotencyKey: string): Promise<DeliveryReceipt> {
    this.calls.push({ applicationId: pkg.applicationId, idempotencyKey });
    if (this.gate) {
      await this.gate.promise;
    }

    const failure = this.failures.shift();
    if (failure) throw failure;

    if (!this.deliveries.has(idempotencyKey)) {
      this.deliveries.set(idempotencyKey, pkg);
    }
    return { deliveryId: `dlv_${idempotencyKey.slice(0, 8)}` };
  }
}

export class RecordingLearningSink implements LearningSink {
  readonly signals: WeightAdjustmentSignal[] = [];
  private failuresLeft = 0;

  failNext(count: number): this {
    this.failuresLeft = count;
    return this;
  }

  async publish(signal: WeightAdjustmentSignal): Promise<void> {
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error('learning sink unavailable');
    }
    this.signals.push(signal);
  }
}

export class RecordingNotifier implements FollowUpNotifier {
  readonly tasks: FollowUpTask[] = [];
  private failuresLeft = 0;

  failNext(count: number): this {
    this.failuresLeft = count;
    return this;
  }

  async notify(task: FollowUpTask): Promise<void> {
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error('notifier unavailable');
    }
    this.tasks.push(task);
  }
}
