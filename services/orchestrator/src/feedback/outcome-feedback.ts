/**
 * Outcome Feedback Adapter
 *
 * Turns an observed outcome into a WeightAdjustmentSignal for the learning
 * collaborator. The signal is attributed to the weights version that scored
 * the application; installing new weights is the collaborator's job, so this
 * adapter never touches the registry's current version.
 */

import { RetryPolicy, getErrorMessage } from '@pipeline/core';
import type { ILogger, RetryPolicyConfig } from '@pipeline/core';
import { SCORING_FEATURES } from '@pipeline/types';
import type {
  ApplicationRecord,
  LearningSink,
  Outcome,
  ScoringFeature,
  ScoringWeights,
  WeightAdjustmentSignal,
} from '@pipeline/types';

export const OUTCOME_TARGETS: Readonly<Record<Outcome, number>> = Object.freeze({
  Accepted: 1,
  Rejected: 0,
  NoResponse: 0.2,
});

export interface WeightsLookup {
  get(version: number): ScoringWeights | undefined;
  current(): ScoringWeights;
}

export interface OutcomeFeedbackConfig {
  learningRate: number;
  /** Publishing retry settings; defaults to 3 attempts from 1s */
  publishRetry?: Partial<RetryPolicyConfig>;
}

export interface OutcomeFeedbackDeps {
  sink: LearningSink;
  weights: WeightsLookup;
  logger: ILogger;
  sleep?: (ms: number) => Promise<void>;
}

function round6(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

export class OutcomeFeedbackAdapter {
  private readonly published = new Set<string>();
  private readonly retryPolicy: RetryPolicy;
  private readonly logger: ILogger;

  constructor(private readonly config: OutcomeFeedbackConfig, private readonly deps: OutcomeFeedbackDeps) {
    this.logger = deps.logger;
    this.retryPolicy = new RetryPolicy(
      { maxAttempts: 3, initialDelayMs: 1000, backoffMultiplier: 2, maxDelayMs: 10_000, ...config.publishRetry },
      { logger: deps.logger, sleep: deps.sleep }
    );
  }

  /**
   * Publish one signal per application. Publishing failures are logged, not
   * thrown.
   *
   * @returns The signal, or null for a duplicate or an unscored application
   */
  async recordOutcome(
    application: ApplicationRecord,
    outcome: Outcome,
    observedAt: number
  ): Promise<WeightAdjustmentSignal | null> {
    if (this.published.has(application.id)) {
      this.logger.debug('Outcome already fed back', { applicationId: application.id, outcome });
      return null;
    }

    const { score, featureVector } = application;
    if (score === undefined || featureVector === undefined) {
      this.logger.warn('Outcome for an unscored application, no signal emitted', {
        applicationId: application.id,
        outcome,
      });
      return null;
    }

    const weights = this.resolveWeights(application);
    const error = round6(OUTCOME_TARGETS[outcome] - score);

    // Every feature, weighted or not, so learning can raise a zero weight
    const featureDeltas: Partial<Record<ScoringFeature, number>> = {};
    for (const feature of SCORING_FEATURES) {
      featureDeltas[feature] = round6(this.config.learningRate * error * featureVector[feature]);
    }

    const signal: WeightAdjustmentSignal = {
      applicationId: application.id,
      weightsVersion: weights.version,
      outcome,
      predictedScore: score,
      error,
      featureDeltas,
      observedAt,
    };

    this.published.add(application.id);
    try {
      await this.retryPolicy.run(() => this.deps.sink.publish(signal), 'publish weight adjustment');
      this.logger.info('Published weight adjustment signal', {
        applicationId: application.id,
        weightsVersion: weights.version,
        outcome,
        error,
      });
    } catch (publishError) {
      this.logger.error('Weight adjustment signal dropped', {
        applicationId: application.id,
        error: getErrorMessage(publishError),
      });
    }
    return signal;
  }

  private resolveWeights(application: ApplicationRecord): ScoringWeights {
    if (application.weightsVersion !== undefined) {
      const scoredWith = this.deps.weights.get(application.weightsVersion);
      if (scoredWith) return scoredWith;
      this.logger.warn('Weights version not found, attributing to current', {
        applicationId: application.id,
        weightsVersion: application.weightsVersion,
      });
    }
    return this.deps.weights.current();
  }
}
