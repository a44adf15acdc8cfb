/**
 * Versioned scoring weights.
 *
 * Every version is a frozen value. install() validates the input, builds
 * version current + 1 and swaps the reference; readers holding an older
 * version keep a consistent view. All versions are retained so outcome
 * feedback can attribute a score to the weights that produced it.
 */

import { WeightsInstallSchema } from '@pipeline/config';
import { systemClock } from '@pipeline/core';
import type { Clock, ILogger } from '@pipeline/core';
import type { ScoringFeature, ScoringWeights, TierThresholds, WeightsSource } from '@pipeline/types';
import { parsePayload } from '../validation';

export const DEFAULT_WEIGHTS: Readonly<Partial<Record<ScoringFeature, number>>> = Object.freeze({
  skillMatch: 0.25,
  experienceMatch: 0.2,
  semanticSimilarity: 0.2,
  prestige: 0.15,
  historicalSuccessRate: 0.1,
  deadlineUrgency: 0.05,
  compensationFit: 0.05,
});

export const DEFAULT_THRESHOLDS: Readonly<TierThresholds> = Object.freeze({ tier1: 0.85, tier2: 0.5 });

export interface WeightsInstall {
  weights: Partial<Record<ScoringFeature, number>>;
  thresholds?: TierThresholds;
}

export class WeightsRegistry {
  private readonly versions = new Map<number, ScoringWeights>();
  private active: ScoringWeights;

  constructor(private readonly logger: ILogger, private readonly clock: Clock = systemClock) {
    this.active = this.freeze({
      weights: { ...DEFAULT_WEIGHTS },
      thresholds: { ...DEFAULT_THRESHOLDS },
      version: 1,
      updatedAt: clock.now(),
      source: 'default',
    });
    this.versions.set(1, this.active);
  }

  current(): ScoringWeights {
    return this.active;
  }

  get(version: number): ScoringWeights | undefined {
    return this.versions.get(version);
  }

  /**
   * Install a new version. Thresholds default to the current ones.
   *
   * @throws ValidationError for negative or non-finite weights, no positive
   *   weight, unknown feature names, or tier1 <= tier2
   */
  install(input: unknown, source: WeightsSource): ScoringWeights {
    const parsed = parsePayload(WeightsInstallSchema, input, 'scoring weights');
    const previous = this.active;

    const next = this.freeze({
      weights: { ...parsed.weights },
      thresholds: { ...(parsed.thresholds ?? previous.thresholds) },
      version: previous.version + 1,
      updatedAt: this.clock.now(),
      source,
    });

    this.versions.set(next.version, next);
    this.active = next;

    this.logger.info('Installed scoring weights', {
      version: next.version,
      previousVersion: previous.version,
      source,
      thresholds: next.thresholds,
    });
    return next;
  }

  /** All versions, oldest first */
  history(): ScoringWeights[] {
    return [...this.versions.values()];
  }

  private freeze(weights: ScoringWeights): ScoringWeights {
    Object.freeze(weights.weights);
    Object.freeze(weights.thresholds);
    return Object.freeze(weights);
  }
}
