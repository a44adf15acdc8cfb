/**
 * Fit Scoring & Tiering Engine
 *
 * score() is a pure function of (profile, opportunity, weights): the weights
 * are passed in rather than read from the registry, so a caller that holds
 * one version scores consistently even while a new version is installed.
 */

import { SCORING_FEATURES } from '@pipeline/types';
import type {
  Opportunity,
  ScoreResult,
  ScoringWeights,
  Tier,
  TierThresholds,
  UserProfile,
} from '@pipeline/types';
import { computeFeatures } from './features';

export interface OpportunityScorer {
  score(profile: UserProfile, opportunity: Opportunity, weights: ScoringWeights): ScoreResult;
}

export function assignTier(score: number, thresholds: TierThresholds): Tier {
  if (score >= thresholds.tier1) return 1;
  if (score >= thresholds.tier2) return 2;
  return 3;
}

export class ScoringEngine implements OpportunityScorer {
  /**
   * Weighted mean of the features over positive weights, clamped to [0, 1]
   * and rounded to 4 decimals.
   */
  score(profile: UserProfile, opportunity: Opportunity, weights: ScoringWeights): ScoreResult {
    const features = computeFeatures(profile, opportunity);

    let weighted = 0;
    let total = 0;
    for (const feature of SCORING_FEATURES) {
      const weight = weights.weights[feature];
      if (weight === undefined || !(weight > 0)) continue;
      weighted += weight * features[feature];
      total += weight;
    }

    const raw = total > 0 ? weighted / total : 0;
    const score = Math.round(Math.min(1, Math.max(0, raw)) * 10_000) / 10_000;

    return {
      score,
      tier: assignTier(score, weights.thresholds),
      features,
      weightsVersion: weights.version,
    };
  }
}
