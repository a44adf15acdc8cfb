import type { OpportunityType, Tier } from './opportunity';

/**
 * Features the scoring engine knows how to compute.
 * Weights for names outside this list are ignored.
 */
export const SCORING_FEATURES = [
  'semanticSimilarity',
  'skillMatch',
  'experienceMatch',
  'deadlineUrgency',
  'historicalSuccessRate',
  'prestige',
  'compensationFit',
] as const;

export type ScoringFeature = typeof SCORING_FEATURES[number];

export type FeatureVector = Record<ScoringFeature, number>;

export interface TierThresholds {
  /** Minimum score for tier 1 */
  tier1: number;
  /** Minimum score for tier 2 (below is tier 3) */
  tier2: number;
}

export type WeightsSource = 'default' | 'learning' | 'operator';

/**
 * Versioned scoring configuration. Instances are frozen; a change installs a
 * new version instead of mutating the current one.
 */
export interface ScoringWeights {
  readonly weights: Readonly<Partial<Record<ScoringFeature, number>>>;
  readonly thresholds: Readonly<TierThresholds>;
  readonly version: number;
  readonly updatedAt: number;
  readonly source: WeightsSource;
}

export interface UserProfile {
  userId: string;
  skills: string[];
  experienceYears: number;
  pastRoles: string[];
  interests: string[];
  careerGoals?: string;
  minCompensation?: number;
  /** Historical success rate per opportunity type, 0-1 */
  successRates?: Partial<Record<OpportunityType, number>>;
}

export interface ScoreResult {
  score: number;
  tier: Tier;
  features: FeatureVector;
  weightsVersion: number;
}
