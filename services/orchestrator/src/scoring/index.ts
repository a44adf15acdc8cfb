export { ScoringEngine, assignTier } from './scoring-engine';
export type { OpportunityScorer } from './scoring-engine';
export { WeightsRegistry, DEFAULT_WEIGHTS, DEFAULT_THRESHOLDS } from './weights-registry';
export type { WeightsInstall } from './weights-registry';
export {
  computeFeatures,
  compensationFit,
  cosineSimilarity,
  deadlineUrgency,
  experienceMatch,
  prestige,
  skillMatch,
  tokenize,
} from './features';
