// Contracts of the external collaborators the orchestration core depends on.

import type { Opportunity } from './opportunity';
import type { Outcome } from './application';
import type { ScoringFeature, UserProfile } from './scoring';
import type { ApplicationPackage } from './submission';
import type { FollowUpTask } from './tracking';

export interface GenerationConstraints {
  applicationId: string;
  /** 1-based attempt counter; the generator may use it to vary sampling */
  attempt: number;
  maxWords?: number;
}

export interface GeneratedDraft {
  content: string;
  /** Self-reported quality, 0-1 */
  qualityScore: number;
}

/**
 * Produces application material. Must be safe to call again for the same
 * application: the orchestrator retries on timeout.
 */
export interface Generator {
  generate(profile: UserProfile, opportunity: Opportunity, constraints: GenerationConstraints): Promise<GeneratedDraft>;
}

export interface DeliveryReceipt {
  deliveryId: string;
}

/**
 * Delivers a package to one platform. A repeated call with an idempotency key
 * that was already delivered must succeed without delivering again.
 */
export interface PlatformAdapter {
  deliver(pkg: ApplicationPackage, idempotencyKey: string): Promise<DeliveryReceipt>;
}

export interface WeightAdjustmentSignal {
  applicationId: string;
  weightsVersion: number;
  outcome: Outcome;
  predictedScore: number;
  /** target(outcome) - predictedScore */
  error: number;
  featureDeltas: Partial<Record<ScoringFeature, number>>;
  observedAt: number;
}

export interface LearningSink {
  publish(signal: WeightAdjustmentSignal): Promise<void>;
}

export interface FollowUpNotifier {
  notify(task: FollowUpTask): Promise<void>;
}
