import type { FeatureVector } from './scoring';
import type { Tier } from './opportunity';

/**
 * Workflow states of an application. Terminal states are listed in
 * TERMINAL_STATES; no automatic transition leaves them.
 */
export enum ApplicationState {
  Discovered = 'Discovered',
  Scored = 'Scored',
  Admitted = 'Admitted',
  Skipped = 'Skipped',
  GenerationRequested = 'GenerationRequested',
  Generated = 'Generated',
  AutoApproved = 'AutoApproved',
  PendingApproval = 'PendingApproval',
  Approved = 'Approved',
  Rejected = 'Rejected',
  Submitting = 'Submitting',
  Submitted = 'Submitted',
  SubmissionFailed = 'SubmissionFailed',
  Tracking = 'Tracking',
  Closed = 'Closed',
  Abandoned = 'Abandoned',
}

export const TERMINAL_STATES: ReadonlySet<ApplicationState> = new Set([
  ApplicationState.Skipped,
  ApplicationState.Rejected,
  ApplicationState.SubmissionFailed,
  ApplicationState.Closed,
  ApplicationState.Abandoned,
]);

export type AutomationLevel = 'full-auto' | 'review';

export type ApprovalVerdict = 'Approved' | 'Rejected';

export interface ApprovalDecision {
  decision: ApprovalVerdict | 'AutoApproved';
  reviewer: string;
  decidedAt: number;
}

export type Outcome = 'Accepted' | 'Rejected' | 'NoResponse';

export interface ApplicationRecord {
  readonly id: string;
  readonly opportunityId: string;
  readonly userId: string;
  readonly state: ApplicationState;
  readonly version: number;
  readonly createdAt: number;
  readonly updatedAt: number;

  readonly score?: number;
  readonly tier?: Tier;
  /** Weights version used when the record was scored */
  readonly weightsVersion?: number;
  readonly featureVector?: Readonly<FeatureVector>;

  /** Reference to the generated draft held by the content store */
  readonly generatedContentRef?: string;
  readonly qualityScore?: number;
  readonly generationAttempts: number;
  readonly approvalDecision?: ApprovalDecision;

  readonly platform?: string;
  readonly submissionAttemptId?: string;

  readonly lastError?: string;
  /** Why the record entered its current terminal state, when not obvious from the state */
  readonly reason?: string;
  readonly outcome?: Outcome;
  readonly closedAt?: number;
  readonly archivedAt?: number;
}

/** Inbound approval channel event */
export interface ApprovalDecisionEvent {
  applicationId: string;
  decision: ApprovalVerdict;
  reviewer: string;
}

/** Inbound outcome channel event */
export interface OutcomeEvent {
  applicationId: string;
  outcome: Outcome;
  observedAt: number;
}

export interface TransitionEvent {
  applicationId: string;
  userId: string;
  from: ApplicationState;
  to: ApplicationState;
  version: number;
  at: number;
}
