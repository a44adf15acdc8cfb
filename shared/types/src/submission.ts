import type { Tier } from './opportunity';

export type SubmissionStatus =
  | 'Queued'
  | 'InFlight'
  | 'RetryScheduled'
  | 'Delivered'
  | 'Failed'
  | 'Expired'
  | 'Cancelled';

export const TERMINAL_SUBMISSION_STATUSES: ReadonlySet<SubmissionStatus> = new Set<SubmissionStatus>([
  'Delivered',
  'Failed',
  'Expired',
  'Cancelled',
]);

/** Everything a platform adapter needs to deliver one application. */
export interface ApplicationPackage {
  applicationId: string;
  userId: string;
  opportunityId: string;
  title: string;
  organization: string;
  url?: string;
  content: string;
}

export interface SubmissionRequest {
  applicationId: string;
  package: ApplicationPackage;
  tier: Tier;
  /** Epoch ms; a request still queued after this is expired instead of delivered */
  deadline?: number;
}

export interface AttemptLogEntry {
  attemptNumber: number;
  at: number;
  result: 'delivered' | 'failed';
  error?: string;
}

export interface SubmissionAttempt {
  readonly id: string;
  readonly applicationId: string;
  readonly platform: string;
  readonly idempotencyKey: string;
  readonly status: SubmissionStatus;
  /** Number of adapter calls made so far */
  readonly attemptNumber: number;
  readonly nextRetryAt?: number;
  readonly lastError?: string;
  readonly deliveryId?: string;
  readonly createdAt: number;
  readonly updatedAt: number;
  readonly history: ReadonlyArray<AttemptLogEntry>;
}

/** Reported to the orchestrator exactly once per attempt. */
export interface SubmissionResult {
  attemptId: string;
  applicationId: string;
  platform: string;
  status: 'Delivered' | 'Failed' | 'Expired';
  deliveryId?: string;
  lastError?: string;
}
