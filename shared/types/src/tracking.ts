export type FollowUpKind = 'status_check' | 'thank_you' | 'offer_response' | 'additional_info';

export interface FollowUpTask {
  readonly id: string;
  readonly applicationId: string;
  readonly dueAt: number;
  readonly kind: FollowUpKind;
  readonly completed: boolean;
  readonly notifiedAt?: number;
  readonly completedAt?: number;
}

export interface TimelineEvent {
  readonly seq: number;
  readonly applicationId: string;
  readonly kind: string;
  readonly payload: Readonly<Record<string, unknown>>;
  readonly at: number;
}

export interface FunnelCounts {
  userId: string;
  discovered: number;
  admitted: number;
  submitted: number;
  closed: number;
  accepted: number;
  /** submitted / discovered, 0 when nothing was discovered */
  discoveredToSubmitted: number;
  /** closed / submitted, 0 when nothing was submitted */
  submittedToClosed: number;
}

export interface ApplicationMetrics {
  applicationId: string;
  eventCount: number;
  /** Time since the last state change */
  timeInCurrentStateMs: number;
  /** Time since the first timeline event */
  totalElapsedMs: number;
}
