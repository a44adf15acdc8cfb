import { DAY_MS } from '@pipeline/core';
import type { FollowUpKind } from '@pipeline/types';

export interface FollowUpRule {
  kind: FollowUpKind;
  /** Offset from the submission time */
  offsetMs: number;
}

/** Status checks one and two weeks after submission */
export const DEFAULT_FOLLOW_UP_RULES: ReadonlyArray<FollowUpRule> = Object.freeze([
  { kind: 'status_check', offsetMs: 7 * DAY_MS },
  { kind: 'status_check', offsetMs: 14 * DAY_MS },
]);
