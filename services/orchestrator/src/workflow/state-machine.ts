import { ApplicationState, TERMINAL_STATES } from '@pipeline/types';

const S = ApplicationState;

/** Forward edges. Abandoned is reachable from every non-terminal state. */
const TRANSITIONS: Readonly<Record<ApplicationState, ReadonlyArray<ApplicationState>>> = {
  [S.Discovered]: [S.Scored],
  [S.Scored]: [S.Admitted, S.Skipped],
  [S.Admitted]: [S.GenerationRequested],
  [S.GenerationRequested]: [S.Generated, S.Skipped],
  [S.Generated]: [S.AutoApproved, S.PendingApproval],
  [S.AutoApproved]: [S.Approved],
  [S.PendingApproval]: [S.Approved, S.Rejected],
  [S.Approved]: [S.Submitting],
  [S.Submitting]: [S.Submitted, S.SubmissionFailed],
  [S.Submitted]: [S.Tracking],
  [S.Tracking]: [S.Closed],
  [S.Skipped]: [],
  [S.Rejected]: [],
  [S.SubmissionFailed]: [],
  [S.Closed]: [],
  [S.Abandoned]: [],
};

export function isTerminal(state: ApplicationState): boolean {
  return TERMINAL_STATES.has(state);
}

export function canTransition(from: ApplicationState, to: ApplicationState): boolean {
  if (isTerminal(from)) return false;
  if (to === S.Abandoned) return true;
  return TRANSITIONS[from].includes(to);
}

export function nextStates(from: ApplicationState): ApplicationState[] {
  if (isTerminal(from)) return [];
  return [...TRANSITIONS[from], S.Abandoned];
}
