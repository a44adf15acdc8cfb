export { OutcomeFeedbackAdapter, OUTCOME_TARGETS } from './outcome-feedback';
export type { OutcomeFeedbackConfig, OutcomeFeedbackDeps, WeightsLookup } from './outcome-feedback';
export { SignalLog } from './signal-log';
