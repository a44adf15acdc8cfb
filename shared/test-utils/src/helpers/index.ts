export { waitForCondition, waitForValue } from './wait';
export type { WaitOptions } from './wait';
