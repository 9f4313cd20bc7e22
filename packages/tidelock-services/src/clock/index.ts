export { SystemClock, ManualClock } from './clock.js';
export type { Clock } from './clock.js';
