export { FixedTickLoop } from './fixed-tick-loop';
export type { FixedTickLoopOptions } from './fixed-tick-loop';
