export { IntervalTree } from './IntervalTree';

export { IntervalError, IntervalErrorCode, createInterval } from './types';

export type { Interval, IntervalTreeOptions, PayloadEquals } from './types';
