export * from './types';

export { EventEmitter } from './events/EventEmitter';
export type { EventHandler, EventMap } from './events/EventEmitter';

// Interval tree exports
export {
  IntervalTree,
  IntervalError,
  IntervalErrorCode,
  createInterval
} from './interval-tree';

export type {
  Interval,
  IntervalTreeOptions,
  PayloadEquals
} from './interval-tree';

// Hit test exports
export {
  HitTestSystem,
  DEFAULT_HIT_TEST_OPTIONS,
  createRect,
  containsPoint,
  rectsOverlap,
  rectRight,
  rectBottom
} from './hit-test';

export type {
  HitTestOptions,
  HitTestEvents,
  HitTestEvent,
  HitTestStats,
  WidgetUpdatedEvent
} from './hit-test';
