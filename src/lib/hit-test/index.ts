/**
 * Hit test system for efficient click/hover detection.
 *
 * @example
 * ```typescript
 * import { HitTestSystem } from './hit-test';
 *
 * const hitTest = new HitTestSystem();
 *
 * // Index elements as layout produces their bounds
 * hitTest.insertWidget({ id: 'panel', bounds: { x: 0, y: 0, width: 400, height: 300 }, zIndex: 0 });
 * hitTest.insertWidget({ id: 'button', bounds: { x: 20, y: 20, width: 80, height: 24 }, zIndex: 1 });
 *
 * // Query on pointer events
 * const target = hitTest.getWidgetAt(30, 30);
 * if (target) {
 *   console.log('Hit:', target.id);
 * }
 * ```
 */

export { HitTestSystem } from './HitTestSystem';

export { DEFAULT_HIT_TEST_OPTIONS } from './types';

export {
  createRect,
  containsPoint,
  rectsOverlap,
  rectRight,
  rectBottom
} from './geometry';

export type {
  HitTestOptions,
  HitTestEvents,
  HitTestEvent,
  HitTestStats,
  WidgetUpdatedEvent
} from './types';
