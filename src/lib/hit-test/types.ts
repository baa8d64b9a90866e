/**
 * Hit test system types.
 *
 * All coordinates are in the caller's layout space; the index applies no
 * transforms.
 */

import type { ElementHandle, Rect } from '../types';

/**
 * Options for creating a HitTestSystem.
 */
export interface HitTestOptions {
  /**
   * Re-check each candidate against its current bounds before returning it.
   * Disabling this trusts the per-axis trees alone, which also exposes
   * stale entries left by an update with the wrong old bounds.
   */
  exactCheck?: boolean;
  /** Log a warning when removeWidget finds no matching entry */
  warnOnMissingRemoval?: boolean;
}

/**
 * Default hit test options.
 */
export const DEFAULT_HIT_TEST_OPTIONS: Required<HitTestOptions> = {
  exactCheck: true,
  warnOnMissingRemoval: false
};

/**
 * Payload of the 'widget-updated' event.
 */
export interface WidgetUpdatedEvent {
  handle: ElementHandle;
  oldBounds: Rect;
}

/**
 * Events emitted by HitTestSystem after each mutation completes.
 */
export type HitTestEvents = {
  'widget-inserted': [handle: ElementHandle];
  'widget-removed': [handle: ElementHandle];
  'widget-updated': [event: WidgetUpdatedEvent];
  'rebuilt': [event: { count: number }];
  'cleared': [];
};

export type HitTestEvent = keyof HitTestEvents;

/**
 * Counts and balance status of a HitTestSystem.
 */
export interface HitTestStats {
  widgetCount: number;
  xTreeSize: number;
  yTreeSize: number;
  xTreeHeight: number;
  yTreeHeight: number;
  xTreeBalanced: boolean;
  yTreeBalanced: boolean;
}
