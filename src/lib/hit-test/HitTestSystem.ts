/**
 * HitTestSystem - Spatial index answering "what is under this point?".
 *
 * Elements are indexed by two interval trees, one per axis:
 * - xTree holds each element's horizontal extent [x, x + width]
 * - yTree holds each element's vertical extent [y, y + height]
 *
 * A point or rectangle query asks both trees independently, keeps the
 * elements found on both axes, re-checks the exact geometry and sorts the
 * survivors front to back. Queries cost O(log n + k).
 *
 * The index does not observe elements. Whenever an element's bounds change,
 * the caller must report the previous bounds through updateWidget(), since
 * that is the only way to find the stale entries.
 */

import { EventEmitter } from '../events/EventEmitter';
import { IntervalTree } from '../interval-tree/IntervalTree';
import { createInterval } from '../interval-tree/types';
import type { ElementHandle, ElementId, Rect } from '../types';
import { containsPoint, rectBottom, rectRight, rectsOverlap } from './geometry';
import { DEFAULT_HIT_TEST_OPTIONS } from './types';
import type { HitTestEvents, HitTestOptions, HitTestStats } from './types';

function sameElement(a: ElementHandle, b: ElementHandle): boolean {
  return a.id === b.id;
}

/**
 * Throws IntervalError if either axis of the bounds is malformed.
 */
function assertIndexable(handle: ElementHandle): void {
  const { bounds } = handle;
  createInterval(bounds.x, rectRight(bounds), handle);
  createInterval(bounds.y, rectBottom(bounds), handle);
}

export class HitTestSystem extends EventEmitter<HitTestEvents> {
  private readonly xTree: IntervalTree<ElementHandle>;
  private readonly yTree: IntervalTree<ElementHandle>;
  private widgetCount: number = 0;
  private readonly options: Required<HitTestOptions>;

  /**
   * Insertion sequence per element, used to order elements with equal
   * zIndex (most recently inserted first).
   */
  private insertionOrder: Map<ElementId, number> = new Map();
  private nextSequence: number = 0;

  constructor(options: HitTestOptions = {}) {
    super();
    this.options = { ...DEFAULT_HIT_TEST_OPTIONS, ...options };
    this.xTree = new IntervalTree<ElementHandle>({ equals: sameElement });
    this.yTree = new IntervalTree<ElementHandle>({ equals: sameElement });
  }

  /**
   * Number of widgets in the index.
   */
  get size(): number {
    return this.widgetCount;
  }

  /**
   * Alias of `size`.
   */
  len(): number {
    return this.widgetCount;
  }

  isEmpty(): boolean {
    return this.widgetCount === 0;
  }

  /**
   * Remove all widgets.
   */
  clear(): void {
    this.reset();
    this.emit('cleared');
  }

  // ============================================================================
  // Widget management
  // ============================================================================

  /**
   * Index a widget by its current bounds.
   *
   * @throws IntervalError if the bounds have a negative or NaN extent; the
   * index is left unchanged
   */
  insertWidget(handle: ElementHandle): void {
    assertIndexable(handle);
    this.addToTrees(handle);
    this.widgetCount++;
    this.emit('widget-inserted', handle);
  }

  /**
   * Remove a widget using its current bounds.
   *
   * Returns false, changing nothing, when either tree has no entry for the
   * widget at those bounds (for example when its bounds changed without a
   * matching updateWidget call).
   */
  removeWidget(handle: ElementHandle): boolean {
    const { bounds } = handle;
    const xEnd = rectRight(bounds);
    const yEnd = rectBottom(bounds);

    if (
      !this.xTree.contains(bounds.x, xEnd, handle) ||
      !this.yTree.contains(bounds.y, yEnd, handle)
    ) {
      if (this.options.warnOnMissingRemoval) {
        console.warn(
          `[HitTestSystem] removeWidget: no entry for element ${String(handle.id)} at ` +
          `(${bounds.x}, ${bounds.y}, ${bounds.width}, ${bounds.height})`
        );
      }
      return false;
    }

    this.xTree.remove(bounds.x, xEnd, handle);
    this.yTree.remove(bounds.y, yEnd, handle);
    this.widgetCount--;
    this.insertionOrder.delete(handle.id);
    this.emit('widget-removed', handle);
    return true;
  }

  /**
   * Move a widget's entries from oldBounds to its current bounds.
   *
   * `oldBounds` must be the bounds the widget was last indexed with. If they
   * are wrong the stale entries stay in the trees, the tree sizes drift from
   * the widget count and verifyIntegrity() reports false.
   *
   * @example
   * ```typescript
   * const oldBounds = { ...widget.bounds };
   * widget.bounds = newBounds;
   * system.updateWidget(widget, oldBounds);
   * ```
   *
   * @throws IntervalError if the current bounds are malformed; the index is
   * left unchanged
   */
  updateWidget(handle: ElementHandle, oldBounds: Readonly<Rect>): void {
    assertIndexable(handle);

    this.xTree.remove(oldBounds.x, rectRight(oldBounds), handle);
    this.yTree.remove(oldBounds.y, rectBottom(oldBounds), handle);
    this.addToTrees(handle);

    this.emit('widget-updated', { handle, oldBounds: { ...oldBounds } });
  }

  /**
   * Replace the whole index with the given widgets, inserted in list order.
   * Cheaper than many updateWidget calls when most widgets moved at once.
   *
   * @throws IntervalError if any widget has malformed bounds; the previous
   * contents are kept in that case
   */
  rebuildFromWidgets(handles: readonly ElementHandle[]): void {
    for (const handle of handles) {
      assertIndexable(handle);
    }

    this.reset();
    for (const handle of handles) {
      this.addToTrees(handle);
    }
    this.widgetCount = handles.length;

    this.emit('rebuilt', { count: this.widgetCount });
  }

  /**
   * Check whether the widget is indexed at its current bounds.
   */
  hasWidget(handle: ElementHandle): boolean {
    const { bounds } = handle;
    return (
      this.xTree.contains(bounds.x, rectRight(bounds), handle) &&
      this.yTree.contains(bounds.y, rectBottom(bounds), handle)
    );
  }

  // ============================================================================
  // Spatial queries
  // ============================================================================

  /**
   * Find all widgets containing the point, front to back.
   */
  findWidgetsAt(x: number, y: number): ElementHandle[] {
    const xCandidates = this.xTree.query(x);
    if (xCandidates.length === 0) {
      return [];
    }
    const yCandidates = this.yTree.query(y);

    return this.intersect(xCandidates, yCandidates, (handle) =>
      containsPoint(handle.bounds, x, y)
    );
  }

  /**
   * Find all widgets overlapping the rectangle, front to back. Touching
   * edges count as overlap.
   */
  findWidgetsInRect(rect: Readonly<Rect>): ElementHandle[] {
    const xCandidates = this.xTree.findOverlaps(rect.x, rectRight(rect));
    if (xCandidates.length === 0) {
      return [];
    }
    const yCandidates = this.yTree.findOverlaps(rect.y, rectBottom(rect));

    return this.intersect(xCandidates, yCandidates, (handle) =>
      rectsOverlap(handle.bounds, rect)
    );
  }

  /**
   * The front-most widget at the point, or null.
   */
  findTopWidgetAt(x: number, y: number): ElementHandle | null {
    return this.findWidgetsAt(x, y)[0] ?? null;
  }

  /**
   * Get the widget under the cursor. Same as findTopWidgetAt().
   */
  getWidgetAt(x: number, y: number): ElementHandle | null {
    return this.findTopWidgetAt(x, y);
  }

  // ============================================================================
  // Diagnostics
  // ============================================================================

  /**
   * Check that both trees hold exactly one entry per widget and are
   * structurally sound (AVL balance, heights, maxEnd aggregates).
   */
  verifyIntegrity(): boolean {
    if (this.xTree.size !== this.yTree.size) {
      return false;
    }
    if (this.widgetCount !== this.xTree.size) {
      return false;
    }
    return this.xTree.validate().length === 0 && this.yTree.validate().length === 0;
  }

  getStatsSnapshot(): HitTestStats {
    return {
      widgetCount: this.widgetCount,
      xTreeSize: this.xTree.size,
      yTreeSize: this.yTree.size,
      xTreeHeight: this.xTree.height(),
      yTreeHeight: this.yTree.height(),
      xTreeBalanced: this.xTree.isBalanced(),
      yTreeBalanced: this.yTree.isBalanced()
    };
  }

  /**
   * Human-readable summary for debugging.
   */
  getStats(): string {
    const stats = this.getStatsSnapshot();
    return [
      'HitTestSystem Stats:',
      `  Widget count: ${stats.widgetCount}`,
      `  X-tree size: ${stats.xTreeSize}`,
      `  Y-tree size: ${stats.yTreeSize}`,
      `  X-tree height: ${stats.xTreeHeight}`,
      `  Y-tree height: ${stats.yTreeHeight}`,
      `  X-tree balanced: ${stats.xTreeBalanced}`,
      `  Y-tree balanced: ${stats.yTreeBalanced}`
    ].join('\n');
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private addToTrees(handle: ElementHandle): void {
    const { bounds } = handle;
    this.xTree.insert(bounds.x, rectRight(bounds), handle);
    this.yTree.insert(bounds.y, rectBottom(bounds), handle);
    if (!this.insertionOrder.has(handle.id)) {
      this.insertionOrder.set(handle.id, this.nextSequence++);
    }
  }

  private reset(): void {
    this.xTree.clear();
    this.yTree.clear();
    this.widgetCount = 0;
    this.insertionOrder.clear();
    this.nextSequence = 0;
  }

  /**
   * Keep the x candidates that were also found on the y axis, once each,
   * and sort them front to back.
   */
  private intersect(
    xCandidates: readonly ElementHandle[],
    yCandidates: readonly ElementHandle[],
    isHit: (handle: ElementHandle) => boolean
  ): ElementHandle[] {
    const yIds = new Set<ElementId>();
    for (const handle of yCandidates) {
      yIds.add(handle.id);
    }

    const seen = new Set<ElementId>();
    const hits: ElementHandle[] = [];
    for (const handle of xCandidates) {
      if (!yIds.has(handle.id) || seen.has(handle.id)) {
        continue;
      }
      seen.add(handle.id);
      if (this.options.exactCheck && !isHit(handle)) {
        continue;
      }
      hits.push(handle);
    }

    hits.sort((a, b) => b.zIndex - a.zIndex || this.sequenceOf(b) - this.sequenceOf(a));
    return hits;
  }

  private sequenceOf(handle: ElementHandle): number {
    return this.insertionOrder.get(handle.id) ?? -1;
  }
}
