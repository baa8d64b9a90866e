/**
 * Randomized tests for HitTestSystem against a linear scan
 */
import { describe, it, expect } from 'vitest';
import { HitTestSystem } from '../../../lib/hit-test/HitTestSystem';
import { containsPoint } from '../../../lib/hit-test/geometry';
import type { ElementHandle, Rect } from '../../../lib/types';
import { createRandom } from '../../helpers/random';
import type { Random } from '../../helpers/random';
import {
  bruteForceAt,
  bruteForceInRect,
  makeWidget,
  randomWidgets,
  sortedIds
} from '../../helpers/widgetFixtures';
import type { TestWidget } from '../../helpers/widgetFixtures';

/**
 * Results must be sorted by zIndex descending, then by most recent
 * insertion. Widgets here are inserted in ascending numeric id order.
 */
function expectPaintOrder(results: readonly ElementHandle[]): void {
  for (let i = 1; i < results.length; i++) {
    const above = results[i - 1];
    const below = results[i];
    const ordered =
      above.zIndex > below.zIndex ||
      (above.zIndex === below.zIndex && Number(above.id) > Number(below.id));
    expect(ordered).toBe(true);
  }
}

function center(rect: Rect): { x: number; y: number } {
  return { x: rect.x + rect.width / 2, y: rect.y + rect.height / 2 };
}

/**
 * Widgets snapped to a coarse grid so many share x or y starts.
 */
function gridWidgets(random: Random, count: number): TestWidget[] {
  const widgets: TestWidget[] = [];
  for (let i = 0; i < count; i++) {
    widgets.push(
      makeWidget(
        i,
        random.int(0, 20) * 10,
        random.int(0, 20) * 10,
        random.int(0, 5) * 10,
        random.int(0, 5) * 10,
        random.int(0, 3)
      )
    );
  }
  return widgets;
}

describe('HitTestSystem (randomized)', () => {
  it('should match a linear scan for 1000 widgets and 100 points', () => {
    const random = createRandom(42);
    const widgets = randomWidgets(random, 1000);
    const system = new HitTestSystem();
    for (const widget of widgets) {
      system.insertWidget(widget);
    }

    expect(system.len()).toBe(1000);
    expect(system.verifyIntegrity()).toBe(true);

    for (let q = 0; q < 100; q++) {
      const x = random.float(0, 1100);
      const y = random.float(0, 1100);
      const results = system.findWidgetsAt(x, y);

      expect(sortedIds(results)).toEqual(sortedIds(bruteForceAt(widgets, x, y)));
      expectPaintOrder(results);
    }
  });

  it('should find every widget at its own center', () => {
    const random = createRandom(7);
    const widgets = randomWidgets(random, 300);
    const system = new HitTestSystem();
    for (const widget of widgets) {
      system.insertWidget(widget);
    }

    for (const widget of widgets.slice(0, 100)) {
      const { x, y } = center(widget.bounds);
      const results = system.findWidgetsAt(x, y);

      expect(results).toContain(widget);
      expect(sortedIds(results)).toEqual(sortedIds(bruteForceAt(widgets, x, y)));
      expectPaintOrder(results);
    }
  });

  it('should match a linear scan for rectangle queries', () => {
    const random = createRandom(11);
    const widgets = randomWidgets(random, 500);
    const system = new HitTestSystem();
    system.rebuildFromWidgets(widgets);

    for (let q = 0; q < 50; q++) {
      const rect = {
        x: random.float(0, 1000),
        y: random.float(0, 1000),
        width: random.float(0, 150),
        height: random.float(0, 150)
      };
      const results = system.findWidgetsInRect(rect);

      expect(sortedIds(results)).toEqual(sortedIds(bruteForceInRect(widgets, rect)));
      expectPaintOrder(results);
    }
  });

  it('should keep the trees consistent through random mutations', () => {
    const random = createRandom(99);
    const pool = gridWidgets(random, 60);
    const live = new Map<number, TestWidget>();
    const system = new HitTestSystem();

    for (let step = 0; step < 400; step++) {
      const widget = pool[random.int(0, pool.length - 1)];
      const id = Number(widget.id);

      if (!live.has(id)) {
        system.insertWidget(widget);
        live.set(id, widget);
      } else if (random.next() < 0.5) {
        expect(system.removeWidget(widget)).toBe(true);
        live.delete(id);
      } else {
        const oldBounds = { ...widget.bounds };
        widget.bounds = {
          x: random.int(0, 20) * 10,
          y: random.int(0, 20) * 10,
          width: random.int(0, 5) * 10,
          height: random.int(0, 5) * 10
        };
        system.updateWidget(widget, oldBounds);

        // Present at the new position, gone from any old-only position
        const now = center(widget.bounds);
        expect(system.findWidgetsAt(now.x, now.y)).toContain(widget);
        const before = center(oldBounds);
        if (!containsPoint(widget.bounds, before.x, before.y)) {
          expect(system.findWidgetsAt(before.x, before.y)).not.toContain(widget);
        }
      }

      expect(system.verifyIntegrity()).toBe(true);
      expect(system.len()).toBe(live.size);
      expect(system.getStatsSnapshot().xTreeSize).toBe(live.size);
      expect(system.getStatsSnapshot().yTreeSize).toBe(live.size);

      if (step % 20 === 0) {
        const x = random.int(0, 25) * 10;
        const y = random.int(0, 25) * 10;
        const expected = bruteForceAt(Array.from(live.values()), x, y);
        expect(sortedIds(system.findWidgetsAt(x, y))).toEqual(sortedIds(expected));
      }
    }
  });

  it('should give the same answers after a rebuild as after sequential inserts', () => {
    const random = createRandom(123);
    const widgets = gridWidgets(random, 200);

    const rebuilt = new HitTestSystem();
    for (const widget of gridWidgets(random, 50)) {
      rebuilt.insertWidget(makeWidget(`prior-${widget.id}`, widget.bounds.x, widget.bounds.y, 10, 10));
    }
    rebuilt.rebuildFromWidgets(widgets);

    const sequential = new HitTestSystem();
    for (const widget of widgets) {
      sequential.insertWidget(widget);
    }

    expect(rebuilt.verifyIntegrity()).toBe(true);
    expect(rebuilt.len()).toBe(widgets.length);

    for (let q = 0; q < 100; q++) {
      const x = random.int(0, 250);
      const y = random.int(0, 250);
      expect(rebuilt.findWidgetsAt(x, y)).toEqual(sequential.findWidgetsAt(x, y));
    }
  });
});
