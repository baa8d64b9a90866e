/**
 * Rectangle helpers for hit testing.
 *
 * Edges are inclusive on every side: a point on the right or bottom edge is
 * inside, and rectangles that only share an edge overlap.
 */

import type { Rect } from '../types';

export function createRect(x: number, y: number, width: number, height: number): Rect {
  return { x, y, width, height };
}

export function rectRight(rect: Readonly<Rect>): number {
  return rect.x + rect.width;
}

export function rectBottom(rect: Readonly<Rect>): number {
  return rect.y + rect.height;
}

/**
 * Check if a point is within bounds.
 */
export function containsPoint(rect: Readonly<Rect>, x: number, y: number): boolean {
  return (
    x >= rect.x &&
    x <= rectRight(rect) &&
    y >= rect.y &&
    y <= rectBottom(rect)
  );
}

export function rectsOverlap(a: Readonly<Rect>, b: Readonly<Rect>): boolean {
  return (
    a.x <= rectRight(b) &&
    b.x <= rectRight(a) &&
    a.y <= rectBottom(b) &&
    b.y <= rectBottom(a)
  );
}
