export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface Rect extends Point, Size {}

/**
 * Stable identity of an indexed element.
 */
export type ElementId = string | number;

/**
 * Reference to an element owned by the surrounding UI layer.
 *
 * The index only reads these fields; it never creates, mutates or
 * disposes elements. `bounds` must reflect the element's current layout
 * whenever it is inserted, removed or updated.
 */
export interface ElementHandle {
  readonly id: ElementId;
  readonly bounds: Readonly<Rect>;
  /** Paint order; higher values are drawn on top. */
  readonly zIndex: number;
}
