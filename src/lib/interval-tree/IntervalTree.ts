/**
 * IntervalTree - AVL-balanced interval tree.
 *
 * Each node is keyed on its interval's `start` and stores the largest `end`
 * in its subtree (`maxEnd`), which lets point and range queries skip whole
 * subtrees. Insert, remove and query are O(log n) (+ k for the results).
 *
 * Equal starts descend to the right on insert. Rotations can later move an
 * equal-start node into a left subtree, so the in-order sequence is only
 * non-decreasing: left keys are <= the node's start and right keys are >=.
 * Removal accounts for this by searching both sides on a start tie.
 */

import { createInterval } from './types';
import type { Interval, IntervalTreeOptions, PayloadEquals } from './types';

interface IntervalNode<T> {
  interval: Interval<T>;
  /** Largest `end` in this node's subtree */
  maxEnd: number;
  /** Subtree height (a leaf has height 1) */
  height: number;
  left: IntervalNode<T> | null;
  right: IntervalNode<T> | null;
}

/**
 * Predicate deciding whether a node's interval is the one being looked for.
 */
type IntervalMatcher<T> = (interval: Interval<T>) => boolean;

// ============================================================================
// Node helpers
// ============================================================================

function createNode<T>(interval: Interval<T>): IntervalNode<T> {
  return {
    interval,
    maxEnd: interval.end,
    height: 1,
    left: null,
    right: null
  };
}

function heightOf<T>(node: IntervalNode<T> | null): number {
  return node ? node.height : 0;
}

function balanceFactor<T>(node: IntervalNode<T> | null): number {
  return node ? heightOf(node.left) - heightOf(node.right) : 0;
}

/**
 * Recompute height and maxEnd from the node's children.
 */
function refresh<T>(node: IntervalNode<T>): void {
  node.height = 1 + Math.max(heightOf(node.left), heightOf(node.right));
  let maxEnd = node.interval.end;
  if (node.left && node.left.maxEnd > maxEnd) {
    maxEnd = node.left.maxEnd;
  }
  if (node.right && node.right.maxEnd > maxEnd) {
    maxEnd = node.right.maxEnd;
  }
  node.maxEnd = maxEnd;
}

function rotateRight<T>(y: IntervalNode<T>): IntervalNode<T> {
  const x = y.left;
  if (!x) {
    return y;
  }

  y.left = x.right;
  x.right = y;

  // y is now below x, so it must be refreshed first
  refresh(y);
  refresh(x);
  return x;
}

function rotateLeft<T>(x: IntervalNode<T>): IntervalNode<T> {
  const y = x.right;
  if (!y) {
    return x;
  }

  x.right = y.left;
  y.left = x;

  refresh(x);
  refresh(y);
  return y;
}

/**
 * Restore the AVL property at a node whose children are already balanced,
 * choosing the rotation case from the heavier child's balance factor.
 */
function rebalance<T>(node: IntervalNode<T>): IntervalNode<T> {
  refresh(node);
  const balance = balanceFactor(node);

  if (balance > 1 && node.left) {
    if (balanceFactor(node.left) < 0) {
      node.left = rotateLeft(node.left);
    }
    return rotateRight(node);
  }

  if (balance < -1 && node.right) {
    if (balanceFactor(node.right) > 0) {
      node.right = rotateRight(node.right);
    }
    return rotateLeft(node);
  }

  return node;
}

// ============================================================================
// Insert
// ============================================================================

function insertNode<T>(node: IntervalNode<T> | null, interval: Interval<T>): IntervalNode<T> {
  if (!node) {
    return createNode(interval);
  }

  if (interval.start < node.interval.start) {
    node.left = insertNode(node.left, interval);
  } else {
    node.right = insertNode(node.right, interval);
  }

  refresh(node);
  const balance = balanceFactor(node);

  // The case is picked with the same comparison the descent used at the
  // child, so ties (which went right) select the inner/outer case correctly.
  if (balance > 1 && node.left) {
    if (interval.start < node.left.interval.start) {
      // Left-Left
      return rotateRight(node);
    }
    // Left-Right
    node.left = rotateLeft(node.left);
    return rotateRight(node);
  }

  if (balance < -1 && node.right) {
    if (interval.start >= node.right.interval.start) {
      // Right-Right
      return rotateLeft(node);
    }
    // Right-Left
    node.right = rotateRight(node.right);
    return rotateLeft(node);
  }

  return node;
}

// ============================================================================
// Remove
// ============================================================================

interface RemoveState {
  removed: boolean;
}

/**
 * Detach the leftmost node of a subtree, returning its interval and the
 * rebalanced remainder.
 */
function detachMin<T>(
  node: IntervalNode<T>
): { interval: Interval<T>; rest: IntervalNode<T> | null } {
  if (!node.left) {
    return { interval: node.interval, rest: node.right };
  }
  const detached = detachMin(node.left);
  node.left = detached.rest;
  return { interval: detached.interval, rest: rebalance(node) };
}

function removeNode<T>(
  node: IntervalNode<T> | null,
  start: number,
  end: number,
  matches: IntervalMatcher<T>,
  state: RemoveState
): IntervalNode<T> | null {
  if (!node) {
    return null;
  }

  if (start < node.interval.start) {
    node.left = removeNode(node.left, start, end, matches, state);
  } else if (start > node.interval.start) {
    node.right = removeNode(node.right, start, end, matches, state);
  } else if (node.interval.end === end && matches(node.interval)) {
    state.removed = true;

    if (!node.left) {
      return node.right;
    }
    if (!node.right) {
      return node.left;
    }

    // Two children: take over the in-order successor's interval
    const successor = detachMin(node.right);
    node.interval = successor.interval;
    node.right = successor.rest;
  } else {
    // Start tie without a match: the target may sit on either side
    if (node.left && node.left.maxEnd >= end) {
      node.left = removeNode(node.left, start, end, matches, state);
    }
    if (!state.removed) {
      node.right = removeNode(node.right, start, end, matches, state);
    }
  }

  if (!state.removed) {
    return node;
  }
  return rebalance(node);
}

function findNode<T>(
  node: IntervalNode<T> | null,
  start: number,
  end: number,
  matches: IntervalMatcher<T>
): boolean {
  if (!node || node.maxEnd < end) {
    return false;
  }

  if (start < node.interval.start) {
    return findNode(node.left, start, end, matches);
  }
  if (start > node.interval.start) {
    return findNode(node.right, start, end, matches);
  }
  if (node.interval.end === end && matches(node.interval)) {
    return true;
  }
  return findNode(node.left, start, end, matches) || findNode(node.right, start, end, matches);
}

// ============================================================================
// Queries
// ============================================================================

function collectAtPoint<T>(node: IntervalNode<T> | null, point: number, out: T[]): void {
  if (!node || node.maxEnd < point) {
    return;
  }

  collectAtPoint(node.left, point, out);

  if (node.interval.start <= point && point <= node.interval.end) {
    out.push(node.interval.payload);
  }

  // Everything to the right starts at or after this node
  if (node.interval.start <= point) {
    collectAtPoint(node.right, point, out);
  }
}

function collectOverlaps<T>(
  node: IntervalNode<T> | null,
  start: number,
  end: number,
  out: T[]
): void {
  if (!node || node.maxEnd < start) {
    return;
  }

  collectOverlaps(node.left, start, end, out);

  if (node.interval.start <= end && start <= node.interval.end) {
    out.push(node.interval.payload);
  }

  if (node.interval.start <= end) {
    collectOverlaps(node.right, start, end, out);
  }
}

function collectInOrder<T>(node: IntervalNode<T> | null, out: Interval<T>[]): void {
  if (!node) {
    return;
  }
  collectInOrder(node.left, out);
  out.push(node.interval);
  collectInOrder(node.right, out);
}

function isSubtreeBalanced<T>(node: IntervalNode<T> | null): boolean {
  if (!node) {
    return true;
  }
  if (Math.abs(balanceFactor(node)) > 1) {
    return false;
  }
  return isSubtreeBalanced(node.left) && isSubtreeBalanced(node.right);
}

interface SubtreeSummary {
  height: number;
  maxEnd: number;
  count: number;
  minStart: number;
  maxStart: number;
}

/**
 * Recompute every aggregate from scratch and record where the stored values
 * disagree. Heights are measured, not read, so a corrupt height is caught
 * even when the balance factor computed from stored heights looks fine.
 */
function inspectSubtree<T>(
  node: IntervalNode<T> | null,
  path: string,
  issues: string[]
): SubtreeSummary | null {
  if (!node) {
    return null;
  }

  const left = inspectSubtree(node.left, `${path}.left`, issues);
  const right = inspectSubtree(node.right, `${path}.right`, issues);
  const { start, end } = node.interval;
  const label = `${path} [${start}, ${end}]`;

  const leftHeight = left ? left.height : 0;
  const rightHeight = right ? right.height : 0;
  const height = 1 + Math.max(leftHeight, rightHeight);
  const maxEnd = Math.max(end, left ? left.maxEnd : end, right ? right.maxEnd : end);

  if (!(start <= end)) {
    issues.push(`${label}: start is greater than end`);
  }
  if (Math.abs(leftHeight - rightHeight) > 1) {
    issues.push(`${label}: balance factor ${leftHeight - rightHeight} is out of range`);
  }
  if (node.height !== height) {
    issues.push(`${label}: stored height ${node.height}, actual ${height}`);
  }
  if (node.maxEnd !== maxEnd) {
    issues.push(`${label}: stored maxEnd ${node.maxEnd}, actual ${maxEnd}`);
  }
  if (left && left.maxStart > start) {
    issues.push(`${label}: left subtree has start ${left.maxStart} greater than ${start}`);
  }
  if (right && right.minStart < start) {
    issues.push(`${label}: right subtree has start ${right.minStart} less than ${start}`);
  }

  return {
    height,
    maxEnd,
    count: 1 + (left ? left.count : 0) + (right ? right.count : 0),
    minStart: left ? Math.min(left.minStart, start) : start,
    maxStart: right ? Math.max(right.maxStart, start) : start
  };
}

// ============================================================================
// IntervalTree
// ============================================================================

/**
 * AVL-balanced tree of closed intervals with attached payloads.
 *
 * @example
 * ```typescript
 * const tree = new IntervalTree<string>();
 * tree.insert(0, 10, 'a');
 * tree.insert(5, 15, 'b');
 * tree.query(7);            // ['a', 'b']
 * tree.findOverlaps(11, 20); // ['b']
 * tree.remove(0, 10, 'a');   // true
 * ```
 */
export class IntervalTree<T> {
  private root: IntervalNode<T> | null = null;
  private _size: number = 0;
  private readonly equals: PayloadEquals<T>;

  constructor(options: IntervalTreeOptions<T> = {}) {
    this.equals = options.equals ?? Object.is;
  }

  /**
   * Number of intervals in the tree.
   */
  get size(): number {
    return this._size;
  }

  /**
   * Alias of `size`.
   */
  len(): number {
    return this._size;
  }

  isEmpty(): boolean {
    return this.root === null;
  }

  /**
   * Height of the tree (0 when empty).
   */
  height(): number {
    return heightOf(this.root);
  }

  /**
   * Insert the closed interval [start, end].
   *
   * @throws IntervalError when start > end or either bound is NaN
   */
  insert(start: number, end: number, payload: T): void {
    const interval = createInterval(start, end, payload);
    this.root = insertNode(this.root, interval);
    this._size++;
  }

  /**
   * Remove one interval matching [start, end] exactly. When a payload is
   * given (not undefined), the stored payload must also be equal to it.
   *
   * A missing interval is not an error: the tree is left untouched and
   * `false` is returned.
   */
  remove(start: number, end: number, payload?: T): boolean {
    const state: RemoveState = { removed: false };
    this.root = removeNode(this.root, start, end, this.matcherFor(payload), state);
    if (state.removed) {
      this._size--;
    }
    return state.removed;
  }

  /**
   * Check for an interval matching [start, end] (and the payload, if given).
   */
  contains(start: number, end: number, payload?: T): boolean {
    return findNode(this.root, start, end, this.matcherFor(payload));
  }

  /**
   * Payloads of all intervals containing the point, in ascending start order.
   */
  query(point: number): T[] {
    const result: T[] = [];
    collectAtPoint(this.root, point, result);
    return result;
  }

  /**
   * Payloads of all intervals [s, e] with s <= end and start <= e, in
   * ascending start order.
   */
  findOverlaps(start: number, end: number): T[] {
    const result: T[] = [];
    if (start > end) {
      return result;
    }
    collectOverlaps(this.root, start, end, result);
    return result;
  }

  clear(): void {
    this.root = null;
    this._size = 0;
  }

  /**
   * Snapshot of all intervals in ascending start order.
   */
  toArray(): Interval<T>[] {
    const result: Interval<T>[] = [];
    collectInOrder(this.root, result);
    return result;
  }

  /**
   * Check the AVL balance factor at every node.
   */
  isBalanced(): boolean {
    return isSubtreeBalanced(this.root);
  }

  /**
   * Check every structural invariant and describe each violation found.
   * Returns an empty array for a consistent tree. Intended for tests and
   * debugging; O(n).
   */
  validate(): string[] {
    const issues: string[] = [];
    const summary = inspectSubtree(this.root, 'root', issues);
    const count = summary ? summary.count : 0;
    if (count !== this._size) {
      issues.push(`size is ${this._size} but the tree holds ${count} nodes`);
    }
    return issues;
  }

  private matcherFor(payload: T | undefined): IntervalMatcher<T> {
    if (payload === undefined) {
      return () => true;
    }
    const target: T = payload;
    return (interval) => this.equals(interval.payload, target);
  }
}
