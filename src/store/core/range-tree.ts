/**
 * Range tree: the ordered set of loaded ranges as an immutable Red-Black tree.
 * Nodes are keyed by start offset. Because ranges never overlap or touch,
 * in-order traversal yields them sorted by both start and end, which lets
 * every lookup prune on a single comparison.
 *
 * All operations return new tree structures with structural sharing.
 */

import type { RangeNode, RangeExtent } from '../../types/state.ts';
import { byteOffset, byteLength, endOf, type ByteOffset } from '../../types/branded.ts';
import { createRangeNode, withRangeNode } from './state.ts';
import {
  concatTrees,
  fixInsertWithPath,
  splitTree,
  type InsertionPathEntry,
  type WithNodeFn,
} from './rb-tree.ts';

// Type-safe wrapper for withRangeNode to use with generic R-B tree functions
const withRange: WithNodeFn<RangeNode> = withRangeNode;

/**
 * Exclusive end offset of a range.
 */
export function rangeEnd(node: RangeExtent): number {
  return endOf(node.start, node.length);
}

// =============================================================================
// Tree Traversal
// =============================================================================

/**
 * Collect all ranges in ascending order (in-order traversal).
 */
export function collectRanges(root: RangeNode | null): readonly RangeNode[] {
  const result: RangeNode[] = [];

  function inOrder(node: RangeNode | null) {
    if (node === null) return;
    inOrder(node.left);
    result.push(node);
    inOrder(node.right);
  }

  inOrder(root);
  return result;
}

/**
 * Yield, in ascending order, every range whose exclusive end is at or after
 * `position`. A range ending exactly at `position` is included, so callers
 * looking for touching neighbours see it.
 *
 * Subtrees that end before `position` are skipped without being visited.
 */
export function* iterateRangesFrom(
  root: RangeNode | null,
  position: number
): Generator<RangeNode, void, undefined> {
  // Explicit stack: descending left only while the node itself qualifies
  const stack: RangeNode[] = [];
  let current = root;

  while (current !== null || stack.length > 0) {
    while (current !== null) {
      if (rangeEnd(current) >= position) {
        stack.push(current);
        current = current.left;
      } else {
        // Whole left subtree ends before this node does
        current = current.right;
      }
    }
    const node = stack.pop();
    if (node === undefined) return;
    yield node;
    current = node.right;
  }
}

/**
 * Find the range containing a byte offset.
 * Returns null if the offset is not loaded.
 */
export function findRangeAt(root: RangeNode | null, position: ByteOffset): RangeNode | null {
  let current = root;
  while (current !== null) {
    if (position < current.start) {
      current = current.left;
    } else if (position >= rangeEnd(current)) {
      current = current.right;
    } else {
      return current;
    }
  }
  return null;
}

/**
 * Number of ranges in the tree. O(1).
 */
export function getRangeCount(root: RangeNode | null): number {
  return root?.subtreeCount ?? 0;
}

/**
 * Total loaded bytes in the tree. O(1).
 */
export function getLoadedLength(root: RangeNode | null): number {
  return root?.subtreeLoaded ?? 0;
}

/**
 * Holes (unloaded spans) inside `[start, end)`, in ascending order.
 */
export function findGaps(
  root: RangeNode | null,
  start: number,
  end: number
): readonly RangeExtent[] {
  const gaps: RangeExtent[] = [];
  let position = start;

  for (const node of iterateRangesFrom(root, start)) {
    if (node.start >= end) break;
    if (node.start > position) {
      gaps.push({ start: byteOffset(position), length: byteLength(node.start - position) });
    }
    position = Math.max(position, rangeEnd(node));
  }

  if (position < end) {
    gaps.push({ start: byteOffset(position), length: byteLength(end - position) });
  }
  return gaps;
}

// =============================================================================
// Red-Black Tree Insert (Immutable)
// =============================================================================

/**
 * Insert a new range holding `data` at `start`.
 * The caller guarantees it neither overlaps nor touches an existing range.
 * Returns the new root of the tree.
 */
export function rbInsertRange(
  root: RangeNode | null,
  start: ByteOffset,
  data: Uint8Array
): RangeNode {
  const leaf = createRangeNode(start, data, 'red');

  if (root === null) {
    return withRangeNode(leaf, { color: 'black' });
  }

  const path: InsertionPathEntry<RangeNode>[] = [];
  let current: RangeNode | null = root;
  while (current !== null) {
    const direction: 'left' | 'right' = start < current.start ? 'left' : 'right';
    path.push({ node: current, direction });
    current = direction === 'left' ? current.left : current.right;
  }

  const parent = path[path.length - 1];
  parent.node = parent.direction === 'left'
    ? withRangeNode(parent.node, { left: leaf })
    : withRangeNode(parent.node, { right: leaf });

  return fixInsertWithPath(path, withRange);
}

// =============================================================================
// Range Removal
// =============================================================================

/**
 * Whether any node starts inside `[firstStart, lastStart]`.
 */
function hasRangeStartingIn(root: RangeNode | null, firstStart: number, lastStart: number): boolean {
  let current = root;
  while (current !== null) {
    if (current.start < firstStart) {
      current = current.right;
    } else if (current.start > lastStart) {
      current = current.left;
    } else {
      return true;
    }
  }
  return false;
}

/**
 * Drop every node whose start lies in `[firstStart, lastStart]`.
 * Splits off the nodes on either side of the key span and joins them back,
 * so the result is a valid Red-Black tree. O(log n) however many nodes go.
 * Returns the input tree itself when nothing starts in the span.
 */
export function removeRangesBetween(
  root: RangeNode | null,
  firstStart: number,
  lastStart: number
): RangeNode | null {
  if (!hasRangeStartingIn(root, firstStart, lastStart)) return root;

  const [below] = splitTree(root, (node) => node.start < firstStart, withRange);
  const [, above] = splitTree(root, (node) => node.start <= lastStart, withRange);
  return concatTrees(below, above, withRange);
}
