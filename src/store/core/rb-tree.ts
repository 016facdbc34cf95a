/**
 * Generic Red-Black tree utilities for persistent trees.
 * Nodes are never mutated: every structural change goes through a
 * caller-supplied `withNode` that returns a fresh node and recomputes the
 * concrete node type's subtree aggregates.
 */

import type { NodeColor, RBNode } from '../../types/state.ts';

export type { RBNode };

// =============================================================================
// Types
// =============================================================================

/**
 * Function type for creating a new node with updated structure.
 */
export type WithNodeFn<N extends RBNode<N>> = (
  node: N,
  updates: Partial<{ color: NodeColor; left: N | null; right: N | null }>
) => N;

/**
 * One step of a root-to-leaf descent: the copied node and the side taken.
 */
export interface InsertionPathEntry<N extends RBNode<N>> {
  node: N;
  direction: 'left' | 'right';
}

// =============================================================================
// Color Utilities
// =============================================================================

/**
 * Null children count as black.
 */
export function isRed<N extends RBNode<N>>(node: N | null | undefined): boolean {
  return node != null && node.color === 'red';
}

// =============================================================================
// Rotations
// =============================================================================

/**
 * Rotate left at `node`, returning the new subtree root.
 *
 *       x                y
 *      / \              / \
 *     a   y    =>      x   c
 *        / \          / \
 *       b   c        a   b
 */
export function rotateLeft<N extends RBNode<N>>(node: N, withNode: WithNodeFn<N>): N {
  const pivot = node.right;
  if (pivot === null) return node;
  return withNode(pivot, { left: withNode(node, { right: pivot.left }) });
}

/**
 * Rotate right at `node`, returning the new subtree root.
 *
 *         y            x
 *        / \          / \
 *       x   c   =>   a   y
 *      / \              / \
 *     a   b            b   c
 */
export function rotateRight<N extends RBNode<N>>(node: N, withNode: WithNodeFn<N>): N {
  const pivot = node.left;
  if (pivot === null) return node;
  return withNode(pivot, { right: withNode(node, { left: pivot.right }) });
}

// =============================================================================
// Balancing
// =============================================================================

function ensureBlackRoot<N extends RBNode<N>>(node: N, withNode: WithNodeFn<N>): N {
  return node.color === 'red' ? withNode(node, { color: 'black' }) : node;
}

/**
 * Recolor a rotated subtree root black with both children red.
 */
function settleRotation<N extends RBNode<N>>(node: N, withNode: WithNodeFn<N>): N {
  return withNode(node, {
    color: 'black',
    left: node.left === null ? null : withNode(node.left, { color: 'red' }),
    right: node.right === null ? null : withNode(node.right, { color: 'red' }),
  });
}

/**
 * Resolve a red-red violation below `node` by rotation.
 * Handles the LL, LR, RR and RL shapes; returns `node` untouched otherwise.
 */
export function fixRedViolations<N extends RBNode<N>>(node: N, withNode: WithNodeFn<N>): N {
  const { left, right } = node;

  if (left !== null && isRed(left)) {
    if (isRed(left.left)) {
      return settleRotation(rotateRight(node, withNode), withNode);
    }
    if (isRed(left.right)) {
      const straightened = withNode(node, { left: rotateLeft(left, withNode) });
      return settleRotation(rotateRight(straightened, withNode), withNode);
    }
  }

  if (right !== null && isRed(right)) {
    if (isRed(right.right)) {
      return settleRotation(rotateLeft(node, withNode), withNode);
    }
    if (isRed(right.left)) {
      const straightened = withNode(node, { right: rotateRight(right, withNode) });
      return settleRotation(rotateLeft(straightened, withNode), withNode);
    }
  }

  return node;
}

/**
 * Fix a violation at one level of the insertion path.
 * A red uncle is handled by a color flip (which may push the violation up);
 * a black uncle by rotation.
 */
function fixInsertViolation<N extends RBNode<N>>(node: N, withNode: WithNodeFn<N>): N {
  const { left, right } = node;
  const leftViolates = left !== null && isRed(left) && (isRed(left.left) || isRed(left.right));
  const rightViolates = right !== null && isRed(right) && (isRed(right.left) || isRed(right.right));

  if (!leftViolates && !rightViolates) return node;

  if (left !== null && right !== null && isRed(left) && isRed(right)) {
    return withNode(node, {
      color: 'red',
      left: withNode(left, { color: 'black' }),
      right: withNode(right, { color: 'black' }),
    });
  }

  return fixRedViolations(node, withNode);
}

/**
 * Rebalance after an insert using only the descent path.
 * Walks from the leaf parent to the root, re-linking each copied node to
 * the (possibly rotated) child below it. O(log n).
 *
 * @param path - Copied nodes from root (index 0) to the new leaf's parent
 * @returns The balanced root
 */
export function fixInsertWithPath<N extends RBNode<N>>(
  path: InsertionPathEntry<N>[],
  withNode: WithNodeFn<N>
): N {
  for (let i = path.length - 1; i >= 0; i--) {
    const entry = path[i];
    if (i < path.length - 1) {
      const below = path[i + 1].node;
      const current = entry.direction === 'left' ? entry.node.left : entry.node.right;
      if (current !== below) {
        entry.node = entry.direction === 'left'
          ? withNode(entry.node, { left: below })
          : withNode(entry.node, { right: below });
      }
    }
    entry.node = fixInsertViolation(entry.node, withNode);
  }

  return ensureBlackRoot(path[0].node, withNode);
}

// =============================================================================
// Join, Split and Concatenation
// =============================================================================

/**
 * A subtree paired with its black height (black nodes on any root-to-leaf
 * path, the root included; null has height 0).
 */
interface SizedTree<N extends RBNode<N>> {
  readonly root: N | null;
  readonly height: number;
}

/**
 * Black height of a valid subtree, read off its leftmost path.
 */
function blackHeight<N extends RBNode<N>>(node: N | null): number {
  let height = 0;
  let current = node;
  while (current !== null) {
    if (current.color === 'black') height++;
    current = current.left;
  }
  return height;
}

function childHeight<N extends RBNode<N>>(node: N, height: number): number {
  return node.color === 'black' ? height - 1 : height;
}

/**
 * Walk down the right spine of `tree` to a black subtree as tall as `right`
 * and hang `middle` there as a red node. The result keeps the height of
 * `tree`; its root may be red with a red right child, which the caller fixes.
 */
function joinRight<N extends RBNode<N>>(
  tree: N | null,
  height: number,
  middle: N,
  right: SizedTree<N>,
  withNode: WithNodeFn<N>
): N {
  if (tree === null || (tree.color === 'black' && height === right.height)) {
    return withNode(middle, { color: 'red', left: tree, right: right.root });
  }

  const joined = joinRight(tree.right, childHeight(tree, height), middle, right, withNode);
  if (tree.color === 'black' && isRed(joined) && joined.right !== null && isRed(joined.right)) {
    const lifted = withNode(joined, { right: withNode(joined.right, { color: 'black' }) });
    return rotateLeft(withNode(tree, { right: lifted }), withNode);
  }
  return withNode(tree, { right: joined });
}

/**
 * Mirror of joinRight along the left spine of `tree`.
 */
function joinLeft<N extends RBNode<N>>(
  left: SizedTree<N>,
  middle: N,
  tree: N | null,
  height: number,
  withNode: WithNodeFn<N>
): N {
  if (tree === null || (tree.color === 'black' && height === left.height)) {
    return withNode(middle, { color: 'red', left: left.root, right: tree });
  }

  const joined = joinLeft(left, middle, tree.left, childHeight(tree, height), withNode);
  if (tree.color === 'black' && isRed(joined) && joined.left !== null && isRed(joined.left)) {
    const lifted = withNode(joined, { left: withNode(joined.left, { color: 'black' }) });
    return rotateRight(withNode(tree, { left: lifted }), withNode);
  }
  return withNode(tree, { left: joined });
}

function blackenSized<N extends RBNode<N>>(tree: SizedTree<N>, withNode: WithNodeFn<N>): SizedTree<N> {
  if (tree.root === null || tree.root.color === 'black') return tree;
  return { root: withNode(tree.root, { color: 'black' }), height: tree.height + 1 };
}

function sealRoot<N extends RBNode<N>>(root: N, height: number, withNode: WithNodeFn<N>): SizedTree<N> {
  return root.color === 'red'
    ? { root: withNode(root, { color: 'black' }), height: height + 1 }
    : { root, height };
}

/**
 * Build a tree holding `left`, then `middle`, then `right`, in that order.
 * Costs O(|height difference| + 1); the result has a black root.
 */
function join<N extends RBNode<N>>(
  leftTree: SizedTree<N>,
  middle: N,
  rightTree: SizedTree<N>,
  withNode: WithNodeFn<N>
): SizedTree<N> {
  const left = blackenSized(leftTree, withNode);
  const right = blackenSized(rightTree, withNode);

  if (left.height > right.height) {
    return sealRoot(joinRight(left.root, left.height, middle, right, withNode), left.height, withNode);
  }
  if (right.height > left.height) {
    return sealRoot(joinLeft(left, middle, right.root, right.height, withNode), right.height, withNode);
  }
  return {
    root: withNode(middle, { color: 'black', left: left.root, right: right.root }),
    height: left.height + 1,
  };
}

function splitSized<N extends RBNode<N>>(
  node: N | null,
  height: number,
  goesLeft: (node: N) => boolean,
  withNode: WithNodeFn<N>
): [SizedTree<N>, SizedTree<N>] {
  if (node === null) {
    return [{ root: null, height: 0 }, { root: null, height: 0 }];
  }

  const below = childHeight(node, height);
  if (goesLeft(node)) {
    const [inner, outer] = splitSized(node.right, below, goesLeft, withNode);
    return [join({ root: node.left, height: below }, node, inner, withNode), outer];
  }
  const [outer, inner] = splitSized(node.left, below, goesLeft, withNode);
  return [outer, join(inner, node, { root: node.right, height: below }, withNode)];
}

/**
 * Split a tree into the nodes for which `goesLeft` holds and the rest.
 * `goesLeft` must hold for a prefix of the in-order sequence. O(log n).
 */
export function splitTree<N extends RBNode<N>>(
  root: N | null,
  goesLeft: (node: N) => boolean,
  withNode: WithNodeFn<N>
): [N | null, N | null] {
  const [left, right] = splitSized(root, blackHeight(root), goesLeft, withNode);
  return [left.root, right.root];
}

function splitLast<N extends RBNode<N>>(
  node: N,
  height: number,
  withNode: WithNodeFn<N>
): { rest: SizedTree<N>; last: N } {
  const below = childHeight(node, height);
  if (node.right === null) {
    return { rest: { root: node.left, height: below }, last: node };
  }
  const { rest, last } = splitLast(node.right, below, withNode);
  return { rest: join({ root: node.left, height: below }, node, rest, withNode), last };
}

/**
 * Concatenate two trees where every key in `left` sorts before every key in
 * `right`. O(log n).
 */
export function concatTrees<N extends RBNode<N>>(
  left: N | null,
  right: N | null,
  withNode: WithNodeFn<N>
): N | null {
  if (left === null) return right;
  if (right === null) return left;

  const { rest, last } = splitLast(left, blackHeight(left), withNode);
  return join(rest, last, { root: right, height: blackHeight(right) }, withNode).root;
}
