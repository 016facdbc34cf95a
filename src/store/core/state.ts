/**
 * State factory functions for sparse buffers.
 * Creates immutable state structures.
 */

import type {
  SparseBufferState,
  SparseBufferConfig,
  RangeNode,
  NodeColor,
} from '../../types/state.ts';
import { byteLength, ZERO_BYTE_OFFSET } from '../../types/branded.ts';
import type { ByteOffset, ByteLength } from '../../types/branded.ts';
import { defaultAllocator } from './allocator.ts';

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Required<Omit<SparseBufferConfig, 'size'>> = {
  allocator: defaultAllocator,
  verifyInvariants: false,
};

/**
 * Create a range node. Used internally by range tree operations.
 *
 * All node creation (insert, split, merge) flows through this function,
 * ensuring the subtree aggregates are computed from the start.
 */
export function createRangeNode(
  start: ByteOffset,
  data: Uint8Array,
  color: NodeColor = 'black',
  left: RangeNode | null = null,
  right: RangeNode | null = null
): RangeNode {
  return Object.freeze({
    color,
    left,
    right,
    start,
    length: byteLength(data.length),
    data,
    subtreeCount: 1 + (left?.subtreeCount ?? 0) + (right?.subtreeCount ?? 0),
    subtreeLoaded: data.length + (left?.subtreeLoaded ?? 0) + (right?.subtreeLoaded ?? 0),
  });
}

/**
 * Settable fields on a RangeNode.
 * `length` follows `data` and the subtree aggregates follow the children,
 * so none of them can be set directly.
 */
export type RangeNodeUpdates = Partial<Pick<RangeNode, 'color' | 'left' | 'right' | 'start' | 'data'>>;

/**
 * Helper to create modified range node with structural sharing.
 *
 * All tree mutations (insert, delete, rotations) flow through this function,
 * so subtree aggregates are maintained without the callers knowing about them.
 */
export function withRangeNode(node: RangeNode, changes: RangeNodeUpdates): RangeNode {
  const next = { ...node, ...changes };

  if ('data' in changes) {
    next.length = byteLength(next.data.length);
  }

  if ('left' in changes || 'right' in changes || 'data' in changes) {
    next.subtreeCount = 1 + (next.left?.subtreeCount ?? 0) + (next.right?.subtreeCount ?? 0);
    next.subtreeLoaded = next.length + (next.left?.subtreeLoaded ?? 0) + (next.right?.subtreeLoaded ?? 0);
  }

  return Object.freeze(next);
}

/**
 * Create the state of an empty buffer of `size` bytes.
 * The size is not validated here; see createSparseBuffer.
 */
export function createInitialBufferState(size: ByteLength): SparseBufferState {
  return Object.freeze({
    version: 0,
    size,
    cursor: ZERO_BYTE_OFFSET,
    root: null,
  });
}

/**
 * Helper to create modified state with structural sharing.
 * Bumps the version.
 */
export function withBufferState(
  state: SparseBufferState,
  changes: Partial<Omit<SparseBufferState, 'version'>>
): SparseBufferState {
  return Object.freeze({ ...state, ...changes, version: state.version + 1 });
}
