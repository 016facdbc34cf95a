/**
 * Scan namespace: O(n) operations.
 * All functions in this namespace walk every loaded range.
 * Use `query.*` for efficient lookups when possible.
 */

import type { SparseBufferState, RangeNode } from '../types/state.ts';
import { collectRanges } from '../store/core/range-tree.ts';
import { getLoadedRanges, readAll, assertInvariants } from '../store/core/range-list.ts';

export const scan = {
  /** @complexity O(n): in-order tree walk of all range nodes */
  collectRanges: (state: SparseBufferState): readonly RangeNode[] => collectRanges(state.root),
  /** @complexity O(n): extents of all ranges, without payloads */
  getLoadedRanges,
  /** @complexity O(size): full logical content from offset 0 */
  readAll,
  /** @complexity O(n): checks ordering, bounds, cached aggregates and red-black shape */
  assertInvariants,
} as const;
