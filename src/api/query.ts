/**
 * Query namespace: O(1), O(log n), and bounded linear operations.
 * Functions here are read-only selectors over immutable buffer state.
 */

import {
  getSize,
  getCursor,
  getBytesLeft,
  getStateRangeCount,
  getStateLoadedLength,
  findLoadedRangeAt,
  isLoaded,
  getMissingRanges,
  readRange,
  readInto,
  resolveSeek,
} from '../store/core/range-list.ts';

export const query = {
  /** @complexity O(1) */
  getSize,
  /** @complexity O(1) */
  getCursor,
  /** @complexity O(1): size minus cursor */
  getBytesLeft,
  /** @complexity O(1): cached subtreeCount on the root */
  getRangeCount: getStateRangeCount,
  /** @complexity O(1): cached subtreeLoaded on the root */
  getLoadedLength: getStateLoadedLength,
  /** @complexity O(log n): tree descent to the range holding an offset */
  findRangeAt: findLoadedRangeAt,
  /** @complexity O(log n) */
  isLoaded,
  /** @complexity O(log n + k): k ranges inside the window */
  getMissingRanges,
  /** @complexity O(log n + k + length): zero-filled read at the cursor */
  read: readRange,
  /** @complexity O(log n + k + destination.length) */
  readInto,
  /** @complexity O(1): target of a seek without applying it */
  resolveSeek,
} as const;
