/**
 * Range list operations: load with merge, remove with split, read
 * reconstruction, seek and resize.
 *
 * Every mutation returns a new SparseBufferState (or an error) and never
 * touches the input state. Payload memory comes from an AllocationScope, so
 * the caller decides whether the buffers drawn during an operation survive.
 */

import type { SparseBufferState, RangeNode, RangeExtent } from '../../types/state.ts';
import type { SeekOrigin } from '../../types/actions.ts';
import {
  byteOffset,
  byteLength,
  endOf,
  clampByteOffset,
  ZERO_BYTE_OFFSET,
  isValidOffset,
  isValidSize,
  type ByteOffset,
} from '../../types/branded.ts';
import { ok, fail, type BufferResult } from '../../types/errors.ts';
import type { AllocationScope } from './allocation-scope.ts';
import { withBufferState } from './state.ts';
import {
  collectRanges,
  iterateRangesFrom,
  rangeEnd,
  rbInsertRange,
  removeRangesBetween,
  getRangeCount,
  getLoadedLength,
  findRangeAt,
  findGaps,
} from './range-tree.ts';
import { isRed } from './rb-tree.ts';

/**
 * A payload not yet (or no longer) attached to a tree node.
 */
interface Span {
  readonly start: ByteOffset;
  readonly data: Uint8Array;
}

function spanEnd(span: Span): number {
  return endOf(span.start, byteLength(span.data.length));
}

// =============================================================================
// Merge
// =============================================================================

/**
 * Merge the incoming span with the first existing range it intersects.
 *
 * - If one contains the other, the container's bytes are kept whole
 *   (equal extents keep the incoming bytes).
 * - Otherwise the span with the higher start wins the overlap: bytes below
 *   its start come from the other span, everything from its start on comes
 *   from it.
 *
 * Returns null if the union buffer could not be allocated.
 */
export function mergeIncoming(
  incoming: Span,
  existing: Span,
  scope: AllocationScope
): Span | null {
  const incomingEnd = spanEnd(incoming);
  const existingEnd = spanEnd(existing);

  if (incoming.start <= existing.start && incomingEnd >= existingEnd) {
    return incoming;
  }
  if (existing.start <= incoming.start && existingEnd >= incomingEnd) {
    return existing;
  }

  const [lower, higher] = incoming.start <= existing.start
    ? [incoming, existing]
    : [existing, incoming];
  const data = scope.allocate(spanEnd(higher) - lower.start);
  if (data === null) return null;

  const split = higher.start - lower.start;
  data.set(lower.data.subarray(0, split));
  data.set(higher.data, split);
  return { start: lower.start, data };
}

/**
 * Absorb a following range into an already merged span.
 * The merged span keeps its bytes; the follower only contributes what lies
 * past the merged span's end.
 *
 * Returns null if the grown buffer could not be allocated.
 */
export function absorbFollower(
  merged: Span,
  follower: Span,
  scope: AllocationScope
): Span | null {
  const mergedEnd = spanEnd(merged);
  const followerEnd = spanEnd(follower);
  if (followerEnd <= mergedEnd) {
    return merged;
  }

  const data = scope.reallocate(merged.data, followerEnd - merged.start);
  if (data === null) return null;

  data.set(follower.data.subarray(mergedEnd - follower.start), mergedEnd - merged.start);
  return { start: merged.start, data };
}

// =============================================================================
// Load
// =============================================================================

/**
 * Copy `payload` into the buffer at `offset`, merging it with every range it
 * touches or overlaps.
 *
 * Validation happens before any allocation. The bound check is made against
 * the cursor (`cursor + length <= size`) as well as against the offset.
 */
export function loadRange(
  state: SparseBufferState,
  offset: number,
  payload: Uint8Array,
  scope: AllocationScope
): BufferResult<SparseBufferState> {
  if (payload.length === 0) {
    return fail('invalid-argument', 'Invalid buffer size.');
  }
  if (!isValidOffset(offset)) {
    return fail('invalid-argument', `Invalid range offset: ${offset}.`);
  }
  if (state.cursor + payload.length > state.size || offset + payload.length > state.size) {
    return fail('invalid-argument', 'Cannot load a range past the end of the sparse buffer size.');
  }

  const data = scope.allocate(payload.length);
  if (data === null) {
    return fail('allocation-failure', 'Could not allocate buffer for sparse list entry.');
  }
  data.set(payload);
  const incoming: Span = { start: byteOffset(offset), data };

  const following = iterateRangesFrom(state.root, offset);
  const first = following.next();

  // Nothing reaches the new range: plain insert
  if (first.done === true || first.value.start > spanEnd(incoming)) {
    return ok(withBufferState(state, {
      root: rbInsertRange(state.root, incoming.start, incoming.data),
    }));
  }

  const anchor = first.value;
  let merged = mergeIncoming(incoming, anchor, scope);
  if (merged === null) {
    return fail('allocation-failure', 'Could not allocate merged buffer.');
  }
  if (merged.data !== incoming.data) {
    scope.retire(incoming.data);
  }

  const absorbed: RangeNode[] = [anchor];
  for (const next of following) {
    if (next.start > spanEnd(merged)) break;
    const grown = absorbFollower(merged, next, scope);
    if (grown === null) {
      return fail('allocation-failure', 'Could not allocate merged buffer.');
    }
    merged = grown;
    absorbed.push(next);
  }

  // Incoming bytes swallowed by a range that already held them all
  if (absorbed.length === 1 && merged.data === anchor.data) {
    return ok(state);
  }

  for (const node of absorbed) {
    if (node.data !== merged.data) {
      scope.retire(node.data);
    }
  }

  const last = absorbed[absorbed.length - 1];
  const pruned = removeRangesBetween(state.root, anchor.start, last.start);
  return ok(withBufferState(state, {
    root: rbInsertRange(pruned, merged.start, merged.data),
  }));
}

// =============================================================================
// Remove
// =============================================================================

/**
 * Carve `[start, end]` (inclusive) out of the tree.
 * Ranges inside are dropped, ranges crossing a boundary are truncated, and a
 * range spanning the whole interval is split in two.
 */
function carve(
  root: RangeNode | null,
  start: number,
  end: number,
  scope: AllocationScope
): BufferResult<RangeNode | null> {
  const affected: RangeNode[] = [];
  for (const node of iterateRangesFrom(root, start)) {
    if (node.start > end) break;
    if (rangeEnd(node) <= start) continue;
    affected.push(node);
  }

  if (affected.length === 0) {
    return ok(root);
  }

  const remainders: Span[] = [];
  for (const node of affected) {
    const keepBefore = start - node.start;
    const keepAfter = rangeEnd(node) - (end + 1);

    if (keepAfter > 0) {
      const suffix = scope.allocate(keepAfter);
      if (suffix === null) {
        return fail('allocation-failure', 'Could not allocate new range data.');
      }
      suffix.set(node.data.subarray(node.length - keepAfter));
      remainders.push({ start: byteOffset(end + 1), data: suffix });
    }

    if (keepBefore > 0) {
      const prefix = scope.reallocate(node.data, keepBefore);
      if (prefix === null) {
        return fail('allocation-failure', 'Could not realloc reduced range data.');
      }
      remainders.push({ start: node.start, data: prefix });
    } else {
      scope.retire(node.data);
    }
  }

  let next = removeRangesBetween(root, affected[0].start, affected[affected.length - 1].start);
  for (const span of remainders) {
    next = rbInsertRange(next, span.start, span.data);
  }
  return ok(next);
}

/**
 * Erase any loaded data in the inclusive interval `[start, end]`.
 * Rejects `end >= size` and `end < start`.
 */
export function removeRange(
  state: SparseBufferState,
  start: number,
  end: number,
  scope: AllocationScope
): BufferResult<SparseBufferState> {
  if (!isValidOffset(start) || !isValidOffset(end) || end >= state.size || end < start) {
    return fail('invalid-argument', 'Invalid range.');
  }

  const carved = carve(state.root, start, end, scope);
  if (!carved.ok) return carved;
  if (carved.value === state.root) return ok(state);

  return ok(withBufferState(state, { root: carved.value }));
}

/**
 * Release every loaded range. Size and cursor are kept.
 */
export function clearRanges(
  state: SparseBufferState,
  scope: AllocationScope
): SparseBufferState {
  if (state.root === null) return state;

  for (const node of collectRanges(state.root)) {
    scope.retire(node.data);
  }
  return withBufferState(state, { root: null });
}

// =============================================================================
// Resize
// =============================================================================

/**
 * Change the logical size.
 * Shrinking discards data in `[newSize, oldSize - 1]` and clamps the cursor;
 * growing only moves the end, so the new tail reads as zero.
 */
export function resizeBuffer(
  state: SparseBufferState,
  newSize: number,
  scope: AllocationScope
): BufferResult<SparseBufferState> {
  if (newSize === 0) {
    return fail('invalid-argument', 'Cannot resize to zero size.');
  }
  if (!isValidSize(newSize)) {
    return fail('invalid-argument', `Invalid buffer size: ${newSize}.`);
  }
  if (newSize === state.size) return ok(state);

  if (newSize > state.size) {
    return ok(withBufferState(state, { size: byteLength(newSize) }));
  }

  const carved = carve(state.root, newSize, state.size - 1, scope);
  if (!carved.ok) return carved;

  return ok(withBufferState(state, {
    size: byteLength(newSize),
    root: carved.value,
    cursor: clampByteOffset(state.cursor, ZERO_BYTE_OFFSET, byteOffset(newSize)),
  }));
}

// =============================================================================
// Seek
// =============================================================================

/**
 * Compute the cursor a seek would land on.
 * Returns an error for non-integer offsets and targets outside `[0, size]`.
 */
export function resolveSeek(
  state: SparseBufferState,
  offset: number,
  whence: SeekOrigin
): BufferResult<ByteOffset> {
  if (!Number.isSafeInteger(offset)) {
    return fail('invalid-argument', `Invalid seek offset: ${offset}.`);
  }

  let target: number;
  switch (whence) {
    case 'start':
      target = offset;
      break;
    case 'current':
      target = state.cursor + offset;
      break;
    case 'end':
      if (offset > state.size) {
        return fail('invalid-argument', 'Cannot seek past beginning of file.');
      }
      target = state.size - offset;
      break;
    default:
      return fail('invalid-argument', 'Invalid whence.');
  }

  if (target < 0) {
    return fail('invalid-argument', 'Cannot seek past beginning of file.');
  }
  if (target > state.size) {
    return fail('invalid-argument', 'Cannot seek past end of file.');
  }
  return ok(byteOffset(target));
}

/**
 * Move the cursor. Seeking to the current position returns the same state.
 */
export function seekCursor(
  state: SparseBufferState,
  offset: number,
  whence: SeekOrigin
): BufferResult<SparseBufferState> {
  const target = resolveSeek(state, offset, whence);
  if (!target.ok) return target;
  if (target.value === state.cursor) return ok(state);
  return ok(withBufferState(state, { cursor: target.value }));
}

// =============================================================================
// Read Operations
// =============================================================================

/**
 * Fill `destination` with the logical bytes starting at the cursor: loaded
 * bytes verbatim, everything else zero. The cursor does not move.
 *
 * @returns Number of bytes written
 */
export function readInto(
  state: SparseBufferState,
  destination: Uint8Array
): BufferResult<number> {
  if (destination.length === 0) {
    return fail('invalid-argument', 'Cannot read zero bytes.');
  }

  const from = state.cursor;
  const to = from + destination.length;
  if (to > state.size) {
    return fail('out-of-bounds', 'Cannot read past EOF.');
  }

  destination.fill(0);
  for (const node of iterateRangesFrom(state.root, from)) {
    if (node.start >= to) break;
    const copyStart = Math.max(node.start, from);
    const copyEnd = Math.min(rangeEnd(node), to);
    if (copyEnd > copyStart) {
      destination.set(
        node.data.subarray(copyStart - node.start, copyEnd - node.start),
        copyStart - from
      );
    }
  }

  return ok(destination.length);
}

/**
 * Read `length` bytes starting at the cursor into a new array.
 * The cursor does not move.
 */
export function readRange(
  state: SparseBufferState,
  length: number
): BufferResult<Uint8Array> {
  if (length === 0) {
    return fail('invalid-argument', 'Cannot read zero bytes.');
  }
  if (!isValidSize(length)) {
    return fail('invalid-argument', `Invalid read length: ${length}.`);
  }
  if (state.cursor + length > state.size) {
    return fail('out-of-bounds', 'Cannot read past EOF.');
  }

  const destination = new Uint8Array(length);
  const result = readInto(state, destination);
  if (!result.ok) return result;
  return ok(destination);
}

/**
 * The whole logical content, from offset 0 regardless of the cursor.
 */
export function readAll(state: SparseBufferState): Uint8Array {
  const out = new Uint8Array(state.size);
  for (const node of collectRanges(state.root)) {
    out.set(node.data, node.start);
  }
  return out;
}

/**
 * Extents of every loaded range, in ascending order. Payloads are not exposed.
 */
export function getLoadedRanges(state: SparseBufferState): readonly RangeExtent[] {
  return collectRanges(state.root).map((node) => ({ start: node.start, length: node.length }));
}

// =============================================================================
// Selectors
// =============================================================================

export function getSize(state: SparseBufferState): number {
  return state.size;
}

export function getCursor(state: SparseBufferState): ByteOffset {
  return state.cursor;
}

/**
 * Bytes between the cursor and the logical end.
 */
export function getBytesLeft(state: SparseBufferState): number {
  return state.size - state.cursor;
}

/**
 * Extent of the loaded range holding the byte at `offset`, or null.
 */
export function findLoadedRangeAt(state: SparseBufferState, offset: number): RangeExtent | null {
  const node = findRangeAt(state.root, byteOffset(offset));
  return node === null ? null : { start: node.start, length: node.length };
}

/**
 * Whether every byte of `[offset, offset + length)` is loaded.
 * Since ranges never touch, this holds only inside a single range.
 */
export function isLoaded(state: SparseBufferState, offset: number, length = 1): boolean {
  const node = findRangeAt(state.root, byteOffset(offset));
  return node !== null && offset + length <= rangeEnd(node);
}

/**
 * Unloaded spans inside `[start, end)`, by default the whole buffer.
 */
export function getMissingRanges(
  state: SparseBufferState,
  start = 0,
  end: number = state.size
): readonly RangeExtent[] {
  const from = Math.max(0, start);
  const to = Math.min(state.size, end);
  if (from >= to) return [];
  return findGaps(state.root, from, to);
}

export function getStateRangeCount(state: SparseBufferState): number {
  return getRangeCount(state.root);
}

export function getStateLoadedLength(state: SparseBufferState): number {
  return getLoadedLength(state.root);
}

// =============================================================================
// Invariants
// =============================================================================

/**
 * Black height of a subtree, throwing on a red-red edge or unequal paths.
 */
function checkRedBlack(node: RangeNode | null): number {
  if (node === null) return 0;
  if (isRed(node) && (isRed(node.left) || isRed(node.right))) {
    throw new Error(`Red range at ${node.start} has a red child`);
  }
  const left = checkRedBlack(node.left);
  const right = checkRedBlack(node.right);
  if (left !== right) {
    throw new Error(`Unequal black heights below range at ${node.start}: ${left} vs ${right}`);
  }
  return left + (isRed(node) ? 0 : 1);
}

/**
 * Throw if the state breaks any range-list invariant.
 * A failure here is a defect in the engine, never a user error.
 */
export function assertInvariants(state: SparseBufferState): void {
  if (!isValidSize(state.size)) {
    throw new Error(`Buffer size must be a positive integer, got ${state.size}`);
  }
  if (!isValidOffset(state.cursor) || state.cursor > state.size) {
    throw new Error(`Cursor ${state.cursor} outside [0, ${state.size}]`);
  }

  const ranges = collectRanges(state.root);
  let previousEnd = -1;
  let loaded = 0;
  for (const node of ranges) {
    if (node.length <= 0 || node.data.length !== node.length) {
      throw new Error(`Range at ${node.start} has length ${node.length} but holds ${node.data.length} bytes`);
    }
    if (node.start < 0 || rangeEnd(node) > state.size) {
      throw new Error(`Range [${node.start}, ${rangeEnd(node)}) lies outside [0, ${state.size})`);
    }
    if (previousEnd >= node.start) {
      throw new Error(`Range at ${node.start} overlaps or touches the range ending at ${previousEnd}`);
    }
    previousEnd = rangeEnd(node);
    loaded += node.length;
  }

  if (getRangeCount(state.root) !== ranges.length || getLoadedLength(state.root) !== loaded) {
    throw new Error('Range tree aggregates are out of date');
  }

  if (isRed(state.root)) {
    throw new Error('Range tree root must be black');
  }
  checkRedBlack(state.root);
}
