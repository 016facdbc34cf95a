/**
 * Store exports for sparse buffers.
 */

// Buffer factory
export { createSparseBuffer, isSparseBuffer } from './features/store.ts';

// Action creators
export { BufferActions, serializeAction, deserializeAction } from './features/actions.ts';

// State factories
export {
  DEFAULT_CONFIG,
  createInitialBufferState,
  createRangeNode,
  withRangeNode,
  withBufferState,
} from './core/state.ts';
export type { RangeNodeUpdates } from './core/state.ts';

// Reducer
export { bufferReducer } from './features/reducer.ts';

// Range list operations
export {
  loadRange,
  removeRange,
  clearRanges,
  resizeBuffer,
  seekCursor,
  resolveSeek,
  readInto,
  readRange,
  readAll,
  getLoadedRanges,
  mergeIncoming,
  absorbFollower,
  assertInvariants,
} from './core/range-list.ts';

// Range tree operations
export {
  rangeEnd,
  collectRanges,
  iterateRangesFrom,
  findRangeAt,
  findGaps,
  getRangeCount,
  getLoadedLength,
  rbInsertRange,
  removeRangesBetween,
} from './core/range-tree.ts';

// Memory
export { defaultAllocator, createTrackedAllocator } from './core/allocator.ts';
export type {
  TrackedAllocator,
  TrackedAllocatorOptions,
  AllocatorStats,
} from './core/allocator.ts';
export { createAllocationScope } from './core/allocation-scope.ts';
export type { AllocationScope } from './core/allocation-scope.ts';

// Event system
export {
  createEventEmitter,
  createContentChangeEvent,
  createCursorChangeEvent,
  createSizeChangeEvent,
  getAffectedRange,
} from './features/events.ts';
export type {
  BufferEvent,
  ContentChangeEvent,
  CursorChangeEvent,
  SizeChangeEvent,
  AnyBufferEvent,
  BufferEventMap,
  EventHandler,
  BufferEventEmitter,
} from './features/events.ts';
