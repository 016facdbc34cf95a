/**
 * sparse-bytes - Sparse byte buffers backed by an immutable range tree
 *
 * Main entry point exporting core types, store, and utilities.
 */

// =============================================================================
// Types
// =============================================================================

// State types
export type {
  NodeColor,
  RBNode,
  RangeNode,
  RangeExtent,
  SparseBufferState,
  MemoryAllocator,
  SparseBufferConfig,
} from './types/index.ts';

// Action types
export type {
  LoadRangeAction,
  RemoveRangeAction,
  ClearAction,
  ResizeAction,
  SeekOrigin,
  SeekAction,
  BufferAction,
  BufferActionType,
  ActionValidationResult,
} from './types/index.ts';

// Store types
export type {
  StoreListener,
  Unsubscribe,
  ReadonlySparseBuffer,
  SparseBuffer,
  BufferReducer,
} from './types/index.ts';

// Errors
export type {
  SparseBufferErrorKind,
  BufferOk,
  BufferErr,
  BufferResult,
} from './types/index.ts';

export { SparseBufferError, ok, fail, isSparseBufferError } from './types/index.ts';

// Branded position types
export type { ByteOffset, ByteLength } from './types/index.ts';

export {
  byteOffset,
  byteLength,
  isValidOffset,
  isValidSize,
  endOf,
  clampByteOffset,
  ZERO_BYTE_OFFSET,
} from './types/index.ts';

// =============================================================================
// Type Guards
// =============================================================================

export {
  isContentAction,
  isSeekOrigin,
  isBufferAction,
  validateAction,
} from './types/index.ts';

// =============================================================================
// Store
// =============================================================================

export {
  createSparseBuffer,
  isSparseBuffer,
  BufferActions,
  serializeAction,
  deserializeAction,
  bufferReducer,
  createInitialBufferState,
  DEFAULT_CONFIG,
} from './store/index.ts';

// =============================================================================
// Memory
// =============================================================================

export {
  defaultAllocator,
  createTrackedAllocator,
  createAllocationScope,
} from './store/index.ts';

export type {
  TrackedAllocator,
  TrackedAllocatorOptions,
  AllocatorStats,
  AllocationScope,
} from './store/index.ts';

// =============================================================================
// Events
// =============================================================================

export { createEventEmitter } from './store/index.ts';

export type {
  BufferEvent,
  ContentChangeEvent,
  CursorChangeEvent,
  SizeChangeEvent,
  AnyBufferEvent,
  BufferEventMap,
  EventHandler,
  BufferEventEmitter,
} from './store/index.ts';

// =============================================================================
// Complexity-Stratified API
// =============================================================================

export { query, scan } from './api/index.ts';
