/**
 * Type exports for sparse buffers.
 */

// State types
export type {
  NodeColor,
  RBNode,
  RangeNode,
  RangeExtent,
  SparseBufferState,
  MemoryAllocator,
  SparseBufferConfig,
} from './state.ts';

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
} from './actions.ts';

export {
  isContentAction,
  isSeekOrigin,
  isBufferAction,
  validateAction,
} from './actions.ts';

// Store types
export type {
  StoreListener,
  Unsubscribe,
  ReadonlySparseBuffer,
  SparseBuffer,
  BufferReducer,
} from './store.ts';

// Errors
export type {
  SparseBufferErrorKind,
  BufferOk,
  BufferErr,
  BufferResult,
} from './errors.ts';

export { SparseBufferError, ok, fail, isSparseBufferError } from './errors.ts';

// Branded position types
export type { ByteOffset, ByteLength } from './branded.ts';

export {
  byteOffset,
  byteLength,
  isValidOffset,
  isValidSize,
  endOf,
  clampByteOffset,
  ZERO_BYTE_OFFSET,
} from './branded.ts';
