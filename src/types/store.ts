/**
 * SparseBuffer interface.
 * The engine instance combines the operation surface of a sparse buffer with
 * a framework-agnostic store (subscribe / getSnapshot / dispatch).
 */

import type { SparseBufferState } from './state.ts';
import type { BufferAction, SeekOrigin } from './actions.ts';
import type { ByteOffset, ByteLength } from './branded.ts';
import type { BufferResult } from './errors.ts';
import type {
  BufferEventEmitter,
  BufferEventMap,
  EventHandler,
} from '../store/features/events.ts';

/**
 * Listener function type for store subscriptions.
 */
export type StoreListener = () => void;

/**
 * Unsubscribe function returned by subscribe.
 */
export type Unsubscribe = () => void;

/**
 * Read-only subset of SparseBuffer for consumers that only need to read state.
 */
export interface ReadonlySparseBuffer {
  subscribe(listener: StoreListener): Unsubscribe;
  getSnapshot(): SparseBufferState;
  /** Logical size in bytes */
  size(): ByteLength;
  /** Bytes between the cursor and the end (`size - cursor`) */
  bytesLeft(): number;
  /** Current cursor */
  position(): ByteOffset;
  /**
   * Read `length` bytes starting at the cursor. Unloaded bytes read as zero.
   * Does not move the cursor.
   */
  read(length: number): BufferResult<Uint8Array>;
  /**
   * Fill `destination` with the bytes starting at the cursor.
   * Does not move the cursor.
   * @returns Number of bytes written (always `destination.length`)
   */
  readInto(destination: Uint8Array): BufferResult<number>;
}

/**
 * Sparse buffer engine.
 *
 * Every mutation is all-or-nothing: on failure the snapshot, the loaded
 * ranges and the allocator's live buffers are exactly as before the call.
 */
export interface SparseBuffer extends ReadonlySparseBuffer {
  /**
   * Load a copy of `data` at `offset`, merging it with every range it
   * touches or overlaps.
   */
  loadRange(offset: number, data: Uint8Array): BufferResult<void>;

  /**
   * Erase loaded data in the inclusive interval `[start, end]`.
   */
  removeRange(start: number, end: number): BufferResult<void>;

  /**
   * Move the cursor.
   * @returns The new absolute position
   */
  seek(offset: number, whence?: SeekOrigin): BufferResult<ByteOffset>;

  /**
   * Change the logical size. Shrinking discards data past the new end.
   */
  resize(size: number): BufferResult<void>;

  /**
   * Release every loaded range. Size and cursor are kept.
   */
  clear(): void;

  /**
   * Release every payload through the allocator. Later operations fail.
   */
  destroy(): void;

  /** Whether destroy() has been called */
  readonly destroyed: boolean;

  /**
   * Apply an action.
   * @returns The new state, or the error that left the state unchanged
   */
  dispatch(action: BufferAction): BufferResult<SparseBufferState>;

  /**
   * Apply several actions as one unit: either all of them take effect or
   * none does. Listeners are notified once.
   */
  batch(actions: readonly BufferAction[]): BufferResult<SparseBufferState>;

  /**
   * Subscribe to typed buffer events.
   *
   * @example
   * ```typescript
   * buffer.addEventListener('content-change', (event) => {
   *   console.log('Changed range:', event.affectedRange);
   * });
   * ```
   */
  addEventListener<K extends keyof BufferEventMap>(
    type: K,
    handler: EventHandler<BufferEventMap[K]>
  ): Unsubscribe;

  /**
   * Remove a previously registered event listener.
   */
  removeEventListener<K extends keyof BufferEventMap>(
    type: K,
    handler: EventHandler<BufferEventMap[K]>
  ): void;

  /**
   * Access the underlying event emitter for advanced use cases.
   */
  readonly events: BufferEventEmitter;
}

/**
 * Type for the buffer reducer function.
 * Produces a new state from old state + action, drawing payload memory from
 * the given allocation scope.
 */
export type BufferReducer<Scope> = (
  state: SparseBufferState,
  action: BufferAction,
  scope: Scope
) => BufferResult<SparseBufferState>;
