/**
 * Sparse buffer implementation.
 * Factory function that creates a SparseBuffer with encapsulated state.
 */

import type { SparseBufferState, SparseBufferConfig } from '../../types/state.ts';
import type { BufferAction, SeekOrigin } from '../../types/actions.ts';
import type { SparseBuffer, StoreListener, Unsubscribe } from '../../types/store.ts';
import { isContentAction } from '../../types/actions.ts';
import { byteOffset, byteLength, isValidSize, type ByteOffset } from '../../types/branded.ts';
import { ok, fail, type BufferResult } from '../../types/errors.ts';
import { DEFAULT_CONFIG, createInitialBufferState } from '../core/state.ts';
import { createAllocationScope } from '../core/allocation-scope.ts';
import { assertInvariants, clearRanges, readInto, readRange } from '../core/range-list.ts';
import { bufferReducer } from './reducer.ts';
import {
  createEventEmitter,
  createContentChangeEvent,
  createCursorChangeEvent,
  createSizeChangeEvent,
  getAffectedRange,
} from './events.ts';

/**
 * One applied action and the states around it.
 */
interface AppliedStep {
  readonly action: BufferAction;
  readonly prevState: SparseBufferState;
  readonly nextState: SparseBufferState;
}

const DESTROYED_MESSAGE = 'Sparse buffer has been destroyed.';

/**
 * Factory function to create a SparseBuffer.
 * Encapsulates internal mutable state (current snapshot, listeners).
 *
 * Every mutation runs inside its own allocation scope: the scope is
 * committed when the reducer succeeds and rolled back otherwise, so a failed
 * call leaves both the snapshot and the allocator untouched.
 *
 * @example
 * ```typescript
 * const created = createSparseBuffer({ size: 1024 });
 * if (created.ok) {
 *   const buffer = created.value;
 *   buffer.loadRange(16, new Uint8Array([1, 2, 3]));
 *   buffer.seek(16);
 *   buffer.read(4); // ok(Uint8Array [1, 2, 3, 0])
 * }
 * ```
 *
 * @returns The new buffer, or an `invalid-argument` error for a bad size
 */
export function createSparseBuffer(config: SparseBufferConfig): BufferResult<SparseBuffer> {
  if (!isValidSize(config.size)) {
    return fail('invalid-argument', 'Invalid buffer size.');
  }

  const allocator = config.allocator ?? DEFAULT_CONFIG.allocator;
  const verifyInvariants = config.verifyInvariants ?? DEFAULT_CONFIG.verifyInvariants;

  // Internal mutable state
  let state = createInitialBufferState(byteLength(config.size));
  let destroyed = false;
  const listeners = new Set<StoreListener>();
  const emitter = createEventEmitter();

  /**
   * Notify all listeners of state change.
   */
  function notifyListeners(): void {
    for (const listener of listeners) {
      try {
        listener();
      } catch (error) {
        // Don't let one listener's error affect others
        console.error('Store listener threw an error:', error);
      }
    }
  }

  function emitEventsForStep({ action, prevState, nextState }: AppliedStep): void {
    if (prevState.root !== nextState.root && (isContentAction(action) || action.type === 'RESIZE')) {
      emitter.emit(
        'content-change',
        createContentChangeEvent(action, prevState, nextState, getAffectedRange(action, prevState))
      );
    }

    if (prevState.size !== nextState.size) {
      emitter.emit(
        'size-change',
        createSizeChangeEvent(prevState.size, nextState.size, nextState)
      );
    }

    if (prevState.cursor !== nextState.cursor) {
      emitter.emit('cursor-change', createCursorChangeEvent(prevState, nextState));
    }
  }

  /**
   * Run actions as one unit inside a single allocation scope.
   */
  function apply(actions: readonly BufferAction[]): BufferResult<SparseBufferState> {
    if (destroyed) {
      return fail('invalid-argument', DESTROYED_MESSAGE);
    }

    const scope = createAllocationScope(allocator);
    const steps: AppliedStep[] = [];
    let current = state;

    for (const action of actions) {
      const result = bufferReducer(current, action, scope);
      if (!result.ok) {
        scope.rollback();
        return result;
      }
      if (result.value !== current) {
        steps.push({ action, prevState: current, nextState: result.value });
        current = result.value;
      }
    }

    scope.commit();
    if (current === state) {
      return ok(state);
    }

    state = current;
    if (verifyInvariants) {
      assertInvariants(state);
    }

    notifyListeners();
    for (const step of steps) {
      emitEventsForStep(step);
    }
    return ok(state);
  }

  function subscribe(listener: StoreListener): Unsubscribe {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  /**
   * Get current immutable state snapshot.
   * Returns the same reference if state hasn't changed.
   */
  function getSnapshot(): SparseBufferState {
    return state;
  }

  function dispatch(action: BufferAction): BufferResult<SparseBufferState> {
    return apply([action]);
  }

  /**
   * Apply several actions as one unit.
   * If any action fails, none takes effect and no listener is called.
   */
  function batch(actions: readonly BufferAction[]): BufferResult<SparseBufferState> {
    return apply(actions);
  }

  function toVoid(result: BufferResult<SparseBufferState>): BufferResult<void> {
    return result.ok ? ok(undefined) : result;
  }

  function loadRange(offset: number, data: Uint8Array): BufferResult<void> {
    return toVoid(dispatch({ type: 'LOAD_RANGE', offset: byteOffset(offset), data }));
  }

  function removeRange(start: number, end: number): BufferResult<void> {
    return toVoid(dispatch({ type: 'REMOVE_RANGE', start: byteOffset(start), end: byteOffset(end) }));
  }

  function seek(offset: number, whence: SeekOrigin = 'start'): BufferResult<ByteOffset> {
    const result = dispatch({ type: 'SEEK', offset, whence });
    return result.ok ? ok(result.value.cursor) : result;
  }

  function resize(size: number): BufferResult<void> {
    return toVoid(dispatch({ type: 'RESIZE', size }));
  }

  function clear(): void {
    if (destroyed) return;
    const result = dispatch({ type: 'CLEAR' });
    if (!result.ok) {
      throw result.error;
    }
  }

  function read(length: number): BufferResult<Uint8Array> {
    if (destroyed) {
      return fail('invalid-argument', DESTROYED_MESSAGE);
    }
    return readRange(state, length);
  }

  function readIntoDestination(destination: Uint8Array): BufferResult<number> {
    if (destroyed) {
      return fail('invalid-argument', DESTROYED_MESSAGE);
    }
    return readInto(state, destination);
  }

  /**
   * Release every payload. Listeners are dropped without being notified.
   */
  function destroy(): void {
    if (destroyed) return;
    const scope = createAllocationScope(allocator);
    state = clearRanges(state, scope);
    scope.commit();
    destroyed = true;
    listeners.clear();
    emitter.removeAllListeners();
  }

  return {
    subscribe,
    getSnapshot,
    size: () => state.size,
    bytesLeft: () => state.size - state.cursor,
    position: () => state.cursor,
    read,
    readInto: readIntoDestination,
    loadRange,
    removeRange,
    seek,
    resize,
    clear,
    destroy,
    get destroyed() { return destroyed; },
    dispatch,
    batch,
    addEventListener: emitter.addEventListener,
    removeEventListener: emitter.removeEventListener,
    events: emitter,
  };
}

/**
 * Check if a value is a SparseBuffer.
 * Useful for type narrowing.
 */
export function isSparseBuffer(value: unknown): value is SparseBuffer {
  return (
    typeof value === 'object' &&
    value !== null &&
    'subscribe' in value &&
    typeof value.subscribe === 'function' &&
    'getSnapshot' in value &&
    typeof value.getSnapshot === 'function' &&
    'dispatch' in value &&
    typeof value.dispatch === 'function' &&
    'loadRange' in value &&
    typeof value.loadRange === 'function' &&
    'read' in value &&
    typeof value.read === 'function'
  );
}
