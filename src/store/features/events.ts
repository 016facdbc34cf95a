/**
 * Event system for sparse buffers.
 * Provides a pub/sub mechanism for content, cursor and size changes.
 */

import type { SparseBufferState } from '../../types/state.ts';
import type { BufferAction } from '../../types/actions.ts';

// =============================================================================
// Event Types
// =============================================================================

/**
 * Base event interface.
 */
export interface BufferEvent {
  readonly type: string;
  readonly timestamp: number;
}

/**
 * Fired when loaded content changes.
 */
export interface ContentChangeEvent extends BufferEvent {
  readonly type: 'content-change';
  /** The action that caused the change */
  readonly action: BufferAction;
  /** Buffer state before the change */
  readonly prevState: SparseBufferState;
  /** Buffer state after the change */
  readonly nextState: SparseBufferState;
  /** Byte range affected [start, end) */
  readonly affectedRange: readonly [number, number];
}

/**
 * Fired when the cursor moves, whether by a seek or by a shrinking resize.
 */
export interface CursorChangeEvent extends BufferEvent {
  readonly type: 'cursor-change';
  readonly prevState: SparseBufferState;
  readonly nextState: SparseBufferState;
}

/**
 * Fired when the logical size changes.
 */
export interface SizeChangeEvent extends BufferEvent {
  readonly type: 'size-change';
  readonly prevSize: number;
  readonly nextSize: number;
  readonly state: SparseBufferState;
}

/**
 * Union of all buffer events.
 */
export type AnyBufferEvent =
  | ContentChangeEvent
  | CursorChangeEvent
  | SizeChangeEvent;

/**
 * Event type to handler mapping.
 */
export interface BufferEventMap {
  'content-change': ContentChangeEvent;
  'cursor-change': CursorChangeEvent;
  'size-change': SizeChangeEvent;
}

// =============================================================================
// Event Handler Types
// =============================================================================

/**
 * Handler function for a specific event type.
 */
export type EventHandler<T extends AnyBufferEvent> = (event: T) => void;

/**
 * Unsubscribe function returned by addEventListener.
 */
export type Unsubscribe = () => void;

// =============================================================================
// Event Emitter
// =============================================================================

/**
 * Type-safe pub/sub for buffer events.
 */
export interface BufferEventEmitter {
  /**
   * Add an event listener for a specific event type.
   * @returns Unsubscribe function
   */
  addEventListener<K extends keyof BufferEventMap>(
    type: K,
    handler: EventHandler<BufferEventMap[K]>
  ): Unsubscribe;

  removeEventListener<K extends keyof BufferEventMap>(
    type: K,
    handler: EventHandler<BufferEventMap[K]>
  ): void;

  /**
   * Emit an event to all registered handlers.
   * A throwing handler is logged and does not stop the others.
   */
  emit<K extends keyof BufferEventMap>(
    type: K,
    event: BufferEventMap[K]
  ): void;

  /**
   * Remove all event listeners.
   */
  removeAllListeners(): void;

  /**
   * Number of handlers registered for an event type.
   */
  listenerCount(type: keyof BufferEventMap): number;
}

type HandlerRegistry = {
  [K in keyof BufferEventMap]: Set<EventHandler<BufferEventMap[K]>>;
};

/**
 * Create a new buffer event emitter.
 */
export function createEventEmitter(): BufferEventEmitter {
  const handlers: HandlerRegistry = {
    'content-change': new Set(),
    'cursor-change': new Set(),
    'size-change': new Set(),
  };

  function removeEventListener<K extends keyof BufferEventMap>(
    type: K,
    handler: EventHandler<BufferEventMap[K]>
  ): void {
    handlers[type].delete(handler);
  }

  return {
    addEventListener<K extends keyof BufferEventMap>(
      type: K,
      handler: EventHandler<BufferEventMap[K]>
    ): Unsubscribe {
      handlers[type].add(handler);
      return () => removeEventListener(type, handler);
    },

    removeEventListener,

    emit<K extends keyof BufferEventMap>(
      type: K,
      event: BufferEventMap[K]
    ): void {
      // Copy so handlers may unsubscribe while being notified
      for (const handler of [...handlers[type]]) {
        try {
          handler(event);
        } catch (error) {
          console.error(`Event handler error for '${type}':`, error);
        }
      }
    },

    removeAllListeners(): void {
      handlers['content-change'].clear();
      handlers['cursor-change'].clear();
      handlers['size-change'].clear();
    },

    listenerCount(type: keyof BufferEventMap): number {
      return handlers[type].size;
    },
  };
}

// =============================================================================
// Event Helpers
// =============================================================================

/**
 * Create a content change event.
 */
export function createContentChangeEvent(
  action: BufferAction,
  prevState: SparseBufferState,
  nextState: SparseBufferState,
  affectedRange: readonly [number, number]
): ContentChangeEvent {
  return Object.freeze({
    type: 'content-change' as const,
    timestamp: Date.now(),
    action,
    prevState,
    nextState,
    affectedRange,
  });
}

/**
 * Create a cursor change event.
 */
export function createCursorChangeEvent(
  prevState: SparseBufferState,
  nextState: SparseBufferState
): CursorChangeEvent {
  return Object.freeze({
    type: 'cursor-change' as const,
    timestamp: Date.now(),
    prevState,
    nextState,
  });
}

/**
 * Create a size change event.
 */
export function createSizeChangeEvent(
  prevSize: number,
  nextSize: number,
  state: SparseBufferState
): SizeChangeEvent {
  return Object.freeze({
    type: 'size-change' as const,
    timestamp: Date.now(),
    prevSize,
    nextSize,
    state,
  });
}

/**
 * Determine the byte range [start, end) an action may have changed.
 * A shrinking resize reports the discarded tail, a growing one an empty range.
 */
export function getAffectedRange(
  action: BufferAction,
  prevState: SparseBufferState
): readonly [number, number] {
  switch (action.type) {
    case 'LOAD_RANGE':
      return [action.offset, action.offset + action.data.length];
    case 'REMOVE_RANGE':
      return [action.start, action.end + 1];
    case 'CLEAR':
      return [0, prevState.size];
    case 'RESIZE':
      return action.size < prevState.size
        ? [action.size, prevState.size]
        : [prevState.size, prevState.size];
    default:
      return [0, 0];
  }
}
