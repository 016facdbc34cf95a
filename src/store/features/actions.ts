/**
 * Action creator functions for sparse buffers.
 * Provides type-safe factory functions for creating buffer actions.
 */

import type { ByteOffset } from '../../types/branded.ts';
import type {
  BufferAction,
  LoadRangeAction,
  RemoveRangeAction,
  ClearAction,
  ResizeAction,
  SeekAction,
  SeekOrigin,
} from '../../types/actions.ts';
import { isBufferAction } from '../../types/actions.ts';

/**
 * Action creators for buffer mutations.
 * All functions return serializable action objects.
 */
export const BufferActions = {
  /**
   * Create a load action.
   * @param offset - Offset of the first loaded byte
   * @param data - Bytes to load; copied when the action is applied
   */
  loadRange(offset: ByteOffset, data: Uint8Array): LoadRangeAction {
    return Object.freeze({ type: 'LOAD_RANGE', offset, data });
  },

  /**
   * Create a remove action.
   * @param start - First byte to erase (inclusive)
   * @param end - Last byte to erase (inclusive)
   */
  removeRange(start: ByteOffset, end: ByteOffset): RemoveRangeAction {
    return Object.freeze({ type: 'REMOVE_RANGE', start, end });
  },

  clear(): ClearAction {
    return Object.freeze({ type: 'CLEAR' });
  },

  resize(size: number): ResizeAction {
    return Object.freeze({ type: 'RESIZE', size });
  },

  /**
   * Create a seek action.
   * @param offset - Distance from the origin; may be negative for `current`
   * @param whence - Reference point (default: `start`)
   */
  seek(offset: number, whence: SeekOrigin = 'start'): SeekAction {
    return Object.freeze({ type: 'SEEK', offset, whence });
  },
};

function toBase64(bytes: Uint8Array): string {
  let binary = '';
  for (const byte of bytes) {
    binary += String.fromCharCode(byte);
  }
  return btoa(binary);
}

function fromBase64(encoded: string): Uint8Array {
  const binary = atob(encoded);
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i);
  }
  return bytes;
}

/**
 * Serialize an action to JSON string.
 * Useful for logging and replay.
 * Note: the Uint8Array of a LOAD_RANGE action is written as base64.
 */
export function serializeAction(action: BufferAction): string {
  if (action.type === 'LOAD_RANGE') {
    return JSON.stringify({ ...action, data: toBase64(action.data) });
  }
  return JSON.stringify(action);
}

/**
 * Deserialize an action from JSON string.
 * Note: base64 data in LOAD_RANGE is converted back to Uint8Array.
 * @throws Error if the JSON does not describe a valid action
 */
export function deserializeAction(json: string): BufferAction {
  const parsed: unknown = JSON.parse(json);
  const revived =
    typeof parsed === 'object' &&
    parsed !== null &&
    'type' in parsed &&
    parsed.type === 'LOAD_RANGE' &&
    'data' in parsed &&
    typeof parsed.data === 'string'
      ? { ...parsed, data: fromBase64(parsed.data) }
      : parsed;

  if (!isBufferAction(revived)) {
    throw new Error(`Invalid deserialized action: ${json}`);
  }
  return revived;
}
