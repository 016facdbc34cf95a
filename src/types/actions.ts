/**
 * Buffer action types for sparse buffers.
 * All buffer mutations are expressed as plain, serializable actions.
 */

import type { ByteOffset } from './branded.ts';

// =============================================================================
// Range Actions
// =============================================================================

/**
 * Load bytes at an offset, merging with any range they touch or overlap.
 */
export interface LoadRangeAction {
  readonly type: 'LOAD_RANGE';
  /** Offset of the first loaded byte */
  readonly offset: ByteOffset;
  /** Bytes to load (copied; the caller keeps ownership) */
  readonly data: Uint8Array;
}

/**
 * Erase loaded data in an inclusive interval.
 */
export interface RemoveRangeAction {
  readonly type: 'REMOVE_RANGE';
  /** First byte to erase (inclusive) */
  readonly start: ByteOffset;
  /** Last byte to erase (inclusive) */
  readonly end: ByteOffset;
}

/**
 * Drop every loaded range. Size and cursor are kept.
 */
export interface ClearAction {
  readonly type: 'CLEAR';
}

// =============================================================================
// Extent Actions
// =============================================================================

/**
 * Change the logical size.
 */
export interface ResizeAction {
  readonly type: 'RESIZE';
  /** New logical size in bytes */
  readonly size: number;
}

/**
 * Reference point of a seek.
 *
 * - `start`: absolute offset
 * - `current`: relative to the cursor
 * - `end`: `offset` bytes before the end
 */
export type SeekOrigin = 'start' | 'current' | 'end';

/**
 * Move the cursor.
 */
export interface SeekAction {
  readonly type: 'SEEK';
  readonly offset: number;
  readonly whence: SeekOrigin;
}

// =============================================================================
// Union Type
// =============================================================================

/**
 * All possible buffer actions.
 */
export type BufferAction =
  | LoadRangeAction
  | RemoveRangeAction
  | ClearAction
  | ResizeAction
  | SeekAction;

/**
 * Extract the action type string from an action.
 */
export type BufferActionType = BufferAction['type'];

// =============================================================================
// Action Type Guards
// =============================================================================

/**
 * Check if an action changes loaded content.
 */
export function isContentAction(
  action: BufferAction
): action is LoadRangeAction | RemoveRangeAction | ClearAction {
  return (
    action.type === 'LOAD_RANGE' ||
    action.type === 'REMOVE_RANGE' ||
    action.type === 'CLEAR'
  );
}

/**
 * Check if a value is one of the seek origins.
 */
export function isSeekOrigin(value: unknown): value is SeekOrigin {
  return value === 'start' || value === 'current' || value === 'end';
}

/**
 * Check if an unknown value is a valid BufferAction.
 * Useful for validating actions from external sources.
 */
export function isBufferAction(value: unknown): value is BufferAction {
  return validateAction(value).valid;
}

// =============================================================================
// Action Validation
// =============================================================================

/**
 * Result of validating an action.
 */
export interface ActionValidationResult {
  /** Whether the action is valid */
  readonly valid: boolean;
  /** Error messages if validation failed */
  readonly errors: readonly string[];
}

/**
 * Validate an action with detailed error messages.
 * Optionally validates bounds against the buffer's logical size.
 *
 * @example
 * ```typescript
 * const result = validateAction(action, 4096);
 * if (!result.valid) {
 *   console.error('Invalid action:', result.errors);
 * }
 * ```
 *
 * @param value - Value to validate as an action
 * @param bufferSize - Optional logical size for bounds checking
 */
export function validateAction(
  value: unknown,
  bufferSize?: number
): ActionValidationResult {
  const errors: string[] = [];

  if (typeof value !== 'object' || value === null) {
    errors.push('Action must be a non-null object');
    return { valid: false, errors };
  }

  if (!('type' in value) || typeof value.type !== 'string') {
    errors.push('Action must have a string "type" property');
    return { valid: false, errors };
  }

  switch (value.type) {
    case 'LOAD_RANGE': {
      const offset = 'offset' in value ? value.offset : undefined;
      const data = 'data' in value ? value.data : undefined;
      if (typeof offset !== 'number') {
        errors.push('LOAD_RANGE action requires a numeric "offset" property');
      } else if (!Number.isInteger(offset) || offset < 0) {
        errors.push(`LOAD_RANGE offset must be a non-negative integer: ${offset}`);
      }
      if (!(data instanceof Uint8Array)) {
        errors.push('LOAD_RANGE action requires a Uint8Array "data" property');
      } else if (data.length === 0) {
        errors.push('LOAD_RANGE data cannot be empty');
      } else if (
        bufferSize !== undefined &&
        typeof offset === 'number' &&
        offset + data.length > bufferSize
      ) {
        errors.push(
          `LOAD_RANGE end ${offset + data.length} exceeds buffer size ${bufferSize}`
        );
      }
      break;
    }

    case 'REMOVE_RANGE': {
      const start = 'start' in value ? value.start : undefined;
      const end = 'end' in value ? value.end : undefined;
      if (typeof start !== 'number') {
        errors.push('REMOVE_RANGE action requires a numeric "start" property');
      } else if (start < 0) {
        errors.push(`REMOVE_RANGE start cannot be negative: ${start}`);
      }
      if (typeof end !== 'number') {
        errors.push('REMOVE_RANGE action requires a numeric "end" property');
      } else if (end < 0) {
        errors.push(`REMOVE_RANGE end cannot be negative: ${end}`);
      }
      if (typeof start === 'number' && typeof end === 'number') {
        if (start > end) {
          errors.push(
            `REMOVE_RANGE start (${start}) cannot be greater than end (${end})`
          );
        }
        if (bufferSize !== undefined && end >= bufferSize) {
          errors.push(`REMOVE_RANGE end ${end} must be below buffer size ${bufferSize}`);
        }
      }
      break;
    }

    case 'CLEAR':
      // No additional properties to validate
      break;

    case 'RESIZE': {
      const size = 'size' in value ? value.size : undefined;
      if (typeof size !== 'number') {
        errors.push('RESIZE action requires a numeric "size" property');
      } else if (!Number.isInteger(size) || size <= 0) {
        errors.push(`RESIZE size must be a positive integer: ${size}`);
      }
      break;
    }

    case 'SEEK': {
      const offset = 'offset' in value ? value.offset : undefined;
      const whence = 'whence' in value ? value.whence : undefined;
      if (typeof offset !== 'number' || !Number.isInteger(offset)) {
        errors.push('SEEK action requires an integer "offset" property');
      }
      if (!isSeekOrigin(whence)) {
        errors.push('SEEK action requires "whence" to be "start", "current" or "end"');
      }
      break;
    }

    default:
      errors.push(`Unknown action type: "${value.type}"`);
  }

  return { valid: errors.length === 0, errors };
}
