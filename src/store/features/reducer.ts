/**
 * Buffer reducer for sparse buffers.
 * Produces new state from old state + action. The only side effect is on
 * the allocation scope, which the caller commits or rolls back.
 */

import type { SparseBufferState } from '../../types/state.ts';
import type { BufferAction } from '../../types/actions.ts';
import type { BufferReducer } from '../../types/store.ts';
import { ok, fail, type BufferResult } from '../../types/errors.ts';
import type { AllocationScope } from '../core/allocation-scope.ts';
import {
  loadRange,
  removeRange,
  clearRanges,
  resizeBuffer,
  seekCursor,
} from '../core/range-list.ts';

/**
 * Apply one action.
 * Returns the same state reference when the action changes nothing.
 */
export const bufferReducer: BufferReducer<AllocationScope> = (
  state: SparseBufferState,
  action: BufferAction,
  scope: AllocationScope
): BufferResult<SparseBufferState> => {
  switch (action.type) {
    case 'LOAD_RANGE':
      return loadRange(state, action.offset, action.data, scope);

    case 'REMOVE_RANGE':
      return removeRange(state, action.start, action.end, scope);

    case 'CLEAR':
      return ok(clearRanges(state, scope));

    case 'RESIZE':
      return resizeBuffer(state, action.size, scope);

    case 'SEEK':
      return seekCursor(state, action.offset, action.whence);

    default: {
      // Exhaustiveness check
      const unknown: never = action;
      return fail('invalid-argument', `Unknown action type: ${JSON.stringify(unknown)}`);
    }
  }
};
