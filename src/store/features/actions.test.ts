/**
 * Tests for action creators, serialization and action validation.
 */

import { describe, it, expect } from 'vitest';
import { BufferActions, serializeAction, deserializeAction } from './actions.ts';
import {
  isBufferAction,
  isContentAction,
  isSeekOrigin,
  validateAction,
} from '../../types/actions.ts';
import { byteOffset } from '../../types/branded.ts';

describe('BufferActions', () => {
  it('should create frozen load actions', () => {
    const data = new Uint8Array([1, 2]);
    const action = BufferActions.loadRange(byteOffset(4), data);
    expect(action).toEqual({ type: 'LOAD_RANGE', offset: 4, data });
    expect(Object.isFrozen(action)).toBe(true);
  });

  it('should create remove actions with inclusive bounds', () => {
    expect(BufferActions.removeRange(byteOffset(1), byteOffset(3))).toEqual({
      type: 'REMOVE_RANGE',
      start: 1,
      end: 3,
    });
  });

  it('should default seeks to the start origin', () => {
    expect(BufferActions.seek(7)).toEqual({ type: 'SEEK', offset: 7, whence: 'start' });
    expect(BufferActions.seek(-2, 'current').whence).toBe('current');
  });

  it('should create clear and resize actions', () => {
    expect(BufferActions.clear()).toEqual({ type: 'CLEAR' });
    expect(BufferActions.resize(64)).toEqual({ type: 'RESIZE', size: 64 });
  });
});

describe('serializeAction / deserializeAction', () => {
  it('should write load payloads as base64', () => {
    const action = BufferActions.loadRange(byteOffset(0), new Uint8Array([104, 105]));
    expect(serializeAction(action)).toBe('{"type":"LOAD_RANGE","offset":0,"data":"aGk="}');
  });

  it('should restore load payloads as bytes', () => {
    const restored = deserializeAction('{"type":"LOAD_RANGE","offset":3,"data":"aGk="}');
    expect(restored.type).toBe('LOAD_RANGE');
    if (restored.type === 'LOAD_RANGE') {
      expect(restored.offset).toBe(3);
      expect(Array.from(restored.data)).toEqual([104, 105]);
    }
  });

  it('should pass other actions through JSON unchanged', () => {
    const action = BufferActions.seek(2, 'end');
    expect(deserializeAction(serializeAction(action))).toEqual(action);
  });

  it('should throw on invalid JSON actions', () => {
    expect(() => deserializeAction('{"type":"NOPE"}')).toThrow('Invalid deserialized action');
  });
});

describe('action guards', () => {
  it('should classify content actions', () => {
    expect(isContentAction(BufferActions.clear())).toBe(true);
    expect(isContentAction(BufferActions.resize(3))).toBe(false);
    expect(isContentAction(BufferActions.seek(0))).toBe(false);
  });

  it('should recognise seek origins', () => {
    expect(isSeekOrigin('end')).toBe(true);
    expect(isSeekOrigin('middle')).toBe(false);
  });

  it('should recognise valid actions from unknown input', () => {
    expect(isBufferAction({ type: 'CLEAR' })).toBe(true);
    expect(isBufferAction({ type: 'RESIZE', size: 0 })).toBe(false);
    expect(isBufferAction(null)).toBe(false);
  });
});

describe('validateAction', () => {
  it('should reject non-objects and missing types', () => {
    expect(validateAction(42).errors).toEqual(['Action must be a non-null object']);
    expect(validateAction({}).errors).toEqual(['Action must have a string "type" property']);
  });

  it('should report unknown action types', () => {
    expect(validateAction({ type: 'UNDO' }).errors).toEqual(['Unknown action type: "UNDO"']);
  });

  it('should check load payloads and bounds', () => {
    expect(validateAction({ type: 'LOAD_RANGE', offset: 0, data: new Uint8Array(0) }).errors)
      .toEqual(['LOAD_RANGE data cannot be empty']);
    expect(validateAction({ type: 'LOAD_RANGE', offset: 8, data: new Uint8Array(4) }, 10).errors)
      .toEqual(['LOAD_RANGE end 12 exceeds buffer size 10']);
    expect(validateAction({ type: 'LOAD_RANGE', offset: 6, data: new Uint8Array(4) }, 10).valid)
      .toBe(true);
  });

  it('should check removal bounds', () => {
    expect(validateAction({ type: 'REMOVE_RANGE', start: 5, end: 4 }).errors)
      .toEqual(['REMOVE_RANGE start (5) cannot be greater than end (4)']);
    expect(validateAction({ type: 'REMOVE_RANGE', start: 0, end: 10 }, 10).errors)
      .toEqual(['REMOVE_RANGE end 10 must be below buffer size 10']);
  });

  it('should check seek fields', () => {
    const result = validateAction({ type: 'SEEK', offset: 1.5, whence: 'middle' });
    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(2);
  });
});
