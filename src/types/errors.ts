/**
 * Error values for sparse buffer operations.
 *
 * Operations never throw for ordinary misuse: they return a BufferResult
 * whose error carries one of three kinds. Thrown errors are reserved for
 * broken internal invariants, which are programming defects.
 */

/**
 * Classification of a failed operation.
 *
 * - `invalid-argument`: zero-length request, bad range bounds, bad seek
 *   target, zero size, or use of a destroyed buffer
 * - `allocation-failure`: the bound allocator returned null
 * - `out-of-bounds`: a read would run past the logical end of the buffer
 */
export type SparseBufferErrorKind =
  | 'invalid-argument'
  | 'allocation-failure'
  | 'out-of-bounds';

/**
 * Error reported by a failed sparse buffer operation.
 */
export class SparseBufferError extends Error {
  /** What went wrong */
  readonly kind: SparseBufferErrorKind;

  constructor(kind: SparseBufferErrorKind, message: string) {
    super(message);
    this.name = 'SparseBufferError';
    this.kind = kind;
  }
}

/**
 * Successful outcome of an operation.
 */
export interface BufferOk<T> {
  readonly ok: true;
  readonly value: T;
}

/**
 * Failed outcome of an operation.
 */
export interface BufferErr {
  readonly ok: false;
  readonly error: SparseBufferError;
}

/**
 * Result channel of every fallible operation.
 * Discriminate on `ok`.
 */
export type BufferResult<T> = BufferOk<T> | BufferErr;

/**
 * Wrap a value as a successful result.
 */
export function ok<T>(value: T): BufferOk<T> {
  return Object.freeze({ ok: true as const, value });
}

/**
 * Build a failed result.
 */
export function fail(kind: SparseBufferErrorKind, message: string): BufferErr {
  return Object.freeze({ ok: false as const, error: new SparseBufferError(kind, message) });
}

/**
 * Check if a value is a SparseBufferError.
 */
export function isSparseBufferError(value: unknown): value is SparseBufferError {
  return value instanceof SparseBufferError;
}
