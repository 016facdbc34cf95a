/**
 * Branded types for type-safe position handling.
 *
 * Branded types (also called "opaque types" or "nominal types") prevent
 * accidentally mixing up different kinds of numeric values. A byte offset
 * (a position in the logical address space) should not be confused with a
 * byte length (a count of bytes), even though both are plain numbers at
 * runtime.
 *
 * Usage:
 * ```typescript
 * const start = byteOffset(10);
 * const length = byteLength(4);
 *
 * // Type error: can't assign ByteLength to ByteOffset
 * const wrong: ByteOffset = length;
 *
 * // OK: explicit arithmetic keeps the brand
 * const end: ByteOffset = endOf(start, length);
 * ```
 */

// =============================================================================
// Brand Symbol
// =============================================================================

/**
 * Unique symbol used for branding types.
 * This symbol is never used at runtime - it only exists for the type system.
 */
declare const brand: unique symbol;

/**
 * Generic brand interface.
 * The brand is a phantom type that only exists in the type system.
 */
interface Brand<B> {
  readonly [brand]: B;
}

/**
 * Create a branded type from a base type.
 * The brand only exists at compile time - no runtime overhead.
 */
type Branded<T, B> = T & Brand<B>;

// =============================================================================
// Position Types
// =============================================================================

/**
 * Byte offset in the logical address space of a sparse buffer.
 *
 * Use when:
 * - Addressing the start of a loaded range
 * - Tracking the read cursor
 * - Describing removal bounds
 */
export type ByteOffset = Branded<number, 'ByteOffset'>;

/**
 * Byte length (size/count of bytes).
 *
 * Semantically distinct from ByteOffset: an offset is a position,
 * a length is a size/count.
 */
export type ByteLength = Branded<number, 'ByteLength'>;

// =============================================================================
// Constructor Functions
// =============================================================================

/**
 * Create a ByteOffset from a number.
 * Use this for explicit conversions from raw numbers.
 */
export function byteOffset(value: number): ByteOffset {
  return value as ByteOffset;
}

/**
 * Create a ByteLength from a number.
 * Use this for explicit conversions from raw numbers.
 */
export function byteLength(value: number): ByteLength {
  return value as ByteLength;
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if a value is a valid offset (non-negative integer).
 */
export function isValidOffset(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * Check if a value is a valid size for a buffer or a request (positive integer).
 */
export function isValidSize(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0;
}

// =============================================================================
// Arithmetic Helpers
// =============================================================================

/**
 * Exclusive end of the span starting at `start` with `length` bytes.
 */
export function endOf(start: ByteOffset, length: ByteLength): ByteOffset {
  return (start + length) as ByteOffset;
}

/**
 * Clamp a ByteOffset to a valid range.
 */
export function clampByteOffset(
  offset: ByteOffset,
  min: ByteOffset,
  max: ByteOffset
): ByteOffset {
  return Math.max(min, Math.min(max, offset)) as ByteOffset;
}

/**
 * Zero byte offset - where a fresh cursor sits.
 */
export const ZERO_BYTE_OFFSET: ByteOffset = 0 as ByteOffset;
