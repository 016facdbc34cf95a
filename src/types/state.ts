/**
 * Core immutable state types for sparse buffers.
 * All state structures are read-only and use structural sharing for efficiency.
 */

import type { ByteOffset, ByteLength } from './branded.ts';

// =============================================================================
// Red-Black Tree Types
// =============================================================================

/**
 * Red-Black tree node color.
 */
export type NodeColor = 'red' | 'black';

/**
 * Generic base interface for Red-Black tree nodes.
 * Provides the common structure (color, left, right) that all RB-tree nodes share.
 * Uses F-bounded polymorphism for type-safe self-referential children.
 *
 * @template T - The concrete node type extending this interface
 */
export interface RBNode<T extends RBNode<T>> {
  readonly color: NodeColor;
  readonly left: T | null;
  readonly right: T | null;
}

// =============================================================================
// Range Types
// =============================================================================

/**
 * Immutable loaded range in the Red-Black tree, keyed by `start`.
 *
 * Ranges never overlap or touch, so ordering by start also orders them by end.
 * `data` is owned by this node alone and holds exactly `length` bytes; it is
 * never written to once the node exists.
 */
export interface RangeNode extends RBNode<RangeNode> {
  /** First byte covered by this range */
  readonly start: ByteOffset;
  /** Number of bytes covered (always > 0) */
  readonly length: ByteLength;
  /** Loaded bytes */
  readonly data: Uint8Array;
  /** Number of ranges in this subtree */
  readonly subtreeCount: number;
  /** Total loaded bytes in this subtree */
  readonly subtreeLoaded: number;
}

/**
 * Extent of a loaded range, without its payload.
 */
export interface RangeExtent {
  readonly start: ByteOffset;
  readonly length: ByteLength;
}

// =============================================================================
// Main Buffer State
// =============================================================================

/**
 * Immutable sparse buffer snapshot.
 * All properties are read-only and structurally shared between versions.
 */
export interface SparseBufferState {
  /** Monotonically increasing version number for change detection */
  readonly version: number;
  /** Logical size of the addressable space (always >= 1) */
  readonly size: ByteLength;
  /** Current read position, 0 <= cursor <= size */
  readonly cursor: ByteOffset;
  /** Root of the Red-Black tree of loaded ranges */
  readonly root: RangeNode | null;
}

// =============================================================================
// Memory Allocation
// =============================================================================

/**
 * Pluggable memory provider for range payloads.
 *
 * Every method may fail by returning null; the engine reports that as an
 * `allocation-failure` and leaves the buffer unchanged.
 */
export interface MemoryAllocator {
  /** Allocate a zeroed buffer of `size` bytes. */
  allocate(size: number): Uint8Array | null;
  /**
   * Return a buffer of `size` bytes starting with the first
   * `min(size, buffer.length)` bytes of `buffer`.
   * The input stays valid; the engine releases it separately.
   */
  reallocate(buffer: Uint8Array, size: number): Uint8Array | null;
  /** Give a buffer back. The engine never touches it afterwards. */
  release(buffer: Uint8Array): void;
}

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Configuration options for creating a sparse buffer.
 */
export interface SparseBufferConfig {
  /** Logical size in bytes (must be a positive integer) */
  size: number;
  /** Memory provider for range payloads (default: plain Uint8Arrays) */
  allocator?: MemoryAllocator;
  /** Check range invariants after every committed change (default: false) */
  verifyInvariants?: boolean;
}
