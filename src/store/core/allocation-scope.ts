/**
 * Allocation scope: the memory ledger of one mutation.
 *
 * Buffers allocated while a mutation runs are staged; buffers the mutation
 * stops referencing are retired. Committing releases the retired buffers,
 * rolling back releases the staged ones, so a failed mutation leaves the
 * allocator exactly as it found it.
 *
 * The scope does NOT own any buffer state. The store decides when to commit
 * or roll back.
 */

import type { MemoryAllocator } from '../../types/state.ts';

/**
 * Staging ledger bound to an allocator.
 */
export interface AllocationScope {
  /** Allocate a zeroed buffer; staged until commit. */
  allocate(size: number): Uint8Array | null;

  /**
   * Resize a buffer. A staged input is released right away; a committed
   * input is retired and stays readable until commit.
   */
  reallocate(buffer: Uint8Array, size: number): Uint8Array | null;

  /**
   * Mark a buffer as no longer referenced by the state being built.
   * Staged buffers are released right away.
   */
  retire(buffer: Uint8Array): void;

  /** Release every retired buffer and forget the staged ones. */
  commit(): void;

  /** Release every staged buffer and forget the retired ones. */
  rollback(): void;

  /** Number of buffers allocated in this scope and not yet committed. */
  readonly stagedCount: number;

  /** Number of committed buffers waiting to be released. */
  readonly retiredCount: number;
}

/**
 * Factory function to create an AllocationScope.
 * Uses closure-based encapsulation consistent with the codebase pattern.
 */
export function createAllocationScope(allocator: MemoryAllocator): AllocationScope {
  let staged = new Set<Uint8Array>();
  let retired = new Set<Uint8Array>();

  function allocate(size: number): Uint8Array | null {
    const buffer = allocator.allocate(size);
    if (buffer === null) return null;
    staged.add(buffer);
    return buffer;
  }

  function reallocate(buffer: Uint8Array, size: number): Uint8Array | null {
    const next = allocator.reallocate(buffer, size);
    if (next === null) return null;
    retire(buffer);
    staged.add(next);
    return next;
  }

  function retire(buffer: Uint8Array): void {
    if (staged.delete(buffer)) {
      allocator.release(buffer);
      return;
    }
    retired.add(buffer);
  }

  function commit(): void {
    const toRelease = retired;
    retired = new Set();
    staged = new Set();
    for (const buffer of toRelease) {
      allocator.release(buffer);
    }
  }

  function rollback(): void {
    const toRelease = staged;
    staged = new Set();
    retired = new Set();
    for (const buffer of toRelease) {
      allocator.release(buffer);
    }
  }

  return {
    allocate,
    reallocate,
    retire,
    commit,
    rollback,
    get stagedCount() { return staged.size; },
    get retiredCount() { return retired.size; },
  };
}
