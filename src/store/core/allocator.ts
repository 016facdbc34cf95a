/**
 * Memory providers for range payloads.
 *
 * `defaultAllocator` hands out plain Uint8Arrays. `createTrackedAllocator`
 * keeps a ledger of live buffers, can inject failures, and throws when it is
 * asked to reallocate or release a buffer it does not own.
 */

import type { MemoryAllocator } from '../../types/state.ts';

/**
 * Copy the first `min(size, buffer.length)` bytes of `buffer` into a fresh
 * zeroed array of `size` bytes.
 */
function resized(buffer: Uint8Array, size: number): Uint8Array {
  if (size <= buffer.length) {
    return buffer.slice(0, size);
  }
  const next = new Uint8Array(size);
  next.set(buffer);
  return next;
}

/**
 * Allocator backed by ordinary typed arrays. Never fails.
 */
export const defaultAllocator: MemoryAllocator = Object.freeze({
  allocate(size: number): Uint8Array {
    return new Uint8Array(size);
  },
  reallocate(buffer: Uint8Array, size: number): Uint8Array {
    return resized(buffer, size);
  },
  release(): void {
    // Garbage collected
  },
});

// =============================================================================
// Tracked Allocator
// =============================================================================

/**
 * Options for a tracked allocator.
 */
export interface TrackedAllocatorOptions {
  /**
   * Number of allocate/reallocate calls that succeed before every further
   * call returns null. Undefined means never fail.
   */
  failAfter?: number;
}

/**
 * Counters exposed by a tracked allocator.
 */
export interface AllocatorStats {
  /** Buffers handed out and not yet released */
  readonly liveBuffers: number;
  /** Bytes held by live buffers */
  readonly liveBytes: number;
  /** Successful allocate calls */
  readonly allocations: number;
  /** Successful reallocate calls */
  readonly reallocations: number;
  /** release calls */
  readonly releases: number;
  /** allocate/reallocate calls that returned null */
  readonly failures: number;
}

/**
 * Allocator with a ledger of the buffers it handed out.
 */
export interface TrackedAllocator extends MemoryAllocator {
  /** Current counters */
  readonly stats: AllocatorStats;
  /** Whether `buffer` was handed out by this allocator and is still live */
  owns(buffer: Uint8Array): boolean;
  /** Change the failure budget; counts from the next call */
  setFailAfter(count: number | undefined): void;
}

/**
 * Create an allocator that records every live buffer.
 *
 * @example
 * ```typescript
 * const allocator = createTrackedAllocator({ failAfter: 2 });
 * allocator.allocate(4); // Uint8Array(4)
 * allocator.allocate(4); // Uint8Array(4)
 * allocator.allocate(4); // null
 * ```
 */
export function createTrackedAllocator(
  options: TrackedAllocatorOptions = {}
): TrackedAllocator {
  const live = new Set<Uint8Array>();
  let remaining = options.failAfter;
  let liveBytes = 0;
  let allocations = 0;
  let reallocations = 0;
  let releases = 0;
  let failures = 0;

  /**
   * Consume one unit of the failure budget.
   * Returns false once the budget is exhausted.
   */
  function admit(): boolean {
    if (remaining === undefined) return true;
    if (remaining <= 0) {
      failures++;
      return false;
    }
    remaining--;
    return true;
  }

  function track(buffer: Uint8Array): Uint8Array {
    live.add(buffer);
    liveBytes += buffer.length;
    return buffer;
  }

  function assertOwned(buffer: Uint8Array, operation: string): void {
    if (!live.has(buffer)) {
      throw new Error(`${operation} of a buffer this allocator does not own`);
    }
  }

  return {
    allocate(size: number): Uint8Array | null {
      if (!admit()) return null;
      allocations++;
      return track(new Uint8Array(size));
    },

    reallocate(buffer: Uint8Array, size: number): Uint8Array | null {
      assertOwned(buffer, 'reallocate');
      if (!admit()) return null;
      reallocations++;
      return track(resized(buffer, size));
    },

    release(buffer: Uint8Array): void {
      assertOwned(buffer, 'release');
      live.delete(buffer);
      liveBytes -= buffer.length;
      releases++;
    },

    get stats(): AllocatorStats {
      return Object.freeze({
        liveBuffers: live.size,
        liveBytes,
        allocations,
        reallocations,
        releases,
        failures,
      });
    },

    owns(buffer: Uint8Array): boolean {
      return live.has(buffer);
    },

    setFailAfter(count: number | undefined): void {
      remaining = count;
    },
  };
}
