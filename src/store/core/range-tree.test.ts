/**
 * Tests for the immutable range tree.
 */

import { describe, it, expect } from 'vitest';
import type { RangeNode } from '../../types/state.ts';
import { byteOffset } from '../../types/branded.ts';
import {
  rangeEnd,
  collectRanges,
  iterateRangesFrom,
  findRangeAt,
  findGaps,
  getRangeCount,
  getLoadedLength,
  rbInsertRange,
  removeRangesBetween,
} from './range-tree.ts';

/**
 * Black height of a subtree; throws on a red-red edge or unequal paths.
 */
function blackHeight(node: RangeNode | null): number {
  if (node === null) return 1;
  if (node.color === 'red' && (node.left?.color === 'red' || node.right?.color === 'red')) {
    throw new Error(`red node at ${node.start} has a red child`);
  }
  const left = blackHeight(node.left);
  const right = blackHeight(node.right);
  if (left !== right) {
    throw new Error(`unequal black height at ${node.start}: ${left} vs ${right}`);
  }
  return left + (node.color === 'black' ? 1 : 0);
}

function expectBalanced(root: RangeNode | null): void {
  if (root !== null) {
    expect(root.color).toBe('black');
  }
  expect(() => blackHeight(root)).not.toThrow();
}

/**
 * Build a tree of `count` two-byte ranges at 0, 10, 20, ...
 */
function buildTree(count: number): RangeNode | null {
  let root: RangeNode | null = null;
  for (let i = 0; i < count; i++) {
    root = rbInsertRange(root, byteOffset(i * 10), new Uint8Array([i, i]));
  }
  return root;
}

function depth(node: RangeNode | null): number {
  return node === null ? 0 : 1 + Math.max(depth(node.left), depth(node.right));
}

/**
 * Red-Black height bound: no path longer than 2·log2(n + 1).
 */
function expectShallow(root: RangeNode | null): void {
  const count = getRangeCount(root);
  expect(depth(root)).toBeLessThanOrEqual(2 * Math.log2(count + 1) + 1);
}

/**
 * Deterministic Park-Miller generator.
 */
function createRandom(seed: number): (limit: number) => number {
  let value = seed;
  return (limit) => {
    value = (value * 16807) % 2147483647;
    return value % limit;
  };
}

function starts(root: RangeNode | null): number[] {
  return collectRanges(root).map((node) => node.start);
}

describe('rbInsertRange', () => {
  it('should create a black root for the first range', () => {
    const root = rbInsertRange(null, byteOffset(5), new Uint8Array([1, 2, 3]));
    expect(root.color).toBe('black');
    expect(root.start).toBe(5);
    expect(root.length).toBe(3);
    expect(rangeEnd(root)).toBe(8);
  });

  it('should keep ranges ordered for ascending inserts', () => {
    const root = buildTree(32);
    expect(starts(root)).toEqual(Array.from({ length: 32 }, (_, i) => i * 10));
    expectBalanced(root);
  });

  it('should keep ranges ordered for descending inserts', () => {
    let root: RangeNode | null = null;
    for (let i = 31; i >= 0; i--) {
      root = rbInsertRange(root, byteOffset(i * 10), new Uint8Array([1]));
    }
    expect(starts(root)).toEqual(Array.from({ length: 32 }, (_, i) => i * 10));
    expectBalanced(root);
  });

  it('should maintain subtree aggregates', () => {
    const root = buildTree(7);
    expect(getRangeCount(root)).toBe(7);
    expect(getLoadedLength(root)).toBe(14);
  });

  it('should not modify the input tree', () => {
    const before = buildTree(4);
    const snapshot = starts(before);
    rbInsertRange(before, byteOffset(100), new Uint8Array([9]));
    expect(starts(before)).toEqual(snapshot);
    expect(getRangeCount(before)).toBe(4);
  });
});

describe('iterateRangesFrom', () => {
  const root = buildTree(5); // [0,2) [10,12) [20,22) [30,32) [40,42)

  it('should include a range ending exactly at the position', () => {
    expect([...iterateRangesFrom(root, 12)].map((n) => n.start)).toEqual([10, 20, 30, 40]);
  });

  it('should skip ranges that end before the position', () => {
    expect([...iterateRangesFrom(root, 13)].map((n) => n.start)).toEqual([20, 30, 40]);
  });

  it('should yield nothing past the last range', () => {
    expect([...iterateRangesFrom(root, 43)]).toEqual([]);
  });

  it('should yield nothing for an empty tree', () => {
    expect([...iterateRangesFrom(null, 0)]).toEqual([]);
  });
});

describe('findRangeAt', () => {
  const root = buildTree(3); // [0,2) [10,12) [20,22)

  it('should find the range holding an offset', () => {
    expect(findRangeAt(root, byteOffset(11))?.start).toBe(10);
    expect(findRangeAt(root, byteOffset(0))?.start).toBe(0);
  });

  it('should return null for an offset in a gap or at a range end', () => {
    expect(findRangeAt(root, byteOffset(5))).toBeNull();
    expect(findRangeAt(root, byteOffset(12))).toBeNull();
  });
});

describe('findGaps', () => {
  const root = buildTree(3); // [0,2) [10,12) [20,22)

  it('should list holes between and after ranges', () => {
    expect(findGaps(root, 0, 30)).toEqual([
      { start: 2, length: 8 },
      { start: 12, length: 8 },
      { start: 22, length: 8 },
    ]);
  });

  it('should clip holes to the window', () => {
    expect(findGaps(root, 1, 11)).toEqual([{ start: 2, length: 8 }]);
  });

  it('should report the whole window for an empty tree', () => {
    expect(findGaps(null, 3, 7)).toEqual([{ start: 3, length: 4 }]);
  });

  it('should report nothing inside a loaded range', () => {
    expect(findGaps(root, 10, 12)).toEqual([]);
  });
});

describe('removeRangesBetween', () => {
  it('should drop every range whose start is in the span', () => {
    const root = removeRangesBetween(buildTree(10), 20, 50);
    expect(root?.color).toBe('black');
    expect(starts(root)).toEqual([0, 10, 60, 70, 80, 90]);
    expect(getRangeCount(root)).toBe(6);
    expect(getLoadedLength(root)).toBe(12);
    expectBalanced(root);
  });

  it('should drop a single range', () => {
    const root = removeRangesBetween(buildTree(10), 40, 40);
    expect(starts(root)).toEqual([0, 10, 20, 30, 50, 60, 70, 80, 90]);
    expectBalanced(root);
  });

  it('should drop the first and last ranges', () => {
    const withoutFirst = removeRangesBetween(buildTree(10), 0, 0);
    expect(starts(withoutFirst)).toEqual([10, 20, 30, 40, 50, 60, 70, 80, 90]);
    expectBalanced(withoutFirst);

    const withoutLast = removeRangesBetween(buildTree(10), 90, 95);
    expect(starts(withoutLast)).toEqual([0, 10, 20, 30, 40, 50, 60, 70, 80]);
    expectBalanced(withoutLast);
  });

  it('should return null when every range is dropped', () => {
    expect(removeRangesBetween(buildTree(6), 0, 50)).toBeNull();
  });

  it('should share untouched subtrees with the input', () => {
    const before = buildTree(16);
    const after = removeRangesBetween(before, 1000, 2000);
    expect(after).toBe(before);
  });

  it('should keep the input tree intact', () => {
    const before = buildTree(8);
    removeRangesBetween(before, 0, 30);
    expect(starts(before)).toEqual([0, 10, 20, 30, 40, 50, 60, 70]);
  });

  it('should allow inserting after removal', () => {
    let root = removeRangesBetween(buildTree(8), 20, 40);
    root = rbInsertRange(root, byteOffset(25), new Uint8Array(3));
    expect(starts(root)).toEqual([0, 10, 25, 50, 60, 70]);
    expectBalanced(root);
  });

  it('should keep a large span removal balanced with exact aggregates', () => {
    const root = removeRangesBetween(buildTree(500), 1000, 3995);
    expect(getRangeCount(root)).toBe(200);
    expect(getLoadedLength(root)).toBe(400);
    expect(starts(root).slice(98, 102)).toEqual([980, 990, 4000, 4010]);
    expectBalanced(root);
    expectShallow(root);
  });
});

describe('balance under churn', () => {
  it('should stay balanced while random ranges are removed and reloaded', () => {
    const count = 2000;
    const random = createRandom(7);
    let root = buildTree(count);

    for (let i = 0; i < 4000; i++) {
      const start = random(count) * 10;
      root = removeRangesBetween(root, start, start);
      root = rbInsertRange(root, byteOffset(start), new Uint8Array([1, 2]));
    }

    expect(getRangeCount(root)).toBe(count);
    expect(getLoadedLength(root)).toBe(count * 2);
    expectBalanced(root);
    expectShallow(root);
  });

  it('should stay balanced while the root range is removed and reloaded', () => {
    let root = buildTree(1000);

    for (let i = 0; i < 1000; i++) {
      if (root === null) throw new Error('tree emptied');
      const start = root.start;
      root = removeRangesBetween(root, start, start);
      root = rbInsertRange(root, byteOffset(start), new Uint8Array([3, 4]));
    }

    expect(getRangeCount(root)).toBe(1000);
    expectBalanced(root);
    expectShallow(root);
  });

  it('should stay balanced while half the ranges are removed one by one', () => {
    let root = buildTree(2000);

    for (let i = 0; i < 2000; i += 2) {
      root = removeRangesBetween(root, i * 10, i * 10);
      if (i % 250 === 0) expectBalanced(root);
    }

    expect(getRangeCount(root)).toBe(1000);
    expect(starts(root).slice(0, 3)).toEqual([10, 30, 50]);
    expectBalanced(root);
    expectShallow(root);
  });
});
