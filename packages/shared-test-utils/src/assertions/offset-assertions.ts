/**
 * Assertions over offset collections
 */

import { expect } from 'vitest';
import { offsetsUpTo } from '../helpers/coordinates.js';

/**
 * Assert that `offsets` hits every offset in `[0, size)` exactly once,
 * in any order
 */
export function expectPermutationOf(offsets: Iterable<number>, size: number): void {
  const sorted = Array.from(offsets).sort((a, b) => a - b);
  expect(sorted).toEqual(offsetsUpTo(size));
}

/**
 * Assert that `offsets` is strictly increasing
 */
export function expectStrictlyAscending(offsets: Iterable<number>): void {
  const values = Array.from(offsets);
  for (let k = 1; k < values.length; k++) {
    expect(values[k]).toBeGreaterThan(values[k - 1]);
  }
}
