/**
 * Coordinate enumeration helpers
 */

import type { Coordinate } from '@trimat/core';

/**
 * Every `(i, j)` in an `n` by `n` matrix, row-major
 */
export function allPairs(n: number): Coordinate[] {
  const pairs: Coordinate[] = [];
  for (let i = 0; i < n; i++) {
    for (let j = 0; j < n; j++) {
      pairs.push([i, j]);
    }
  }
  return pairs;
}

/**
 * Every `(i, j)` with `i != j`, row-major
 */
export function offDiagonalPairs(n: number): Coordinate[] {
  return allPairs(n).filter(([i, j]) => i !== j);
}

/**
 * `[0, 1, ..., count - 1]`
 */
export function offsetsUpTo(count: number): number[] {
  return Array.from({ length: count }, (_, k) => k);
}
