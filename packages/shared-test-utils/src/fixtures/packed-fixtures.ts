/**
 * Packed layout fixtures.
 *
 * Every fixture stores its own offset at each position, so an element read
 * through a view equals the offset the view computed.
 */

import { PackedArray, type TriangleKind } from '@trimat/core';

export interface PackedFixture {
  description: string;
  kind: TriangleKind;
  n: number;
  /** Packed rows as stored, row-major */
  rows: readonly (readonly number[])[];
}

/**
 * Layouts drawn as the rows they store
 */
export const PackedFixtures = {
  lowerWithDiagonal: {
    description: 'Lower triangle with diagonal, n=4',
    kind: 'lower',
    n: 4,
    rows: [[0], [1, 2], [3, 4, 5], [6, 7, 8, 9]],
  },
  upperWithDiagonal: {
    description: 'Upper triangle with diagonal, n=4',
    kind: 'upper',
    n: 4,
    rows: [[0, 1, 2, 3], [4, 5, 6], [7, 8], [9]],
  },
  simpleLower: {
    description: 'Lower triangle without diagonal, n=5 (rows 1..4)',
    kind: 'simple-lower',
    n: 5,
    rows: [[0], [1, 2], [3, 4, 5], [6, 7, 8, 9]],
  },
  simpleUpper: {
    description: 'Upper triangle without diagonal, n=5 (rows 0..3)',
    kind: 'simple-upper',
    n: 5,
    rows: [[0, 1, 2, 3], [4, 5, 6], [7, 8], [9]],
  },
} satisfies Record<string, PackedFixture>;

/**
 * Whether a shape stores its diagonal
 */
export function storesDiagonal(kind: TriangleKind): boolean {
  return kind === 'lower' || kind === 'upper';
}

/**
 * Storage whose element at every offset is the offset itself
 */
export function sequentialStorage(kind: TriangleKind, n: number): PackedArray<number> {
  return PackedArray.sequential(n, storesDiagonal(kind));
}

/**
 * Storage for a fixture, filled from its drawn rows
 */
export function fixtureStorage(fixture: PackedFixture): PackedArray<number> {
  return PackedArray.from(fixture.n, storesDiagonal(fixture.kind), fixture.rows.flat());
}
