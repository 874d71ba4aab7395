/**
 * Example usage of @trimat/test-utils
 * This file demonstrates the utilities provided by the package
 */

import { describe, test, expect } from 'vitest';
import { LowerTri, SimpleUpperTriMut, TriangleError } from '@trimat/core';
import {
  PackedFixtures,
  ReadOnlyStorage,
  allPairs,
  captureError,
  createSpyStorage,
  expectPermutationOf,
  expectStrictlyAscending,
  fixtureStorage,
  offDiagonalPairs,
  offsetsUpTo,
  sequentialStorage,
  storesDiagonal,
} from '../src/index.js';

describe('Fixtures', () => {
  test('fixture storage holds the drawn rows', () => {
    const storage = fixtureStorage(PackedFixtures.upperWithDiagonal);
    expect(storage.n).toBe(4);
    expect(storage.toArray()).toEqual(offsetsUpTo(10));
  });

  test('sequential storage is sized for the shape', () => {
    expect(sequentialStorage('lower', 4).length).toBe(10);
    expect(sequentialStorage('symmetric-upper', 4).length).toBe(6);
  });

  test('only the full shapes store the diagonal', () => {
    expect(storesDiagonal('upper')).toBe(true);
    expect(storesDiagonal('simple-lower')).toBe(false);
    expect(storesDiagonal('symmetric-lower')).toBe(false);
  });
});

describe('Helpers', () => {
  test('allPairs covers the square row-major', () => {
    expect(allPairs(2)).toEqual([
      [0, 0],
      [0, 1],
      [1, 0],
      [1, 1],
    ]);
  });

  test('offDiagonalPairs drops i === j', () => {
    expect(offDiagonalPairs(3)).toHaveLength(6);
  });

  test('captureError returns the thrown value', () => {
    const view = new LowerTri(sequentialStorage('lower', 3));
    const err = captureError(() => view.getElement(0, 2));
    expect(err).toBeInstanceOf(TriangleError);
  });

  test('captureError fails when nothing is thrown', () => {
    expect(() => captureError(() => 1)).toThrow('expected function to throw');
  });
});

describe('Assertions', () => {
  test('expectPermutationOf ignores order', () => {
    expectPermutationOf([2, 0, 3, 1], 4);
    expect(() => expectPermutationOf([0, 0, 1], 3)).toThrow();
  });

  test('expectStrictlyAscending rejects repeats', () => {
    expectStrictlyAscending([0, 4, 7]);
    expect(() => expectStrictlyAscending([1, 1])).toThrow();
  });
});

describe('Mocks', () => {
  test('ReadOnlyStorage backs a read-only view', () => {
    const view = new LowerTri(new ReadOnlyStorage(2, ['a', 'b', 'c']));
    expect(view.getRow(1).toArray()).toEqual(['b', 'c']);
  });

  test('createSpyStorage records reads and writes', () => {
    const storage = createSpyStorage(3, [0, 0, 0]);
    const view = new SimpleUpperTriMut(storage);

    view.setElement(1, 2, 9);

    expect(storage.set).toHaveBeenCalledWith(2, 9);
    expect(storage.values).toEqual([0, 0, 9]);
  });
});
