/**
 * Storage mocks for testing views without PackedArray
 */

import { vi, type Mock } from 'vitest';
import type { MutableTriangleStorage, TriangleStorage } from '@trimat/core';

/**
 * Read-only storage: implements `get` but no `set`
 */
export class ReadOnlyStorage<T> implements TriangleStorage<T> {
  constructor(
    readonly n: number,
    private readonly values: readonly T[]
  ) {}

  get length(): number {
    return this.values.length;
  }

  get(index: number): T {
    return this.values[index];
  }
}

/**
 * Storage that claims to be writable but has no `set` at run time, as a
 * caller without type checking could pass
 */
export class UnwritableStorage<T> extends ReadOnlyStorage<T> implements MutableTriangleStorage<T> {
  declare readonly set: (index: number, value: T) => void;
}

export interface SpyStorage<T> extends MutableTriangleStorage<T> {
  readonly values: T[];
  readonly get: Mock<(index: number) => T>;
  readonly set: Mock<(index: number, value: T) => void>;
}

/**
 * Mutable storage whose `get` and `set` are spies over a plain array
 */
export function createSpyStorage<T>(n: number, values: T[]): SpyStorage<T> {
  return {
    n,
    values,
    get length() {
      return values.length;
    },
    get: vi.fn((index: number) => values[index]),
    set: vi.fn((index: number, value: T) => {
      values[index] = value;
    }),
  };
}
