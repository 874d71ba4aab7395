/**
 * @trimat/test-utils
 *
 * Shared test utilities for the trimat workspace
 */

// Assertions
export { expectPermutationOf, expectStrictlyAscending } from './assertions/offset-assertions.js';

// Mocks
export { ReadOnlyStorage, UnwritableStorage, createSpyStorage, type SpyStorage } from './mocks/index.js';

// Fixtures
export {
  PackedFixtures,
  fixtureStorage,
  sequentialStorage,
  storesDiagonal,
  type PackedFixture,
} from './fixtures/packed-fixtures.js';

// Helpers
export { allPairs, offDiagonalPairs, offsetsUpTo } from './helpers/coordinates.js';
export { captureError } from './helpers/errors.js';
