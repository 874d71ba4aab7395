export { ReadOnlyStorage, UnwritableStorage, createSpyStorage, type SpyStorage } from './storage-mock.js';
