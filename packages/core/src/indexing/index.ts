/**
 * Deduplication of fixed-length arrays into a palette plus per-element indices
 */

export { IndexedFixedArrays, UniqueIndexBuilder } from './unique-indexer';
