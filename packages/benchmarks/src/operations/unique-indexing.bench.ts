/**
 * Unique indexing benchmarks
 */

import { bench, describe } from 'vitest';
import { IndexedFixedArrays } from '@fixed-vec/core';
import { SEQUENCE_SIZES } from '../utils/sizes';
import { generatePixelSequence } from '../utils/data';

describe('deduplicate pixel sequences', () => {
  for (const size of SEQUENCE_SIZES) {
    const pixels = generatePixelSequence(size.count, size.distinct);

    bench(`fromSequence ${size.name} (${size.count.toString()} arrays)`, () => {
      IndexedFixedArrays.fromSequence(pixels);
    });
  }
});

describe('pack results', () => {
  const indexed = IndexedFixedArrays.fromSequence(generatePixelSequence(10_000, 256));

  bench('indexBuffer', () => {
    indexed.indexBuffer();
  });

  bench('valueBuffer', () => {
    indexed.valueBuffer();
  });

  bench('toArray', () => {
    indexed.toArray();
  });
});
