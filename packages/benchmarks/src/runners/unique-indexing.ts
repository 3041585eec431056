/**
 * Unique indexing benchmark runner using tinybench directly
 *
 * Measures one-pass deduplication of pixel sequences with varying duplicate ratios.
 */

import { IndexedFixedArrays, UniqueIndexBuilder } from '@fixed-vec/core';
import { SEQUENCE_SIZES, formatSize } from '../utils/sizes';
import { generatePixelSequence } from '../utils/data';
import type { FormattedResult } from '../utils/formatting';
import { createBench, isEntryPoint, runAndReport } from './report';

export async function runUniqueIndexingBenchmarks(): Promise<FormattedResult[]> {
  const bench = createBench('Unique Indexing');

  console.log('Setting up pixel sequences...');
  for (const size of SEQUENCE_SIZES) {
    const pixels = generatePixelSequence(size.count, size.distinct);
    console.log(`✓ Generated ${formatSize(size)}`);

    bench.add(`fromSequence ${size.name}`, () => {
      IndexedFixedArrays.fromSequence(pixels);
    });

    bench.add(`builder insert ${size.name}`, () => {
      const builder = new UniqueIndexBuilder();
      for (const pixel of pixels) {
        builder.insert(pixel);
      }
    });

    const indexed = IndexedFixedArrays.fromSequence(pixels);
    bench.add(`indexBuffer ${size.name}`, () => {
      indexed.indexBuffer();
    });
  }

  return runAndReport(bench);
}

if (isEntryPoint(import.meta.url)) {
  await runUniqueIndexingBenchmarks();
}
