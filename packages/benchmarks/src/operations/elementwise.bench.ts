/**
 * Elementwise arithmetic benchmarks
 *
 * Tests the cost of allocating and in-place operations on short fixed arrays.
 */

import { bench, describe } from 'vitest';
import { FixedArray, float32, int32, uint8 } from '@fixed-vec/core';
import { ARRAY_SIZES } from '../utils/sizes';
import { generateByteData } from '../utils/data';

describe('allocating arithmetic', () => {
  for (const size of ARRAY_SIZES) {
    const data = generateByteData(size.length);
    const a = new FixedArray(int32, size.length, data);
    const b = new FixedArray(int32, size.length, data.map((v) => v + 1));

    bench(`add ${size.name} (${size.length.toString()} elements) - int32`, () => {
      a.add(b);
    });

    bench(`add scalar ${size.name} (${size.length.toString()} elements) - int32`, () => {
      a.add(7);
    });

    bench(`div ${size.name} (${size.length.toString()} elements) - int32`, () => {
      a.div(b);
    });
  }
});

describe('in-place arithmetic', () => {
  for (const size of ARRAY_SIZES) {
    const data = generateByteData(size.length);
    const acc = new FixedArray(float32, size.length, data);

    bench(`mulAssign ${size.name} (${size.length.toString()} elements) - float32`, () => {
      acc.mulAssign(1);
    });
  }
});

describe('wrapping arithmetic', () => {
  const pixel = FixedArray.fromArray(uint8, [250, 128, 3]);

  bench('add with wrap - uint8 rgb', () => {
    pixel.add(10);
  });

  bench('compare - uint8 rgb', () => {
    pixel.compare(FixedArray.fromArray(uint8, [250, 128, 4]));
  });

  bench('contentKey - uint8 rgb', () => {
    pixel.contentKey();
  });
});
