/**
 * Elementwise operations benchmark runner
 *
 * Benchmarks add, sub, mul and div across dtypes and array lengths
 */

import { FixedArray, float32, float64, int32, int64, uint8 } from '@fixed-vec/core';
import type { AnyDType, ElementwiseOp, RuntimeDType } from '@fixed-vec/core';
import { ARRAY_SIZES } from '../utils/sizes';
import { generateByteData } from '../utils/data';
import type { FormattedResult } from '../utils/formatting';
import { createBench, isEntryPoint, runAndReport } from './report';

const OPERATIONS: readonly ElementwiseOp[] = ['add', 'sub', 'mul', 'div'];

const NUMBER_DTYPES: readonly RuntimeDType<AnyDType>[] = [uint8, int32, float32, float64];

export async function runElementwiseBenchmarks(): Promise<FormattedResult[]> {
  const bench = createBench('Elementwise Operations');

  console.log('Setting up operand pairs...');
  for (const size of ARRAY_SIZES) {
    for (const dtype of NUMBER_DTYPES) {
      // divisors stay non-zero for integer dtypes
      const a = new FixedArray(dtype, size.length, generateByteData(size.length));
      const b = new FixedArray(
        dtype,
        size.length,
        generateByteData(size.length).map((v) => (v % 255) + 1),
      );

      for (const op of OPERATIONS) {
        bench.add(`${op} ${dtype.name} ${size.name} (${size.length.toString()})`, () => {
          a[op](b);
        });
      }
    }

    const wideA = new FixedArray(
      int64,
      size.length,
      generateByteData(size.length).map((v) => BigInt(v)),
    );
    const wideB = new FixedArray(
      int64,
      size.length,
      generateByteData(size.length).map((v) => BigInt(v + 1)),
    );
    bench.add(`mul int64 ${size.name} (${size.length.toString()})`, () => {
      wideA.mul(wideB);
    });

    console.log(`✓ Created ${size.name} operands (${size.length.toString()} elements)`);
  }

  return runAndReport(bench);
}

if (isEntryPoint(import.meta.url)) {
  await runElementwiseBenchmarks();
}
