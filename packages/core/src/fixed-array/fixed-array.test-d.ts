/**
 * Type tests for the fixed-array module
 *
 * Lengths inferred from literals, element types per dtype and compile-time index checks.
 */

import { expectTypeOf } from 'expect-type';
import { FixedArray } from './fixed-array';
import type { BinaryOperand } from './fixed-array';
import { float64, int64, uint8 } from '../dtype/constants';
import type { Float64, Int64, Uint8 } from '../dtype/types';
import type { Ordering } from '../dtype/kernel';

const rgb = FixedArray.fromArray(uint8, [255, 0, 0]);
expectTypeOf(rgb).toEqualTypeOf<FixedArray<Uint8, 3>>();
expectTypeOf(rgb.length).toEqualTypeOf<3>();
expectTypeOf(rgb.at(0)).toEqualTypeOf<number>();
expectTypeOf(rgb.at(2)).toEqualTypeOf<number>();

// @ts-expect-error - index 3 is past the end of a length-3 array
rgb.at(3);

// @ts-expect-error - negative literal indices never resolve
rgb.at(-1);

// @ts-expect-error - writes are checked the same way
rgb.set(3, 0);

// Dynamic indices are checked at run time
declare const position: number;
expectTypeOf(rgb.at(position)).toEqualTypeOf<number>();

// 64-bit integers carry bigint elements
const wide = FixedArray.fromArray(int64, [1n, 2n]);
expectTypeOf(wide).toEqualTypeOf<FixedArray<Int64, 2>>();
expectTypeOf(wide.toArray()).toEqualTypeOf<bigint[]>();
expectTypeOf(wide.toTypedArray()).toEqualTypeOf<InstanceType<BigInt64ArrayConstructor>>();

// @ts-expect-error - number elements are not int64 values
FixedArray.fromArray(int64, [1, 2]);

// Arithmetic keeps dtype and length
expectTypeOf(rgb.add(rgb)).toEqualTypeOf<FixedArray<Uint8, 3>>();
expectTypeOf(rgb.mul(2)).toEqualTypeOf<FixedArray<Uint8, 3>>();
expectTypeOf(rgb.addAssign(1)).toEqualTypeOf<FixedArray<Uint8, 3>>();
expectTypeOf<BinaryOperand<Uint8, 3>>().toEqualTypeOf<FixedArray<Uint8, 3> | number>();

// @ts-expect-error - operands of another literal length are rejected
rgb.add(FixedArray.fromArray(uint8, [1, 2]));

// @ts-expect-error - bigint scalars do not broadcast into uint8
rgb.add(1n);

expectTypeOf(rgb.compare(rgb)).toEqualTypeOf<Ordering>();

// Casting changes the dtype and keeps the length
expectTypeOf(rgb.castTo(float64)).toEqualTypeOf<FixedArray<Float64, 3>>();

// Broadcast and TypedArray construction
expectTypeOf(FixedArray.fromBroadcast(uint8, 4, 0)).toEqualTypeOf<FixedArray<Uint8, 4>>();
expectTypeOf(FixedArray.fromTypedArray(uint8, new Uint8Array(2))).toEqualTypeOf<
  FixedArray<Uint8>
>();
