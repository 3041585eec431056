/**
 * Type tests for dtype/types.ts
 */

import { expectTypeOf } from 'expect-type';
import type {
  AnyDType,
  ByteSizeOf,
  CanSafelyCast,
  DTypeFromName,
  DTypeName,
  DTypeNameOf,
  Float32,
  Float64,
  Int8,
  Int16,
  Int32,
  Int64,
  IsFloatDType,
  IsIntegerDType,
  IsLossyCast,
  IsSignedDType,
  JSTypeOf,
  TypedArrayOf,
  Uint8,
  Uint64,
} from './types';
import type { RuntimeDType } from './runtime';
import { DTYPES, getDType } from './runtime';

// Element value types
expectTypeOf<JSTypeOf<Uint8>>().toEqualTypeOf<number>();
expectTypeOf<JSTypeOf<Float32>>().toEqualTypeOf<number>();
expectTypeOf<JSTypeOf<Int64>>().toEqualTypeOf<bigint>();
expectTypeOf<JSTypeOf<AnyDType>>().toEqualTypeOf<number | bigint>();

// Names and lookups
expectTypeOf<DTypeNameOf<Int16>>().toEqualTypeOf<'int16'>();
expectTypeOf<DTypeFromName<'uint64'>>().toEqualTypeOf<Uint64>();
expectTypeOf<DTypeFromName<'float64'>>().toEqualTypeOf<Float64>();
expectTypeOf<DTypeNameOf<AnyDType>>().toEqualTypeOf<DTypeName>();

// TypedArray bridge
expectTypeOf<TypedArrayOf<Int8>>().toEqualTypeOf<InstanceType<Int8ArrayConstructor>>();
expectTypeOf<TypedArrayOf<Int64>>().toEqualTypeOf<InstanceType<BigInt64ArrayConstructor>>();

// Flags
expectTypeOf<IsIntegerDType<Int32>>().toEqualTypeOf<true>();
expectTypeOf<IsIntegerDType<Float32>>().toEqualTypeOf<false>();
expectTypeOf<IsFloatDType<Float64>>().toEqualTypeOf<true>();
expectTypeOf<IsFloatDType<Uint8>>().toEqualTypeOf<false>();
expectTypeOf<IsSignedDType<Uint8>>().toEqualTypeOf<false>();
expectTypeOf<ByteSizeOf<Float64>>().toEqualTypeOf<8>();

// Cast safety
expectTypeOf<CanSafelyCast<Int8, Int32>>().toEqualTypeOf<true>();
expectTypeOf<CanSafelyCast<Uint8, Int16>>().toEqualTypeOf<true>();
expectTypeOf<CanSafelyCast<Int32, Float64>>().toEqualTypeOf<true>();
expectTypeOf<CanSafelyCast<Int32, Float32>>().toEqualTypeOf<false>();
expectTypeOf<CanSafelyCast<Float64, Float32>>().toEqualTypeOf<false>();
expectTypeOf<CanSafelyCast<Int64, Float64>>().toEqualTypeOf<false>();
expectTypeOf<CanSafelyCast<Uint64, Uint64>>().toEqualTypeOf<true>();
expectTypeOf<IsLossyCast<Float32, Float64>>().toEqualTypeOf<false>();
expectTypeOf<IsLossyCast<Int32, Int8>>().toEqualTypeOf<true>();

// Runtime descriptors keep their brand
expectTypeOf(getDType('uint8')).toEqualTypeOf<RuntimeDType<Uint8>>();
expectTypeOf(DTYPES.int64).toEqualTypeOf<RuntimeDType<Int64>>();
expectTypeOf(DTYPES.int64.minValue).toEqualTypeOf<bigint>();
expectTypeOf(DTYPES.float32.kernel.add).parameters.toEqualTypeOf<[number, number]>();

// @ts-expect-error - bool is not a numeric dtype
getDType('bool');
