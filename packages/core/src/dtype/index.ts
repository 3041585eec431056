/**
 * DType System - numeric element types for fixed-length arrays
 *
 * - Compile-time branded types for each element type
 * - Runtime descriptors with range validation and TypedArray integration
 * - Per-dtype scalar kernels with fixed-width integer and IEEE float semantics
 * - Value conversion with overflow and precision-loss policies
 *
 * @example
 * ```typescript
 * import { getDType, convertValue, NATIVE_CAST_OPTIONS } from './dtype';
 *
 * const uint8 = getDType('uint8');
 * uint8.kernel.add(250, 10); // 4
 *
 * const result = convertValue(-1.5, getDType('float64'), uint8, NATIVE_CAST_OPTIONS);
 * // { success: true, value: 255, ... }
 * ```
 */

export type {
  DType,
  AnyDType,
  DTypeName,
  IntegerDTypeName,
  FloatDTypeName,
  Int8,
  Uint8,
  Int16,
  Uint16,
  Int32,
  Uint32,
  Int64,
  Uint64,
  Float32,
  Float64,
  DTypeNameOf,
  JSTypeOf,
  ArrayConstructorOf,
  TypedArrayOf,
  TypedArrayConstructor,
  DTypeFromName,
  ByteSizeOf,
  IsIntegerDType,
  IsFloatDType,
  IsSignedDType,
  CanSafelyCast,
  IsLossyCast,
} from './types';

export {
  RuntimeDType,
  DTYPES,
  getDType,
  getDTypeNames,
  isValidDTypeName,
  isRuntimeDType,
  DTypeError,
  DTypeValidationError,
} from './runtime';
export type { DTypeRegistry, TypedArrayCodec } from './runtime';

export {
  bigintKernel,
  compareFloat,
  floatKernel,
  floatKeyOf,
  numberIntegerKernel,
} from './kernel';
export type { NumberIntegerName, Ordering, ScalarKernel } from './kernel';

export {
  convertValue,
  convertArray,
  ConversionError,
  STRICT_CONVERSION_OPTIONS,
  PERMISSIVE_CONVERSION_OPTIONS,
  NATIVE_CAST_OPTIONS,
} from './conversion';
export type { ArrayConversionResult, ConversionOptions, ConversionResult } from './conversion';

export {
  int8,
  uint8,
  int16,
  uint16,
  int32,
  uint32,
  int64,
  uint64,
  float32,
  float64,
} from './constants';
