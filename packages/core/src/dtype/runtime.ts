/**
 * Runtime DType management and validation
 *
 * This module provides runtime descriptors for the numeric element types: value
 * validation, range metadata, the scalar kernel used by elementwise arithmetic and
 * the bridge to JavaScript TypedArrays.
 */

import type {
  AnyDType,
  DTypeName,
  DTypeFromName,
  JSTypeOf,
  ArrayConstructorOf,
  TypedArrayOf,
  Float32,
  Float64,
  Int8,
  Int16,
  Int32,
  Int64,
  Uint8,
  Uint16,
  Uint32,
  Uint64,
} from './types';
import { bigintKernel, floatKernel, numberIntegerKernel, type ScalarKernel } from './kernel';

/**
 * Copies values in and out of the dtype's TypedArray
 */
export interface TypedArrayCodec<T extends AnyDType> {
  alloc(length: number): TypedArrayOf<T>;
  pack(values: readonly JSTypeOf<T>[]): TypedArrayOf<T>;
  unpack(array: TypedArrayOf<T>): JSTypeOf<T>[];
}

// =============================================================================
// Runtime DType Class
// =============================================================================

/**
 * Runtime representation of a DType
 *
 * Bridges the compile-time brands with value validation and the kernel that
 * elementwise operations dispatch to.
 */
export class RuntimeDType<T extends AnyDType = AnyDType> {
  constructor(
    public readonly name: T['__dtype'],
    public readonly jsType: 'number' | 'bigint',
    public readonly typedArrayConstructor: ArrayConstructorOf<T>,
    public readonly byteSize: number,
    public readonly signed: boolean,
    public readonly isInteger: boolean,
    public readonly minValue: JSTypeOf<T>,
    public readonly maxValue: JSTypeOf<T>,
    public readonly kernel: ScalarKernel<JSTypeOf<T>>,
    private readonly codec: TypedArrayCodec<T>,
  ) {}

  /**
   * Type guard to check if a value matches this DType, including range
   */
  isValidValue(value: unknown): value is JSTypeOf<T> {
    if (typeof value === 'bigint') {
      return this.jsType === 'bigint' && value >= this.minValue && value <= this.maxValue;
    }
    if (typeof value !== 'number' || this.jsType !== 'number') {
      return false;
    }

    // NaN and Infinity are only representable by floating-point types
    if (!Number.isFinite(value)) {
      return !this.isInteger;
    }

    if (this.isInteger && !Number.isInteger(value)) {
      return false;
    }

    return value >= this.minValue && value <= this.maxValue;
  }

  /**
   * Return the stored form of a valid value, throw otherwise
   *
   * Integer dtypes store `-0` as `+0` and float32 rounds to single precision, the
   * same values the dtype's TypedArray would hold.
   */
  validateValue(value: unknown, index?: number): JSTypeOf<T> {
    if (this.isValidValue(value)) {
      return this.kernel.wrap(value);
    }

    throw new DTypeValidationError(value, this, index);
  }

  /**
   * Create a zero-filled TypedArray for this DType
   */
  createTypedArray(length: number): TypedArrayOf<T> {
    return this.codec.alloc(length);
  }

  /**
   * Create a TypedArray holding the given values
   */
  createTypedArrayFromData(data: readonly JSTypeOf<T>[]): TypedArrayOf<T> {
    for (let i = 0; i < data.length; i++) {
      if (!this.isValidValue(data[i])) {
        throw new DTypeValidationError(data[i], this, i);
      }
    }
    return this.codec.pack(data);
  }

  /**
   * Read every element of a TypedArray of this DType
   */
  readTypedArray(array: TypedArrayOf<T>): JSTypeOf<T>[] {
    return this.codec.unpack(array);
  }

  getInfo(): {
    name: string;
    jsType: string;
    byteSize: number;
    signed: boolean;
    isInteger: boolean;
    minValue: number | bigint;
    maxValue: number | bigint;
    typedArrayName: string;
  } {
    return {
      name: this.name,
      jsType: this.jsType,
      byteSize: this.byteSize,
      signed: this.signed,
      isInteger: this.isInteger,
      minValue: this.minValue,
      maxValue: this.maxValue,
      typedArrayName: this.typedArrayConstructor.name,
    };
  }

  toString(): string {
    return `RuntimeDType(${this.name})`;
  }

  toJSON(): { name: string; byteSize: number; signed: boolean; isInteger: boolean } {
    return {
      name: this.name,
      byteSize: this.byteSize,
      signed: this.signed,
      isInteger: this.isInteger,
    };
  }
}

// =============================================================================
// DType Registry and Factory
// =============================================================================

/**
 * Singleton DType instances
 */
export const DTYPES = {
  int8: new RuntimeDType<Int8>(
    'int8',
    'number',
    Int8Array,
    1,
    true,
    true,
    -128,
    127,
    numberIntegerKernel('int8'),
    {
      alloc: (length) => new Int8Array(length),
      pack: (values) => Int8Array.from(values),
      unpack: (array) => Array.from(array),
    },
  ),
  uint8: new RuntimeDType<Uint8>(
    'uint8',
    'number',
    Uint8Array,
    1,
    false,
    true,
    0,
    255,
    numberIntegerKernel('uint8'),
    {
      alloc: (length) => new Uint8Array(length),
      pack: (values) => Uint8Array.from(values),
      unpack: (array) => Array.from(array),
    },
  ),
  int16: new RuntimeDType<Int16>(
    'int16',
    'number',
    Int16Array,
    2,
    true,
    true,
    -32768,
    32767,
    numberIntegerKernel('int16'),
    {
      alloc: (length) => new Int16Array(length),
      pack: (values) => Int16Array.from(values),
      unpack: (array) => Array.from(array),
    },
  ),
  uint16: new RuntimeDType<Uint16>(
    'uint16',
    'number',
    Uint16Array,
    2,
    false,
    true,
    0,
    65535,
    numberIntegerKernel('uint16'),
    {
      alloc: (length) => new Uint16Array(length),
      pack: (values) => Uint16Array.from(values),
      unpack: (array) => Array.from(array),
    },
  ),
  int32: new RuntimeDType<Int32>(
    'int32',
    'number',
    Int32Array,
    4,
    true,
    true,
    -2147483648,
    2147483647,
    numberIntegerKernel('int32'),
    {
      alloc: (length) => new Int32Array(length),
      pack: (values) => Int32Array.from(values),
      unpack: (array) => Array.from(array),
    },
  ),
  uint32: new RuntimeDType<Uint32>(
    'uint32',
    'number',
    Uint32Array,
    4,
    false,
    true,
    0,
    4294967295,
    numberIntegerKernel('uint32'),
    {
      alloc: (length) => new Uint32Array(length),
      pack: (values) => Uint32Array.from(values),
      unpack: (array) => Array.from(array),
    },
  ),
  int64: new RuntimeDType<Int64>(
    'int64',
    'bigint',
    BigInt64Array,
    8,
    true,
    true,
    -9223372036854775808n,
    9223372036854775807n,
    bigintKernel('int64'),
    {
      alloc: (length) => new BigInt64Array(length),
      pack: (values) => BigInt64Array.from(values),
      unpack: (array) => Array.from(array),
    },
  ),
  uint64: new RuntimeDType<Uint64>(
    'uint64',
    'bigint',
    BigUint64Array,
    8,
    false,
    true,
    0n,
    18446744073709551615n,
    bigintKernel('uint64'),
    {
      alloc: (length) => new BigUint64Array(length),
      pack: (values) => BigUint64Array.from(values),
      unpack: (array) => Array.from(array),
    },
  ),
  float32: new RuntimeDType<Float32>(
    'float32',
    'number',
    Float32Array,
    4,
    true,
    false,
    -3.4028234663852886e38,
    3.4028234663852886e38,
    floatKernel('float32'),
    {
      alloc: (length) => new Float32Array(length),
      pack: (values) => Float32Array.from(values),
      unpack: (array) => Array.from(array),
    },
  ),
  float64: new RuntimeDType<Float64>(
    'float64',
    'number',
    Float64Array,
    8,
    true,
    false,
    -Number.MAX_VALUE,
    Number.MAX_VALUE,
    floatKernel('float64'),
    {
      alloc: (length) => new Float64Array(length),
      pack: (values) => Float64Array.from(values),
      unpack: (array) => Array.from(array),
    },
  ),
} as const;

export type DTypeRegistry = typeof DTYPES;

/**
 * Get a RuntimeDType instance by name with proper typing
 *
 * @example
 * const uint8 = getDType('uint8'); // RuntimeDType<Uint8>
 */
export function getDType<N extends DTypeName>(name: N): RuntimeDType<DTypeFromName<N>> {
  if (!isValidDTypeName(name)) {
    throw new DTypeError(`Unknown DType: ${String(name)}`);
  }
  return DTYPES[name] as RuntimeDType<DTypeFromName<N>>;
}

export function getDTypeNames(): readonly DTypeName[] {
  return Object.keys(DTYPES).filter(isValidDTypeName);
}

export function isValidDTypeName(name: string): name is DTypeName {
  return Object.prototype.hasOwnProperty.call(DTYPES, name);
}

export function isRuntimeDType(value: unknown): value is RuntimeDType {
  return value instanceof RuntimeDType;
}

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Error thrown when DType operations fail
 */
export class DTypeError extends Error {
  constructor(
    message: string,
    public readonly dtype?: RuntimeDType,
    public readonly value?: unknown,
  ) {
    super(message);
    this.name = 'DTypeError';
  }
}

/**
 * Error thrown when a value is not representable by a DType
 */
export class DTypeValidationError extends DTypeError {
  constructor(
    value: unknown,
    expectedDType: RuntimeDType,
    public readonly index?: number,
  ) {
    super(
      index === undefined
        ? `Value ${String(value)} is not valid for DType ${expectedDType.name}`
        : `Value ${String(value)} at index ${index.toString()} is not valid for DType ${expectedDType.name}`,
      expectedDType,
      value,
    );
    this.name = 'DTypeValidationError';
  }
}
