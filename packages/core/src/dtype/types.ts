/**
 * Type-level DType definitions for fixed-length numeric arrays
 *
 * Each numeric element type is a branded interface carrying its name, JavaScript value
 * type, TypedArray constructor and layout facts. The brands only exist at compile time;
 * their runtime counterparts live in `./runtime`.
 */

// =============================================================================
// Core DType Branded Types
// =============================================================================

/**
 * Base branded type interface for numeric element types
 */
export interface DType<
  Name extends string,
  JSType extends number | bigint,
  TypedArrayType extends TypedArrayConstructor,
  ByteSize extends number = number,
  Signed extends boolean = boolean,
  IsInteger extends boolean = boolean,
> {
  readonly __dtype: Name;
  readonly __jsType: JSType;
  readonly __typedArray: TypedArrayType;
  readonly __byteSize: ByteSize;
  readonly __signed: Signed;
  readonly __isInteger: IsInteger;
}

/**
 * TypedArray constructors backing the numeric dtypes
 */
export type TypedArrayConstructor =
  | Int8ArrayConstructor
  | Uint8ArrayConstructor
  | Int16ArrayConstructor
  | Uint16ArrayConstructor
  | Int32ArrayConstructor
  | Uint32ArrayConstructor
  | Float32ArrayConstructor
  | Float64ArrayConstructor
  | BigInt64ArrayConstructor
  | BigUint64ArrayConstructor;

// =============================================================================
// Concrete DType Definitions
// =============================================================================

export type Int8 = DType<'int8', number, Int8ArrayConstructor, 1, true, true>;
export type Uint8 = DType<'uint8', number, Uint8ArrayConstructor, 1, false, true>;
export type Int16 = DType<'int16', number, Int16ArrayConstructor, 2, true, true>;
export type Uint16 = DType<'uint16', number, Uint16ArrayConstructor, 2, false, true>;
export type Int32 = DType<'int32', number, Int32ArrayConstructor, 4, true, true>;
export type Uint32 = DType<'uint32', number, Uint32ArrayConstructor, 4, false, true>;

/**
 * 64-bit signed integer (BigInt)
 */
export type Int64 = DType<'int64', bigint, BigInt64ArrayConstructor, 8, true, true>;

/**
 * 64-bit unsigned integer (BigInt)
 */
export type Uint64 = DType<'uint64', bigint, BigUint64ArrayConstructor, 8, false, true>;

export type Float32 = DType<'float32', number, Float32ArrayConstructor, 4, true, false>;
export type Float64 = DType<'float64', number, Float64ArrayConstructor, 8, true, false>;

// =============================================================================
// DType Utility Types
// =============================================================================

/**
 * Union of all supported DType names
 */
export type DTypeName =
  | 'int8'
  | 'uint8'
  | 'int16'
  | 'uint16'
  | 'int32'
  | 'uint32'
  | 'int64'
  | 'uint64'
  | 'float32'
  | 'float64';

export type IntegerDTypeName =
  | 'int8'
  | 'uint8'
  | 'int16'
  | 'uint16'
  | 'int32'
  | 'uint32'
  | 'int64'
  | 'uint64';

export type FloatDTypeName = 'float32' | 'float64';

/**
 * Union of all DType branded types
 */
export type AnyDType =
  | Int8
  | Uint8
  | Int16
  | Uint16
  | Int32
  | Uint32
  | Int64
  | Uint64
  | Float32
  | Float64;

/**
 * Extract the name from a DType
 *
 * @example
 * type Name = DTypeNameOf<Float32> // 'float32'
 */
export type DTypeNameOf<T extends AnyDType> = T['__dtype'];

/**
 * Extract the JavaScript value type from a DType
 *
 * @example
 * type Value = JSTypeOf<Uint8> // number
 * type Wide = JSTypeOf<Int64> // bigint
 */
export type JSTypeOf<T extends AnyDType> = T['__jsType'];

/**
 * Extract the TypedArray constructor from a DType
 */
export type ArrayConstructorOf<T extends AnyDType> = T['__typedArray'];

/**
 * TypedArray instance type of a DType
 */
export type TypedArrayOf<T extends AnyDType> = InstanceType<ArrayConstructorOf<T>>;

/**
 * Get DType from name
 *
 * @example
 * type Type = DTypeFromName<'uint8'> // Uint8
 */
export type DTypeFromName<Name extends DTypeName> = Name extends 'int8'
  ? Int8
  : Name extends 'uint8'
    ? Uint8
    : Name extends 'int16'
      ? Int16
      : Name extends 'uint16'
        ? Uint16
        : Name extends 'int32'
          ? Int32
          : Name extends 'uint32'
            ? Uint32
            : Name extends 'int64'
              ? Int64
              : Name extends 'uint64'
                ? Uint64
                : Name extends 'float32'
                  ? Float32
                  : Name extends 'float64'
                    ? Float64
                    : never;

export type IsIntegerDType<T extends AnyDType> = T['__isInteger'];

export type IsFloatDType<T extends AnyDType> = T['__isInteger'] extends false ? true : false;

export type IsSignedDType<T extends AnyDType> = T['__signed'];

export type ByteSizeOf<T extends AnyDType> = T['__byteSize'];

// =============================================================================
// Type Compatibility
// =============================================================================

/**
 * Check if one DType can be cast to another without data loss
 *
 * @example
 * type Widening = CanSafelyCast<Int8, Int32> // true
 * type Narrowing = CanSafelyCast<Float64, Int32> // false
 */
export type CanSafelyCast<From extends AnyDType, To extends AnyDType> = From extends To
  ? true
  : From extends Int8
    ? To extends Int16 | Int32 | Int64 | Float32 | Float64
      ? true
      : false
    : From extends Uint8
      ? To extends Int16 | Uint16 | Int32 | Uint32 | Int64 | Uint64 | Float32 | Float64
        ? true
        : false
      : From extends Int16
        ? To extends Int32 | Int64 | Float32 | Float64
          ? true
          : false
        : From extends Uint16
          ? To extends Int32 | Uint32 | Int64 | Uint64 | Float32 | Float64
            ? true
            : false
          : From extends Int32
            ? To extends Int64 | Float64
              ? true
              : false
            : From extends Uint32
              ? To extends Int64 | Uint64 | Float64
                ? true
                : false
              : From extends Float32
                ? To extends Float64
                  ? true
                  : false
                : false;

/**
 * Check if a cast may lose data
 */
export type IsLossyCast<From extends AnyDType, To extends AnyDType> =
  CanSafelyCast<From, To> extends true ? false : true;
