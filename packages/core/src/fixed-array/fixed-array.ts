/**
 * Core FixedArray class implementation
 *
 * A FixedArray is a value of exactly N elements of one numeric dtype. Arithmetic is
 * elementwise and dispatches to the dtype's scalar kernel, ordering is lexicographic,
 * and casts convert element by element.
 */

import type { AnyDType, JSTypeOf, TypedArrayOf } from '../dtype/types';
import type { RuntimeDType } from '../dtype/runtime';
import type { Ordering } from '../dtype/kernel';
import {
  convertArray,
  ConversionError,
  NATIVE_CAST_OPTIONS,
  type ConversionOptions,
} from '../dtype/conversion';
import type { ValidIndex } from '../arithmetic';
import { DTypeMismatchError, IndexOutOfBoundsError, LengthMismatchError } from '../errors';

/**
 * Right-hand side of an elementwise operation: a same-shaped array or a broadcast scalar
 */
export type BinaryOperand<D extends AnyDType, N extends number> = FixedArray<D, N> | JSTypeOf<D>;

/**
 * Elementwise operations backed by the scalar kernel
 */
export type ElementwiseOp = 'add' | 'sub' | 'mul' | 'div' | 'rem';

function isArrayOperand<D extends AnyDType, N extends number>(
  operand: BinaryOperand<D, N>,
): operand is FixedArray<D, N> {
  return operand instanceof FixedArray;
}

/**
 * Fixed-length numeric array
 *
 * @template D - Element dtype
 * @template N - Number of elements
 *
 * @example
 * const a = FixedArray.fromArray(int32, [1, 2, 3]);
 * const b = a.add(FixedArray.fromArray(int32, [4, 5, 6])); // [5, 7, 9]
 * const c = a.add(1);                                      // [2, 3, 4]
 * a.gt(FixedArray.fromArray(int32, [1, 2, 2]));            // true
 */
export class FixedArray<D extends AnyDType = AnyDType, N extends number = number>
  implements Iterable<JSTypeOf<D>>
{
  private data: JSTypeOf<D>[];

  /**
   * @throws {LengthMismatchError} when `elements.length !== length`
   * @throws {DTypeValidationError} when an element is not a value of `dtype`
   *
   * Elements are stored in the dtype's canonical form (see `RuntimeDType.validateValue`).
   */
  constructor(
    public readonly dtype: RuntimeDType<D>,
    public readonly length: N,
    elements: readonly JSTypeOf<D>[],
  ) {
    if (elements.length !== length) {
      throw new LengthMismatchError(length, elements.length, 'construction');
    }
    this.data = elements.map((value, i) => dtype.validateValue(value, i));
  }

  // =============================================================================
  // Creation
  // =============================================================================

  /**
   * Build from a literal; the length is taken from the tuple type
   *
   * @example
   * const red = FixedArray.fromArray(uint8, [255, 0, 0]); // FixedArray<Uint8, 3>
   */
  static fromArray<D extends AnyDType, E extends readonly JSTypeOf<D>[] | []>(
    dtype: RuntimeDType<D>,
    elements: E,
  ): FixedArray<D, E['length']> {
    // the tuple type fixes the length the runtime value reports
    return new FixedArray(dtype, elements.length as E['length'], elements);
  }

  /**
   * Build with every position set to `scalar`
   */
  static fromBroadcast<D extends AnyDType, N extends number>(
    dtype: RuntimeDType<D>,
    length: N,
    scalar: JSTypeOf<D>,
  ): FixedArray<D, N> {
    return new FixedArray(dtype, length, Array.from({ length }, () => scalar));
  }

  /**
   * Copy the elements of a TypedArray of the same dtype
   */
  static fromTypedArray<D extends AnyDType>(
    dtype: RuntimeDType<D>,
    array: TypedArrayOf<D>,
  ): FixedArray<D> {
    const values = dtype.readTypedArray(array);
    return new FixedArray(dtype, values.length, values);
  }

  // =============================================================================
  // Element Access
  // =============================================================================

  /**
   * Read the element at `index`
   *
   * A literal index outside `[0, N)` does not compile when N is a literal.
   *
   * @throws {IndexOutOfBoundsError}
   */
  at<I extends number>(index: I & ValidIndex<I, N>): JSTypeOf<D> {
    if (!Number.isInteger(index) || index < 0) {
      throw new IndexOutOfBoundsError(index, this.length);
    }
    return this.get(index);
  }

  /**
   * Overwrite the element at `index`
   *
   * @throws {IndexOutOfBoundsError}
   * @throws {DTypeValidationError} when `value` is not a value of the dtype
   */
  set<I extends number>(index: I & ValidIndex<I, N>, value: JSTypeOf<D>): this {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      throw new IndexOutOfBoundsError(index, this.length);
    }
    this.data[index] = this.dtype.validateValue(value);
    return this;
  }

  private get(index: number): JSTypeOf<D> {
    const value = this.data[index];
    if (value === undefined) {
      throw new IndexOutOfBoundsError(index, this.length);
    }
    return value;
  }

  [Symbol.iterator](): Iterator<JSTypeOf<D>> {
    return this.data[Symbol.iterator]();
  }

  toArray(): JSTypeOf<D>[] {
    return this.data.slice();
  }

  toTypedArray(): TypedArrayOf<D> {
    return this.dtype.createTypedArrayFromData(this.data);
  }

  clone(): FixedArray<D, N> {
    return new FixedArray(this.dtype, this.length, this.data);
  }

  // =============================================================================
  // Elementwise Arithmetic
  // =============================================================================

  add(rhs: BinaryOperand<D, N>): FixedArray<D, N> {
    return this.derive(this.combine('add', rhs));
  }

  sub(rhs: BinaryOperand<D, N>): FixedArray<D, N> {
    return this.derive(this.combine('sub', rhs));
  }

  mul(rhs: BinaryOperand<D, N>): FixedArray<D, N> {
    return this.derive(this.combine('mul', rhs));
  }

  /**
   * Elementwise division; integer dtypes truncate toward zero
   *
   * @throws {DivisionByZeroError} for a zero divisor on integer dtypes
   */
  div(rhs: BinaryOperand<D, N>): FixedArray<D, N> {
    return this.derive(this.combine('div', rhs));
  }

  /**
   * Elementwise remainder, signed like the dividend
   *
   * @throws {DivisionByZeroError} for a zero divisor on integer dtypes
   */
  rem(rhs: BinaryOperand<D, N>): FixedArray<D, N> {
    return this.derive(this.combine('rem', rhs));
  }

  // In-place variants compute the whole result before replacing the elements, so a
  // failing operation leaves the receiver unchanged.

  addAssign(rhs: BinaryOperand<D, N>): this {
    this.data = this.combine('add', rhs);
    return this;
  }

  subAssign(rhs: BinaryOperand<D, N>): this {
    this.data = this.combine('sub', rhs);
    return this;
  }

  mulAssign(rhs: BinaryOperand<D, N>): this {
    this.data = this.combine('mul', rhs);
    return this;
  }

  divAssign(rhs: BinaryOperand<D, N>): this {
    this.data = this.combine('div', rhs);
    return this;
  }

  remAssign(rhs: BinaryOperand<D, N>): this {
    this.data = this.combine('rem', rhs);
    return this;
  }

  private combine(op: ElementwiseOp, rhs: BinaryOperand<D, N>): JSTypeOf<D>[] {
    const kernel = this.dtype.kernel;

    if (isArrayOperand(rhs)) {
      this.assertCompatible(rhs);
      return this.data.map((value, i) => kernel[op](value, rhs.get(i)));
    }

    const scalar = this.dtype.validateValue(rhs);
    return this.data.map((value) => kernel[op](value, scalar));
  }

  private derive(values: JSTypeOf<D>[]): FixedArray<D, N> {
    return new FixedArray(this.dtype, this.length, values);
  }

  private assertCompatible(other: FixedArray<D, N>): void {
    if (other.dtype.name !== this.dtype.name) {
      throw new DTypeMismatchError(this.dtype.name, other.dtype.name);
    }
    if (other.length !== this.length) {
      throw new LengthMismatchError(this.length, other.length, 'operand');
    }
  }

  // =============================================================================
  // Comparison
  // =============================================================================

  /**
   * Elementwise equality under the dtype's native `===`
   */
  equals(other: FixedArray<D, N>): boolean {
    if (other.dtype.name !== this.dtype.name || other.length !== this.length) {
      return false;
    }
    const kernel = this.dtype.kernel;
    return this.data.every((value, i) => kernel.equals(value, other.get(i)));
  }

  notEquals(other: FixedArray<D, N>): boolean {
    return !this.equals(other);
  }

  /**
   * Lexicographic three-way comparison
   *
   * The first differing position decides; floats use the kernel's total order.
   *
   * @throws {DTypeMismatchError | LengthMismatchError} for operands of another shape
   */
  compare(other: FixedArray<D, N>): Ordering {
    this.assertCompatible(other);
    const kernel = this.dtype.kernel;
    for (let i = 0; i < this.length; i++) {
      const ordering = kernel.compare(this.get(i), other.get(i));
      if (ordering !== 0) {
        return ordering;
      }
    }
    return 0;
  }

  lt(other: FixedArray<D, N>): boolean {
    return this.compare(other) < 0;
  }

  le(other: FixedArray<D, N>): boolean {
    return this.compare(other) <= 0;
  }

  gt(other: FixedArray<D, N>): boolean {
    return this.compare(other) > 0;
  }

  ge(other: FixedArray<D, N>): boolean {
    return this.compare(other) >= 0;
  }

  /**
   * Canonical content key: NaNs collapse to one key, `-0` stays apart from `+0`
   */
  contentKey(): string {
    const kernel = this.dtype.kernel;
    return `${this.dtype.name}:${this.data.map((value) => kernel.keyOf(value)).join(',')}`;
  }

  /**
   * Equality by content key, the relation used for deduplication
   */
  isIdentical(other: FixedArray<D, N>): boolean {
    return this.contentKey() === other.contentKey();
  }

  // =============================================================================
  // Casting
  // =============================================================================

  /**
   * Convert every element to another dtype
   *
   * Defaults to the native cast: floats truncate toward zero, integers wrap, NaN
   * becomes zero.
   *
   * @example
   * FixedArray.fromArray(float64, [1.9, -1.9, 300]).castTo(uint8); // [1, 255, 44]
   *
   * @throws {ConversionError} when `options` forbid a conversion the data needs
   */
  castTo<U extends AnyDType>(
    dtype: RuntimeDType<U>,
    options: ConversionOptions = NATIVE_CAST_OPTIONS,
  ): FixedArray<U, N> {
    const result = convertArray(this.data, this.dtype, dtype, options);
    if (!result.success) {
      throw new ConversionError(
        `Cannot cast ${this.toString()} to ${dtype.name}: ${result.errors.join('; ')}`,
        this.dtype,
        dtype,
        this.toArray(),
      );
    }
    return new FixedArray(dtype, this.length, result.values);
  }

  // =============================================================================
  // Utilities
  // =============================================================================

  toString(): string {
    return `FixedArray(${this.dtype.name}, [${this.data.map(String).join(', ')}])`;
  }
}
