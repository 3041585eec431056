/**
 * Unique indexing of fixed-length arrays
 *
 * A sequence of FixedArrays is split into the distinct values, in order of first
 * appearance, and one index per input element pointing into them. Two arrays are the
 * same value when their content keys match, so every NaN matches every other NaN
 * while `-0` and `+0` stay apart.
 */

import type { AnyDType, TypedArrayOf } from '../dtype/types';
import type { FixedArray } from '../fixed-array/fixed-array';
import { DTypeMismatchError, IndexOutOfBoundsError, LengthMismatchError } from '../errors';

// =============================================================================
// Result
// =============================================================================

/**
 * Immutable deduplicated view of a sequence
 *
 * @example
 * const red = FixedArray.fromArray(uint8, [255, 0, 0]);
 * const green = FixedArray.fromArray(uint8, [0, 255, 0]);
 * const indexed = IndexedFixedArrays.fromSequence([red, green, green, red]);
 * indexed.indices;     // [0, 1, 1, 0]
 * indexed.uniqueCount; // 2
 */
export class IndexedFixedArrays<D extends AnyDType = AnyDType, N extends number = number>
  implements Iterable<FixedArray<D, N>>
{
  private readonly palette: readonly FixedArray<D, N>[];
  private readonly positions: readonly number[];

  /**
   * @throws {IndexOutOfBoundsError} when an index does not point into `values`
   */
  constructor(values: readonly FixedArray<D, N>[], indices: readonly number[]) {
    for (const index of indices) {
      if (!Number.isInteger(index) || index < 0 || index >= values.length) {
        throw new IndexOutOfBoundsError(index, values.length);
      }
    }
    this.palette = Object.freeze(values.map((value) => value.clone()));
    this.positions = Object.freeze(indices.slice());
  }

  /**
   * Deduplicate `sequence` in one pass
   *
   * @throws {DTypeMismatchError | LengthMismatchError} when elements differ in dtype or length
   */
  static fromSequence<D extends AnyDType, N extends number>(
    sequence: Iterable<FixedArray<D, N>>,
  ): IndexedFixedArrays<D, N> {
    const builder = new UniqueIndexBuilder<D, N>();
    for (const value of sequence) {
      builder.insert(value);
    }
    return builder.build();
  }

  static empty<D extends AnyDType, N extends number>(): IndexedFixedArrays<D, N> {
    return new IndexedFixedArrays<D, N>([], []);
  }

  /**
   * Distinct values in order of first appearance
   *
   * Returns copies; the snapshot itself never changes.
   */
  get values(): FixedArray<D, N>[] {
    return this.palette.map((value) => value.clone());
  }

  /**
   * One index into `values` per input element
   */
  get indices(): readonly number[] {
    return this.positions;
  }

  /**
   * Number of input elements
   */
  get length(): number {
    return this.positions.length;
  }

  get uniqueCount(): number {
    return this.palette.length;
  }

  /**
   * Value of the input element at `index`
   *
   * @throws {IndexOutOfBoundsError}
   */
  at(index: number): FixedArray<D, N> {
    const position = this.positions[index];
    if (position === undefined || !Number.isInteger(index)) {
      throw new IndexOutOfBoundsError(index, this.positions.length);
    }
    return this.valueAt(position);
  }

  /**
   * Rebuild the input sequence
   */
  toArray(): FixedArray<D, N>[] {
    return this.positions.map((position) => this.valueAt(position));
  }

  *[Symbol.iterator](): Iterator<FixedArray<D, N>> {
    for (const position of this.positions) {
      yield this.valueAt(position);
    }
  }

  /**
   * Indices packed into the narrowest unsigned TypedArray that holds all of them
   */
  indexBuffer(): Uint16Array | Uint32Array {
    if (this.palette.length <= 0x10000) {
      return Uint16Array.from(this.positions);
    }
    return Uint32Array.from(this.positions);
  }

  /**
   * Distinct values laid end to end in one TypedArray of their dtype
   *
   * `undefined` when there are no values, since an empty result has no dtype.
   */
  valueBuffer(): TypedArrayOf<D> | undefined {
    const first = this.palette[0];
    if (first === undefined) {
      return undefined;
    }
    return first.dtype.createTypedArrayFromData(this.palette.flatMap((value) => value.toArray()));
  }

  toString(): string {
    return `IndexedFixedArrays(${this.length.toString()} elements, ${this.uniqueCount.toString()} unique)`;
  }

  private valueAt(position: number): FixedArray<D, N> {
    const value = this.palette[position];
    if (value === undefined) {
      throw new IndexOutOfBoundsError(position, this.palette.length);
    }
    return value.clone();
  }
}

// =============================================================================
// Incremental Builder
// =============================================================================

/**
 * Deduplicates values one at a time
 *
 * @example
 * const builder = new UniqueIndexBuilder<Uint8, 3>();
 * builder.insert(red);   // true
 * builder.insert(red);   // false
 * builder.build().indices; // [0, 0]
 */
export class UniqueIndexBuilder<D extends AnyDType = AnyDType, N extends number = number> {
  private readonly lookup = new Map<string, number>();
  private readonly palette: FixedArray<D, N>[] = [];
  private readonly positions: number[] = [];

  /**
   * Append `value`, returning whether it had not been seen before
   *
   * @throws {DTypeMismatchError | LengthMismatchError} when `value` differs in dtype or
   * length from the values already inserted
   */
  insert(value: FixedArray<D, N>): boolean {
    const first = this.palette[0];
    if (first !== undefined) {
      if (value.dtype.name !== first.dtype.name) {
        throw new DTypeMismatchError(first.dtype.name, value.dtype.name);
      }
      if (value.length !== first.length) {
        throw new LengthMismatchError(first.length, value.length, 'sequence');
      }
    }

    const key = value.contentKey();
    const existing = this.lookup.get(key);
    if (existing !== undefined) {
      this.positions.push(existing);
      return false;
    }

    const position = this.palette.length;
    this.lookup.set(key, position);
    this.palette.push(value.clone());
    this.positions.push(position);
    return true;
  }

  get length(): number {
    return this.positions.length;
  }

  get uniqueCount(): number {
    return this.palette.length;
  }

  /**
   * Snapshot of everything inserted so far; later inserts do not affect it
   */
  build(): IndexedFixedArrays<D, N> {
    return new IndexedFixedArrays(this.palette, this.positions);
  }
}
