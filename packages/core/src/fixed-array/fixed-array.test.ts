/**
 * Runtime tests for fixed-array/fixed-array.ts
 */

import { describe, it, expect } from 'vitest';
import { FixedArray } from './fixed-array';
import { float32, float64, int8, int32, int64, uint8, uint16 } from '../dtype/constants';
import { DTypeValidationError } from '../dtype/runtime';
import type { Int32 } from '../dtype/types';
import { ConversionError, STRICT_CONVERSION_OPTIONS } from '../dtype/conversion';
import {
  DivisionByZeroError,
  DTypeMismatchError,
  IndexOutOfBoundsError,
  LengthMismatchError,
} from '../errors';

describe('FixedArray', () => {
  describe('construction', () => {
    it('should build from elements matching the declared length', () => {
      const a = new FixedArray(int32, 3, [1, 2, 3]);
      expect(a.length).toBe(3);
      expect(a.dtype).toBe(int32);
      expect(a.toArray()).toEqual([1, 2, 3]);
    });

    it('should store negative zero as positive zero on integer dtypes', () => {
      const a = FixedArray.fromArray(int32, [Math.round(-0.4), 1]);
      expect(Object.is(a.at(0), 0)).toBe(true);
      expect(a.contentKey()).toBe('int32:0,1');
      expect(FixedArray.fromArray(int32, [1, 2]).mul(-0).toArray()).toEqual([0, 0]);
    });

    it('should reject a wrong element count', () => {
      expect(() => new FixedArray(int32, 3, [1, 2])).toThrow(LengthMismatchError);
      expect(() => new FixedArray(int32, 3, [1, 2])).toThrow('Expected 3 elements, received 2');
    });

    it('should reject values outside the dtype', () => {
      expect(() => new FixedArray(uint8, 2, [1, 256])).toThrow(DTypeValidationError);
      expect(() => new FixedArray(uint8, 2, [1, 256])).toThrow(
        'Value 256 at index 1 is not valid for DType uint8',
      );
    });

    it('should take the length from a literal', () => {
      const red = FixedArray.fromArray(uint8, [255, 0, 0]);
      expect(red.length).toBe(3);
      expect(red.toString()).toBe('FixedArray(uint8, [255, 0, 0])');
    });

    it('should broadcast a scalar', () => {
      expect(FixedArray.fromBroadcast(int8, 4, -7).toArray()).toEqual([-7, -7, -7, -7]);
    });

    it('should allow zero-length arrays', () => {
      const empty = FixedArray.fromArray(float64, []);
      expect(empty.length).toBe(0);
      expect(empty.toArray()).toEqual([]);
    });

    it('should copy out of a TypedArray', () => {
      const source = Uint16Array.from([1, 2, 65535]);
      const a = FixedArray.fromTypedArray(uint16, source);
      source[0] = 9;
      expect(a.toArray()).toEqual([1, 2, 65535]);
    });

    it('should not alias the input elements', () => {
      const elements = [1, 2, 3];
      const a = new FixedArray(int32, 3, elements);
      elements[0] = 100;
      expect(a.at(0)).toBe(1);
    });
  });

  describe('element access', () => {
    const rgb = FixedArray.fromArray(uint8, [10, 20, 30]);

    it('should read by position', () => {
      expect(rgb.at(0)).toBe(10);
      expect(rgb.at(2)).toBe(30);
    });

    it('should throw for dynamic indices out of range', () => {
      const indices: number[] = [3, -1, 1.5];
      for (const index of indices) {
        expect(() => rgb.at(index)).toThrow(IndexOutOfBoundsError);
      }
      expect(() => rgb.at(indices[0] ?? 0)).toThrow('Index 3 out of bounds for length 3');
    });

    it('should overwrite single elements', () => {
      const pixel = FixedArray.fromArray(uint8, [1, 2, 3]);
      expect(pixel.set(1, 200).toArray()).toEqual([1, 200, 3]);
      expect(() => pixel.set(0, 256)).toThrow('Value 256 is not valid for DType uint8');
      const index: number = 3;
      expect(() => pixel.set(index, 0)).toThrow('Index 3 out of bounds for length 3');
      expect(pixel.toArray()).toEqual([1, 200, 3]);
    });

    it('should iterate in order', () => {
      expect([...rgb]).toEqual([10, 20, 30]);
    });

    it('should export a TypedArray of the dtype', () => {
      const typed = rgb.toTypedArray();
      expect(typed).toBeInstanceOf(Uint8Array);
      expect(Array.from(typed)).toEqual([10, 20, 30]);
    });

    it('should clone into an independent value', () => {
      const copy = rgb.clone();
      copy.addAssign(1);
      expect(copy.toArray()).toEqual([11, 21, 31]);
      expect(rgb.toArray()).toEqual([10, 20, 30]);
    });
  });

  describe('arithmetic', () => {
    const a = FixedArray.fromArray(int32, [1, 2, 3]);
    const b = FixedArray.fromArray(int32, [4, 5, 6]);

    it('should add elementwise', () => {
      expect(a.add(b).toArray()).toEqual([5, 7, 9]);
    });

    it('should broadcast a scalar operand', () => {
      expect(a.add(1).toArray()).toEqual([2, 3, 4]);
      expect(b.mul(2).toArray()).toEqual([8, 10, 12]);
    });

    it('should subtract, multiply, divide and take remainders', () => {
      expect(b.sub(a).toArray()).toEqual([3, 3, 3]);
      expect(a.mul(b).toArray()).toEqual([4, 10, 18]);
      expect(b.div(a).toArray()).toEqual([4, 2, 2]);
      expect(b.rem(a).toArray()).toEqual([0, 1, 0]);
    });

    it('should leave the operands untouched', () => {
      a.add(b);
      expect(a.toArray()).toEqual([1, 2, 3]);
      expect(b.toArray()).toEqual([4, 5, 6]);
    });

    it('should wrap integer overflow', () => {
      const pixel = FixedArray.fromArray(uint8, [250, 5, 0]);
      expect(pixel.add(10).toArray()).toEqual([4, 15, 10]);
      expect(pixel.sub(1).toArray()).toEqual([249, 4, 255]);
    });

    it('should work on bigint dtypes', () => {
      const wide = FixedArray.fromArray(int64, [1n, -2n]);
      expect(wide.mul(3n).toArray()).toEqual([3n, -6n]);
    });

    it('should round float32 results', () => {
      const single = FixedArray.fromArray(float32, [0.5, 1]);
      expect(single.div(3).toArray()).toEqual([Math.fround(0.5 / 3), Math.fround(1 / 3)]);
    });

    it('should store float32 elements at single precision', () => {
      const literal = FixedArray.fromArray(float32, [0.1]);
      const typed = FixedArray.fromTypedArray(float32, Float32Array.of(0.1));
      expect(literal.at(0)).toBe(Math.fround(0.1));
      expect(typed.equals(literal)).toBe(true);
      expect(literal.add(0).equals(literal)).toBe(true);
      expect(literal.set(0, 0.2).at(0)).toBe(Math.fround(0.2));
    });

    it('should round float32 scalar operands before applying them', () => {
      const one = FixedArray.fromArray(float32, [1]);
      expect(one.mul(0.1).at(0)).toBe(Math.fround(0.1));
    });

    it('should throw on integer division by zero', () => {
      const divisor = FixedArray.fromArray(int32, [1, 0, 1]);
      expect(() => a.div(divisor)).toThrow(DivisionByZeroError);
      expect(() => a.rem(0)).toThrow('Integer remainder by zero in int32: 1 / 0');
    });

    it('should follow IEEE for float division by zero', () => {
      const x = FixedArray.fromArray(float64, [1, -1, 0]);
      const [pos, neg, nan] = x.div(0).toArray();
      expect(pos).toBe(Infinity);
      expect(neg).toBe(-Infinity);
      expect(nan).toBeNaN();
    });

    it('should reject operands of another length', () => {
      const short = new FixedArray(int32, 2, [1, 2]);
      const loose: FixedArray<Int32> = a;
      expect(() => loose.add(short)).toThrow(LengthMismatchError);
      expect(() => loose.add(short)).toThrow(
        'Length mismatch in operand: expected 3, received 2',
      );
    });

    it('should reject scalars outside the dtype', () => {
      expect(() => FixedArray.fromArray(uint8, [1]).add(256)).toThrow(DTypeValidationError);
      expect(() => a.add(0.5)).toThrow('Value 0.5 is not valid for DType int32');
    });
  });

  describe('in-place arithmetic', () => {
    it('should mutate the receiver and return it', () => {
      const a = FixedArray.fromArray(int32, [1, 2, 3]);
      const result = a.addAssign(FixedArray.fromArray(int32, [4, 5, 6]));
      expect(result).toBe(a);
      expect(a.toArray()).toEqual([5, 7, 9]);
    });

    it('should support every operation', () => {
      const a = FixedArray.fromArray(int32, [20, 30, 40]);
      a.subAssign(2).mulAssign(3).divAssign(4).remAssign(5);
      // [18, 28, 38] -> [54, 84, 114] -> [13, 21, 28] -> [3, 1, 3]
      expect(a.toArray()).toEqual([3, 1, 3]);
    });

    it('should agree with the value-producing forms', () => {
      const ops = ['add', 'sub', 'mul', 'div', 'rem'] as const;
      const x = FixedArray.fromArray(int32, [20, -30, 40]);
      const y = FixedArray.fromArray(int32, [3, 7, -6]);
      const fx = FixedArray.fromArray(float32, [0.1, -2.5, 7]);
      const fy = FixedArray.fromArray(float32, [0.3, 0.7, -3]);

      for (const op of ops) {
        const assign = `${op}Assign` as const;
        expect(x.clone()[assign](y).toArray()).toEqual(x[op](y).toArray());
        expect(x.clone()[assign](4).toArray()).toEqual(x[op](4).toArray());
        expect(fx.clone()[assign](fy).toArray()).toEqual(fx[op](fy).toArray());
        expect(fx.clone()[assign](0.1).toArray()).toEqual(fx[op](0.1).toArray());
      }
    });

    it('should leave the receiver unchanged when division by zero throws', () => {
      const a = FixedArray.fromArray(int32, [8, 9, 10]);
      expect(() => a.divAssign(FixedArray.fromArray(int32, [2, 0, 5]))).toThrow(
        DivisionByZeroError,
      );
      expect(a.toArray()).toEqual([8, 9, 10]);
    });
  });

  describe('comparison', () => {
    const a = FixedArray.fromArray(int32, [1, 2, 3]);

    it('should order lexicographically', () => {
      expect(a.gt(FixedArray.fromArray(int32, [1, 2, 2]))).toBe(true);
      expect(a.lt(FixedArray.fromArray(int32, [4, 5, 6]))).toBe(true);
      expect(a.compare(FixedArray.fromArray(int32, [1, 3, 0]))).toBe(-1);
      expect(a.compare(a.clone())).toBe(0);
    });

    it('should derive le and ge', () => {
      const same = a.clone();
      expect(a.le(same)).toBe(true);
      expect(a.ge(same)).toBe(true);
      expect(a.ge(FixedArray.fromArray(int32, [2, 0, 0]))).toBe(false);
    });

    it('should compare elementwise for equality', () => {
      expect(a.equals(FixedArray.fromArray(int32, [1, 2, 3]))).toBe(true);
      expect(a.notEquals(FixedArray.fromArray(int32, [1, 2, 4]))).toBe(true);
    });

    it('should use native equality for floats', () => {
      const withNaN = FixedArray.fromArray(float64, [NaN, 1]);
      expect(withNaN.equals(withNaN.clone())).toBe(false);
      const negZero = FixedArray.fromArray(float64, [-0]);
      expect(negZero.equals(FixedArray.fromArray(float64, [0]))).toBe(true);
    });

    it('should use the total order for floats', () => {
      const negZero = FixedArray.fromArray(float64, [-0, 1]);
      const posZero = FixedArray.fromArray(float64, [0, 1]);
      expect(negZero.lt(posZero)).toBe(true);
      const nan = FixedArray.fromArray(float64, [NaN]);
      expect(nan.gt(FixedArray.fromArray(float64, [Infinity]))).toBe(true);
    });

    it('should reject comparing different dtypes', () => {
      const asInt = FixedArray.fromArray(int32, [1]);
      const asFloat: FixedArray = FixedArray.fromArray(float64, [1]);
      const loose: FixedArray = asInt;
      expect(() => loose.compare(asFloat)).toThrow(DTypeMismatchError);
      expect(() => loose.compare(asFloat)).toThrow('DType mismatch: expected int32, received float64');
      expect(loose.equals(asFloat)).toBe(false);
    });
  });

  describe('content identity', () => {
    it('should build keys from dtype and elements', () => {
      expect(FixedArray.fromArray(uint8, [255, 0, 0]).contentKey()).toBe('uint8:255,0,0');
      expect(FixedArray.fromArray(float64, [NaN, -0, 1.5]).contentKey()).toBe('float64:NaN,-0,1.5');
    });

    it('should treat NaN as identical to NaN', () => {
      const a = FixedArray.fromArray(float64, [NaN, 1]);
      expect(a.isIdentical(FixedArray.fromArray(float64, [0 / 0, 1]))).toBe(true);
    });

    it('should keep signed zeros apart', () => {
      const a = FixedArray.fromArray(float64, [-0]);
      expect(a.isIdentical(FixedArray.fromArray(float64, [0]))).toBe(false);
    });
  });

  describe('casting', () => {
    it('should truncate floats and wrap integers by default', () => {
      const cast = FixedArray.fromArray(float64, [1.9, -1.9, 300]).castTo(uint8);
      expect(cast.dtype).toBe(uint8);
      expect(cast.toArray()).toEqual([1, 255, 44]);
    });

    it('should round-trip through a wider integer type', () => {
      const source = FixedArray.fromArray(int8, [-128, 0, 127]);
      const widened = source.castTo(int32);
      expect(widened.toArray()).toEqual([-128, 0, 127]);
      expect(widened.castTo(int8).equals(source)).toBe(true);
    });

    it('should widen into bigint dtypes', () => {
      expect(FixedArray.fromArray(int32, [-1, 2]).castTo(int64).toArray()).toEqual([-1n, 2n]);
    });

    it('should throw ConversionError when strict options forbid the cast', () => {
      const source = FixedArray.fromArray(int32, [1, 300]);
      expect(() => source.castTo(uint8, STRICT_CONVERSION_OPTIONS)).toThrow(ConversionError);
      expect(() => source.castTo(uint8, STRICT_CONVERSION_OPTIONS)).toThrow(
        'Cannot cast FixedArray(int32, [1, 300]) to uint8: [1] Value 300 out of range for uint8 [0, 255]',
      );
    });
  });
});
