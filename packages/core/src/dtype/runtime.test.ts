/**
 * Runtime tests for dtype/runtime.ts
 *
 * Tests for DType validation, registry lookup and TypedArray integration
 */

import { describe, it, expect } from 'vitest';
import {
  DTYPES,
  DTypeValidationError,
  getDType,
  getDTypeNames,
  isRuntimeDType,
  isValidDTypeName,
} from './runtime';

describe('RuntimeDType', () => {
  describe('isValidValue', () => {
    it('should accept values inside the integer range', () => {
      const uint8 = getDType('uint8');
      expect(uint8.isValidValue(0)).toBe(true);
      expect(uint8.isValidValue(255)).toBe(true);
      expect(uint8.isValidValue(256)).toBe(false);
      expect(uint8.isValidValue(-1)).toBe(false);
    });

    it('should reject fractions and non-finite values for integers', () => {
      const int32 = getDType('int32');
      expect(int32.isValidValue(1.5)).toBe(false);
      expect(int32.isValidValue(NaN)).toBe(false);
      expect(int32.isValidValue(Infinity)).toBe(false);
    });

    it('should accept negative zero for integers', () => {
      expect(getDType('int32').isValidValue(-0)).toBe(true);
      expect(getDType('uint8').isValidValue(-0)).toBe(true);
    });

    it('should accept NaN, infinities and signed zeros for floats', () => {
      const float64 = getDType('float64');
      expect(float64.isValidValue(NaN)).toBe(true);
      expect(float64.isValidValue(-Infinity)).toBe(true);
      expect(float64.isValidValue(-0)).toBe(true);
    });

    it('should reject finite values beyond the float32 range', () => {
      const float32 = getDType('float32');
      expect(float32.isValidValue(3.4e38)).toBe(true);
      expect(float32.isValidValue(1e39)).toBe(false);
    });

    it('should require bigint values for 64-bit integers', () => {
      const int64 = getDType('int64');
      expect(int64.isValidValue(5n)).toBe(true);
      expect(int64.isValidValue(5)).toBe(false);
      expect(int64.isValidValue(9223372036854775808n)).toBe(false);
      expect(getDType('int32').isValidValue(5n)).toBe(false);
    });

    it('should reject non-numeric values', () => {
      expect(getDType('float64').isValidValue('1')).toBe(false);
      expect(getDType('float64').isValidValue(null)).toBe(false);
    });
  });

  describe('validateValue', () => {
    it('should return valid values unchanged', () => {
      expect(getDType('int16').validateValue(-300)).toBe(-300);
    });

    it('should store negative zero as positive zero for integers', () => {
      expect(Object.is(getDType('int32').validateValue(-0), 0)).toBe(true);
      expect(Object.is(getDType('uint16').validateValue(-0), 0)).toBe(true);
    });

    it('should keep negative zero for floats', () => {
      expect(Object.is(getDType('float64').validateValue(-0), -0)).toBe(true);
    });

    it('should round float32 values to single precision', () => {
      const float32 = getDType('float32');
      expect(float32.validateValue(0.1)).toBe(Math.fround(0.1));
      expect(float32.validateValue(0.5)).toBe(0.5);
      expect(getDType('float64').validateValue(0.1)).toBe(0.1);
    });

    it('should include the index in the message when given', () => {
      expect(() => getDType('int8').validateValue(200, 4)).toThrow(
        'Value 200 at index 4 is not valid for DType int8',
      );
    });

    it('should throw DTypeValidationError for invalid values', () => {
      const int8 = getDType('int8');
      expect(() => int8.validateValue(200)).toThrow(DTypeValidationError);
      expect(() => int8.validateValue(200)).toThrow('Value 200 is not valid for DType int8');
    });
  });

  describe('TypedArray integration', () => {
    it('should allocate zero-filled arrays of the right kind', () => {
      const array = getDType('uint16').createTypedArray(3);
      expect(array).toBeInstanceOf(Uint16Array);
      expect(Array.from(array)).toEqual([0, 0, 0]);
    });

    it('should pack values into a TypedArray', () => {
      const array = getDType('int8').createTypedArrayFromData([1, -2, 3]);
      expect(array).toBeInstanceOf(Int8Array);
      expect(Array.from(array)).toEqual([1, -2, 3]);
    });

    it('should report the index of an invalid value', () => {
      expect(() => getDType('uint8').createTypedArrayFromData([1, 2, 300])).toThrow(
        'Value 300 at index 2 is not valid for DType uint8',
      );
    });

    it('should read TypedArrays back into plain values', () => {
      const uint64 = getDType('uint64');
      expect(uint64.readTypedArray(BigUint64Array.from([1n, 2n]))).toEqual([1n, 2n]);
    });
  });

  describe('diagnostics', () => {
    it('should describe itself', () => {
      const int16 = getDType('int16');
      expect(int16.toString()).toBe('RuntimeDType(int16)');
      expect(int16.toJSON()).toEqual({ name: 'int16', byteSize: 2, signed: true, isInteger: true });
      expect(int16.getInfo()).toEqual({
        name: 'int16',
        jsType: 'number',
        byteSize: 2,
        signed: true,
        isInteger: true,
        minValue: -32768,
        maxValue: 32767,
        typedArrayName: 'Int16Array',
      });
    });
  });
});

describe('DType registry', () => {
  it('should return singleton instances', () => {
    expect(getDType('float32')).toBe(DTYPES.float32);
    expect(isRuntimeDType(getDType('float32'))).toBe(true);
    expect(isRuntimeDType({ name: 'float32' })).toBe(false);
  });

  it('should list every numeric dtype', () => {
    expect(getDTypeNames()).toEqual([
      'int8',
      'uint8',
      'int16',
      'uint16',
      'int32',
      'uint32',
      'int64',
      'uint64',
      'float32',
      'float64',
    ]);
  });

  it('should validate names', () => {
    expect(isValidDTypeName('uint32')).toBe(true);
    expect(isValidDTypeName('bool')).toBe(false);
    expect(isValidDTypeName('toString')).toBe(false);
  });
});
