/**
 * Scalar kernels: per-dtype arithmetic, ordering and content keys
 *
 * Integer kernels reproduce fixed-width machine arithmetic on top of JavaScript
 * numbers and bigints: every result is wrapped to the dtype's bit width and division
 * truncates toward zero. Float kernels follow IEEE 754, with float32 results rounded
 * to single precision.
 */

import { DivisionByZeroError } from '../errors';

/**
 * Result of a three-way comparison
 */
export type Ordering = -1 | 0 | 1;

/**
 * Element operations for one dtype
 *
 * Declared with method syntax so that a kernel over `number` stays assignable to a
 * kernel over `number | bigint`.
 */
export interface ScalarKernel<V extends number | bigint> {
  add(a: V, b: V): V;
  sub(a: V, b: V): V;
  mul(a: V, b: V): V;
  /** Throws `DivisionByZeroError` for integer dtypes when `b` is zero */
  div(a: V, b: V): V;
  /** Remainder with the sign of the dividend */
  rem(a: V, b: V): V;

  /** Reduce an integral value to the dtype's range (modular for integers, rounding for float32) */
  wrap(a: V): V;

  /**
   * Total order. Floats order `-0` before `+0` and every NaN after `+Infinity`.
   */
  compare(a: V, b: V): Ordering;

  /** Native equality: NaN differs from itself and `-0` equals `+0` */
  equals(a: V, b: V): boolean;

  /** Canonical key: NaNs share one key, `-0` and `+0` do not */
  keyOf(a: V): string;
}

function compareOrdered<V extends number | bigint>(a: V, b: V): Ordering {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

// =============================================================================
// Integer kernels (number)
// =============================================================================

/**
 * Wrappers reducing an integral double to a fixed width. The bitwise operators apply
 * ToInt32 first, which is exact modular reduction for any finite integer.
 */
const NUMBER_WRAPPERS = {
  int8: (v: number) => (v << 24) >> 24,
  uint8: (v: number) => v & 0xff,
  int16: (v: number) => (v << 16) >> 16,
  uint16: (v: number) => v & 0xffff,
  int32: (v: number) => v | 0,
  uint32: (v: number) => v >>> 0,
} as const;

export type NumberIntegerName = keyof typeof NUMBER_WRAPPERS;

export function numberIntegerKernel(name: NumberIntegerName): ScalarKernel<number> {
  const wrap = NUMBER_WRAPPERS[name];

  return {
    add: (a, b) => wrap(a + b),
    sub: (a, b) => wrap(a - b),
    // Math.imul keeps the low 32 bits exactly; a plain product of two 32-bit values can exceed 2^53
    mul: (a, b) => wrap(Math.imul(a, b)),
    div: (a, b) => {
      if (b === 0) {
        throw new DivisionByZeroError(name, 'div', a);
      }
      return wrap(Math.trunc(a / b));
    },
    rem: (a, b) => {
      if (b === 0) {
        throw new DivisionByZeroError(name, 'rem', a);
      }
      return wrap(a % b);
    },
    wrap,
    compare: compareOrdered,
    equals: (a, b) => a === b,
    keyOf: (a) => a.toString(),
  };
}

// =============================================================================
// Integer kernels (bigint)
// =============================================================================

export function bigintKernel(name: 'int64' | 'uint64'): ScalarKernel<bigint> {
  const wrap =
    name === 'int64' ? (v: bigint) => BigInt.asIntN(64, v) : (v: bigint) => BigInt.asUintN(64, v);

  return {
    add: (a, b) => wrap(a + b),
    sub: (a, b) => wrap(a - b),
    mul: (a, b) => wrap(a * b),
    div: (a, b) => {
      if (b === 0n) {
        throw new DivisionByZeroError(name, 'div', a);
      }
      return wrap(a / b);
    },
    rem: (a, b) => {
      if (b === 0n) {
        throw new DivisionByZeroError(name, 'rem', a);
      }
      return wrap(a % b);
    },
    wrap,
    compare: compareOrdered,
    equals: (a, b) => a === b,
    keyOf: (a) => a.toString(),
  };
}

// =============================================================================
// Float kernels
// =============================================================================

/**
 * IEEE 754 totalOrder restricted to a single NaN class
 */
export function compareFloat(a: number, b: number): Ordering {
  if (a < b) {
    return -1;
  }
  if (a > b) {
    return 1;
  }
  if (a === b) {
    if (a !== 0) {
      return 0;
    }
    const negA = Object.is(a, -0);
    const negB = Object.is(b, -0);
    if (negA === negB) {
      return 0;
    }
    return negA ? -1 : 1;
  }

  const nanA = Number.isNaN(a);
  const nanB = Number.isNaN(b);
  if (nanA === nanB) {
    return 0;
  }
  return nanA ? 1 : -1;
}

export function floatKeyOf(a: number): string {
  if (Number.isNaN(a)) {
    return 'NaN';
  }
  return Object.is(a, -0) ? '-0' : a.toString();
}

export function floatKernel(name: 'float32' | 'float64'): ScalarKernel<number> {
  const wrap = name === 'float32' ? Math.fround : (v: number) => v;

  return {
    add: (a, b) => wrap(a + b),
    sub: (a, b) => wrap(a - b),
    mul: (a, b) => wrap(a * b),
    div: (a, b) => wrap(a / b),
    rem: (a, b) => wrap(a % b),
    wrap,
    compare: compareFloat,
    equals: (a, b) => a === b,
    keyOf: floatKeyOf,
  };
}
