import type { Compare } from 'ts-arithmetic';

/**
 * Check if a number is an integer (no decimal part)
 * IsInteger<4> = true
 * IsInteger<4.5> = false
 */
export type IsInteger<N extends number> = `${N}` extends `${number}.${number}` ? false : true;

/**
 * Check if a number is negative
 * IsNegative<-3> = true
 * IsNegative<0> = false
 */
export type IsNegative<N extends number> = `${N}` extends `-${string}` ? true : false;

/**
 * Check if a number literal is a valid position (whole and not negative)
 */
export type IsNonNegativeInteger<N extends number> =
  IsNegative<N> extends true ? false : IsInteger<N>;

/**
 * Resolve an index literal against a length literal
 *
 * Evaluates to `I` when `0 <= I < N` and to `never` otherwise. Non-literal indices or
 * lengths (`number`) pass through and are checked at run time.
 *
 * @example
 * type Ok = ValidIndex<2, 3> // 2
 * type Out = ValidIndex<3, 3> // never
 * type Dynamic = ValidIndex<number, 3> // number
 */
export type ValidIndex<I extends number, N extends number> = number extends I
  ? I
  : IsNonNegativeInteger<I> extends true
    ? number extends N
      ? I
      : Compare<I, N> extends -1
        ? I
        : never
    : never;
