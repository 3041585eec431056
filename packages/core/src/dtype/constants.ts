/**
 * Named dtype constants
 *
 * Shorthands for the registry entries, so call sites read
 * `FixedArray.fromArray(uint8, [255, 0, 0])`.
 */

import { DTYPES } from './runtime';

export const int8 = DTYPES.int8;
export const uint8 = DTYPES.uint8;
export const int16 = DTYPES.int16;
export const uint16 = DTYPES.uint16;
export const int32 = DTYPES.int32;
export const uint32 = DTYPES.uint32;

/**
 * 64-bit integers carry `bigint` elements
 */
export const int64 = DTYPES.int64;
export const uint64 = DTYPES.uint64;

export const float32 = DTYPES.float32;
export const float64 = DTYPES.float64;
