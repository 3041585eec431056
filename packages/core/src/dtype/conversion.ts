/**
 * Type conversion between DTypes
 *
 * Converts element values between numeric dtypes with overflow and precision-loss
 * detection. Policies decide whether a lossy conversion fails, clamps or wraps.
 */

import type { AnyDType, JSTypeOf } from './types';
import type { RuntimeDType } from './runtime';

// =============================================================================
// Conversion Options and Policies
// =============================================================================

/**
 * Options for controlling type conversion behavior
 */
export interface ConversionOptions {
  /**
   * Allow conversions that may lose precision (e.g., float64 to int32)
   * @default false
   */
  readonly allowPrecisionLoss?: boolean;

  /**
   * Allow conversions that may overflow (e.g., int32 to int8)
   * @default false
   */
  readonly allowOverflow?: boolean;

  /**
   * How to handle NaN when the target is an integer type
   * - 'error': Fail (default)
   * - 'zero': Convert to zero
   * - 'clamp': Convert to the target's minimum
   */
  readonly nanHandling?: 'error' | 'zero' | 'clamp';

  /**
   * How to handle Infinity when the target is an integer type
   * - 'error': Fail (default)
   * - 'clamp': Saturate to the target's bounds
   */
  readonly infinityHandling?: 'error' | 'clamp';

  /**
   * How to handle values outside the target's range
   * - 'error': Fail (default)
   * - 'clamp': Saturate to the target's bounds
   * - 'wrap': Reduce modulo the target's bit width
   */
  readonly overflowHandling?: 'error' | 'clamp' | 'wrap';
}

export const STRICT_CONVERSION_OPTIONS: Required<ConversionOptions> = {
  allowPrecisionLoss: false,
  allowOverflow: false,
  nanHandling: 'error',
  infinityHandling: 'error',
  overflowHandling: 'error',
} as const;

export const PERMISSIVE_CONVERSION_OPTIONS: Required<ConversionOptions> = {
  allowPrecisionLoss: true,
  allowOverflow: true,
  nanHandling: 'clamp',
  infinityHandling: 'clamp',
  overflowHandling: 'clamp',
} as const;

/**
 * The numeric cast used by `FixedArray.castTo` unless told otherwise
 *
 * Mirrors TypedArray element assignment: floats truncate toward zero, integers wrap
 * modulo the target width and NaN becomes zero. Infinities saturate instead of
 * collapsing to zero.
 */
export const NATIVE_CAST_OPTIONS: Required<ConversionOptions> = {
  allowPrecisionLoss: true,
  allowOverflow: true,
  nanHandling: 'zero',
  infinityHandling: 'clamp',
  overflowHandling: 'wrap',
} as const;

// =============================================================================
// Conversion Result Types
// =============================================================================

/**
 * Result of a type conversion operation
 */
export type ConversionResult<T extends AnyDType> =
  | {
      readonly success: true;
      readonly value: JSTypeOf<T>;
      readonly warnings: readonly string[];
    }
  | {
      readonly success: false;
      readonly errors: readonly string[];
    };

/**
 * Result of converting a whole array
 */
export type ArrayConversionResult<T extends AnyDType> =
  | {
      readonly success: true;
      readonly values: JSTypeOf<T>[];
      readonly warnings: readonly string[];
    }
  | {
      readonly success: false;
      readonly errors: readonly string[];
    };

type Staged = { ok: true; value: number | bigint } | { ok: false; error: string };

const ok = (value: number | bigint): Staged => ({ ok: true, value });
const fail = (error: string): Staged => ({ ok: false, error });

// =============================================================================
// Core Conversion Functions
// =============================================================================

/**
 * Convert a value from one DType to another
 *
 * @example
 * const result = convertValue(3.7, getDType('float64'), getDType('int32'), NATIVE_CAST_OPTIONS);
 * if (result.success) {
 *   console.log(result.value); // 3
 * }
 */
export function convertValue<From extends AnyDType, To extends AnyDType>(
  value: JSTypeOf<From>,
  fromDType: RuntimeDType<From>,
  toDType: RuntimeDType<To>,
  options: ConversionOptions = {},
): ConversionResult<To> {
  const opts = { ...STRICT_CONVERSION_OPTIONS, ...options };
  const warnings: string[] = [];

  if (fromDType.name === toDType.name && toDType.isValidValue(value)) {
    return { success: true, value: toDType.validateValue(value), warnings };
  }

  const staged =
    typeof value === 'bigint'
      ? convertFromBigInt(value, toDType, opts, warnings)
      : convertFromNumber(value, toDType, opts, warnings);

  if (!staged.ok) {
    return { success: false, errors: [staged.error] };
  }

  const converted = toDType.jsType === 'bigint' ? toBigInt(staged.value) : Number(staged.value);
  if (!toDType.isValidValue(converted)) {
    return {
      success: false,
      errors: [`Converted value ${converted.toString()} is not valid for ${toDType.name}`],
    };
  }

  return { success: true, value: converted, warnings };
}

function toBigInt(value: number | bigint): bigint {
  return typeof value === 'bigint' ? value : BigInt(value);
}

function convertFromNumber(
  value: number,
  toDType: RuntimeDType,
  options: Required<ConversionOptions>,
  warnings: string[],
): Staged {
  if (!Number.isFinite(value)) {
    if (!toDType.isInteger) {
      return ok(value);
    }

    if (Number.isNaN(value)) {
      if (options.nanHandling === 'error') {
        return fail(`Cannot convert NaN to integer type ${toDType.name}`);
      }
      const replacement = options.nanHandling === 'zero' ? 0 : toDType.minValue;
      warnings.push(`Special value NaN converted to ${replacement.toString()}`);
      return ok(replacement);
    }

    if (options.infinityHandling === 'error') {
      return fail(`Cannot convert ${value.toString()} to integer type ${toDType.name}`);
    }
    const replacement = value > 0 ? toDType.maxValue : toDType.minValue;
    warnings.push(`Special value ${value.toString()} converted to ${replacement.toString()}`);
    return ok(replacement);
  }

  if (toDType.isInteger) {
    let integral = value;
    if (!Number.isInteger(value)) {
      if (!options.allowPrecisionLoss) {
        return fail(
          `Cannot convert non-integer ${value.toString()} to ${toDType.name} without precision loss`,
        );
      }
      integral = Math.trunc(value);
      warnings.push(`Precision loss: ${value.toString()} truncated to ${integral.toString()}`);
    }
    // integer dtypes only hold +0
    integral = integral === 0 ? 0 : integral;
    const candidate = toDType.jsType === 'bigint' ? BigInt(integral) : integral;
    return fitIntegerRange(candidate, toDType, options, warnings);
  }

  if (toDType.name === 'float64') {
    return ok(value);
  }

  const single = Math.fround(value);
  if (!Number.isFinite(single)) {
    if (!options.allowOverflow || options.overflowHandling === 'error') {
      return fail(`Value ${value.toString()} out of range for ${toDType.name}`);
    }
    let replacement: number | bigint = single;
    if (options.overflowHandling === 'clamp') {
      replacement = value > 0 ? toDType.maxValue : toDType.minValue;
    }
    warnings.push(
      `Value ${value.toString()} overflowed ${toDType.name} to ${replacement.toString()}`,
    );
    return ok(replacement);
  }

  if (single !== value) {
    if (!options.allowPrecisionLoss) {
      return fail(`Precision loss converting ${value.toString()} to ${toDType.name}`);
    }
    warnings.push(`Precision loss: ${value.toString()} rounded to ${single.toString()}`);
  }
  return ok(single);
}

function convertFromBigInt(
  value: bigint,
  toDType: RuntimeDType,
  options: Required<ConversionOptions>,
  warnings: string[],
): Staged {
  if (toDType.isInteger) {
    return fitIntegerRange(value, toDType, options, warnings);
  }

  const approx = toDType.name === 'float32' ? Math.fround(Number(value)) : Number(value);
  if (BigInt(approx) !== value) {
    if (!options.allowPrecisionLoss) {
      return fail(`BigInt ${value.toString()} cannot be represented exactly as ${toDType.name}`);
    }
    warnings.push(`Precision loss: ${value.toString()} rounded to ${approx.toString()}`);
  }
  return ok(approx);
}

/**
 * Validate an integral candidate against the target range, clamping or wrapping on overflow
 */
function fitIntegerRange(
  candidate: number | bigint,
  toDType: RuntimeDType,
  options: Required<ConversionOptions>,
  warnings: string[],
): Staged {
  if (candidate >= toDType.minValue && candidate <= toDType.maxValue) {
    return ok(candidate);
  }

  const range = `[${toDType.minValue.toString()}, ${toDType.maxValue.toString()}]`;
  if (!options.allowOverflow || options.overflowHandling === 'error') {
    return fail(`Value ${candidate.toString()} out of range for ${toDType.name} ${range}`);
  }

  if (options.overflowHandling === 'clamp') {
    const clamped = candidate < toDType.minValue ? toDType.minValue : toDType.maxValue;
    warnings.push(
      `Value ${candidate.toString()} clamped to ${clamped.toString()} for ${toDType.name}`,
    );
    return ok(clamped);
  }

  const bits = toDType.byteSize * 8;
  const wide = toBigInt(candidate);
  const wrapped = toDType.signed ? BigInt.asIntN(bits, wide) : BigInt.asUintN(bits, wide);
  warnings.push(
    `Value ${candidate.toString()} wrapped to ${wrapped.toString()} for ${toDType.name}`,
  );
  return ok(wrapped);
}

// =============================================================================
// Batch Conversion
// =============================================================================

/**
 * Convert an array of values from one DType to another
 *
 * Errors and warnings are prefixed with the index of the element they concern.
 */
export function convertArray<From extends AnyDType, To extends AnyDType>(
  values: readonly JSTypeOf<From>[],
  fromDType: RuntimeDType<From>,
  toDType: RuntimeDType<To>,
  options: ConversionOptions = {},
): ArrayConversionResult<To> {
  const convertedValues: JSTypeOf<To>[] = [];
  const allWarnings: string[] = [];
  const allErrors: string[] = [];

  values.forEach((value, i) => {
    const result = convertValue(value, fromDType, toDType, options);

    if (result.success) {
      convertedValues.push(result.value);
      allWarnings.push(...result.warnings.map((w) => `[${i.toString()}] ${w}`));
    } else {
      allErrors.push(...result.errors.map((e) => `[${i.toString()}] ${e}`));
    }
  });

  if (allErrors.length > 0) {
    return { success: false, errors: allErrors };
  }

  return { success: true, values: convertedValues, warnings: allWarnings };
}

// =============================================================================
// Conversion Error Classes
// =============================================================================

/**
 * Error thrown when type conversion fails
 */
export class ConversionError extends Error {
  constructor(
    message: string,
    public readonly fromDType: RuntimeDType,
    public readonly toDType: RuntimeDType,
    public readonly value: unknown,
  ) {
    super(message);
    this.name = 'ConversionError';
  }
}
