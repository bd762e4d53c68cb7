/**
 * Input Validation
 *
 * Range checks for values entering the arithmetic kernel. Checks are skipped
 * when `validateInputs` is turned off through `configure`.
 */

import type { Exponent } from './types.js';
import { getConfig } from './config.js';
import { invalidBaseValueError, invalidExponentError } from './errors.js';

/** 2^64 - 1, the largest raw base value */
export const MAX_U64 = 0xffff_ffff_ffff_ffffn;

/**
 * Check whether a bigint is an unsigned 64-bit integer
 */
export function isU64(value: bigint): boolean {
  return value >= 0n && value <= MAX_U64;
}

/**
 * Validate a raw base value
 *
 * @param value - The value to check
 * @param operation - Operation name reported in the error
 * @throws GoldilocksError with INVALID_BASE_VALUE if value is outside [0, 2^64)
 */
export function validateBaseValue(value: bigint, operation: string): void {
  if (!getConfig().validateInputs) {
    return;
  }
  if (!isU64(value)) {
    throw invalidBaseValueError(value.toString(), operation);
  }
}

/**
 * Validate an exponent and convert it to bigint
 *
 * Negative or fractional exponents are always rejected; they have no meaning
 * for square-and-multiply.
 */
export function toExponent(exponent: Exponent): bigint {
  if (typeof exponent === 'number') {
    if (!Number.isSafeInteger(exponent) || exponent < 0) {
      throw invalidExponentError(String(exponent));
    }
    return BigInt(exponent);
  }
  if (exponent < 0n) {
    throw invalidExponentError(exponent.toString());
  }
  return exponent;
}
