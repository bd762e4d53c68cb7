/**
 * Field Arithmetic Operations
 *
 * Addition, subtraction, negation, multiplication, exponentiation and
 * inversion over raw base values. Inputs may be unreduced (anywhere in
 * [0, 2^64)); every result is canonical.
 *
 * No intermediate is truncated to 64 bits: sums are formed from canonical
 * inputs and corrected with one conditional subtraction, products are folded
 * with the Goldilocks identity 2^64 ≡ 2^32 - 1 (mod p).
 */

import type { Exponent, FieldElement } from '../types.js';
import { divisionByZeroError } from '../errors.js';
import { toExponent, validateBaseValue } from '../validation.js';
import { EPSILON, GOLDILOCKS_MODULUS, MASK_32, MASK_64 } from './config.js';

const P = GOLDILOCKS_MODULUS;

/**
 * Bring a raw 64-bit value into [0, p)
 *
 * 2^64 < 2p, so one conditional subtraction suffices.
 */
function reduce64(x: bigint): bigint {
  return x >= P ? x - P : x;
}

/**
 * Reduce a value in [0, 2^128) modulo p
 *
 * With x = lo + 2^64 * (hiLo + 2^32 * hiHi):
 *   x ≡ lo - hiHi + hiLo * (2^32 - 1)   (mod p)
 */
export function reduce128(x: bigint): bigint {
  const lo = x & MASK_64;
  const hi = x >> 64n;
  const hiHi = hi >> 32n;
  const hiLo = hi & MASK_32;

  let t0 = lo - hiHi;
  if (t0 < 0n) {
    t0 += P;
  }

  // t0 < 2^64 and hiLo * EPSILON ≤ (2^32 - 1)^2, so the sum is below 2p
  const r = t0 + hiLo * EPSILON;
  return r >= P ? r - P : r;
}

/**
 * Field addition: (a + b) mod p
 */
export function fieldAdd(a: bigint, b: bigint): bigint {
  validateBaseValue(a, 'fieldAdd');
  validateBaseValue(b, 'fieldAdd');

  const sum = reduce64(a) + reduce64(b);
  return sum >= P ? sum - P : sum;
}

/**
 * Field subtraction: (a + p - b) mod p
 */
export function fieldSub(a: bigint, b: bigint): bigint {
  validateBaseValue(a, 'fieldSub');
  validateBaseValue(b, 'fieldSub');

  const diff = reduce64(a) + P - reduce64(b);
  return diff >= P ? diff - P : diff;
}

/**
 * Field negation: (p - a) mod p, with neg(0) = 0
 */
export function fieldNeg(a: bigint): bigint {
  validateBaseValue(a, 'fieldNeg');

  const aVal = reduce64(a);
  return aVal === 0n ? 0n : P - aVal;
}

/**
 * Field multiplication: (a * b) mod p
 */
export function fieldMul(a: bigint, b: bigint): bigint {
  validateBaseValue(a, 'fieldMul');
  validateBaseValue(b, 'fieldMul');

  return reduce128(a * b);
}

/**
 * Field squaring: a² mod p
 */
export function fieldSquare(a: bigint): bigint {
  validateBaseValue(a, 'fieldSquare');

  return reduce128(a * a);
}

/**
 * Field exponentiation: a^exponent mod p
 *
 * Square-and-multiply over the bits of the exponent. `fieldPow(a, 0)` is 1
 * for every a, including 0.
 *
 * @param a - The base
 * @param exponent - Non-negative bigint or safe integer
 * @throws GoldilocksError with INVALID_EXPONENT for a negative exponent
 */
export function fieldPow(a: bigint, exponent: Exponent): bigint {
  validateBaseValue(a, 'fieldPow');
  let e = toExponent(exponent);

  let result = 1n;
  let base = reduce64(a);

  while (e > 0n) {
    if ((e & 1n) === 1n) {
      result = reduce128(result * base);
    }
    base = reduce128(base * base);
    e >>= 1n;
  }

  return result;
}

/**
 * Field inversion: a^(p-2) mod p
 *
 * Valid by Fermat's little theorem since p is prime.
 *
 * @throws GoldilocksError with DIVISION_BY_ZERO if a ≡ 0
 */
export function fieldInv(a: bigint): bigint {
  validateBaseValue(a, 'fieldInv');

  if (reduce64(a) === 0n) {
    throw divisionByZeroError();
  }

  return fieldPow(a, P - 2n);
}

/**
 * Field division: a * b^(-1) mod p
 *
 * @throws GoldilocksError with DIVISION_BY_ZERO if b ≡ 0
 */
export function fieldDiv(a: bigint, b: bigint): bigint {
  return fieldMul(a, fieldInv(b));
}

/**
 * Batch inversion using Montgomery's trick
 *
 * Computes the inverses of n values with one inversion and 3(n-1)
 * multiplications:
 * 1. prefix[i] = a[0] * ... * a[i]
 * 2. inv = prefix[n-1]^(-1)
 * 3. walking backwards, a[i]^(-1) = inv * prefix[i-1], then inv = inv * a[i]
 *
 * @param values - Values to invert (all must be non-zero)
 * @returns Inverses in the same order
 * @throws GoldilocksError with DIVISION_BY_ZERO and the index of the first zero
 */
export function batchInv(values: readonly bigint[]): bigint[] {
  const n = values.length;
  if (n === 0) {
    return [];
  }

  const prefixProducts: bigint[] = new Array<bigint>(n);
  let acc = 1n;
  for (let i = 0; i < n; i++) {
    const value = values[i] ?? 0n;
    validateBaseValue(value, 'batchInv');
    if (reduce64(value) === 0n) {
      throw divisionByZeroError(i);
    }
    acc = reduce128(acc * value);
    prefixProducts[i] = acc;
  }

  let inv = fieldInv(acc);
  const inverses: bigint[] = new Array<bigint>(n);

  for (let i = n - 1; i > 0; i--) {
    inverses[i] = reduce128(inv * (prefixProducts[i - 1] ?? 1n));
    inv = reduce128(inv * (values[i] ?? 1n));
  }
  inverses[0] = inv;

  return inverses;
}

/**
 * Multiply pairs of values
 */
export function batchMul(pairs: readonly (readonly [bigint, bigint])[]): bigint[] {
  return pairs.map(([a, b]) => fieldMul(a, b));
}

/**
 * Add pairs of values
 */
export function batchAdd(pairs: readonly (readonly [bigint, bigint])[]): bigint[] {
  return pairs.map(([a, b]) => fieldAdd(a, b));
}

// ============================================================================
// Element-level wrappers
// ============================================================================

function wrap(value: bigint): FieldElement {
  return Object.freeze({ value });
}

export function elementAdd(a: FieldElement, b: FieldElement): FieldElement {
  return wrap(fieldAdd(a.value, b.value));
}

export function elementSub(a: FieldElement, b: FieldElement): FieldElement {
  return wrap(fieldSub(a.value, b.value));
}

export function elementNeg(a: FieldElement): FieldElement {
  return wrap(fieldNeg(a.value));
}

export function elementMul(a: FieldElement, b: FieldElement): FieldElement {
  return wrap(fieldMul(a.value, b.value));
}

export function elementSquare(a: FieldElement): FieldElement {
  return wrap(fieldSquare(a.value));
}

export function elementPow(a: FieldElement, exponent: Exponent): FieldElement {
  return wrap(fieldPow(a.value, exponent));
}

/**
 * @throws GoldilocksError with DIVISION_BY_ZERO if a ≡ 0
 */
export function elementInv(a: FieldElement): FieldElement {
  return wrap(fieldInv(a.value));
}

/**
 * @throws GoldilocksError with DIVISION_BY_ZERO if b ≡ 0
 */
export function elementDiv(a: FieldElement, b: FieldElement): FieldElement {
  return wrap(fieldDiv(a.value, b.value));
}
