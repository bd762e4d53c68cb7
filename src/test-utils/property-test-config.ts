/**
 * Property-based testing configuration and utilities
 *
 * Shared fast-check configuration, arbitraries for Goldilocks values, and a
 * reference implementation of modular arithmetic on plain bigints that the
 * property tests use as an oracle.
 */

import * as fc from 'fast-check';

/**
 * Standard configuration for property-based tests
 * - 100 iterations per property
 * - Seed logging for reproducibility
 */
export const PROPERTY_TEST_CONFIG = {
  numRuns: 100,
  verbose: true,
  seed: Date.now(), // Can be overridden for reproducibility
  endOnFailure: false,
};

/**
 * Configuration for exhaustive property tests (used for critical properties)
 */
export const EXHAUSTIVE_PROPERTY_TEST_CONFIG = {
  numRuns: 1000,
  verbose: true,
  seed: Date.now(),
  endOnFailure: false,
};

/**
 * Goldilocks modulus, duplicated here so the oracle does not depend on the
 * code under test
 */
export const TEST_MODULUS = 18446744069414584321n;

export const TEST_MAX_U64 = 18446744073709551615n;

/**
 * Values at the edges of the field and of the 64-bit range
 */
export const BOUNDARY_VALUES: readonly bigint[] = [
  0n,
  1n,
  2n,
  0xffff_ffffn,
  0x1_0000_0000n,
  TEST_MODULUS - 2n,
  TEST_MODULUS - 1n,
];

/**
 * Raw 64-bit values that are not canonical (in [p, 2^64))
 */
export const UNREDUCED_VALUES: readonly bigint[] = [
  TEST_MODULUS,
  TEST_MODULUS + 1n,
  TEST_MAX_U64 - 1n,
  TEST_MAX_U64,
];

/**
 * Arbitrary canonical field value in [0, p), biased towards boundaries
 */
export function arbitraryFieldValue(): fc.Arbitrary<bigint> {
  return fc.oneof(
    { weight: 4, arbitrary: fc.bigInt({ min: 0n, max: TEST_MODULUS - 1n }) },
    { weight: 1, arbitrary: fc.constantFrom(...BOUNDARY_VALUES) }
  );
}

/**
 * Arbitrary non-zero canonical field value in [1, p)
 */
export function arbitraryNonZeroFieldValue(): fc.Arbitrary<bigint> {
  return arbitraryFieldValue().filter((value) => value !== 0n);
}

/**
 * Arbitrary raw base value in [0, 2^64), including non-canonical ones
 */
export function arbitraryRawValue(): fc.Arbitrary<bigint> {
  return fc.oneof(
    { weight: 3, arbitrary: fc.bigInt({ min: 0n, max: TEST_MAX_U64 }) },
    { weight: 1, arbitrary: fc.bigInt({ min: TEST_MODULUS, max: TEST_MAX_U64 }) },
    { weight: 1, arbitrary: fc.constantFrom(...BOUNDARY_VALUES, ...UNREDUCED_VALUES) }
  );
}

/**
 * Arbitrary array of non-zero field values
 */
export function arbitraryNonZeroFieldValueArray(
  minLength: number = 1,
  maxLength: number = 50
): fc.Arbitrary<bigint[]> {
  return fc.array(arbitraryNonZeroFieldValue(), { minLength, maxLength });
}

/**
 * Arbitrary byte order
 */
export function arbitraryEndianness(): fc.Arbitrary<'be' | 'le'> {
  return fc.constantFrom('be' as const, 'le' as const);
}

// ============================================================================
// Reference modular arithmetic
// ============================================================================

export function modAdd(a: bigint, b: bigint, modulus: bigint = TEST_MODULUS): bigint {
  return (a + b) % modulus;
}

export function modSub(a: bigint, b: bigint, modulus: bigint = TEST_MODULUS): bigint {
  return (((a - b) % modulus) + modulus) % modulus;
}

export function modMul(a: bigint, b: bigint, modulus: bigint = TEST_MODULUS): bigint {
  return (a * b) % modulus;
}

export function modNeg(a: bigint, modulus: bigint = TEST_MODULUS): bigint {
  return (modulus - (a % modulus)) % modulus;
}

export function modPow(base: bigint, exp: bigint, modulus: bigint = TEST_MODULUS): bigint {
  let result = 1n;
  let b = base % modulus;
  let e = exp;
  while (e > 0n) {
    if (e % 2n === 1n) {
      result = (result * b) % modulus;
    }
    b = (b * b) % modulus;
    e = e / 2n;
  }
  return result;
}

/**
 * Modular inverse via the extended Euclidean algorithm
 */
export function modInverse(a: bigint, modulus: bigint = TEST_MODULUS): bigint {
  let [oldR, r] = [a % modulus, modulus];
  let [oldS, s] = [1n, 0n];

  while (r !== 0n) {
    const quotient = oldR / r;
    [oldR, r] = [r, oldR - quotient * r];
    [oldS, s] = [s, oldS - quotient * s];
  }

  if (oldR !== 1n) {
    throw new Error('No modular inverse exists');
  }
  return ((oldS % modulus) + modulus) % modulus;
}
