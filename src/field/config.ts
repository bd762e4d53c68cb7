/**
 * Goldilocks Field Configuration
 *
 * p = 2^64 - 2^32 + 1. Because 2^64 ≡ 2^32 - 1 and 2^96 ≡ -1 (mod p), a
 * 128-bit product folds back into 64 bits with shifts, one multiplication by
 * EPSILON and a few conditional corrections instead of a full division.
 */

import type { FieldConfig } from '../types.js';

/** p = 2^64 - 2^32 + 1 */
export const GOLDILOCKS_MODULUS = 0xffff_ffff_0000_0001n;

/** 2^64 mod p = 2^32 - 1 */
export const EPSILON = 0xffff_ffffn;

export const MASK_32 = 0xffff_ffffn;
export const MASK_64 = 0xffff_ffff_ffff_ffffn;

/**
 * Number of bits needed to represent a value (0 needs 0 bits)
 */
export function bitLength(value: bigint): number {
  let bits = 0;
  let v = value;
  while (v > 0n) {
    bits++;
    v >>= 1n;
  }
  return bits;
}

/**
 * Goldilocks field configuration
 *
 * The generator 7 is the primitive root used by protocols built on this field.
 */
export const GOLDILOCKS_FIELD: FieldConfig = (() => {
  const modulus = GOLDILOCKS_MODULUS;
  // floor(log2(p - 1)) + 1
  const bitSize = bitLength(modulus - 1n);

  return {
    modulus,
    generator: 7n,
    bitSize,
    byteSize: 8,
  };
})();
