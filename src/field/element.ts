/**
 * Field Element Implementation
 *
 * Canonicalization, equality and element construction. Raw base values are
 * plain bigints in [0, 2^64); a value ≥ p stands for its residue mod p and is
 * only reduced when an operation needs the canonical form.
 */

import type { FieldElement } from '../types.js';
import { GOLDILOCKS_FIELD, GOLDILOCKS_MODULUS } from './config.js';
import { validateBaseValue } from '../validation.js';

/**
 * Reduce a raw value to its canonical representative in [0, p)
 *
 * @param x - Raw unsigned 64-bit value
 * @returns x mod p (x itself when already canonical)
 */
export function fromRaw(x: bigint): bigint {
  validateBaseValue(x, 'fromRaw');
  return x >= GOLDILOCKS_MODULUS ? x % GOLDILOCKS_MODULUS : x;
}

/**
 * Alias of {@link fromRaw} for callers working with the field's base type
 */
export function fromBaseType(x: bigint): bigint {
  return fromRaw(x);
}

/**
 * Return the raw value as stored, without canonicalizing it
 */
export function representative(a: bigint): bigint {
  return a;
}

/**
 * Equality of canonical representatives
 *
 * `fieldEquals(1n, p + 1n)` is true even though the raw values differ.
 */
export function fieldEquals(a: bigint, b: bigint): boolean {
  return fromRaw(a) === fromRaw(b);
}

export function isZero(a: bigint): boolean {
  return fromRaw(a) === 0n;
}

export function isOne(a: bigint): boolean {
  return fromRaw(a) === 1n;
}

/**
 * Bits needed to represent p - 1 (64)
 */
export function fieldBitSize(): number {
  return GOLDILOCKS_FIELD.bitSize;
}

/**
 * Wrap a raw value in a frozen element without reducing it
 *
 * Used by decoders, which keep whatever raw value they read.
 */
export function wrapRawValue(value: bigint): FieldElement {
  validateBaseValue(value, 'wrapRawValue');
  return Object.freeze({ value });
}

/**
 * Create a field element from a raw value
 *
 * The value is reduced modulo p.
 *
 * @param value - Raw unsigned 64-bit value
 * @returns A new canonical field element
 */
export function createFieldElement(value: bigint): FieldElement {
  return Object.freeze({ value: fromRaw(value) });
}

/**
 * Create the zero element
 */
export function createZeroFieldElement(): FieldElement {
  return Object.freeze({ value: 0n });
}

/**
 * Create the one element (multiplicative identity)
 */
export function createOneFieldElement(): FieldElement {
  return Object.freeze({ value: 1n });
}

/**
 * Get the stored raw value of a field element
 */
export function getRepresentative(element: FieldElement): bigint {
  return representative(element.value);
}

/**
 * Check if two field elements are equal
 *
 * Compares canonical forms, so an element decoded as p + 3 equals one
 * created from 3.
 */
export function fieldElementsEqual(a: FieldElement, b: FieldElement): boolean {
  return fieldEquals(a.value, b.value);
}

export function isZeroFieldElement(element: FieldElement): boolean {
  return isZero(element.value);
}

export function isOneFieldElement(element: FieldElement): boolean {
  return isOne(element.value);
}
