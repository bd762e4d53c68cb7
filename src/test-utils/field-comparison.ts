/**
 * Field element comparison utilities for testing
 */

import type { FieldElement } from '../types.js';
import { TEST_MODULUS } from './property-test-config.js';

/**
 * Canonical form of a raw value, computed independently of the library
 */
export function canonical(value: bigint): bigint {
  return value % TEST_MODULUS;
}

/**
 * Build a plain element without going through the library's constructors
 */
export function rawElement(value: bigint): FieldElement {
  return { value };
}
