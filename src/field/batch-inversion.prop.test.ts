/**
 * Property-Based Tests for Batch Inversion
 *
 * - batchInv produces the same results as individual fieldInv calls
 * - every output multiplied by its input gives one
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  PROPERTY_TEST_CONFIG,
  TEST_MODULUS,
  arbitraryNonZeroFieldValueArray,
} from '../test-utils/property-test-config.js';
import { batchInv, fieldInv, fieldMul } from './operations.js';
import { ErrorCode, GoldilocksError } from '../errors.js';

describe('Batch Inversion Correctness', () => {
  it('should produce same results as individual inv calls', () => {
    fc.assert(
      fc.property(arbitraryNonZeroFieldValueArray(1, 20), (values) => {
        expect(batchInv(values)).toEqual(values.map((value) => fieldInv(value)));
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should satisfy a[i] * batchInv(a)[i] = 1', () => {
    fc.assert(
      fc.property(arbitraryNonZeroFieldValueArray(1, 50), (values) => {
        const inverses = batchInv(values);
        expect(inverses).toHaveLength(values.length);
        inverses.forEach((inverse, i) => {
          expect(fieldMul(values[i] ?? 0n, inverse)).toBe(1n);
        });
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should fail with the index of the first zero element', () => {
    fc.assert(
      fc.property(
        arbitraryNonZeroFieldValueArray(1, 20),
        fc.nat(),
        fc.constantFrom(0n, TEST_MODULUS),
        (values, position, zero) => {
          const index = position % (values.length + 1);
          const withZero = [...values.slice(0, index), zero, ...values.slice(index)];

          try {
            batchInv(withZero);
            expect.unreachable('expected DIVISION_BY_ZERO');
          } catch (error) {
            expect(error).toBeInstanceOf(GoldilocksError);
            if (error instanceof GoldilocksError) {
              expect(error.code).toBe(ErrorCode.DIVISION_BY_ZERO);
              expect(error.details).toEqual({ index });
            }
          }
        }
      ),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should return an empty array for empty input', () => {
    expect(batchInv([])).toEqual([]);
  });

  it('should invert a single element', () => {
    expect(batchInv([2n])).toEqual([0x7fff_ffff_8000_0001n]);
  });

  it('should accept unreduced inputs', () => {
    expect(batchInv([TEST_MODULUS + 1n, TEST_MODULUS - 1n])).toEqual([1n, TEST_MODULUS - 1n]);
  });
});
