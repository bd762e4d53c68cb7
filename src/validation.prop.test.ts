/**
 * Property-Based Tests for Input Validation
 *
 * - Every value in [0, 2^64) is accepted, everything outside is rejected
 * - Disabling validation skips range checks
 * - Exponents must be non-negative integers
 */

import { afterEach, describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { PROPERTY_TEST_CONFIG, TEST_MAX_U64 } from './test-utils/property-test-config.js';
import { MAX_U64, isU64, toExponent, validateBaseValue } from './validation.js';
import { configure, resetConfig } from './api.js';
import { ErrorCode, GoldilocksError } from './errors.js';

function arbitraryOutOfRange(): fc.Arbitrary<bigint> {
  return fc.oneof(
    fc.bigInt({ min: -(1n << 80n), max: -1n }),
    fc.bigInt({ min: TEST_MAX_U64 + 1n, max: 1n << 80n })
  );
}

describe('Input Validation', () => {
  afterEach(() => {
    resetConfig();
  });

  it('should use 2^64 - 1 as the largest raw value', () => {
    expect(MAX_U64).toBe(TEST_MAX_U64);
  });

  it('should accept every unsigned 64-bit value', () => {
    fc.assert(
      fc.property(fc.bigInt({ min: 0n, max: TEST_MAX_U64 }), (value) => {
        expect(isU64(value)).toBe(true);
        expect(() => validateBaseValue(value, 'test')).not.toThrow();
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should reject values outside [0, 2^64)', () => {
    fc.assert(
      fc.property(arbitraryOutOfRange(), (value) => {
        expect(isU64(value)).toBe(false);
        try {
          validateBaseValue(value, 'test');
          expect.unreachable('expected INVALID_BASE_VALUE');
        } catch (error) {
          expect(error).toBeInstanceOf(GoldilocksError);
          if (error instanceof GoldilocksError) {
            expect(error.code).toBe(ErrorCode.INVALID_BASE_VALUE);
            expect(error.details).toEqual({ value: value.toString(), operation: 'test' });
          }
        }
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should skip range checks when validation is disabled', () => {
    configure({ validateInputs: false });
    fc.assert(
      fc.property(arbitraryOutOfRange(), (value) => {
        expect(() => validateBaseValue(value, 'test')).not.toThrow();
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  describe('toExponent', () => {
    it('should convert non-negative safe integers', () => {
      fc.assert(
        fc.property(fc.nat(), (n) => {
          expect(toExponent(n)).toBe(BigInt(n));
        }),
        PROPERTY_TEST_CONFIG
      );
    });

    it('should pass non-negative bigints through', () => {
      fc.assert(
        fc.property(fc.bigInt({ min: 0n, max: 1n << 128n }), (e) => {
          expect(toExponent(e)).toBe(e);
        }),
        PROPERTY_TEST_CONFIG
      );
    });

    it('should reject negative and non-integer exponents even without validation', () => {
      configure({ validateInputs: false });
      for (const bad of [-1n, -1, 0.5, Number.NaN, Number.POSITIVE_INFINITY, 2 ** 60]) {
        expect(() => toExponent(bad)).toThrow(GoldilocksError);
      }
    });
  });
});
