/**
 * Tests for error types
 */

import { describe, it, expect } from 'vitest';
import {
  ErrorCode,
  GoldilocksError,
  isGoldilocksError,
  divisionByZeroError,
  invalidExponentError,
  invalidBaseValueError,
  invalidHexStringError,
  invalidByteLengthError,
  invalidConfigError,
} from './errors.js';

describe('GoldilocksError', () => {
  it('should carry code and details', () => {
    const error = new GoldilocksError('boom', ErrorCode.INVALID_CONFIG, { option: 'x' });
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('GoldilocksError');
    expect(error.message).toBe('boom');
    expect(error.code).toBe(ErrorCode.INVALID_CONFIG);
    expect(error.details).toEqual({ option: 'x' });
  });

  it('should format toString with details', () => {
    expect(divisionByZeroError(3).toString()).toBe(
      'GoldilocksError [DIVISION_BY_ZERO]: Cannot compute inverse of zero element ({"index":3})'
    );
  });

  it('should format toString without details', () => {
    expect(divisionByZeroError().toString()).toBe(
      'GoldilocksError [DIVISION_BY_ZERO]: Cannot compute inverse of zero element'
    );
  });

  it('should convert to JSON', () => {
    expect(invalidExponentError('-1').toJSON()).toEqual({
      name: 'GoldilocksError',
      code: ErrorCode.INVALID_EXPONENT,
      message: 'Exponent must be a non-negative integer',
      details: { exponent: '-1' },
    });
  });

  it('should be recognised by the type guard', () => {
    expect(isGoldilocksError(invalidHexStringError('zz', 'non-hex character'))).toBe(true);
    expect(isGoldilocksError(new Error('plain'))).toBe(false);
    expect(isGoldilocksError('string')).toBe(false);
  });
});

describe('Error factories', () => {
  it('should build base value errors', () => {
    const error = invalidBaseValueError('-1', 'fieldAdd');
    expect(error.code).toBe(ErrorCode.INVALID_BASE_VALUE);
    expect(error.message).toBe('fieldAdd requires an unsigned 64-bit integer');
  });

  it('should build byte length errors', () => {
    const error = invalidByteLengthError(3, 8, 'le');
    expect(error.code).toBe(ErrorCode.INVALID_BYTE_LENGTH);
    expect(error.message).toBe('Expected 8 bytes for little-endian decoding, got 3');
    expect(error.details).toEqual({ actualLength: 3, expectedLength: 8, endian: 'le' });
  });

  it('should build config errors with printable values', () => {
    const error = invalidConfigError('debug', 5n);
    expect(error.message).toBe("Invalid configuration option 'debug': 5");
    expect(error.toString()).toBe(
      `GoldilocksError [INVALID_CONFIG]: Invalid configuration option 'debug': 5 ({"option":"debug","value":"5"})`
    );
  });
});
