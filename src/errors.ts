/**
 * Error handling for goldilocks-field
 *
 * Every failure raised by this library is a GoldilocksError carrying an
 * ErrorCode for programmatic handling and an optional details object.
 * Arithmetic overflow has no code: the reductions cannot overflow.
 */

import { debugLog } from './debug.js';

/**
 * Error codes for field operations
 */
export enum ErrorCode {
  // Arithmetic errors
  /** Attempted inversion of (or division by) an element whose canonical value is zero */
  DIVISION_BY_ZERO = 'DIVISION_BY_ZERO',
  /** Exponent is negative or not an integer */
  INVALID_EXPONENT = 'INVALID_EXPONENT',

  // Input validation errors
  /** Raw value lies outside the unsigned 64-bit range [0, 2^64) */
  INVALID_BASE_VALUE = 'INVALID_BASE_VALUE',

  // Codec errors
  /** Hex string is empty, has non-hex characters, or does not fit 64 bits */
  INVALID_HEX_STRING = 'INVALID_HEX_STRING',
  /** Byte input is too short (or not a whole number of elements) */
  INVALID_BYTE_LENGTH = 'INVALID_BYTE_LENGTH',

  // Configuration errors
  /** Invalid configuration option provided */
  INVALID_CONFIG = 'INVALID_CONFIG',
}

/**
 * Base error class for field errors
 *
 * @example
 * ```typescript
 * try {
 *   fieldInv(0n);
 * } catch (error) {
 *   if (isGoldilocksError(error) && error.code === ErrorCode.DIVISION_BY_ZERO) {
 *     // handle zero divisor
 *   }
 * }
 * ```
 */
export class GoldilocksError extends Error {
  /**
   * @param message - Human-readable error message
   * @param code - Error code for programmatic handling
   * @param details - Optional context for debugging
   */
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GoldilocksError';
    Object.setPrototypeOf(this, GoldilocksError.prototype);
  }

  override toString(): string {
    let str = `${this.name} [${this.code}]: ${this.message}`;
    if (this.details) {
      str += ` (${JSON.stringify(this.details)})`;
    }
    return str;
  }

  /**
   * Convert error to a plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Type guard to check if an error is a GoldilocksError
 */
export function isGoldilocksError(error: unknown): error is GoldilocksError {
  return error instanceof GoldilocksError;
}

function raise(
  scope: string,
  message: string,
  code: ErrorCode,
  details?: Record<string, unknown>
): GoldilocksError {
  debugLog(scope, `${code}: ${message}`, details);
  return new GoldilocksError(message, code, details);
}

// ============================================================================
// Error Factory Functions
// ============================================================================

/**
 * Create an error for inversion of zero
 *
 * @param index - Position of the zero element in a batch, if any
 */
export function divisionByZeroError(index?: number): GoldilocksError {
  const details: Record<string, unknown> = {};
  if (index !== undefined) {
    details['index'] = index;
  }
  return raise(
    'arithmetic',
    'Cannot compute inverse of zero element',
    ErrorCode.DIVISION_BY_ZERO,
    Object.keys(details).length > 0 ? details : undefined
  );
}

/**
 * Create an error for an exponent that is not an unsigned integer
 */
export function invalidExponentError(exponent: string): GoldilocksError {
  return raise('arithmetic', 'Exponent must be a non-negative integer', ErrorCode.INVALID_EXPONENT, {
    exponent,
  });
}

/**
 * Create an error for a raw value outside [0, 2^64)
 *
 * @param value - The offending value as string
 * @param operation - Name of the operation that received it
 */
export function invalidBaseValueError(value: string, operation: string): GoldilocksError {
  return raise(
    'validation',
    `${operation} requires an unsigned 64-bit integer`,
    ErrorCode.INVALID_BASE_VALUE,
    { value, operation }
  );
}

/**
 * Create an error for a malformed hex string
 *
 * @param input - The rejected string
 * @param reason - What was wrong with it
 */
export function invalidHexStringError(input: string, reason: string): GoldilocksError {
  return raise('codec', `Invalid hex string: ${reason}`, ErrorCode.INVALID_HEX_STRING, {
    input,
    reason,
  });
}

/**
 * Create an error for byte input of the wrong length
 *
 * @param actualLength - Number of bytes supplied
 * @param expectedLength - Number of bytes required (or the element width for vectors)
 * @param endian - Byte order being decoded
 */
export function invalidByteLengthError(
  actualLength: number,
  expectedLength: number,
  endian: 'be' | 'le'
): GoldilocksError {
  return raise(
    'codec',
    `Expected ${expectedLength} bytes for ${endian === 'be' ? 'big' : 'little'}-endian decoding, got ${actualLength}`,
    ErrorCode.INVALID_BYTE_LENGTH,
    { actualLength, expectedLength, endian }
  );
}

/**
 * Create an error for invalid configuration
 *
 * @param option - Name of the invalid option
 * @param value - The invalid value
 */
export function invalidConfigError(option: string, value: unknown): GoldilocksError {
  return raise(
    'config',
    `Invalid configuration option '${option}': ${String(value)}`,
    ErrorCode.INVALID_CONFIG,
    { option, value: String(value) }
  );
}
