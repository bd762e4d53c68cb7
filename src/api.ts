/**
 * High-level API for goldilocks-field
 *
 * Configuration entry points and factory functions that build canonical
 * field elements from the input types callers usually hold.
 */

import type { Endianness, FieldElement } from './types.js';
import { applyConfig, getConfig, resetConfig, type GoldilocksConfig } from './config.js';
import { invalidBaseValueError, invalidConfigError } from './errors.js';
import { debugLog } from './debug.js';
import { GOLDILOCKS_FIELD } from './field/config.js';
import {
  createFieldElement,
  createOneFieldElement,
  createZeroFieldElement,
} from './field/element.js';
import { fieldElementFromBytes, parseHex } from './field/serialization.js';

export { getConfig, resetConfig, type GoldilocksConfig };

const CONFIG_KEYS: ReadonlyArray<keyof GoldilocksConfig> = ['validateInputs', 'debug'];

/**
 * Configure global library settings
 *
 * @param config - Options to merge into the current configuration
 * @throws GoldilocksError with INVALID_CONFIG for unknown options or non-boolean values
 *
 * @example
 * ```typescript
 * configure({
 *   validateInputs: false, // skip range checks in hot loops
 *   debug: true,
 * });
 * ```
 */
export function configure(config: GoldilocksConfig): void {
  const accepted: GoldilocksConfig = {};
  const entries: [string, unknown][] = Object.entries(config);
  for (const [option, value] of entries) {
    const key = CONFIG_KEYS.find((candidate) => candidate === option);
    if (key === undefined) {
      throw invalidConfigError(option, value);
    }
    if (value === undefined) {
      continue;
    }
    if (typeof value !== 'boolean') {
      throw invalidConfigError(option, value);
    }
    accepted[key] = value;
  }

  applyConfig(accepted);
  debugLog('config', 'Configuration updated', { ...getConfig() });
}

// ============================================================================
// Field Element Factory Functions
// ============================================================================

/**
 * Input types accepted for creating field elements
 */
export type FieldElementInput = bigint | number | string | Uint8Array;

/**
 * Options for creating field elements
 */
export interface CreateElementOptions {
  /** Byte order for Uint8Array input (default: 'be') */
  endian?: Endianness;
}

/**
 * Create a canonical field element from various input types
 *
 * Accepts bigint, number, hex string, or byte array inputs. The value is
 * reduced modulo p.
 *
 * @param value - The value to convert to a field element
 * @param options - Parsing options
 * @throws GoldilocksError with INVALID_BASE_VALUE, INVALID_HEX_STRING or INVALID_BYTE_LENGTH
 *
 * @example
 * ```typescript
 * const a = createElement(123n);
 * const b = createElement(456);
 * const c = createElement('0x1a2b3c');
 * const d = createElement(new Uint8Array([0, 0, 0, 0, 0, 0, 1, 0]), { endian: 'be' });
 * ```
 */
export function createElement(value: FieldElementInput, options: CreateElementOptions = {}): FieldElement {
  if (value instanceof Uint8Array) {
    return createFieldElement(fieldElementFromBytes(value, options.endian ?? 'be').value);
  }

  if (typeof value === 'string') {
    return createFieldElement(parseHex(value));
  }

  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw invalidBaseValueError(String(value), 'createElement');
    }
    return createFieldElement(BigInt(value));
  }

  return createFieldElement(value);
}

/**
 * Create the zero element
 */
export function createZero(): FieldElement {
  return createZeroFieldElement();
}

/**
 * Create the one element (multiplicative identity)
 */
export function createOne(): FieldElement {
  return createOneFieldElement();
}

/**
 * Get the field generator (7)
 */
export function getGenerator(): FieldElement {
  return createFieldElement(GOLDILOCKS_FIELD.generator);
}
