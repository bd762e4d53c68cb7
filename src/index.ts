/**
 * goldilocks-field
 *
 * Arithmetic over the 64-bit prime field p = 2^64 - 2^32 + 1, the scalar
 * field of several proof systems.
 *
 * @example
 * ```typescript
 * import { GoldilocksField as F, createElement, toBytesBe } from 'goldilocks-field';
 *
 * const x = F.mul(5n, 3n); // 15n
 * const y = F.inv(2n);     // 9223372034707292161n
 * const bytes = toBytesBe(createElement(x));
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Public API - Factory functions and configuration
// ============================================================================
export {
  configure,
  getConfig,
  resetConfig,
  type GoldilocksConfig,
  createElement,
  createZero,
  createOne,
  getGenerator,
  type FieldElementInput,
  type CreateElementOptions,
} from './api.js';

// ============================================================================
// Field
// ============================================================================
export {
  // Capability objects
  GoldilocksField,
  GoldilocksElementCodec,

  // Configuration
  GOLDILOCKS_FIELD,
  GOLDILOCKS_MODULUS,
  EPSILON,

  // Canonicalization and equality
  fromRaw,
  fromBaseType,
  representative,
  fieldEquals,
  isZero,
  isOne,
  fieldBitSize,
  createFieldElement,
  getRepresentative,
  fieldElementsEqual,
  isZeroFieldElement,
  isOneFieldElement,

  // Arithmetic
  reduce128,
  fieldAdd,
  fieldSub,
  fieldNeg,
  fieldMul,
  fieldSquare,
  fieldPow,
  fieldInv,
  fieldDiv,
  batchInv,
  batchMul,
  batchAdd,
  elementAdd,
  elementSub,
  elementNeg,
  elementMul,
  elementSquare,
  elementPow,
  elementInv,
  elementDiv,

  // Serialization
  ELEMENT_BYTE_SIZE,
  fieldElementToBytes,
  fieldElementFromBytes,
  toBytesBe,
  toBytesLe,
  fromBytesBe,
  fromBytesLe,
  serializeFieldElement,
  deserializeFieldElement,
  parseHex,
  fieldElementFromHex,
  fieldElementToHex,
  fieldElementsToBytes,
  fieldElementsFromBytes,
} from './field/index.js';

// ============================================================================
// Types
// ============================================================================
export type {
  Endianness,
  Exponent,
  FieldConfig,
  FieldElement,
  IsField,
  IsPrimeField,
  ByteConversion,
  Serializable,
  Deserializable,
} from './types.js';

// ============================================================================
// Errors
// ============================================================================
export { GoldilocksError, ErrorCode, isGoldilocksError } from './errors.js';

export { MAX_U64, isU64 } from './validation.js';
