/**
 * Goldilocks field capability objects
 *
 * `GoldilocksField` plugs the base-value kernel into the generic field
 * interfaces; `GoldilocksElementCodec` does the same for the byte codec over
 * elements. Code written against `IsPrimeField<B>` or `ByteConversion<T>`
 * can take these objects or any other field that satisfies the same shape.
 */

import type {
  ByteConversion,
  Deserializable,
  FieldElement,
  IsPrimeField,
  Serializable,
} from '../types.js';
import { GOLDILOCKS_FIELD } from './config.js';
import {
  fieldBitSize,
  fieldEquals,
  fromBaseType,
  fromRaw,
  representative,
} from './element.js';
import {
  fieldAdd,
  fieldDiv,
  fieldInv,
  fieldMul,
  fieldNeg,
  fieldPow,
  fieldSquare,
  fieldSub,
} from './operations.js';
import {
  deserializeFieldElement,
  fromBytesBe,
  fromBytesLe,
  parseHex,
  serializeFieldElement,
  toBytesBe,
  toBytesLe,
} from './serialization.js';

export const GoldilocksField = Object.freeze({
  zero: (): bigint => 0n,
  one: (): bigint => 1n,
  generator: (): bigint => GOLDILOCKS_FIELD.generator,
  add: fieldAdd,
  sub: fieldSub,
  neg: fieldNeg,
  mul: fieldMul,
  square: fieldSquare,
  div: fieldDiv,
  inv: fieldInv,
  pow: fieldPow,
  eq: fieldEquals,
  fromU64: fromRaw,
  fromBaseType,
  representative,
  fieldBitSize,
  fromHex: parseHex,
}) satisfies IsPrimeField<bigint>;

export const GoldilocksElementCodec = Object.freeze({
  toBytesBe,
  toBytesLe,
  fromBytesBe,
  fromBytesLe,
  serialize: serializeFieldElement,
  deserialize: deserializeFieldElement,
}) satisfies ByteConversion<FieldElement> & Serializable<FieldElement> & Deserializable<FieldElement>;
