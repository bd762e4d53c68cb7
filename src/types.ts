/**
 * Core type definitions for goldilocks-field
 *
 * The capability interfaces describe what higher-level code may ask of "a
 * field" without knowing which field it is. Any field can satisfy them
 * independently; the Goldilocks field is one implementation.
 *
 * @module types
 */

/**
 * Byte order for serialization
 */
export type Endianness = 'be' | 'le';

/**
 * Exponent accepted by `pow`: an unsigned bigint or a non-negative safe integer
 */
export type Exponent = bigint | number;

/**
 * Field parameters
 *
 * @example
 * ```typescript
 * const field: FieldConfig = {
 *   modulus: 0xffffffff00000001n,
 *   generator: 7n,
 *   bitSize: 64,
 *   byteSize: 8,
 * };
 * ```
 */
export interface FieldConfig {
  /** The prime modulus p of the field F_p */
  readonly modulus: bigint;
  /** Fixed generator handed to protocols that need a primitive root */
  readonly generator: bigint;
  /** Bits needed to represent p - 1 */
  readonly bitSize: number;
  /** Width in bytes of one encoded element */
  readonly byteSize: number;
}

/**
 * Goldilocks field element
 *
 * Holds one raw unsigned 64-bit integer. Results of arithmetic are always
 * canonical (< p); values decoded from bytes or hex keep whatever raw value
 * was decoded, which may be in [p, 2^64). Elements are frozen.
 *
 * @example
 * ```typescript
 * import { createFieldElement, getRepresentative } from 'goldilocks-field';
 *
 * const elem = createFieldElement(123n);
 * getRepresentative(elem); // 123n
 * ```
 */
export interface FieldElement {
  /** Raw stored value in [0, 2^64) */
  readonly value: bigint;
}

/**
 * Arithmetic capabilities of a field over its base type `B`
 *
 * Every operation takes base values that may be unreduced and returns a
 * canonical one.
 */
export interface IsField<B> {
  zero(): B;
  one(): B;
  add(a: B, b: B): B;
  sub(a: B, b: B): B;
  neg(a: B): B;
  mul(a: B, b: B): B;
  square(a: B): B;
  /** @throws GoldilocksError with DIVISION_BY_ZERO when b ≡ 0 */
  div(a: B, b: B): B;
  /** @throws GoldilocksError with DIVISION_BY_ZERO when a ≡ 0 */
  inv(a: B): B;
  pow(a: B, exponent: Exponent): B;
  /** Equality of canonical representatives */
  eq(a: B, b: B): boolean;
  fromU64(x: bigint): B;
  fromBaseType(x: B): B;
}

/**
 * Prime-field capabilities on top of {@link IsField}
 */
export interface IsPrimeField<B, R = B> extends IsField<B> {
  generator(): B;
  /** Stored raw value, not forced into canonical form */
  representative(a: B): R;
  fieldBitSize(): number;
  /** @throws GoldilocksError with INVALID_HEX_STRING */
  fromHex(hex: string): B;
}

/**
 * Fixed-width byte conversion for values of type `T`
 */
export interface ByteConversion<T> {
  toBytesBe(value: T): Uint8Array;
  toBytesLe(value: T): Uint8Array;
  /** @throws GoldilocksError with INVALID_BYTE_LENGTH */
  fromBytesBe(bytes: Uint8Array): T;
  /** @throws GoldilocksError with INVALID_BYTE_LENGTH */
  fromBytesLe(bytes: Uint8Array): T;
}

export interface Serializable<T> {
  serialize(value: T): Uint8Array;
}

export interface Deserializable<T> {
  /** @throws GoldilocksError with INVALID_BYTE_LENGTH */
  deserialize(bytes: Uint8Array): T;
}
