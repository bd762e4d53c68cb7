/**
 * Field Element Serialization
 *
 * Fixed-width 8-byte encodings in big- or little-endian order, hex parsing
 * and formatting, and concatenated vectors of elements. Big-endian is the
 * wire form used by serialize/deserialize.
 *
 * Encoders write the raw stored value; decoders keep the raw value they read.
 * Neither canonicalizes.
 */

import type { Endianness, FieldElement } from '../types.js';
import { invalidByteLengthError, invalidHexStringError } from '../errors.js';
import { MAX_U64, validateBaseValue } from '../validation.js';
import { GOLDILOCKS_FIELD } from './config.js';
import { wrapRawValue } from './element.js';

/** Bytes per encoded element */
export const ELEMENT_BYTE_SIZE = GOLDILOCKS_FIELD.byteSize;

const HEX_DIGITS = /^[0-9a-fA-F]+$/;

/**
 * Serialize a field element to exactly 8 bytes
 *
 * @param element - The field element to serialize
 * @param endian - Byte order ('be' for big-endian, 'le' for little-endian)
 * @throws GoldilocksError with INVALID_BASE_VALUE if the value is outside [0, 2^64)
 */
export function fieldElementToBytes(element: FieldElement, endian: Endianness = 'be'): Uint8Array {
  validateBaseValue(element.value, 'fieldElementToBytes');
  const bytes = new Uint8Array(ELEMENT_BYTE_SIZE);

  let v = element.value;
  if (endian === 'le') {
    // LSB first
    for (let i = 0; i < ELEMENT_BYTE_SIZE; i++) {
      bytes[i] = Number(v & 0xffn);
      v >>= 8n;
    }
  } else {
    // MSB first
    for (let i = ELEMENT_BYTE_SIZE - 1; i >= 0; i--) {
      bytes[i] = Number(v & 0xffn);
      v >>= 8n;
    }
  }

  return bytes;
}

/**
 * Deserialize the first 8 bytes to a field element
 *
 * Bytes beyond the first 8 are ignored.
 *
 * @param bytes - At least 8 bytes
 * @param endian - Byte order ('be' for big-endian, 'le' for little-endian)
 * @throws GoldilocksError with INVALID_BYTE_LENGTH if fewer than 8 bytes are given
 */
export function fieldElementFromBytes(bytes: Uint8Array, endian: Endianness = 'be'): FieldElement {
  if (bytes.length < ELEMENT_BYTE_SIZE) {
    throw invalidByteLengthError(bytes.length, ELEMENT_BYTE_SIZE, endian);
  }

  let value = 0n;
  if (endian === 'be') {
    for (let i = 0; i < ELEMENT_BYTE_SIZE; i++) {
      value = (value << 8n) | BigInt(bytes[i] ?? 0);
    }
  } else {
    for (let i = ELEMENT_BYTE_SIZE - 1; i >= 0; i--) {
      value = (value << 8n) | BigInt(bytes[i] ?? 0);
    }
  }

  return wrapRawValue(value);
}

export function toBytesBe(element: FieldElement): Uint8Array {
  return fieldElementToBytes(element, 'be');
}

export function toBytesLe(element: FieldElement): Uint8Array {
  return fieldElementToBytes(element, 'le');
}

export function fromBytesBe(bytes: Uint8Array): FieldElement {
  return fieldElementFromBytes(bytes, 'be');
}

export function fromBytesLe(bytes: Uint8Array): FieldElement {
  return fieldElementFromBytes(bytes, 'le');
}

/**
 * Canonical wire form: big-endian
 */
export function serializeFieldElement(element: FieldElement): Uint8Array {
  return fieldElementToBytes(element, 'be');
}

/**
 * @throws GoldilocksError with INVALID_BYTE_LENGTH if fewer than 8 bytes are given
 */
export function deserializeFieldElement(bytes: Uint8Array): FieldElement {
  return fieldElementFromBytes(bytes, 'be');
}

/**
 * Parse a hex string to a raw base value
 *
 * A leading "0x" is stripped only when the string is longer than 2
 * characters, so "0x" on its own is rejected. Digits may be either case.
 * The value is not reduced mod p.
 *
 * @throws GoldilocksError with INVALID_HEX_STRING on empty input, non-hex
 *   characters, or a value wider than 64 bits
 */
export function parseHex(hex: string): bigint {
  let digits = hex;
  if (digits.length > 2 && digits.startsWith('0x')) {
    digits = digits.slice(2);
  }

  if (digits.length === 0) {
    throw invalidHexStringError(hex, 'empty string');
  }
  if (!HEX_DIGITS.test(digits)) {
    throw invalidHexStringError(hex, 'non-hex character');
  }

  const value = BigInt('0x' + digits);
  if (value > MAX_U64) {
    throw invalidHexStringError(hex, 'value does not fit in 64 bits');
  }

  return value;
}

/**
 * Deserialize a hex string to a field element
 *
 * @param hex - The hex string (with or without '0x' prefix)
 * @throws GoldilocksError with INVALID_HEX_STRING
 */
export function fieldElementFromHex(hex: string): FieldElement {
  return wrapRawValue(parseHex(hex));
}

/**
 * Serialize a field element to a 16-digit lowercase hex string
 *
 * @param element - The field element to serialize
 * @param prefix - Whether to include '0x' prefix
 * @throws GoldilocksError with INVALID_BASE_VALUE if the value is outside [0, 2^64)
 */
export function fieldElementToHex(element: FieldElement, prefix: boolean = true): string {
  validateBaseValue(element.value, 'fieldElementToHex');
  const hex = element.value.toString(16).padStart(ELEMENT_BYTE_SIZE * 2, '0');
  return prefix ? '0x' + hex : hex;
}

/**
 * Serialize multiple field elements to concatenated bytes
 *
 * @param elements - The field elements to serialize
 * @param endian - Byte order
 */
export function fieldElementsToBytes(
  elements: readonly FieldElement[],
  endian: Endianness = 'be'
): Uint8Array {
  const result = new Uint8Array(elements.length * ELEMENT_BYTE_SIZE);

  elements.forEach((element, i) => {
    result.set(fieldElementToBytes(element, endian), i * ELEMENT_BYTE_SIZE);
  });

  return result;
}

/**
 * Deserialize concatenated bytes to multiple field elements
 *
 * @param bytes - A whole number of 8-byte encodings
 * @param endian - Byte order
 * @throws GoldilocksError with INVALID_BYTE_LENGTH if the length is not a multiple of 8
 */
export function fieldElementsFromBytes(bytes: Uint8Array, endian: Endianness = 'be'): FieldElement[] {
  if (bytes.length % ELEMENT_BYTE_SIZE !== 0) {
    throw invalidByteLengthError(bytes.length, ELEMENT_BYTE_SIZE, endian);
  }

  const count = bytes.length / ELEMENT_BYTE_SIZE;
  const elements: FieldElement[] = [];

  for (let i = 0; i < count; i++) {
    const offset = i * ELEMENT_BYTE_SIZE;
    elements.push(fieldElementFromBytes(bytes.subarray(offset, offset + ELEMENT_BYTE_SIZE), endian));
  }

  return elements;
}
