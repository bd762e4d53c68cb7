/**
 * Goldilocks Field Module
 *
 * Arithmetic, canonicalization and byte/hex codecs for the prime field
 * p = 2^64 - 2^32 + 1.
 */

export * from './config.js';
export * from './element.js';
export * from './operations.js';
export * from './serialization.js';
export * from './goldilocks.js';
