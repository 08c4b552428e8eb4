/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Repository keys.
 *
 * A key is an ordered sequence of path segments, e.g. `['feeds', 'abc.xml']`.
 * Segments are opaque strings at this layer; backends decide how to map them.
 */

import { EmptyKeyError, InvalidKeyTypeError } from './errors.js';

export type Key = readonly string[];

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object') return typeof value;
  return value.constructor?.name ?? 'object';
}

/**
 * Assert that a value is a key: an array whose members are all non-empty
 * strings.
 *
 * The empty array passes; use {@link requireEntryKey} where an entry must be
 * addressed.
 *
 * @throws {InvalidKeyTypeError} If the value is not an array of non-empty strings
 */
export function validateKey(key: unknown): asserts key is Key {
  if (!Array.isArray(key)) {
    throw new InvalidKeyTypeError(describeValue(key));
  }
  for (const segment of key) {
    if (typeof segment !== 'string') {
      throw new InvalidKeyTypeError(`array containing ${describeValue(segment)}`);
    }
    if (segment.length === 0) {
      throw new InvalidKeyTypeError('array containing an empty string');
    }
  }
}

/**
 * Validate a key that must address a concrete entry.
 *
 * @throws {InvalidKeyTypeError} If the value is not an array of strings
 * @throws {EmptyKeyError} If the key has no segments
 */
export function requireEntryKey(key: unknown, operation: string): asserts key is Key {
  validateKey(key);
  if (key.length === 0) {
    throw new EmptyKeyError(operation);
  }
}

/** Stable string form of a key, for use as a map key */
export function keyId(key: Key): string {
  return JSON.stringify(key);
}

/**
 * Parse a slash-separated key, e.g. `feeds/abc.xml`.
 *
 * Leading, trailing and repeated slashes are ignored, so `''` and `'/'` both
 * parse to the empty key.
 */
export function parseKey(text: string): Key {
  return text.split('/').filter((segment) => segment.length > 0);
}

/** Inverse of {@link parseKey} for keys whose segments contain no slash */
export function formatKey(key: Key): string {
  return key.join('/');
}
