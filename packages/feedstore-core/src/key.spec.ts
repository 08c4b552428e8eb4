/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { formatKey, keyId, parseKey, requireEntryKey, validateKey } from './key.js';
import { EmptyKeyError, InvalidKeyTypeError } from './errors.js';

describe('key', () => {
  describe('validateKey', () => {
    it('accepts arrays of strings, including the empty array', () => {
      validateKey(['feeds', 'abc.xml']);
      validateKey([]);
    });

    it('rejects a Set of strings', () => {
      assert.throws(
        () => validateKey(new Set(['key ', 'must ', 'be ', 'sequence'])),
        (err: unknown) => err instanceof InvalidKeyTypeError && err.received === 'Set'
      );
    });

    it('rejects strings and other non-arrays', () => {
      assert.throws(() => validateKey('feeds/abc.xml'), InvalidKeyTypeError);
      assert.throws(() => validateKey(undefined), InvalidKeyTypeError);
      assert.throws(() => validateKey(null), InvalidKeyTypeError);
      assert.throws(() => validateKey({ 0: 'a', length: 1 }), InvalidKeyTypeError);
    });

    it('rejects arrays with non-string segments', () => {
      assert.throws(
        () => validateKey(['a', 1]),
        (err: unknown) =>
          err instanceof InvalidKeyTypeError && err.received === 'array containing number'
      );
    });

    it('rejects empty segments', () => {
      assert.throws(
        () => validateKey(['']),
        (err: unknown) =>
          err instanceof InvalidKeyTypeError &&
          err.received === 'array containing an empty string'
      );
      assert.throws(() => validateKey(['feeds', '']), InvalidKeyTypeError);
    });
  });

  describe('requireEntryKey', () => {
    it('rejects the empty key with EmptyKeyError', () => {
      assert.throws(
        () => requireEntryKey([], 'write'),
        (err: unknown) => err instanceof EmptyKeyError && err.operation === 'write'
      );
    });

    it('checks the type before emptiness', () => {
      assert.throws(() => requireEntryKey(new Set(), 'read'), InvalidKeyTypeError);
    });
  });

  describe('keyId', () => {
    it('distinguishes segment boundaries', () => {
      assert.notStrictEqual(keyId(['a/b']), keyId(['a', 'b']));
      assert.strictEqual(keyId(['a', 'b']), keyId(['a', 'b']));
    });
  });

  describe('parseKey / formatKey', () => {
    it('splits on slashes and drops empty segments', () => {
      assert.deepStrictEqual(parseKey('feeds/abc.xml'), ['feeds', 'abc.xml']);
      assert.deepStrictEqual(parseKey('/feeds//abc.xml/'), ['feeds', 'abc.xml']);
      assert.deepStrictEqual(parseKey(''), []);
      assert.deepStrictEqual(parseKey('/'), []);
    });

    it('formats with slashes', () => {
      assert.strictEqual(formatKey(['feeds', 'abc.xml']), 'feeds/abc.xml');
      assert.strictEqual(formatKey([]), '');
    });
  });
});
