/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * The repository contract.
 *
 * A repository stores opaque byte sequences addressed by keys. Callers
 * depend on this interface only; the filesystem implementation and the
 * write buffer are interchangeable behind it.
 *
 * Every implementation validates its key argument before doing anything
 * else, using {@link validateKey} / {@link requireEntryKey}:
 * - a key that is not an array of strings fails with InvalidKeyTypeError
 * - an empty key fails with EmptyKeyError for read and write
 */

import type { ByteChunks } from './bytes.js';
import { NotImplementedError } from './errors.js';
import { requireEntryKey, validateKey, type Key } from './key.js';

export interface Repository {
  /**
   * Open the entry at `key` for reading.
   *
   * Chunks are produced lazily; the content is never held in memory whole.
   *
   * @throws {EmptyKeyError} If the key is empty
   * @throws {KeyNotFoundError} If there is no entry at the key
   */
  read(key: Key): Promise<AsyncIterable<Uint8Array>>;

  /**
   * Create or replace the entry at `key` with the concatenated chunks.
   *
   * @throws {EmptyKeyError} If the key is empty
   * @throws {PathConflictError} If a prefix of the key is a plain entry
   */
  write(key: Key, chunks: ByteChunks): Promise<void>;

  /**
   * Whether an entry or directory-like node exists at `key`.
   *
   * Always false for the empty key.
   */
  exists(key: Key): Promise<boolean>;

  /**
   * Names of the immediate children of the directory-like node at `key`.
   *
   * The empty key lists the top level of the repository.
   *
   * @throws {KeyNotFoundError} If there is no directory at the key
   */
  list(key: Key): Promise<ReadonlySet<string>>;

  /** Locator URL for this repository under the given scheme */
  toUrl(scheme: string): string;
}

/**
 * The bare contract: validates arguments, then reports every operation as
 * not implemented.
 *
 * Useful as a placeholder backend and for checking that argument validation
 * happens before anything backend-specific.
 */
export class UnimplementedRepository implements Repository {
  async read(key: Key): Promise<AsyncIterable<Uint8Array>> {
    requireEntryKey(key, 'read');
    throw new NotImplementedError('read');
  }

  async write(key: Key, _chunks: ByteChunks): Promise<void> {
    requireEntryKey(key, 'write');
    throw new NotImplementedError('write');
  }

  async exists(key: Key): Promise<boolean> {
    validateKey(key);
    if (key.length === 0) return false;
    throw new NotImplementedError('exists');
  }

  async list(key: Key): Promise<ReadonlySet<string>> {
    validateKey(key);
    throw new NotImplementedError('list');
  }

  toUrl(_scheme: string): string {
    throw new NotImplementedError('toUrl');
  }
}
