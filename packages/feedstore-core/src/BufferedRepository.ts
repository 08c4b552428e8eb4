/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Write-behind buffer in front of another repository.
 *
 * Writes are held in memory (last write per key wins) until flush() pushes
 * them to the wrapped repository. Reads and existence checks see buffered
 * entries first. Listing is delegated as-is, so entries that have not been
 * flushed yet do not appear in list() results.
 *
 * A write that would nest under a plain entry, or land on a key that has
 * entries below it, is refused when it is buffered, whether the other entry
 * is buffered or already persisted.
 *
 * All buffer access is serialized by an AsyncMutex. The mutex is held only
 * around buffer lookups and updates, never across the wrapped repository's
 * I/O.
 */

import { AsyncMutex } from './AsyncMutex.js';
import { readAll, singleChunk, type ByteChunks } from './bytes.js';
import {
  FlushError,
  KeyNotADirectoryError,
  KeyNotFoundError,
  PathConflictError,
  type FlushFailure,
} from './errors.js';
import { keyId, requireEntryKey, validateKey, type Key } from './key.js';
import type { Repository } from './repository.js';

interface BufferedEntry {
  key: Key;
  data: Uint8Array;
}

export class BufferedRepository implements Repository {
  private readonly buffer = new Map<string, BufferedEntry>();

  /**
   * @param repository - Repository that flush() writes to
   * @param lock - Mutex guarding the buffer; pass one in to share it with
   *               other code that must not interleave with buffer updates
   */
  constructor(
    public readonly repository: Repository,
    public readonly lock: AsyncMutex = new AsyncMutex()
  ) {}

  /** True while there are writes not yet flushed */
  get dirty(): boolean {
    return this.buffer.size > 0;
  }

  /** Keys with unflushed writes, in the order they were first written */
  async bufferedKeys(): Promise<Key[]> {
    return this.lock.runExclusive(() =>
      Array.from(this.buffer.values(), (entry) => entry.key)
    );
  }

  async read(key: Key): Promise<AsyncIterable<Uint8Array>> {
    requireEntryKey(key, 'read');
    const entry = await this.lookup(key);
    if (entry !== undefined) {
      return singleChunk(entry.data.slice());
    }
    return this.repository.read(key);
  }

  /**
   * Buffer a write.
   *
   * The chunks are consumed before the mutex is taken, so the sequence may
   * itself read from this repository.
   *
   * @throws {PathConflictError} If a prefix of `key` is a plain entry, or
   *         `key` already has entries below it
   */
  async write(key: Key, chunks: ByteChunks): Promise<void> {
    requireEntryKey(key, 'write');
    const data = await readAll(chunks);
    const entry: BufferedEntry = { key: [...key], data };

    const persisted = await this.persistedConflict(entry.key);
    if (persisted !== undefined) {
      throw new PathConflictError(entry.key, persisted);
    }

    await this.lock.runExclusive(() => {
      const buffered = this.bufferedConflict(entry.key);
      if (buffered !== undefined) {
        throw new PathConflictError(entry.key, buffered);
      }
      this.buffer.set(keyId(entry.key), entry);
    });
  }

  async exists(key: Key): Promise<boolean> {
    validateKey(key);
    if (key.length === 0) return false;
    if ((await this.lookup(key)) !== undefined) return true;
    return this.repository.exists(key);
  }

  async list(key: Key): Promise<ReadonlySet<string>> {
    validateKey(key);
    return this.repository.list(key);
  }

  toUrl(scheme: string): string {
    return this.repository.toUrl(scheme);
  }

  /**
   * Write every buffered entry through to the wrapped repository.
   *
   * Entries are written one at a time and dropped from the buffer once
   * written, unless a newer write to the same key arrived in the meantime.
   * Every entry is attempted; the ones that fail stay buffered.
   *
   * @returns Number of entries written
   * @throws {FlushError} If any entry could not be written
   */
  async flush(): Promise<number> {
    const pending = await this.lock.runExclusive(() => Array.from(this.buffer.entries()));

    let written = 0;
    const failures: FlushFailure[] = [];
    for (const [id, entry] of pending) {
      try {
        await this.repository.write(entry.key, [entry.data]);
      } catch (error) {
        failures.push({ key: entry.key, error });
        continue;
      }
      written++;

      await this.lock.runExclusive(() => {
        if (this.buffer.get(id) === entry) {
          this.buffer.delete(id);
        }
      });
    }

    if (failures.length > 0) {
      throw new FlushError(written, failures);
    }
    return written;
  }

  private async lookup(key: Key): Promise<BufferedEntry | undefined> {
    return this.lock.runExclusive(() => this.buffer.get(keyId(key)));
  }

  /** A buffered key that is a proper prefix of `key`, or that `key` is a proper prefix of */
  private bufferedConflict(key: Key): Key | undefined {
    for (const { key: other } of this.buffer.values()) {
      if (other.length === key.length) continue;
      const shorter = other.length < key.length ? other : key;
      const longer = other.length < key.length ? key : other;
      if (shorter.every((segment, i) => segment === longer[i])) {
        return shorter === other ? other : key;
      }
    }
    return undefined;
  }

  /**
   * Check the wrapped repository: a proper prefix of `key` that is a plain
   * entry, or `key` itself when it has entries below it.
   */
  private async persistedConflict(key: Key): Promise<Key | undefined> {
    for (let length = 1; length <= key.length; length++) {
      const prefix = key.slice(0, length);
      if (!(await this.repository.exists(prefix))) return undefined;

      try {
        await this.repository.list(prefix);
      } catch (err) {
        if (err instanceof KeyNotADirectoryError) {
          return length < key.length ? prefix : undefined;
        }
        if (err instanceof KeyNotFoundError) return undefined;
        throw err;
      }
      if (length === key.length) return key;
    }
    return undefined;
  }
}
