/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Local filesystem implementation of the repository contract.
 *
 * Keys map to nested paths under a root directory:
 * - ['feeds', 'abc.xml'] -> <root>/feeds/abc.xml
 *
 * In atomic mode every write is staged in a .partial file next to its
 * target and renamed into place, so concurrent readers never see a
 * partially written entry.
 */

import type { Stats } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import type { ByteChunks } from './bytes.js';
import {
  KeyNotADirectoryError,
  KeyNotFoundError,
  NotADirectoryError,
  PathConflictError,
  RootNotFoundError,
  isDirectoryError,
  isExistsError,
  isNotDirectoryError,
  isNotFoundError,
} from './errors.js';
import { DEFAULT_CHUNK_SIZE, FileByteIterator, checkChunkSize } from './FileByteIterator.js';
import { requireEntryKey, validateKey, type Key } from './key.js';
import type { Repository } from './repository.js';
import { isStagingName, writeInPlace, writeStaged } from './staging.js';

export interface FilesystemRepositoryOptions {
  /** Create the root directory (and its parents) if missing (default: true) */
  createRoot?: boolean;
  /** Stage writes and rename them into place (default: false) */
  atomic?: boolean;
  /** Bytes per chunk returned by read (default: 4096) */
  chunkSize?: number;
}

/**
 * Repository storing each entry as a file under a root directory.
 *
 * @example
 * ```typescript
 * const repo = await FilesystemRepository.open('/var/lib/feeds', { atomic: true });
 * await repo.write(['feeds', 'abc.xml'], [Buffer.from('<feed/>')]);
 * const data = await readAll(await repo.read(['feeds', 'abc.xml']));
 * ```
 */
export class FilesystemRepository implements Repository {
  readonly atomic: boolean;
  readonly chunkSize: number;

  private constructor(
    public readonly root: string,
    options: FilesystemRepositoryOptions
  ) {
    this.atomic = options.atomic ?? false;
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  }

  /**
   * Open a repository rooted at `root`.
   *
   * @throws {RootNotFoundError} If root is missing and createRoot is false
   * @throws {NotADirectoryError} If root exists but is not a directory
   */
  static async open(
    root: string,
    options: FilesystemRepositoryOptions = {}
  ): Promise<FilesystemRepository> {
    checkChunkSize(options.chunkSize ?? DEFAULT_CHUNK_SIZE);

    let stat: Stats;
    try {
      stat = await fs.stat(root);
    } catch (err) {
      if (!isNotFoundError(err)) throw err;
      if (options.createRoot === false) {
        throw new RootNotFoundError(root);
      }
      await fs.mkdir(root, { recursive: true });
      return new FilesystemRepository(root, options);
    }

    if (!stat.isDirectory()) {
      throw new NotADirectoryError(root);
    }
    return new FilesystemRepository(root, options);
  }

  /**
   * Open the repository a `file://` (or any scheme) URL points at.
   *
   * The URL is read as a file URL whatever its scheme, so `fs:///srv/feeds`
   * is `/srv/feeds` and percent-escapes in the path are decoded.
   */
  static async fromUrl(
    url: string | URL,
    options: FilesystemRepositoryOptions = {}
  ): Promise<FilesystemRepository> {
    const parsed = typeof url === 'string' ? new URL(url) : url;
    const fileUrl = new URL(`file:${parsed.href.slice(parsed.protocol.length)}`);
    return FilesystemRepository.open(fileURLToPath(fileUrl), options);
  }

  /** File URL of the root with its scheme replaced, e.g. `fs:///srv/feeds` */
  toUrl(scheme: string): string {
    return `${scheme}:${pathToFileURL(this.root).href.slice('file:'.length)}`;
  }

  /** Filesystem path for a key */
  pathOf(key: Key): string {
    return path.join(this.root, ...key);
  }

  async read(key: Key): Promise<FileByteIterator> {
    requireEntryKey(key, 'read');
    const target = this.pathOf(key);

    try {
      await fs.access(target);
    } catch (err) {
      if (isNotFoundError(err) || isNotDirectoryError(err)) {
        throw new KeyNotFoundError(key);
      }
      throw err;
    }

    return new FileByteIterator(target, { chunkSize: this.chunkSize, key });
  }

  async write(key: Key, chunks: ByteChunks): Promise<void> {
    requireEntryKey(key, 'write');
    const target = this.pathOf(key);

    await this.ensureParent(key);

    try {
      if (this.atomic) {
        await writeStaged(target, chunks);
      } else {
        await writeInPlace(target, chunks);
      }
    } catch (err) {
      if (isDirectoryError(err)) {
        throw new PathConflictError(key, key);
      }
      throw err;
    }
  }

  async exists(key: Key): Promise<boolean> {
    validateKey(key);
    if (key.length === 0) return false;

    try {
      await fs.access(this.pathOf(key));
      return true;
    } catch (err) {
      if (isNotFoundError(err) || isNotDirectoryError(err)) {
        return false;
      }
      throw err;
    }
  }

  async list(key: Key): Promise<ReadonlySet<string>> {
    validateKey(key);

    let names: string[];
    try {
      names = await fs.readdir(this.pathOf(key));
    } catch (err) {
      if (isNotDirectoryError(err)) {
        throw await this.notADirectory(key);
      }
      if (isNotFoundError(err)) {
        throw new KeyNotFoundError(key);
      }
      throw err;
    }

    return new Set(names.filter((name) => !isStagingName(name)));
  }

  /**
   * Create the directories above `key`.
   *
   * @throws {PathConflictError} If one of them is a plain file
   */
  private async ensureParent(key: Key): Promise<void> {
    if (key.length < 2) return;

    try {
      await fs.mkdir(this.pathOf(key.slice(0, -1)), { recursive: true });
    } catch (err) {
      if (isNotDirectoryError(err) || isExistsError(err)) {
        throw new PathConflictError(key, await this.firstFileAncestor(key));
      }
      throw err;
    }
  }

  /** The shortest proper prefix of `key` that is a plain file */
  private async firstFileAncestor(key: Key): Promise<Key> {
    for (let length = 1; length < key.length; length++) {
      const prefix = key.slice(0, length);
      try {
        const stat = await fs.stat(this.pathOf(prefix));
        if (!stat.isDirectory()) return prefix;
      } catch (err) {
        if (isNotFoundError(err)) break;
        throw err;
      }
    }
    return key.slice(0, -1);
  }

  /**
   * ENOTDIR from readdir means either the key itself is a file, or one of
   * its ancestors is (in which case nothing exists at the key).
   */
  private async notADirectory(key: Key): Promise<KeyNotFoundError> {
    try {
      const stat = await fs.stat(this.pathOf(key));
      return stat.isDirectory() ? new KeyNotFoundError(key) : new KeyNotADirectoryError(key);
    } catch (err) {
      if (isNotFoundError(err) || isNotDirectoryError(err)) {
        return new KeyNotFoundError(key);
      }
      throw err;
    }
  }
}
