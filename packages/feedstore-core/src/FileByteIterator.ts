/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { open, type FileHandle } from 'node:fs/promises';
import {
  InvalidOptionError,
  KeyNotFoundError,
  isDirectoryError,
  isNotFoundError,
} from './errors.js';
import type { Key } from './key.js';

/** Default number of bytes per chunk when reading entries */
export const DEFAULT_CHUNK_SIZE = 4096;

export interface FileByteIteratorOptions {
  /** Bytes per chunk (default: {@link DEFAULT_CHUNK_SIZE}) */
  chunkSize?: number;
  /** Key reported by KeyNotFoundError (default: the file path as one segment) */
  key?: Key;
}

/** Check that a chunk size is a positive integer */
export function checkChunkSize(chunkSize: number): number {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidOptionError('chunkSize', `expected a positive integer, got ${chunkSize}`);
  }
  return chunkSize;
}

/**
 * Reads a file as a lazy sequence of fixed-size chunks.
 *
 * The file is opened on the first advance, every chunk but the last is
 * exactly `chunkSize` bytes, and the handle is closed when the file is
 * exhausted, when a read fails, or when the consumer stops early (`return()`,
 * as issued by `break` inside `for await`). Instances are single-use: create
 * a new one to read the file again.
 *
 * Advance one chunk at a time; concurrent `next()` calls are not supported.
 *
 * @example
 * ```typescript
 * for await (const chunk of new FileByteIterator('/data/feed.xml')) {
 *   process(chunk);
 * }
 * ```
 */
export class FileByteIterator implements AsyncIterableIterator<Uint8Array> {
  readonly chunkSize: number;
  readonly key: Key;

  private handle: FileHandle | undefined;
  private state: 'pending' | 'open' | 'closed' = 'pending';

  constructor(
    public readonly path: string,
    options: FileByteIteratorOptions = {}
  ) {
    this.chunkSize = checkChunkSize(options.chunkSize ?? DEFAULT_CHUNK_SIZE);
    this.key = options.key ?? [path];
  }

  /** True once the underlying handle has been released */
  get closed(): boolean {
    return this.state === 'closed';
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<Uint8Array> {
    return this;
  }

  async next(): Promise<IteratorResult<Uint8Array, undefined>> {
    if (this.state === 'closed') {
      return { done: true, value: undefined };
    }

    let chunk: Uint8Array;
    try {
      chunk = await this.readChunk(await this.acquire());
    } catch (err) {
      try {
        await this.release();
      } catch {
        // the read error is the one to report
      }
      if (isDirectoryError(err) || isNotFoundError(err)) {
        throw new KeyNotFoundError(this.key);
      }
      throw err;
    }

    // A short read on a regular file means end of file
    if (chunk.length < this.chunkSize) {
      await this.release();
    }
    if (chunk.length === 0) {
      return { done: true, value: undefined };
    }
    return { done: false, value: chunk };
  }

  async return(): Promise<IteratorResult<Uint8Array, undefined>> {
    await this.release();
    return { done: true, value: undefined };
  }

  private async acquire(): Promise<FileHandle> {
    if (this.handle === undefined) {
      this.handle = await this.openFile();
      this.state = 'open';
    }
    return this.handle;
  }

  protected openFile(): Promise<FileHandle> {
    return open(this.path, 'r');
  }

  private async readChunk(handle: FileHandle): Promise<Uint8Array> {
    const buffer = Buffer.alloc(this.chunkSize);
    let filled = 0;

    while (filled < this.chunkSize) {
      const { bytesRead } = await handle.read(buffer, filled, this.chunkSize - filled, null);
      if (bytesRead === 0) break;
      filled += bytesRead;
    }

    return buffer.subarray(0, filled);
  }

  private async release(): Promise<void> {
    if (this.state === 'closed') return;
    this.state = 'closed';

    const handle = this.handle;
    this.handle = undefined;
    if (handle !== undefined) {
      await handle.close();
    }
  }
}
