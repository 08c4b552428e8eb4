/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * feedstore put command - Store a file (or stdin) under a key
 *
 * Usage:
 *   feedstore put feeds/abc.xml ./abc.xml
 *   curl -s https://example.com/feed.xml | feedstore put feeds/abc.xml --atomic
 */

import { createReadStream } from 'node:fs';
import { wrapError, type ByteChunks, type Key, type Repository } from '@feedstore/core';
import {
  exitError,
  formatError,
  openCliRepository,
  parseKeyArg,
  type RepositoryCliOptions,
} from '../utils.js';

/**
 * Write `source` to the entry at `key`, counting the bytes on the way.
 *
 * @returns Number of bytes written
 */
export async function putEntry(repo: Repository, key: Key, source: ByteChunks): Promise<number> {
  let bytes = 0;
  async function* counted(): AsyncGenerator<Uint8Array> {
    for await (const chunk of source) {
      bytes += chunk.length;
      yield chunk;
    }
  }
  await repo.write(key, counted());
  return bytes;
}

/** Chunks of a file, or of stdin when no file is given */
export function inputChunks(filePath: string | undefined): AsyncIterable<Uint8Array> {
  return filePath === undefined ? process.stdin : createReadStream(filePath);
}

export async function putCommand(
  keyArg: string,
  filePath: string | undefined,
  options: RepositoryCliOptions
): Promise<void> {
  try {
    const repo = await openCliRepository(options);
    const key = parseKeyArg(keyArg);
    const bytes = await putEntry(repo, key, inputChunks(filePath));
    console.log(`Wrote ${bytes} bytes to ${key.join('/')}`);
  } catch (err) {
    exitError(formatError(wrapError(err, 'Failed to write entry')));
  }
}
