/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * feedstore cat command - Write an entry's content to stdout
 *
 * Usage:
 *   feedstore cat feeds/abc.xml
 *   feedstore cat feeds/abc.xml -r file:///srv/feeds
 */

import { once } from 'node:events';
import { wrapError, type Key, type Repository } from '@feedstore/core';
import {
  exitError,
  formatError,
  openCliRepository,
  parseKeyArg,
  type RepositoryCliOptions,
} from '../utils.js';

/**
 * Stream the entry at `key` into `out`, honouring backpressure.
 *
 * @returns Number of bytes written
 */
export async function catEntry(
  repo: Repository,
  key: Key,
  out: NodeJS.WritableStream
): Promise<number> {
  let bytes = 0;
  for await (const chunk of await repo.read(key)) {
    bytes += chunk.length;
    if (!out.write(chunk)) {
      await once(out, 'drain');
    }
  }
  return bytes;
}

export async function catCommand(keyArg: string, options: RepositoryCliOptions): Promise<void> {
  try {
    const repo = await openCliRepository(options);
    await catEntry(repo, parseKeyArg(keyArg), process.stdout);
  } catch (err) {
    exitError(formatError(wrapError(err, 'Failed to read entry')));
  }
}
