/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Writing chunk sequences to files.
 *
 * Staged writes are atomic using the stage-and-rename pattern:
 * 1. Write to a temporary .partial file in the target's directory
 * 2. Rename to the final destination (atomic on POSIX filesystems)
 *
 * A reader opening the target at any point sees either the previous file or
 * the complete new one.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { ByteChunks } from './bytes.js';

const STAGING_PATTERN = /^\..+\.\d+\.[a-z0-9]+\.partial$/;

/**
 * Temporary path next to `target`, e.g. `dir/.feed.xml.1735689600000.k3j9x2ab.partial`.
 *
 * The random suffix keeps concurrent writers of the same target apart.
 */
export function stagingPath(target: string): string {
  const randomSuffix = Math.random().toString(36).slice(2, 10) || '0';
  const name = `.${path.basename(target)}.${Date.now()}.${randomSuffix}.partial`;
  return path.join(path.dirname(target), name);
}

/** Whether a directory entry name is a staging file of an in-flight write */
export function isStagingName(name: string): boolean {
  return STAGING_PATTERN.test(name);
}

/**
 * Truncate `target` and stream the chunks into it.
 *
 * Readers of `target` may observe a partially written file.
 */
export async function writeInPlace(target: string, chunks: ByteChunks): Promise<void> {
  await fs.writeFile(target, chunks);
}

/**
 * Stream the chunks into a staging file, then publish it over `target`.
 *
 * Nothing is published unless the whole sequence was written. If the
 * sequence or the write fails, the staging file is removed and `target`
 * keeps its previous content.
 */
export async function writeStaged(target: string, chunks: ByteChunks): Promise<void> {
  const staging = stagingPath(target);

  try {
    await fs.writeFile(staging, chunks, { flag: 'wx' });
    await fs.rename(staging, target);
  } catch (err) {
    await fs.rm(staging, { force: true });
    throw err;
  }
}
