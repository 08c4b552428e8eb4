/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * feedstore ls command - List the children of a key
 *
 * Usage:
 *   feedstore ls
 *   feedstore ls feeds
 */

import { wrapError, type Key, type Repository } from '@feedstore/core';
import {
  exitError,
  formatError,
  openCliRepository,
  parseKeyArg,
  type RepositoryCliOptions,
} from '../utils.js';

/** Child names under `key`, sorted */
export async function listEntries(repo: Repository, key: Key): Promise<string[]> {
  return Array.from(await repo.list(key)).sort();
}

export async function lsCommand(
  keyArg: string | undefined,
  options: RepositoryCliOptions
): Promise<void> {
  try {
    const repo = await openCliRepository(options);
    for (const name of await listEntries(repo, parseKeyArg(keyArg))) {
      console.log(name);
    }
  } catch (err) {
    exitError(formatError(wrapError(err, 'Failed to list entries')));
  }
}
