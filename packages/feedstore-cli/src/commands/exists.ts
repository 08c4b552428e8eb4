/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * feedstore exists command - Check for an entry
 *
 * Prints `true` or `false`; the exit status is 1 when the key is absent, so
 * the command can be used in shell conditions.
 */

import { wrapError } from '@feedstore/core';
import {
  exitError,
  formatError,
  openCliRepository,
  parseKeyArg,
  type RepositoryCliOptions,
} from '../utils.js';

export async function existsCommand(keyArg: string, options: RepositoryCliOptions): Promise<void> {
  try {
    const repo = await openCliRepository(options);
    const exists = await repo.exists(parseKeyArg(keyArg));
    console.log(String(exists));
    if (!exists) {
      process.exitCode = 1;
    }
  } catch (err) {
    exitError(formatError(wrapError(err, 'Failed to check entry')));
  }
}
