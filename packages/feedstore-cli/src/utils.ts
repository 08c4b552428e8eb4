/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * CLI utilities for repository resolution and error output
 */

import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import {
  InvalidOptionError,
  openRepository,
  parseKey,
  type FilesystemRepositoryOptions,
  type Key,
  type Repository,
} from '@feedstore/core';

/** Environment variable naming the default repository */
export const REPOSITORY_ENV = 'FEEDSTORE_REPOSITORY';

/** Options shared by every command */
export interface RepositoryCliOptions {
  repository?: string;
  atomic?: boolean;
  /** False when --no-create is given */
  create?: boolean;
  chunkSize?: string;
}

const URL_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Resolve the repository locator from the --repository argument.
 *
 * Falls back to $FEEDSTORE_REPOSITORY, then the current directory. Anything
 * that is not a URL is taken as a filesystem path.
 */
export function resolveRepositoryUrl(
  repoArg: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string {
  const locator = repoArg ?? env[REPOSITORY_ENV] ?? '.';
  if (URL_PATTERN.test(locator)) {
    return locator;
  }
  return pathToFileURL(resolve(locator)).href;
}

/** Parse the --chunk-size argument */
export function parseChunkSize(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value) || Number(value) === 0) {
    throw new InvalidOptionError('chunk-size', `expected a positive integer, got '${value}'`);
  }
  return Number(value);
}

/** Translate CLI options into repository options */
export function repositoryOptions(options: RepositoryCliOptions): FilesystemRepositoryOptions {
  return {
    atomic: options.atomic ?? false,
    createRoot: options.create ?? true,
    chunkSize: parseChunkSize(options.chunkSize),
  };
}

/** Open the repository the CLI options point at */
export function openCliRepository(options: RepositoryCliOptions): Promise<Repository> {
  return openRepository(resolveRepositoryUrl(options.repository), repositoryOptions(options));
}

/** Parse a key argument like `feeds/abc.xml` */
export function parseKeyArg(keyArg: string | undefined): Key {
  return parseKey(keyArg ?? '');
}

/**
 * Format error for CLI output.
 */
export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

/**
 * Exit with error message.
 */
export function exitError(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}
