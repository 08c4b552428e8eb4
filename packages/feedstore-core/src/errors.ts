/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Domain error types for feedstore.
 *
 * All feedstore errors extend FeedstoreError, allowing callers to catch all
 * domain errors with `if (err instanceof FeedstoreError)` or specific errors
 * with their class.
 */

import type { Key } from './key.js';

// =============================================================================
// Base Error
// =============================================================================

/** Base class for all feedstore errors */
export class FeedstoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

function describeKey(key: Key): string {
  return key.length === 0 ? '(root)' : `'${key.join('/')}'`;
}

// =============================================================================
// Key Errors
// =============================================================================

/**
 * The key argument is not an ordered sequence of strings.
 *
 * Raised before any I/O. An unordered collection such as a `Set` is rejected
 * even when its members are strings.
 */
export class InvalidKeyTypeError extends FeedstoreError {
  constructor(public readonly received: string) {
    super(`Key must be an array of strings, got ${received}`);
  }
}

/** Base class for failures tied to a specific key */
export class RepositoryKeyError extends FeedstoreError {
  constructor(
    public readonly key: Key,
    message: string
  ) {
    super(message);
  }
}

export class EmptyKeyError extends RepositoryKeyError {
  constructor(public readonly operation: string) {
    super([], `Cannot ${operation} an empty key`);
  }
}

export class KeyNotFoundError extends RepositoryKeyError {
  constructor(key: Key, message?: string) {
    super(key, message ?? `Key ${describeKey(key)} not found`);
  }
}

/**
 * The key addresses a plain entry where a directory-like node was expected.
 *
 * Extends KeyNotFoundError: there is no directory at that key.
 */
export class KeyNotADirectoryError extends KeyNotFoundError {
  constructor(key: Key) {
    super(key, `Key ${describeKey(key)} is not a directory`);
  }
}

/**
 * Writing through a key prefix that already holds a plain entry, or onto a
 * key that is a directory.
 */
export class PathConflictError extends RepositoryKeyError {
  constructor(
    key: Key,
    public readonly conflict: Key
  ) {
    super(
      key,
      `Cannot write ${describeKey(key)}: ${describeKey(conflict)} conflicts with an existing entry`
    );
  }
}

// =============================================================================
// Repository Errors
// =============================================================================

export class RootNotFoundError extends FeedstoreError {
  constructor(public readonly path: string) {
    super(`Repository root '${path}' does not exist`);
  }
}

export class NotADirectoryError extends FeedstoreError {
  constructor(public readonly path: string) {
    super(`Repository root '${path}' is not a directory`);
  }
}

/** A contract method was invoked on a backend that does not provide it */
export class NotImplementedError extends FeedstoreError {
  constructor(public readonly operation: string) {
    super(`Repository operation '${operation}' is not implemented`);
  }
}

export class UnsupportedSchemeError extends FeedstoreError {
  constructor(public readonly scheme: string) {
    super(`No repository registered for URL scheme '${scheme}'`);
  }
}

/** A buffered entry that flush() could not write through */
export interface FlushFailure {
  key: Key;
  error: unknown;
}

/**
 * Some buffered entries could not be written through. The failed entries
 * stay buffered; every other entry was written.
 */
export class FlushError extends FeedstoreError {
  constructor(
    public readonly written: number,
    public readonly failures: readonly FlushFailure[]
  ) {
    const noun = failures.length === 1 ? 'entry' : 'entries';
    super(
      `Failed to flush ${failures.length} buffered ${noun}: ${failures
        .map((failure) => describeKey(failure.key))
        .join(', ')}`
    );
  }
}

export class InvalidOptionError extends FeedstoreError {
  constructor(
    public readonly option: string,
    public readonly reason: string
  ) {
    super(`Invalid option '${option}': ${reason}`);
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

function errnoCode(err: unknown): string | undefined {
  return err instanceof Error ? (err as NodeJS.ErrnoException).code : undefined;
}

/** Check if error is ENOENT (file not found) */
export function isNotFoundError(err: unknown): boolean {
  return errnoCode(err) === 'ENOENT';
}

/** Check if error is ENOTDIR (a path component is a plain file) */
export function isNotDirectoryError(err: unknown): boolean {
  return errnoCode(err) === 'ENOTDIR';
}

/** Check if error is EISDIR (a file operation hit a directory) */
export function isDirectoryError(err: unknown): boolean {
  return errnoCode(err) === 'EISDIR';
}

/** Check if error is EEXIST (already exists) */
export function isExistsError(err: unknown): boolean {
  return errnoCode(err) === 'EEXIST';
}

/** Wrap unknown errors with context */
export function wrapError(err: unknown, message: string): FeedstoreError {
  if (err instanceof FeedstoreError) return err;
  const cause = err instanceof Error ? err.message : String(err);
  return new FeedstoreError(`${message}: ${cause}`);
}
