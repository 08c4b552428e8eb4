/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * feedstore core - key-addressed repositories for feed documents
 *
 * Callers program against the Repository interface; FilesystemRepository
 * stores entries as files, and BufferedRepository adds a write-behind buffer
 * in front of any repository.
 */

// Keys
export {
  validateKey,
  requireEntryKey,
  keyId,
  parseKey,
  formatKey,
  type Key,
} from './key.js';

// Byte sequences
export { readAll, singleChunk, type ByteChunks } from './bytes.js';

// Contract
export { UnimplementedRepository, type Repository } from './repository.js';

// Filesystem backend
export {
  FilesystemRepository,
  type FilesystemRepositoryOptions,
} from './FilesystemRepository.js';
export {
  FileByteIterator,
  DEFAULT_CHUNK_SIZE,
  checkChunkSize,
  type FileByteIteratorOptions,
} from './FileByteIterator.js';
export { writeInPlace, writeStaged, stagingPath, isStagingName } from './staging.js';

// Write buffer
export { BufferedRepository } from './BufferedRepository.js';
export { AsyncMutex } from './AsyncMutex.js';

// URL resolution
export {
  RepositoryRegistry,
  createDefaultRegistry,
  defaultRegistry,
  openRepository,
  type RepositoryFactory,
} from './registry.js';

// Errors
export {
  FeedstoreError,
  InvalidKeyTypeError,
  RepositoryKeyError,
  EmptyKeyError,
  KeyNotFoundError,
  KeyNotADirectoryError,
  PathConflictError,
  RootNotFoundError,
  NotADirectoryError,
  NotImplementedError,
  UnsupportedSchemeError,
  InvalidOptionError,
  FlushError,
  type FlushFailure,
  isNotFoundError,
  isNotDirectoryError,
  isDirectoryError,
  isExistsError,
  wrapError,
} from './errors.js';
