/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { InvalidOptionError } from '@feedstore/core';
import {
  formatError,
  parseChunkSize,
  parseKeyArg,
  repositoryOptions,
  resolveRepositoryUrl,
} from './utils.js';

describe('cli utils', () => {
  describe('resolveRepositoryUrl', () => {
    it('passes URLs through', () => {
      assert.equal(resolveRepositoryUrl('fs:///srv/feeds', {}), 'fs:///srv/feeds');
      assert.equal(resolveRepositoryUrl('file:///srv/feeds', {}), 'file:///srv/feeds');
    });

    it('turns paths into absolute file URLs', () => {
      assert.equal(resolveRepositoryUrl('/srv/feeds', {}), 'file:///srv/feeds');
      assert.equal(resolveRepositoryUrl('data', {}), pathToFileURL(resolve('data')).href);
    });

    it('escapes url delimiters in paths', () => {
      assert.equal(resolveRepositoryUrl('/srv/a#b', {}), 'file:///srv/a%23b');
    });

    it('falls back to the environment, then the current directory', () => {
      assert.equal(
        resolveRepositoryUrl(undefined, { FEEDSTORE_REPOSITORY: '/srv/env-feeds' }),
        'file:///srv/env-feeds'
      );
      assert.equal(resolveRepositoryUrl(undefined, {}), pathToFileURL(resolve('.')).href);
    });
  });

  describe('parseChunkSize', () => {
    it('parses positive integers', () => {
      assert.equal(parseChunkSize('512'), 512);
      assert.equal(parseChunkSize(undefined), undefined);
    });

    it('rejects anything else', () => {
      assert.throws(() => parseChunkSize('0'), InvalidOptionError);
      assert.throws(() => parseChunkSize('-4'), InvalidOptionError);
      assert.throws(() => parseChunkSize('1k'), InvalidOptionError);
    });
  });

  it('repositoryOptions maps CLI flags', () => {
    assert.deepEqual(repositoryOptions({}), {
      atomic: false,
      createRoot: true,
      chunkSize: undefined,
    });
    assert.deepEqual(repositoryOptions({ atomic: true, create: false, chunkSize: '16' }), {
      atomic: true,
      createRoot: false,
      chunkSize: 16,
    });
  });

  it('parseKeyArg treats a missing argument as the empty key', () => {
    assert.deepEqual(parseKeyArg(undefined), []);
    assert.deepEqual(parseKeyArg('feeds/abc.xml'), ['feeds', 'abc.xml']);
  });

  it('formatError uses the message of errors', () => {
    assert.equal(formatError(new Error('disk full')), 'disk full');
    assert.equal(formatError(42), '42');
  });
});
