/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { FilesystemRepository } from './FilesystemRepository.js';
import { UnimplementedRepository } from './repository.js';
import { RepositoryRegistry, createDefaultRegistry, openRepository } from './registry.js';
import { UnsupportedSchemeError } from './errors.js';
import { createTempDir, removeTempDir } from './test-helpers.js';

describe('registry', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(testDir);
  });

  it('opens file urls as filesystem repositories', async () => {
    const repo = await openRepository(`file://${testDir}`);
    assert.ok(repo instanceof FilesystemRepository);
    assert.strictEqual(repo.root, testDir);
    assert.strictEqual(repo.toUrl('file'), `file://${testDir}`);
  });

  it('accepts the fs scheme and passes options through', async () => {
    const repo = await openRepository(`fs://${testDir}`, { atomic: true });
    assert.ok(repo instanceof FilesystemRepository);
    assert.strictEqual(repo.atomic, true);
  });

  it('rejects unregistered schemes', async () => {
    await assert.rejects(
      openRepository('unregistered-scheme://'),
      (err: unknown) =>
        err instanceof UnsupportedSchemeError && err.scheme === 'unregistered-scheme'
    );
  });

  it('lists the built-in schemes', () => {
    assert.deepStrictEqual(createDefaultRegistry().schemes(), ['file', 'fs']);
  });

  it('uses registered factories', async () => {
    const registry = new RepositoryRegistry();
    const stub = new UnimplementedRepository();
    const seen: string[] = [];
    registry.register('Stub', (url) => {
      seen.push(url.href);
      return stub;
    });

    assert.strictEqual(registry.has('stub'), true);
    assert.strictEqual(await registry.open('stub://feeds/a'), stub);
    assert.deepStrictEqual(seen, ['stub://feeds/a']);
    await assert.rejects(registry.open(`file://${testDir}`), UnsupportedSchemeError);
  });
});
