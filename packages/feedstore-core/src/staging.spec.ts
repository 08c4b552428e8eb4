/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Tests for staging.ts - in-place and stage-and-rename writes
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { readdirSync, readFileSync, writeFileSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import { isStagingName, stagingPath, writeInPlace, writeStaged } from './staging.js';
import { chunks, createTempDir, removeTempDir } from './test-helpers.js';

describe('staging', () => {
  let testDir: string;
  let target: string;

  beforeEach(() => {
    testDir = createTempDir();
    target = join(testDir, 'feed.xml');
  });

  afterEach(() => {
    removeTempDir(testDir);
  });

  describe('stagingPath', () => {
    it('stays in the target directory and is recognisable', () => {
      const staging = stagingPath(target);
      assert.strictEqual(dirname(staging), testDir);
      assert.ok(basename(staging).startsWith('.feed.xml.'));
      assert.ok(isStagingName(basename(staging)));
    });

    it('differs between calls', () => {
      assert.notStrictEqual(stagingPath(target), stagingPath(target));
    });
  });

  describe('isStagingName', () => {
    it('does not match ordinary names', () => {
      assert.strictEqual(isStagingName('feed.xml'), false);
      assert.strictEqual(isStagingName('notes.partial'), false);
      assert.strictEqual(isStagingName('.hidden'), false);
    });
  });

  describe('writeInPlace', () => {
    it('writes chunks in order, replacing existing content', async () => {
      writeFileSync(target, 'a much longer previous revision');
      await writeInPlace(target, chunks('new ', 'content'));
      assert.strictEqual(readFileSync(target, 'utf-8'), 'new content');
    });
  });

  describe('writeStaged', () => {
    it('publishes the complete content', async () => {
      await writeStaged(target, chunks('deep ', 'file ', 'content'));
      assert.strictEqual(readFileSync(target, 'utf-8'), 'deep file content');
      assert.deepStrictEqual(readdirSync(testDir), ['feed.xml']);
    });

    it('leaves the target untouched when the source fails', async () => {
      writeFileSync(target, 'first revision');
      async function* failing() {
        yield Buffer.from('second ');
        throw new Error('source failed');
      }

      await assert.rejects(writeStaged(target, failing()), { message: 'source failed' });
      assert.strictEqual(readFileSync(target, 'utf-8'), 'first revision');
      assert.deepStrictEqual(readdirSync(testDir), ['feed.xml']);
    });

    it('does not create the target when the source fails', async () => {
      async function* failing(): AsyncGenerator<Uint8Array> {
        throw new Error('nothing to write');
      }

      await assert.rejects(writeStaged(target, failing()), { message: 'nothing to write' });
      assert.deepStrictEqual(readdirSync(testDir), []);
    });
  });
});
