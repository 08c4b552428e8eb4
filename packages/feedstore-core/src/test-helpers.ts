/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Test helpers for feedstore core
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { readAll, type ByteChunks } from './bytes.js';

/**
 * Creates a temporary directory for testing
 * @returns Path to temporary directory
 */
export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'feedstore-test-'));
}

/**
 * Removes a temporary directory and all its contents
 * @param dir Path to directory to remove
 */
export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Encode strings as UTF-8 chunks */
export function chunks(...parts: string[]): Uint8Array[] {
  return parts.map((part) => Buffer.from(part));
}

/** Read a whole chunk sequence as a UTF-8 string */
export async function readText(source: ByteChunks | Promise<ByteChunks>): Promise<string> {
  return Buffer.from(await readAll(await source)).toString('utf-8');
}
