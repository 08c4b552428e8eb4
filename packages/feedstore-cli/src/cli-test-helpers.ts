/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Test helpers for CLI command testing
 *
 * Provides utilities for:
 * - Creating temporary test directories
 * - Writing test input files
 * - Collecting stream output
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { PassThrough } from 'node:stream';

/**
 * Create a temporary directory for CLI testing
 */
export function createTestDir(): string {
  return mkdtempSync(join(tmpdir(), 'feedstore-cli-test-'));
}

/**
 * Remove a temporary test directory
 */
export function removeTestDir(testDir: string): void {
  rmSync(testDir, { recursive: true, force: true });
}

/**
 * Write a test file to the test directory
 */
export function writeTestFile(
  testDir: string,
  filename: string,
  content: string | Buffer
): string {
  const filePath = join(testDir, filename);
  writeFileSync(filePath, content);
  return filePath;
}

/**
 * A writable stream that keeps everything written to it
 */
export function collectingStream(): { stream: PassThrough; text: () => string } {
  const stream = new PassThrough();
  const chunks: Buffer[] = [];
  stream.on('data', (chunk: Buffer) => chunks.push(chunk));
  return { stream, text: () => Buffer.concat(chunks).toString('utf-8') };
}
