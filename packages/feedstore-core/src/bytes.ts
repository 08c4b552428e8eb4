/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Byte chunk sequences.
 */

/** A sequence of byte chunks, produced eagerly or lazily */
export type ByteChunks = Iterable<Uint8Array> | AsyncIterable<Uint8Array>;

/**
 * Concatenate a chunk sequence into a single buffer.
 *
 * Consumes the sequence to the end.
 */
export async function readAll(chunks: ByteChunks): Promise<Uint8Array> {
  const parts: Uint8Array[] = [];
  let length = 0;

  for await (const chunk of chunks) {
    parts.push(chunk);
    length += chunk.length;
  }

  const result = new Uint8Array(length);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}

/** A lazy sequence yielding `data` as its only chunk */
export async function* singleChunk(data: Uint8Array): AsyncGenerator<Uint8Array> {
  yield data;
}
