/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Resolve repository URLs to repositories by scheme.
 *
 * The default registry maps `file:` and `fs:` to FilesystemRepository.
 * Applications with other backends register their own factories:
 *
 * @example
 * ```typescript
 * const registry = new RepositoryRegistry();
 * registry.register('mem', () => new MyMemoryRepository());
 * const repo = await registry.open('mem://');
 * ```
 */

import { UnsupportedSchemeError } from './errors.js';
import { FilesystemRepository, type FilesystemRepositoryOptions } from './FilesystemRepository.js';
import type { Repository } from './repository.js';

export type RepositoryFactory = (
  url: URL,
  options: FilesystemRepositoryOptions
) => Repository | Promise<Repository>;

export class RepositoryRegistry {
  private readonly factories = new Map<string, RepositoryFactory>();

  /** Register (or replace) the factory for a scheme, given without the colon */
  register(scheme: string, factory: RepositoryFactory): this {
    this.factories.set(scheme.toLowerCase(), factory);
    return this;
  }

  has(scheme: string): boolean {
    return this.factories.has(scheme.toLowerCase());
  }

  /** Registered schemes, sorted */
  schemes(): string[] {
    return Array.from(this.factories.keys()).sort();
  }

  /**
   * Construct the repository a URL refers to.
   *
   * @throws {UnsupportedSchemeError} If no factory handles the URL's scheme
   */
  async open(url: string | URL, options: FilesystemRepositoryOptions = {}): Promise<Repository> {
    const parsed = typeof url === 'string' ? new URL(url) : url;
    const scheme = parsed.protocol.slice(0, -1);
    const factory = this.factories.get(scheme);
    if (factory === undefined) {
      throw new UnsupportedSchemeError(scheme);
    }
    return factory(parsed, options);
  }
}

function openFilesystem(url: URL, options: FilesystemRepositoryOptions): Promise<FilesystemRepository> {
  return FilesystemRepository.fromUrl(url, options);
}

/** Registry with the built-in `file` and `fs` schemes */
export function createDefaultRegistry(): RepositoryRegistry {
  return new RepositoryRegistry()
    .register('file', openFilesystem)
    .register('fs', openFilesystem);
}

export const defaultRegistry = createDefaultRegistry();

/** Open a repository URL through the default registry */
export function openRepository(
  url: string | URL,
  options: FilesystemRepositoryOptions = {}
): Promise<Repository> {
  return defaultRegistry.open(url, options);
}
