/**
 * Loader types
 */

import type { EnvSource, FileSystem, Logger } from "#/core";
import type { Resolver } from "#/registry";

/**
 * Contract shared by every remote resource loader plugin of the
 * configuration loading pipeline (local paths, git, HTTP, OCI).
 */
export interface ResourceLoader {
  /** Whether this loader handles `path` */
  accept(path: string): boolean;
  /**
   * Resolve `path` to a local file.
   * An empty string means "resource unavailable" (e.g., offline), not an error.
   */
  load(path: string, options?: LoadOptions): Promise<string>;
  /** Local directory previously resolved for `path`, or "" */
  dir(path: string): string;
}

export interface LoadOptions {
  /** Cancels registry requests and stops between layers */
  signal?: AbortSignal;
}

export interface OciRemoteLoaderOptions {
  fs: FileSystem;
  /** Registry configuration is resolved per artifact; the provider may throw ConfigError */
  getResolver: () => Resolver;
  /** Cache root; created on demand, may throw CacheInitError */
  getCacheDir: () => string;
  env: EnvSource;
  /** Never contact registries; load() returns "" */
  offline?: boolean;
  logger?: Logger;
}
