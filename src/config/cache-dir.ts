/**
 * Location of the on-disk artifact cache
 *
 * $XDG_CACHE_HOME/compose when set, otherwise the platform's user cache
 * directory:
 * - macOS: ~/Library/Caches/compose
 * - Windows: %LOCALAPPDATA%\compose
 * - others: ~/.cache/compose
 */

import { posix, win32 } from "path";
import type { EnvSource, FileSystem } from "#/core";
import { CACHE_DIR_NAME } from "#/constants";
import { CacheInitError } from "#/errors";

export interface CacheDirContext {
  env: EnvSource;
  platform: NodeJS.Platform;
  homeDir: string;
}

export function resolveCacheDir({ env, platform, homeDir }: CacheDirContext): string {
  const xdg = env["XDG_CACHE_HOME"];
  if (xdg) {
    return pathFor(platform).join(xdg, CACHE_DIR_NAME);
  }

  switch (platform) {
    case "darwin":
      return requireHome(homeDir, posix.join(homeDir, "Library", "Caches", CACHE_DIR_NAME));
    case "win32": {
      const localAppData = env["LOCALAPPDATA"];
      if (!localAppData) {
        throw new CacheInitError("initializing remote resource cache: %LOCALAPPDATA% is not defined");
      }
      return win32.join(localAppData, CACHE_DIR_NAME);
    }
    default:
      return requireHome(homeDir, posix.join(homeDir, ".cache", CACHE_DIR_NAME));
  }
}

/**
 * Resolve the cache root and make sure it exists (owner-only permissions)
 */
export function ensureCacheDir(fs: FileSystem, context: CacheDirContext): string {
  const dir = resolveCacheDir(context);
  try {
    fs.mkdir(dir, { recursive: true, mode: 0o700 });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new CacheInitError(`initializing remote resource cache: ${message}`, { cause: err });
  }
  return dir;
}

function pathFor(platform: NodeJS.Platform): typeof posix {
  return platform === "win32" ? win32 : posix;
}

function requireHome(homeDir: string, path: string): string {
  if (!homeDir) {
    throw new CacheInitError("initializing remote resource cache: home directory is not defined");
  }
  return path;
}
