/**
 * Path safety for file names taken from registry metadata.
 *
 * Layer annotations name the files we create inside an artifact directory.
 * They come from whoever pushed the artifact, so they are checked before
 * anything is written: absolute paths and names escaping the directory are
 * rejected.
 */

import { isAbsolute, normalize, relative, resolve, sep } from "path";

export type ContainedPathResult =
  | { safe: true; path: string }
  | { safe: false; violation: string };

/**
 * Resolve `name` inside `baseDir`.
 *
 * @example
 * resolveWithin("/cache/abc", "override.yaml") → { safe: true, path: "/cache/abc/override.yaml" }
 * resolveWithin("/cache/abc", "../x.env") → { safe: false, violation: "Path traversal: ../x.env" }
 */
export function resolveWithin(baseDir: string, name: string): ContainedPathResult {
  if (!name || name.includes("\0")) {
    return { safe: false, violation: `Invalid file name: ${JSON.stringify(name)}` };
  }

  if (isAbsolute(name)) {
    return { safe: false, violation: `Absolute path: ${name}` };
  }

  const normalized = normalize(name);
  if (normalized === ".." || normalized.startsWith(`..${sep}`)) {
    return { safe: false, violation: `Path traversal: ${name}` };
  }

  const resolvedBase = resolve(baseDir);
  const resolvedPath = resolve(resolvedBase, normalized);
  if (!isWithinTarget(resolvedBase, resolvedPath) || resolvedPath === resolvedBase) {
    return { safe: false, violation: `Entry escapes target directory: ${name}` };
  }

  return { safe: true, path: resolvedPath };
}

function isWithinTarget(targetDir: string, candidate: string): boolean {
  const rel = relative(targetDir, candidate);
  return !rel.startsWith("..") && !isAbsolute(rel);
}
