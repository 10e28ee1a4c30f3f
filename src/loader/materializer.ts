/**
 * Layer materializer
 *
 * Writes the layers of a compose project artifact to a directory:
 * - compose YAML layers go to compose.yaml, as a multi-document stream, or
 *   to their own file when annotated as "extends"
 * - env file layers go to the file named by their annotation
 * - everything else is skipped
 *
 * Layers are processed strictly in manifest order. The first failure aborts;
 * the caller owns cleanup of the directory.
 */

import { join } from "path";
import type { FileSystem, Logger, WritableFile } from "#/core";
import { resolveWithin } from "#/core";
import { COMPOSE_FILE_NAME } from "#/constants";
import { MaterializationError, OciLoaderError } from "#/errors";
import { COMPOSE_ANNOTATIONS, COMPOSE_MEDIA_TYPES } from "#/oci";
import type { OciDescriptor, OciManifest } from "#/oci";
import { formatReference, withDigest, type Reference } from "#/reference";
import type { Resolver } from "#/registry";
import { validateComposeManifest } from "./validator";

// Separates documents when several compose files share compose.yaml
export const YAML_DOCUMENT_SEPARATOR = "\n---\n";

export type LayerKind = "compose-file" | "env-file" | "empty-config" | "unknown";

export interface MaterializeContext {
  fs: FileSystem;
  resolver: Resolver;
  logger: Logger;
  signal?: AbortSignal;
}

export function classifyLayer(mediaType: string): LayerKind {
  switch (mediaType) {
    case COMPOSE_MEDIA_TYPES.file:
      return "compose-file";
    case COMPOSE_MEDIA_TYPES.envFile:
      return "env-file";
    case COMPOSE_MEDIA_TYPES.emptyConfig:
      return "empty-config";
    default:
      return "unknown";
  }
}

/**
 * Materialize a compose project artifact into `local`.
 *
 * @param ctx - Filesystem, resolver and logger to use
 * @param local - Target directory (created with owner-only permissions)
 * @param manifest - Decoded artifact manifest
 * @param ref - Reference the manifest was fetched by
 */
export async function pullComposeFiles(
  ctx: MaterializeContext,
  local: string,
  manifest: OciManifest,
  ref: Reference
): Promise<void> {
  const { fs, resolver, logger, signal } = ctx;
  validateComposeManifest(manifest, formatReference(ref));

  fileOp(`creating ${local}`, () => fs.mkdir(local, { recursive: true, mode: 0o700 }));
  const composeFile = fileOp(`creating ${COMPOSE_FILE_NAME}`, () =>
    fs.createFile(join(local, COMPOSE_FILE_NAME))
  );

  try {
    for (const [i, layer] of manifest.layers.entries()) {
      signal?.throwIfAborted();

      const digested = formatReference(withDigest(ref, layer.digest));
      const { content } = await resolver.get(digested, { signal });

      const kind = classifyLayer(layer.mediaType);
      switch (kind) {
        case "compose-file":
          if (hasAnnotation(layer, COMPOSE_ANNOTATIONS.extends)) {
            writeExtendsFile(fs, layer, local, content);
          } else {
            writeComposeFile(layer, i, composeFile, content);
          }
          break;
        case "env-file":
          writeEnvFile(fs, layer, local, content);
          break;
        case "empty-config":
          break;
        case "unknown":
          logger.debug("skipping layer with unsupported media type", {
            digest: layer.digest,
            mediaType: layer.mediaType,
          });
          break;
        default: {
          const unreachable: never = kind;
          throw new Error(`unhandled layer kind: ${String(unreachable)}`);
        }
      }

      logger.debug("materialized layer", { index: i, digest: layer.digest, kind });
    }
  } finally {
    closeFile(composeFile, logger);
  }
}

/**
 * Append a compose document to the shared compose.yaml.
 * Every document but the first one gets a separator when it is a named file.
 */
export function writeComposeFile(
  layer: OciDescriptor,
  index: number,
  target: WritableFile,
  content: Buffer
): void {
  fileOp(`writing ${target.path}`, () => {
    if (index > 0 && hasAnnotation(layer, COMPOSE_ANNOTATIONS.file)) {
      target.write(YAML_DOCUMENT_SEPARATOR);
    }
    target.write(content);
  });
}

/**
 * Write an included/extended compose file next to compose.yaml
 */
export function writeExtendsFile(
  fs: FileSystem,
  layer: OciDescriptor,
  local: string,
  content: Buffer
): void {
  const fileName = requireAnnotation(layer, COMPOSE_ANNOTATIONS.file);
  writeNewFile(fs, containedPath(local, fileName), content);
}

/**
 * Write an env file layer to the file named by its annotation
 */
export function writeEnvFile(
  fs: FileSystem,
  layer: OciDescriptor,
  local: string,
  content: Buffer
): void {
  const fileName = requireAnnotation(layer, COMPOSE_ANNOTATIONS.envFile);
  writeNewFile(fs, containedPath(local, fileName), content);
}

function writeNewFile(fs: FileSystem, path: string, content: Buffer): void {
  const file = fileOp(`creating ${path}`, () => fs.createFile(path));
  try {
    fileOp(`writing ${path}`, () => file.write(content));
  } finally {
    fileOp(`closing ${path}`, () => file.close());
  }
}

function hasAnnotation(layer: OciDescriptor, key: string): boolean {
  return layer.annotations !== undefined && Object.prototype.hasOwnProperty.call(layer.annotations, key);
}

function requireAnnotation(layer: OciDescriptor, key: string): string {
  const value = layer.annotations?.[key];
  if (value === undefined) {
    throw new MaterializationError(`missing annotation ${key} in layer "${layer.digest}"`);
  }
  return value;
}

function containedPath(local: string, fileName: string): string {
  const result = resolveWithin(local, fileName);
  if (!result.safe) {
    throw new MaterializationError(`refusing to write outside ${local}: ${result.violation}`);
  }
  return result.path;
}

/**
 * Run a filesystem operation, reporting failures as MaterializationError
 */
function fileOp<T>(description: string, op: () => T): T {
  try {
    return op();
  } catch (err) {
    if (err instanceof OciLoaderError) {
      throw err;
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new MaterializationError(`${description}: ${message}`, { cause: err });
  }
}

function closeFile(file: WritableFile, logger: Logger): void {
  try {
    file.close();
  } catch (err) {
    logger.warn("failed to close file", {
      path: file.path,
      error: err instanceof Error ? err.message : String(err),
    });
  }
}
