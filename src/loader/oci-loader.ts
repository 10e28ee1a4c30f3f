/**
 * OCI remote resource loader
 *
 * Resolves oci://<reference> to compose.yaml inside a directory named after
 * the artifact's manifest digest. Directories are written once and reused
 * across runs; within a run, resolved paths are memoized per input string.
 */

import { join } from "path";
import type { EnvSource, FileSystem, Logger } from "#/core";
import { silentLogger } from "#/core";
import { COMPOSE_FILE_NAME, OCI_PREFIX, OCI_REMOTE_ENABLED } from "#/constants";
import { ociRemoteLoaderEnabled } from "#/config";
import { LoaderDisabledError, ResolutionError } from "#/errors";
import { safeParseJson } from "#/friendly-errors";
import { digestHex } from "#/oci";
import type { OciManifest } from "#/oci";
import { formatReference, parseDockerRef } from "#/reference";
import type { Resolver } from "#/registry";
import { OciManifestSchema } from "#/schemas";
import { pullComposeFiles } from "./materializer";
import type { LoadOptions, OciRemoteLoaderOptions, ResourceLoader } from "./loader.types";

export class OciRemoteLoader implements ResourceLoader {
  private fs: FileSystem;
  private getResolver: () => Resolver;
  private getCacheDir: () => string;
  private env: EnvSource;
  private offline: boolean;
  private logger: Logger;
  // Input path → materialized directory. Not synchronized: concurrent load()
  // calls for the same path may both materialize it.
  private known: Map<string, string> = new Map();

  constructor(options: OciRemoteLoaderOptions) {
    this.fs = options.fs;
    this.getResolver = options.getResolver;
    this.getCacheDir = options.getCacheDir;
    this.env = options.env;
    this.offline = options.offline ?? false;
    this.logger = options.logger ?? silentLogger;
  }

  accept(path: string): boolean {
    return path.startsWith(OCI_PREFIX);
  }

  async load(path: string, options: LoadOptions = {}): Promise<string> {
    const enabled = ociRemoteLoaderEnabled(this.env);

    // Remote artifacts cannot be fetched offline; report "no file", not a failure
    if (this.offline) {
      return "";
    }

    if (!enabled) {
      throw new LoaderDisabledError(OCI_REMOTE_ENABLED);
    }

    let local = this.known.get(path);
    if (local === undefined) {
      local = await this.resolve(path, options);
      this.known.set(path, local);
    } else {
      this.logger.debug("reusing resolved artifact", { path, dir: local });
    }

    return join(local, COMPOSE_FILE_NAME);
  }

  dir(path: string): string {
    return this.known.get(path) ?? "";
  }

  /**
   * Fetch the manifest and materialize it unless its directory already exists.
   * Returns the artifact directory.
   */
  private async resolve(path: string, options: LoadOptions): Promise<string> {
    const ref = parseDockerRef(path.slice(OCI_PREFIX.length));
    const reference = formatReference(ref);

    const resolver = this.getResolver();
    const { content, descriptor } = await resolver.get(reference, { signal: options.signal });

    const local = join(this.getCacheDir(), digestHex(descriptor.digest));
    if (this.fs.exists(local)) {
      this.logger.debug("artifact already in cache", { reference, dir: local });
      return local;
    }

    const manifest = decodeManifest(content, reference);
    try {
      await pullComposeFiles(
        { fs: this.fs, resolver, logger: this.logger, signal: options.signal },
        local,
        manifest,
        ref
      );
    } catch (err) {
      // Never leave a partial directory that would later look like a cache hit
      this.removeQuietly(local);
      throw err;
    }

    this.logger.debug("materialized artifact", { reference, dir: local, layers: manifest.layers.length });
    return local;
  }

  private removeQuietly(dir: string): void {
    try {
      this.fs.rmdir(dir, { recursive: true });
    } catch (err) {
      this.logger.warn("failed to remove partially materialized artifact", {
        dir,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

function decodeManifest(content: Buffer, reference: string): OciManifest {
  const result = safeParseJson(content, OciManifestSchema, reference);
  if (!result.success) {
    const details = result.error.details?.length ? `: ${result.error.details.join("; ")}` : "";
    throw new ResolutionError(reference, `invalid manifest for ${reference}${details}`);
  }
  return result.data;
}
