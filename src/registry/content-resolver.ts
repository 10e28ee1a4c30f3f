/**
 * Resolver backed by OCI registries
 *
 * Manifests for tag references, manifests or blobs for digest references
 * (the manifest endpoint is tried first, then the blob endpoint on 404).
 * Content is verified against the digest it was requested by.
 */

import type { HttpClient, Logger, TokenProvider } from "#/core";
import { silentLogger } from "#/core";
import { DEFAULT_TAG } from "#/constants";
import { ResolutionError } from "#/errors";
import { MANIFEST_MEDIA_TYPES, OciClient, checkDigest, computeDigest, verifyDigest } from "#/oci";
import type { PullResult } from "#/oci";
import { parseDockerRef } from "#/reference";
import { resolveRegistry } from "./resolver";
import type { RegistrySettings, ResolvedContent, ResolveOptions, Resolver } from "./registry.types";

const BLOB_MEDIA_TYPE = "application/octet-stream";

export class RegistryResolver implements Resolver {
  private clients: Map<string, OciClient> = new Map();

  constructor(
    private settings: RegistrySettings,
    private http: HttpClient,
    private tokens?: TokenProvider,
    private logger: Logger = silentLogger
  ) {}

  /**
   * One client per domain, so Bearer tokens are reused across layers
   */
  private clientFor(domain: string): OciClient {
    let client = this.clients.get(domain);
    if (!client) {
      client = new OciClient(resolveRegistry(domain, this.settings, this.tokens), this.http);
      this.clients.set(domain, client);
    }
    return client;
  }

  async get(reference: string, options: ResolveOptions = {}): Promise<ResolvedContent> {
    const { signal } = options;
    const ref = parseDockerRef(reference);
    const client = this.clientFor(ref.domain);

    let result: PullResult = await client.pullManifest(ref.path, ref.digest ?? ref.tag ?? DEFAULT_TAG, signal);
    let isManifest = true;

    if (!result.success && result.status === 404 && ref.digest) {
      this.logger.debug("no manifest for digest, trying blob", { reference });
      result = await client.pullBlob(ref.path, ref.digest, signal);
      isManifest = false;
    }

    if (!result.success) {
      throw new ResolutionError(reference, `${reference}: ${result.error}`, result.status);
    }

    // Ignore a header digest we cannot check
    const headerDigest = result.digest && !checkDigest(result.digest) ? result.digest : undefined;
    const digest = this.verifiedDigest(reference, ref.digest ?? headerDigest, result.data);

    return {
      content: result.data,
      descriptor: {
        mediaType: result.mediaType ?? (isManifest ? MANIFEST_MEDIA_TYPES[0] : BLOB_MEDIA_TYPE),
        digest,
        size: result.data.length,
      },
    };
  }

  /**
   * Digest of the fetched content. When an expected digest is known (from
   * the reference or the registry's Docker-Content-Digest header) the content
   * must match it.
   */
  private verifiedDigest(reference: string, expected: string | undefined, data: Buffer): string {
    if (expected === undefined) {
      return computeDigest(data);
    }

    if (!verifyDigest(data, expected)) {
      throw new ResolutionError(
        reference,
        `${reference}: digest mismatch, expected ${expected} but content hashes to ${computeDigest(data)}`
      );
    }

    return expected;
  }
}
