/**
 * Content digests (algorithm:hex) as used by OCI registries
 */

import { createHash } from "crypto";

// Supported algorithms and the length of their hex encoding
const DIGEST_ALGORITHMS = new Map<string, number>([
  ["sha256", 64],
  ["sha384", 96],
  ["sha512", 128],
]);

const DIGEST_REGEX = /^[a-z0-9]+(?:[.+_-][a-z0-9]+)*:[a-zA-Z0-9=_-]+$/;

/**
 * Check a digest string.
 * Returns an error message, or undefined when the digest is well formed.
 */
export function checkDigest(digest: string): string | undefined {
  const i = digest.indexOf(":");
  if (i <= 0 || i + 1 === digest.length) {
    return "invalid checksum digest format";
  }

  const algorithm = digest.slice(0, i);
  const encoded = digest.slice(i + 1);
  const length = DIGEST_ALGORITHMS.get(algorithm);
  if (length === undefined) {
    return DIGEST_REGEX.test(digest)
      ? "unsupported digest algorithm"
      : "invalid checksum digest format";
  }

  if (encoded.length !== length) {
    return "invalid checksum digest length";
  }
  if (!/^[a-f0-9]+$/.test(encoded)) {
    return "invalid checksum digest format";
  }

  return undefined;
}

/**
 * Hex part of a digest
 *
 * @example
 * digestHex("sha256:4f2a...") → "4f2a..."
 */
export function digestHex(digest: string): string {
  return digest.slice(digest.indexOf(":") + 1);
}

export function digestAlgorithm(digest: string): string {
  const i = digest.indexOf(":");
  return i > 0 ? digest.slice(0, i) : "sha256";
}

/**
 * Digest of raw content
 */
export function computeDigest(data: Buffer | string, algorithm = "sha256"): string {
  const hash = createHash(algorithm).update(data).digest("hex");
  return `${algorithm}:${hash}`;
}

/**
 * True when `data` hashes to `digest` (using the digest's own algorithm)
 */
export function verifyDigest(data: Buffer, digest: string): boolean {
  const algorithm = digestAlgorithm(digest);
  if (!DIGEST_ALGORITHMS.has(algorithm)) {
    return false;
  }
  return computeDigest(data, algorithm) === digest;
}
