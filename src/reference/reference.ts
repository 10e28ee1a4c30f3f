/**
 * Container image / artifact references
 *
 * Parses "name[:tag][@digest]" strings into a normalized Reference, the way
 * the docker CLI does:
 * - missing domain → docker.io
 * - single path component on docker.io → library/<name>
 * - neither tag nor digest → tag "latest"
 * - tag and digest → digest only
 */

import {
  DEFAULT_DOMAIN,
  DEFAULT_TAG,
  LEGACY_DEFAULT_DOMAIN,
  OFFICIAL_REPO_PREFIX,
} from "#/constants";
import { InvalidReferenceError } from "#/errors";
import { checkDigest } from "#/oci/digest";

export interface Reference {
  /** Registry host with optional port (e.g., docker.io, localhost:5000) */
  domain: string;
  /** Repository path (e.g., library/redis, myorg/stack) */
  path: string;
  tag?: string;
  digest?: string;
}

const NAME_TOTAL_LENGTH_MAX = 255;

// Grammar from the distribution reference package
const alphanumeric = "[a-z0-9]+";
const separator = "(?:[._]|__|[-]+)";
const pathComponent = `${alphanumeric}(?:${separator}${alphanumeric})*`;
const domainComponent = "(?:[a-zA-Z0-9]|[a-zA-Z0-9][a-zA-Z0-9-]*[a-zA-Z0-9])";
const ipv6 = "\\[(?:[a-fA-F0-9:]+)\\]";
const domainName = `${domainComponent}(?:\\.${domainComponent})*`;
const domainAndPort = `(?:${domainName}|${ipv6})(?::[0-9]+)?`;
const tagPattern = "[\\w][\\w.-]{0,127}";
const digestPattern = "[A-Za-z][A-Za-z0-9]*(?:[-_+.][A-Za-z][A-Za-z0-9]*)*[:][0-9a-fA-F]{32,}";
const remoteName = `${pathComponent}(?:/${pathComponent})*`;

const REFERENCE_REGEX = new RegExp(
  `^((?:${domainAndPort}/)?${remoteName})(?::(${tagPattern}))?(?:@(${digestPattern}))?$`
);
const ANCHORED_NAME_REGEX = new RegExp(`^(?:(${domainAndPort})/)?(${remoteName})$`);
const ANCHORED_IDENTIFIER_REGEX = /^[a-f0-9]{64}$/;

/**
 * Parse a reference string and normalize it.
 *
 * @example
 * parseDockerRef("redis") → { domain: "docker.io", path: "library/redis", tag: "latest" }
 * parseDockerRef("localhost:5000/stack:v1") → { domain: "localhost:5000", path: "stack", tag: "v1" }
 */
export function parseDockerRef(input: string): Reference {
  if (input === "") {
    throw new InvalidReferenceError(input, "repository name must have at least one component");
  }

  if (ANCHORED_IDENTIFIER_REGEX.test(input)) {
    throw new InvalidReferenceError(
      input,
      `invalid repository name (${input}), cannot specify 64-byte hexadecimal strings`
    );
  }

  const { domain, remainder } = splitDockerDomain(input);

  const tagSep = remainder.indexOf(":");
  const repository = tagSep > -1 ? remainder.slice(0, tagSep) : remainder;
  if (repository.toLowerCase() !== repository) {
    throw new InvalidReferenceError(
      input,
      `invalid reference format: repository name (${repository}) must be lowercase`
    );
  }

  const ref = parseReference(`${domain}/${remainder}`, input);

  // Tagged and digested: the digest alone identifies the content
  if (ref.digest !== undefined) {
    return { domain: ref.domain, path: ref.path, digest: ref.digest };
  }

  return { domain: ref.domain, path: ref.path, tag: ref.tag ?? DEFAULT_TAG };
}

/**
 * Split the registry domain off a (possibly familiar) name.
 */
function splitDockerDomain(name: string): { domain: string; remainder: string } {
  let domain: string;
  let remainder: string;

  const i = name.indexOf("/");
  const first = i === -1 ? "" : name.slice(0, i);
  if (
    i === -1 ||
    (!/[.:]/.test(first) && first !== "localhost" && first.toLowerCase() === first)
  ) {
    domain = DEFAULT_DOMAIN;
    remainder = name;
  } else {
    domain = first;
    remainder = name.slice(i + 1);
  }

  if (domain === LEGACY_DEFAULT_DOMAIN) {
    domain = DEFAULT_DOMAIN;
  }
  if (domain === DEFAULT_DOMAIN && !remainder.includes("/")) {
    remainder = OFFICIAL_REPO_PREFIX + remainder;
  }

  return { domain, remainder };
}

function parseReference(s: string, original: string): Reference {
  const match = s.match(REFERENCE_REGEX);
  if (!match) {
    if (REFERENCE_REGEX.test(s.toLowerCase())) {
      throw new InvalidReferenceError(original, "repository name must be lowercase");
    }
    throw new InvalidReferenceError(original, "invalid reference format");
  }

  const [, name = "", tag, digest] = match;
  if (name.length > NAME_TOTAL_LENGTH_MAX) {
    throw new InvalidReferenceError(
      original,
      `repository name must not be more than ${NAME_TOTAL_LENGTH_MAX} characters`
    );
  }

  const nameMatch = name.match(ANCHORED_NAME_REGEX);
  const domain = nameMatch?.[1];
  const path = nameMatch?.[2];
  if (!domain || !path) {
    throw new InvalidReferenceError(original, "invalid reference format");
  }

  if (digest !== undefined) {
    const digestError = checkDigest(digest);
    if (digestError) {
      throw new InvalidReferenceError(original, digestError);
    }
  }

  return { domain, path, tag, digest };
}

/**
 * Repository name including the domain (e.g., docker.io/library/redis)
 */
export function referenceName(ref: Reference): string {
  return `${ref.domain}/${ref.path}`;
}

/**
 * Canonical string form: domain/path[:tag][@digest]
 */
export function formatReference(ref: Reference): string {
  let s = referenceName(ref);
  if (ref.tag !== undefined) {
    s += `:${ref.tag}`;
  }
  if (ref.digest !== undefined) {
    s += `@${ref.digest}`;
  }
  return s;
}

/**
 * Same repository (and tag), pinned to `digest`.
 */
export function withDigest(ref: Reference, digest: string): Reference {
  const digestError = checkDigest(digest);
  if (digestError) {
    throw new InvalidReferenceError(formatReference(ref), `${digestError}: ${digest}`);
  }
  return { ...ref, digest };
}
