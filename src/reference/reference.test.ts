import { describe, test, expect } from "vitest";
import { parseDockerRef, formatReference, referenceName, withDigest } from "./reference";
import { InvalidReferenceError } from "#/errors";

const DIGEST = `sha256:${"a".repeat(64)}`;

describe("reference", () => {
  describe("parseDockerRef", () => {
    test("normalizes an official image name", () => {
      expect(parseDockerRef("redis")).toEqual({
        domain: "docker.io",
        path: "library/redis",
        tag: "latest",
      });
    });

    test("keeps user repositories on docker.io without library prefix", () => {
      expect(parseDockerRef("myorg/stack:v1")).toEqual({
        domain: "docker.io",
        path: "myorg/stack",
        tag: "v1",
      });
    });

    test("treats a first component with a port as the domain", () => {
      expect(parseDockerRef("localhost:5000/stack")).toEqual({
        domain: "localhost:5000",
        path: "stack",
        tag: "latest",
      });
    });

    test("treats a first component with a dot as the domain", () => {
      expect(parseDockerRef("ghcr.io/acme/tools/app:2.1")).toEqual({
        domain: "ghcr.io",
        path: "acme/tools/app",
        tag: "2.1",
      });
    });

    test("maps the legacy docker hub domain", () => {
      expect(parseDockerRef("index.docker.io/redis")).toEqual({
        domain: "docker.io",
        path: "library/redis",
        tag: "latest",
      });
    });

    test("parses digest references without adding a tag", () => {
      expect(parseDockerRef(`ghcr.io/acme/app@${DIGEST}`)).toEqual({
        domain: "ghcr.io",
        path: "acme/app",
        digest: DIGEST,
      });
    });

    test("drops the tag when both tag and digest are given", () => {
      expect(parseDockerRef(`ghcr.io/acme/app:1.0@${DIGEST}`)).toEqual({
        domain: "ghcr.io",
        path: "acme/app",
        digest: DIGEST,
      });
    });

    test("rejects uppercase repository names", () => {
      expect(() => parseDockerRef("myorg/Stack")).toThrow(
        "invalid reference format: repository name (myorg/Stack) must be lowercase"
      );
    });

    test("rejects an empty reference", () => {
      expect(() => parseDockerRef("")).toThrow("repository name must have at least one component");
    });

    test("rejects a bare 64-character hex identifier", () => {
      const id = "b".repeat(64);

      expect(() => parseDockerRef(id)).toThrow(
        `invalid repository name (${id}), cannot specify 64-byte hexadecimal strings`
      );
    });

    test("rejects an empty tag", () => {
      expect(() => parseDockerRef("app:")).toThrow("invalid reference format");
    });

    test("rejects a digest with the wrong length", () => {
      expect(() => parseDockerRef(`ghcr.io/acme/app@sha256:${"a".repeat(40)}`)).toThrow(
        "invalid checksum digest length"
      );
    });

    test("rejects an unsupported digest algorithm", () => {
      expect(() => parseDockerRef(`ghcr.io/acme/app@md5:${"a".repeat(32)}`)).toThrow(
        "unsupported digest algorithm"
      );
    });

    test("throws InvalidReferenceError carrying the input", () => {
      try {
        parseDockerRef("app:");
        expect.unreachable();
      } catch (err) {
        if (!(err instanceof InvalidReferenceError)) throw err;
        expect(err.reference).toBe("app:");
        expect(err.kind).toBe("reference");
      }
    });
  });

  describe("formatReference", () => {
    test("formats tagged references", () => {
      expect(formatReference(parseDockerRef("redis"))).toBe("docker.io/library/redis:latest");
    });

    test("formats digest references", () => {
      expect(formatReference(parseDockerRef(`ghcr.io/acme/app@${DIGEST}`))).toBe(
        `ghcr.io/acme/app@${DIGEST}`
      );
    });

    test("round-trips through parseDockerRef", () => {
      const formatted = formatReference(parseDockerRef("localhost:5000/team/stack:v3"));

      expect(formatReference(parseDockerRef(formatted))).toBe(formatted);
    });
  });

  describe("referenceName", () => {
    test("includes the domain", () => {
      expect(referenceName(parseDockerRef("myorg/stack:v1"))).toBe("docker.io/myorg/stack");
    });
  });

  describe("withDigest", () => {
    test("keeps name and tag and pins the digest", () => {
      const ref = withDigest(parseDockerRef("myorg/stack:v1"), DIGEST);

      expect(formatReference(ref)).toBe(`docker.io/myorg/stack:v1@${DIGEST}`);
    });

    test("replaces an existing digest", () => {
      const other = `sha256:${"c".repeat(64)}`;
      const ref = withDigest(parseDockerRef(`ghcr.io/acme/app@${DIGEST}`), other);

      expect(ref.digest).toBe(other);
    });

    test("rejects malformed digests", () => {
      expect(() => withDigest(parseDockerRef("redis"), "nope")).toThrow(
        "invalid checksum digest format: nope"
      );
    });
  });
});
