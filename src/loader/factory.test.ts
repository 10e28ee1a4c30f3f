import { describe, test, expect } from "vitest";
import { createOciRemoteLoader } from "./factory";
import { ConfigError } from "#/errors";
import { COMPOSE_ANNOTATIONS, COMPOSE_MEDIA_TYPES, computeDigest, digestHex } from "#/oci";
import type { OciManifest } from "#/oci";
import { binaryResponse, createMockFileSystem, createMockHttpClient } from "#/test-utils/mocks";

const HOME = "/home/dev";
const CACHE = `${HOME}/.cache/compose`;
const COMPOSE = "services:\n  app:\n    image: ghcr.io/acme/app:1.0\n";

const manifest: OciManifest = {
  schemaVersion: 2,
  mediaType: "application/vnd.oci.image.manifest.v1+json",
  artifactType: COMPOSE_MEDIA_TYPES.project,
  config: { mediaType: COMPOSE_MEDIA_TYPES.emptyConfig, digest: computeDigest("{}"), size: 2 },
  layers: [
    {
      mediaType: COMPOSE_MEDIA_TYPES.file,
      digest: computeDigest(COMPOSE),
      size: Buffer.byteLength(COMPOSE),
      annotations: { [COMPOSE_ANNOTATIONS.file]: "compose.yaml" },
    },
  ],
};
const manifestJson = JSON.stringify(manifest);
const LOCAL = `${CACHE}/${digestHex(computeDigest(manifestJson))}`;

function registry(host: string, scheme = "https") {
  const base = `${scheme}://${host}/v2/acme/stack`;
  return createMockHttpClient(
    new Map([
      [
        `${base}/manifests/1.0`,
        () => binaryResponse(manifestJson, { "Content-Type": "application/vnd.oci.image.manifest.v1+json" }),
      ],
      [`${base}/blobs/${computeDigest(COMPOSE)}`, () => binaryResponse(COMPOSE)],
    ])
  );
}

describe("createOciRemoteLoader", () => {
  test("pulls an artifact into the user cache directory", async () => {
    const fs = createMockFileSystem();
    const http = registry("ghcr.io");
    const loader = createOciRemoteLoader({ fs, http, env: {}, homeDir: HOME, platform: "linux" });

    const path = await loader.load("oci://ghcr.io/acme/stack:1.0");

    expect(path).toBe(`${LOCAL}/compose.yaml`);
    expect(fs.text(path)).toBe(COMPOSE);
    expect(fs.files.get(CACHE)?.mode).toBe(0o700);
    expect(http.requests.map((r) => r.url)).toEqual([
      "https://ghcr.io/v2/acme/stack/manifests/1.0",
      `https://ghcr.io/v2/acme/stack/manifests/${computeDigest(COMPOSE)}`,
      `https://ghcr.io/v2/acme/stack/blobs/${computeDigest(COMPOSE)}`,
    ]);
  });

  test("uses $XDG_CACHE_HOME when set", async () => {
    const fs = createMockFileSystem();
    const loader = createOciRemoteLoader({
      fs,
      http: registry("ghcr.io"),
      env: { XDG_CACHE_HOME: "/var/cache/dev" },
      homeDir: HOME,
      platform: "linux",
    });

    const path = await loader.load("oci://ghcr.io/acme/stack:1.0");

    expect(path.startsWith("/var/cache/dev/compose/")).toBe(true);
  });

  test("reads mirrors from registries.yaml under $DOCKER_CONFIG", async () => {
    const fs = createMockFileSystem({
      "/etc/dev-docker/registries.yaml": [
        "registries:",
        "  ghcr.io:",
        "    mirrors:",
        "      - mirror.internal",
        "  mirror.internal:",
        "    http: true",
        "",
      ].join("\n"),
    });
    const http = registry("mirror.internal", "http");
    const loader = createOciRemoteLoader({
      fs,
      http,
      env: { DOCKER_CONFIG: "/etc/dev-docker" },
      homeDir: HOME,
      platform: "linux",
    });

    expect(await loader.load("oci://ghcr.io/acme/stack:1.0")).toBe(`${LOCAL}/compose.yaml`);
    expect(http.requests[0]?.url).toBe("http://mirror.internal/v2/acme/stack/manifests/1.0");
  });

  test("sends stored registry tokens", async () => {
    const fs = createMockFileSystem({
      [`${HOME}/.docker/config.json`]: JSON.stringify({ auths: { "ghcr.io": { registrytoken: "test-secret" } } }),
    });
    const http = registry("ghcr.io");
    const loader = createOciRemoteLoader({ fs, http, env: {}, homeDir: HOME, platform: "linux" });

    await loader.load("oci://ghcr.io/acme/stack:1.0");

    const headers = new Headers(http.requests[0]?.options?.headers);
    expect(headers.get("authorization")).toBe("Bearer test-secret");
  });

  test("reports an invalid registries.yaml as a configuration error", async () => {
    const fs = createMockFileSystem({
      [`${HOME}/.docker/registries.yaml`]: "registries:\n  ghcr.io:\n    http: sometimes\n",
    });
    const loader = createOciRemoteLoader({ fs, http: registry("ghcr.io"), env: {}, homeDir: HOME, platform: "linux" });

    await expect(loader.load("oci://ghcr.io/acme/stack:1.0")).rejects.toThrow(ConfigError);
  });

  test("touches neither network nor disk offline", async () => {
    const fs = createMockFileSystem();
    const http = registry("ghcr.io");
    const loader = createOciRemoteLoader({ offline: true, fs, http, env: {}, homeDir: HOME, platform: "linux" });

    expect(await loader.load("oci://ghcr.io/acme/stack:1.0")).toBe("");
    expect(http.requests).toEqual([]);
    expect(fs.files.size).toBe(0);
  });
});
