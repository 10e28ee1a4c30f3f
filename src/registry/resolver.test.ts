import { describe, test, expect } from "vitest";
import { getApiHost, resolveRegistry } from "./resolver";
import { createMockTokenProvider } from "#/test-utils/mocks";

describe("resolver", () => {
  describe("getApiHost", () => {
    test("maps docker.io to the docker hub API host", () => {
      expect(getApiHost("docker.io")).toBe("registry-1.docker.io");
    });

    test("keeps other domains", () => {
      expect(getApiHost("localhost:5000")).toBe("localhost:5000");
    });
  });

  describe("resolveRegistry", () => {
    test("uses HTTPS on the registry itself by default", () => {
      const config = resolveRegistry("ghcr.io", { registries: {} });

      expect(config).toEqual({
        endpoints: [{ host: "ghcr.io", http: false, credentials: undefined }],
      });
    });

    test("honors plain HTTP settings", () => {
      const config = resolveRegistry("localhost:5000", {
        registries: { "localhost:5000": { http: true, mirrors: [] } },
      });

      expect(config.endpoints).toEqual([{ host: "localhost:5000", http: true, credentials: undefined }]);
    });

    test("puts mirrors before the registry, each with its own scheme", () => {
      const config = resolveRegistry("docker.io", {
        registries: {
          "docker.io": { http: false, mirrors: ["mirror.internal:5000", "mirror.example.com"] },
          "mirror.internal:5000": { http: true, mirrors: [] },
        },
      });

      expect(config.endpoints.map(({ host, http }) => ({ host, http }))).toEqual([
        { host: "mirror.internal:5000", http: true },
        { host: "mirror.example.com", http: false },
        { host: "registry-1.docker.io", http: false },
      ]);
    });

    test("gives the registry the credentials of the reference domain", () => {
      const tokens = createMockTokenProvider({ "docker.io": { registryToken: "test-token" } });

      const config = resolveRegistry("docker.io", { registries: {} }, tokens);

      expect(config.endpoints).toEqual([
        { host: "registry-1.docker.io", http: false, credentials: { registryToken: "test-token" } },
      ]);
    });

    test("gives mirrors only the credentials stored for their own host", () => {
      const tokens = createMockTokenProvider({
        "ghcr.io": { registryToken: "test-token" },
        "mirror.internal": { username: "mirror-user", password: "test-secret" },
      });

      const config = resolveRegistry(
        "ghcr.io",
        { registries: { "ghcr.io": { http: false, mirrors: ["mirror.internal", "mirror.example.com"] } } },
        tokens
      );

      expect(config.endpoints.map((e) => [e.host, e.credentials])).toEqual([
        ["mirror.internal", { username: "mirror-user", password: "test-secret" }],
        ["mirror.example.com", undefined],
        ["ghcr.io", { registryToken: "test-token" }],
      ]);
    });
  });
});
