import { describe, test, expect } from "vitest";
import { ociRemoteLoaderEnabled, parseBoolean } from "./env";
import { ConfigError } from "#/errors";

describe("env", () => {
  describe("parseBoolean", () => {
    test.each(["1", "t", "T", "TRUE", "true", "True"])("parses %s as true", (value) => {
      expect(parseBoolean(value)).toBe(true);
    });

    test.each(["0", "f", "F", "FALSE", "false", "False"])("parses %s as false", (value) => {
      expect(parseBoolean(value)).toBe(false);
    });

    test.each(["yes", "no", "tRuE", " true", "2"])("rejects %j", (value) => {
      expect(parseBoolean(value)).toBeUndefined();
    });
  });

  describe("ociRemoteLoaderEnabled", () => {
    test("is enabled when the variable is unset", () => {
      expect(ociRemoteLoaderEnabled({})).toBe(true);
    });

    test("is enabled when the variable is empty", () => {
      expect(ociRemoteLoaderEnabled({ COMPOSE_EXPERIMENTAL_OCI_REMOTE: "" })).toBe(true);
    });

    test("follows an explicit value", () => {
      expect(ociRemoteLoaderEnabled({ COMPOSE_EXPERIMENTAL_OCI_REMOTE: "0" })).toBe(false);
      expect(ociRemoteLoaderEnabled({ COMPOSE_EXPERIMENTAL_OCI_REMOTE: "true" })).toBe(true);
    });

    test("throws ConfigError on a malformed value", () => {
      const read = () => ociRemoteLoaderEnabled({ COMPOSE_EXPERIMENTAL_OCI_REMOTE: "maybe" });

      expect(read).toThrow(ConfigError);
      expect(read).toThrow(
        'COMPOSE_EXPERIMENTAL_OCI_REMOTE environment variable expects boolean value: invalid syntax "maybe"'
      );
    });
  });
});
