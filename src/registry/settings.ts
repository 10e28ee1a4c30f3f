/**
 * Registry settings and credentials files
 *
 * Both files are optional. A missing file means "no settings"; a malformed
 * one is a ConfigError so misconfiguration is never silently ignored.
 */

import { join } from "path";
import type { EnvSource, FileSystem, RegistryCredentials, TokenProvider } from "#/core";
import { DEFAULT_DOMAIN, LEGACY_DEFAULT_DOMAIN } from "#/constants";
import { ConfigError } from "#/errors";
import { safeParseJson, safeParseYaml } from "#/friendly-errors";
import {
  RegistryCredentialsFileSchema,
  RegistrySettingsFileSchema,
  type RegistryAuthEntry,
} from "#/schemas";
import type { RegistryCredentialsFile, RegistrySettings } from "./registry.types";

export const REGISTRY_SETTINGS_FILE = "registries.yaml";
export const REGISTRY_CREDENTIALS_FILE = "config.json";

/**
 * Directory holding the registry credentials and settings files:
 * $DOCKER_CONFIG, or ~/.docker
 */
export function getConfigDir(env: EnvSource, homeDir: string): string {
  const fromEnv = env["DOCKER_CONFIG"];
  return fromEnv ? fromEnv : join(homeDir, ".docker");
}

/**
 * Load registries.yaml (per-host plain HTTP and mirror settings)
 */
export function loadRegistrySettings(fs: FileSystem, path: string): RegistrySettings {
  if (!fs.exists(path)) {
    return { registries: {} };
  }

  const result = safeParseYaml(fs.readFile(path), RegistrySettingsFileSchema, path);
  if (!result.success) {
    throw new ConfigError(result.error.message, result.error.details);
  }

  return result.data;
}

/**
 * Load the "auths" section of the registry credentials file
 */
export function loadRegistryCredentials(fs: FileSystem, path: string): RegistryCredentialsFile {
  if (!fs.exists(path)) {
    return { auths: {} };
  }

  const result = safeParseJson(fs.readFile(path), RegistryCredentialsFileSchema, path);
  if (!result.success) {
    throw new ConfigError(result.error.message, result.error.details);
  }

  return result.data;
}

/**
 * Normalize an "auths" key to a reference domain.
 *
 * @example
 * normalizeAuthKey("https://index.docker.io/v1/") → "docker.io"
 * normalizeAuthKey("ghcr.io") → "ghcr.io"
 */
export function normalizeAuthKey(key: string): string {
  const host = key.replace(/^[a-z]+:\/\//i, "").split("/")[0] ?? key;
  return host === LEGACY_DEFAULT_DOMAIN ? DEFAULT_DOMAIN : host;
}

function toCredentials(entry: RegistryAuthEntry): RegistryCredentials {
  const credentials: RegistryCredentials = {
    username: entry.username,
    password: entry.password,
    identityToken: entry.identitytoken,
    registryToken: entry.registrytoken,
  };

  // "auth" is base64("user:secret") and takes precedence over the split fields
  if (entry.auth) {
    const decoded = Buffer.from(entry.auth, "base64").toString("utf-8");
    const sep = decoded.indexOf(":");
    if (sep > 0) {
      credentials.username = decoded.slice(0, sep);
      credentials.password = decoded.slice(sep + 1);
    }
  }

  return credentials;
}

/**
 * TokenProvider backed by a parsed credentials file
 */
export function createCredentialsTokenProvider(file: RegistryCredentialsFile): TokenProvider {
  const byHost = new Map<string, RegistryCredentials>();
  for (const [key, entry] of Object.entries(file.auths)) {
    byHost.set(normalizeAuthKey(key), toCredentials(entry));
  }

  return {
    getRegistryCredentials(host: string): RegistryCredentials | undefined {
      return byHost.get(host);
    },
  };
}
