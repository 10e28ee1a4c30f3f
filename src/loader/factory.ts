/**
 * OCI loader factory
 *
 * Single place wiring the loader to Node.js, the user's registry settings and
 * credentials, and the user cache directory.
 */

import { homedir } from "os";
import { join } from "path";
import type { EnvSource, FileSystem, HttpClient, Logger } from "#/core";
import { createNodeFileSystem, createNodeHttpClient, silentLogger } from "#/core";
import { ensureCacheDir } from "#/config";
import {
  REGISTRY_CREDENTIALS_FILE,
  REGISTRY_SETTINGS_FILE,
  RegistryResolver,
  createCredentialsTokenProvider,
  getConfigDir,
  loadRegistryCredentials,
  loadRegistrySettings,
} from "#/registry";
import { OciRemoteLoader } from "./oci-loader";

export interface CreateOciRemoteLoaderOptions {
  offline?: boolean;
  env?: EnvSource;
  fs?: FileSystem;
  http?: HttpClient;
  logger?: Logger;
  homeDir?: string;
  platform?: NodeJS.Platform;
  /** Overrides the default <config dir>/registries.yaml */
  registrySettingsFile?: string;
}

export function createOciRemoteLoader(options: CreateOciRemoteLoaderOptions = {}): OciRemoteLoader {
  const env = options.env ?? process.env;
  const fs = options.fs ?? createNodeFileSystem();
  const http = options.http ?? createNodeHttpClient();
  const logger = (options.logger ?? silentLogger).child({ component: "oci-loader" });
  const homeDir = options.homeDir ?? homedir();
  const platform = options.platform ?? process.platform;

  return new OciRemoteLoader({
    fs,
    env,
    offline: options.offline,
    logger,
    getResolver: () => {
      const configDir = getConfigDir(env, homeDir);
      const settings = loadRegistrySettings(
        fs,
        options.registrySettingsFile ?? join(configDir, REGISTRY_SETTINGS_FILE)
      );
      const credentials = loadRegistryCredentials(fs, join(configDir, REGISTRY_CREDENTIALS_FILE));
      return new RegistryResolver(settings, http, createCredentialsTokenProvider(credentials), logger);
    },
    getCacheDir: () => ensureCacheDir(fs, { env, platform, homeDir }),
  });
}
