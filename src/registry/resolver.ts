/**
 * Registry resolver
 *
 * Normalizes settings and credentials to an OciRegistryConfig for one domain.
 * Parse once, never parse again - downstream code only sees OciRegistryConfig.
 */

import type { TokenProvider } from "#/core";
import { DEFAULT_DOMAIN, DEFAULT_REGISTRY_API_HOST } from "#/constants";
import type { OciEndpoint, OciRegistryConfig } from "#/oci";
import type { RegistrySettings } from "./registry.types";

/**
 * Host serving the registry API for a reference domain
 *
 * @example
 * getApiHost("docker.io") → "registry-1.docker.io"
 * getApiHost("ghcr.io") → "ghcr.io"
 */
export function getApiHost(domain: string): string {
  return domain === DEFAULT_DOMAIN ? DEFAULT_REGISTRY_API_HOST : domain;
}

/**
 * Resolve a reference domain to a registry configuration
 *
 * Endpoints: configured mirrors first (in order), then the registry itself.
 * Each endpoint uses plain HTTP only when its own settings entry says so.
 *
 * The registry gets the credentials stored for the reference domain; a mirror
 * only gets credentials stored under its own host.
 */
export function resolveRegistry(
  domain: string,
  settings: RegistrySettings,
  tokens?: TokenProvider
): OciRegistryConfig {
  const entry = settings.registries[domain];

  const toMirror = (host: string): OciEndpoint => ({
    host,
    http: settings.registries[host]?.http ?? false,
    credentials: tokens?.getRegistryCredentials(host),
  });

  const registry: OciEndpoint = {
    host: getApiHost(domain),
    http: entry?.http ?? false,
    credentials: tokens?.getRegistryCredentials(domain),
  };

  return {
    endpoints: [...(entry?.mirrors ?? []).map(toMirror), registry],
  };
}
