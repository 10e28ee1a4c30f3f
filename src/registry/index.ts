/**
 * Registry module
 *
 * Handles registry settings, credentials and content resolution.
 */

// Types
export * from "./registry.types";

// Resolver (registry settings → endpoints + credentials)
export { getApiHost, resolveRegistry } from "./resolver";

// Settings files
export {
  REGISTRY_SETTINGS_FILE,
  REGISTRY_CREDENTIALS_FILE,
  getConfigDir,
  loadRegistrySettings,
  loadRegistryCredentials,
  normalizeAuthKey,
  createCredentialsTokenProvider,
} from "./settings";

// Content resolution against registries
export { RegistryResolver } from "./content-resolver";
