/**
 * compose-oci-loader
 *
 * Resolves oci:// compose project references to local compose files.
 * Portable, testable, dependency-injected.
 */

// Core interfaces, logger, Node adapters
export * from "#/core";

// Constants (prefix, environment variable, file names)
export * from "#/constants";

// Errors
export * from "#/errors";

// Configuration (environment flag, cache directory)
export * from "#/config";

// References (parsing, formatting)
export * from "#/reference";

// OCI Distribution Spec (client, media types, digests)
export * from "#/oci";

// Registry (settings, credentials, content resolution)
export * from "#/registry";

// Loader (oci:// resource loader)
export * from "#/loader";
