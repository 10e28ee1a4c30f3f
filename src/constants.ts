/**
 * Global constants for the compose OCI loader
 */

// Paths starting with this prefix are claimed by the OCI remote loader
export const OCI_PREFIX = "oci://";

// Environment variable toggling the whole loader (unset = enabled)
export const OCI_REMOTE_ENABLED = "COMPOSE_EXPERIMENTAL_OCI_REMOTE";

// Primary compose file written inside every materialized artifact directory
export const COMPOSE_FILE_NAME = "compose.yaml";

// Name of the directory created under the user cache root
export const CACHE_DIR_NAME = "compose";

// Docker Hub is addressed as docker.io in references but served from another host
export const DEFAULT_DOMAIN = "docker.io";
export const LEGACY_DEFAULT_DOMAIN = "index.docker.io";
export const DEFAULT_REGISTRY_API_HOST = "registry-1.docker.io";
export const OFFICIAL_REPO_PREFIX = "library/";
export const DEFAULT_TAG = "latest";

export const USER_AGENT = "compose-oci-loader";
