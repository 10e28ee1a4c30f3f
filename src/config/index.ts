export { parseBoolean, ociRemoteLoaderEnabled } from "./env";
export { resolveCacheDir, ensureCacheDir, type CacheDirContext } from "./cache-dir";
