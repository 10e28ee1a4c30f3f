/**
 * OCI Distribution Spec module
 *
 * Native client for pulling manifests and blobs from OCI-compliant registries,
 * plus the media types and annotations of compose project artifacts.
 */

export { OciClient } from "./oci-client";
export type {
  OciDescriptor,
  OciManifest,
  OciEndpoint,
  OciRegistryConfig,
  PullResult,
} from "./oci.types";
export { COMPOSE_MEDIA_TYPES, COMPOSE_ANNOTATIONS, MANIFEST_MEDIA_TYPES } from "./oci.types";
export { checkDigest, computeDigest, digestHex, verifyDigest } from "./digest";
