/**
 * OCI Distribution Spec types
 *
 * Types for interacting with OCI-compliant registries (Docker Hub, GHCR, etc.)
 * Only what we need for pull operations - minimal surface area.
 *
 * @see https://github.com/opencontainers/distribution-spec/blob/main/spec.md
 * @see https://github.com/opencontainers/image-spec/blob/main/manifest.md
 */

import type { z } from "zod";
import type { RegistryCredentials } from "#/core";
import type { OciDescriptorSchema, OciManifestSchema } from "#/schemas";

/**
 * OCI content descriptor
 * References a blob (layer or config) or manifest by digest
 */
export type OciDescriptor = z.infer<typeof OciDescriptorSchema>;

/**
 * OCI image manifest (v2)
 * Describes an artifact: artifact type, config and ordered layers
 */
export type OciManifest = z.infer<typeof OciManifestSchema>;

/**
 * Media types of compose project artifacts
 */
export const COMPOSE_MEDIA_TYPES = {
  /** Manifest artifactType of a compose project */
  project: "application/vnd.docker.compose.project",
  /** Layer holding a compose YAML document */
  file: "application/vnd.docker.compose.file+yaml",
  /** Layer holding an env file */
  envFile: "application/vnd.docker.compose.envfile",
  /** Empty config blob; also marks compose artifacts pushed before artifactType existed */
  emptyConfig: "application/vnd.oci.empty.v1+json",
} as const;

/**
 * Layer annotations written when a compose project is pushed
 */
export const COMPOSE_ANNOTATIONS = {
  /** Target file name of a compose layer */
  file: "com.docker.compose.file",
  /** Present when the layer is a separate (included/extended) file */
  extends: "com.docker.compose.extends",
  /** Target file name of an env file layer */
  envFile: "com.docker.compose.envfile",
} as const;

/**
 * Manifest media types requested from registries
 */
export const MANIFEST_MEDIA_TYPES = [
  "application/vnd.oci.image.manifest.v1+json",
  "application/vnd.docker.distribution.manifest.v2+json",
] as const;

/**
 * One endpoint serving a registry host (the host itself or a mirror)
 */
export interface OciEndpoint {
  /** Host with optional port (e.g., registry-1.docker.io, localhost:5000) */
  host: string;
  /** Plain HTTP instead of HTTPS */
  http: boolean;
  /** Credentials stored for this host; never sent to another endpoint */
  credentials?: RegistryCredentials;
}

/**
 * OCI registry connection info
 */
export interface OciRegistryConfig {
  /** Endpoints tried in order; the last one is the registry itself */
  endpoints: OciEndpoint[];
}

/**
 * Result from pulling a manifest or blob
 */
export type PullResult =
  | {
      success: true;
      data: Buffer;
      /** Content-Type reported by the registry, if any */
      mediaType?: string;
      /** Digest reported in Docker-Content-Digest, if any */
      digest?: string;
    }
  | {
      success: false;
      /** HTTP status when the registry answered */
      status?: number;
      error: string;
    };
