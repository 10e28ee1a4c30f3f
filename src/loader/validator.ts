import { ArtifactTypeError } from "#/errors";
import { COMPOSE_MEDIA_TYPES } from "#/oci";
import type { OciManifest } from "#/oci";

/**
 * Check that a manifest describes a compose project.
 *
 * Artifacts pushed before artifactType existed carry no artifactType and
 * an empty config blob; those are accepted too.
 *
 * @param reference - Reference the manifest was fetched by, for the error message
 * @throws ArtifactTypeError
 */
export function validateComposeManifest(manifest: OciManifest, reference: string): void {
  const artifactType = manifest.artifactType ?? "";

  if (artifactType === COMPOSE_MEDIA_TYPES.project) {
    return;
  }

  if (artifactType === "" && manifest.config.mediaType === COMPOSE_MEDIA_TYPES.emptyConfig) {
    return;
  }

  throw new ArtifactTypeError(reference, artifactType);
}
