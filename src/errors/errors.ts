/**
 * Error taxonomy for the OCI loader.
 *
 * Every error the loader raises itself carries a `kind` so callers can tell a
 * misconfiguration from an unreachable registry without matching on messages.
 * Errors thrown by an injected Resolver are passed through untouched.
 */

export type OciLoaderErrorKind =
  | "config"
  | "disabled"
  | "cache"
  | "reference"
  | "resolution"
  | "validation"
  | "materialization";

export abstract class OciLoaderError extends Error {
  abstract readonly kind: OciLoaderErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed environment flag or settings file */
export class ConfigError extends OciLoaderError {
  readonly kind = "config";

  constructor(
    message: string,
    readonly details: string[] = [],
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/** Loader turned off through the environment */
export class LoaderDisabledError extends OciLoaderError {
  readonly kind = "disabled";

  constructor(readonly variable: string) {
    super(`OCI remote resource is disabled by "${variable}"`);
  }
}

/** The cache root could not be located or created */
export class CacheInitError extends OciLoaderError {
  readonly kind = "cache";
}

export class InvalidReferenceError extends OciLoaderError {
  readonly kind = "reference";

  constructor(
    readonly reference: string,
    message: string
  ) {
    super(message);
  }
}

/** Registry, network or authentication failure while fetching content */
export class ResolutionError extends OciLoaderError {
  readonly kind = "resolution";

  constructor(
    readonly reference: string,
    message: string,
    readonly status?: number,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/** Fetched manifest does not describe a compose project */
export class ArtifactTypeError extends OciLoaderError {
  readonly kind = "validation";

  constructor(
    readonly reference: string,
    readonly artifactType: string
  ) {
    super(`${reference} is not a compose project OCI artifact, but ${artifactType}`);
  }
}

/** Writing the artifact to disk failed; the partial directory is removed */
export class MaterializationError extends OciLoaderError {
  readonly kind = "materialization";
}

export function isOciLoaderError(err: unknown): err is OciLoaderError {
  return err instanceof OciLoaderError;
}
