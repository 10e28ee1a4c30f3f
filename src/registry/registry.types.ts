/**
 * Registry types and interfaces
 *
 * The loader NEVER talks to a registry directly - only to "a resolver" that
 * turns a reference string into bytes plus a descriptor.
 */

import type { OciDescriptor } from "#/oci";

export type { RegistrySettings, RegistrySettingsEntry, RegistryCredentialsFile } from "#/schemas";

export interface ResolveOptions {
  /** Cancels in-flight registry requests */
  signal?: AbortSignal;
}

/**
 * Raw content of a manifest or blob, with its descriptor
 */
export interface ResolvedContent {
  content: Buffer;
  descriptor: OciDescriptor;
}

/**
 * Fetches content addressed by a fully qualified reference
 * (domain/path[:tag][@digest]). Digest references may point at a manifest or
 * a blob.
 */
export interface Resolver {
  get(reference: string, options?: ResolveOptions): Promise<ResolvedContent>;
}
