/**
 * Loader module
 *
 * The oci:// resource loader, its manifest validator and layer materializer.
 */

export type { ResourceLoader, LoadOptions, OciRemoteLoaderOptions } from "./loader.types";
export { OciRemoteLoader } from "./oci-loader";
export { createOciRemoteLoader, type CreateOciRemoteLoaderOptions } from "./factory";
export { validateComposeManifest } from "./validator";
export {
  YAML_DOCUMENT_SEPARATOR,
  classifyLayer,
  pullComposeFiles,
  writeComposeFile,
  writeEnvFile,
  writeExtendsFile,
  type LayerKind,
  type MaterializeContext,
} from "./materializer";
