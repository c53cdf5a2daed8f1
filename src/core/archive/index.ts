/**
 * Archive format exports
 */

export { TarGzipCodec } from "./codec";
export {
  MANIFEST_FORMAT_VERSION,
  ManifestError,
  parseManifest,
  readManifest,
  serializeManifest,
} from "./manifest";
