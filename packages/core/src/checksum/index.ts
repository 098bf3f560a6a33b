export {
  CHECKSUM_MANIFEST_NAMES,
  checksumManifestBaseUrl,
  digestsMatch,
  formatChecksumLine,
  parseChecksumManifest,
  sha256Hex
} from "./manifest";
