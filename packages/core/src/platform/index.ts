export type {
  Architecture,
  ClassifiedAsset,
  FilenameClassification,
  MarkerTable,
  OsFamily,
  PackageFormat,
  PriorityClass,
  ReleaseAsset
} from "./types";
export {
  ARCHITECTURE_MARKERS,
  CHECKSUM_FILE_MARKERS,
  DELIMITED_MARKERS,
  EXCLUDED_OS_MARKERS,
  FORMAT_SUFFIXES,
  SOURCE_ARCHIVE_MARKERS,
  TARGET_OS_MARKERS
} from "./markers";
export {
  classifyAsset,
  classifyFilename,
  detectArchitecture,
  detectFormat,
  detectOsFamily,
  isTarballFormat,
  priorityForFormat
} from "./classify";
export { filterEligibleAssets, selectBestAsset, type AssetSelection } from "./select";
export {
  ensureLinuxSuffix,
  normalizePackageName,
  packageNameToClassName,
  parseRepositoryRef,
  slugifyAppName,
  stripVersionPrefix,
  type RepositoryRef,
  type RepositoryRefResult
} from "./naming";
