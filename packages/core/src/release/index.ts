export type {
  CheckResult,
  CheckStatus,
  ManifestValidator,
  ReleaseInfo,
  ReleaseMetadataProvider,
  RepositoryFileLister,
  RepositoryInfo,
  ValidationPlacement,
  ValidationReport,
  ValidationRequest
} from "./types";
export { pickFallbackRelease, sourceTarballUrl } from "./select";
