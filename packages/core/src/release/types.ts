import type { ReleaseAsset } from "../platform/types";
import type { CheckStatus, PackageKind } from "../../../shared/src/contracts";

export type { CheckStatus };

export interface RepositoryInfo {
  owner: string;
  name: string;
  fullName: string;
  description: string;
  homepage: string;
  /** SPDX identifier; absent when GitHub could not detect one. */
  license?: string;
  htmlUrl: string;
  defaultBranch: string;
}

export interface ReleaseInfo {
  tagName: string;
  name: string;
  draft: boolean;
  prerelease: boolean;
  publishedAt?: string;
  assets: ReleaseAsset[];
}

export interface ReleaseMetadataProvider {
  getRepository(owner: string, repo: string): Promise<RepositoryInfo>;
  /** Latest non-draft, non-prerelease release, or undefined when there is none. */
  getLatestRelease(owner: string, repo: string): Promise<ReleaseInfo | undefined>;
  listReleases(owner: string, repo: string): Promise<ReleaseInfo[]>;
}

export interface RepositoryFileLister {
  /** Regular files at the repository root. */
  listRootFiles(owner: string, repo: string, ref?: string): Promise<string[]>;
}

export interface CheckResult {
  status: CheckStatus;
  output: string;
  reason?: string;
}

export type ValidationPlacement = "in-tap" | "staged";

export interface ValidationRequest {
  filePath: string;
  kind: PackageKind;
  autoFix: boolean;
  placement: ValidationPlacement;
}

export interface ValidationReport {
  ok: boolean;
  audit: CheckResult;
  style: CheckResult;
  /** Whether the style check rewrote the file. */
  fixed: boolean;
  diagnostics: string[];
}

export interface ManifestValidator {
  validate(request: ValidationRequest): Promise<ValidationReport>;
}
