export type PackageKind = "cask" | "formula";
export type CheckStatus = "passed" | "failed" | "skipped";
export type ChecksumStatus = "verified" | "no-upstream-manifest" | "not-listed";
export type KindSource = "hint" | "keyword" | "default";

export interface CheckPayload {
  status: CheckStatus;
  output: string;
  reason?: string;
}

export interface ValidationPayload {
  ok: boolean;
  audit: CheckPayload;
  style: CheckPayload;
  fixed: boolean;
  diagnostics: string[];
}

export interface GenerateResponse {
  ok: boolean;
  kind: PackageKind;
  /** Cask token or formula name. */
  package_name: string;
  version: string;
  output_path: string;
  asset_name?: string;
  sha256: string;
  checksum_status: ChecksumStatus;
  build_system?: string;
  validation?: ValidationPayload;
}

export interface ValidateFileResponse {
  path: string;
  kind: PackageKind;
  ok: boolean;
  validation: ValidationPayload;
}

export interface ValidateDirectoryResponse {
  root: string;
  files: ValidateFileResponse[];
  failures: number;
}

export interface IssueRequestPayload {
  repository_url: string;
  package_name: string;
  kind: PackageKind;
  kind_source: KindSource;
  description?: string;
}

export interface IssueResponse {
  request: IssueRequestPayload;
  generation: GenerateResponse;
}

export interface ErrorResponse {
  ok: false;
  code: string;
  message: string;
}
