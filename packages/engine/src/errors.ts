export class EngineError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.code = code;
    this.name = new.target.name;
  }
}

export class InvalidRepositoryError extends EngineError {
  constructor(message: string) {
    super("INVALID_REPOSITORY", message);
  }
}

export class NoReleaseError extends EngineError {
  constructor(repository: string) {
    super("NO_RELEASE", `No published release found for ${repository}`);
  }
}

export class NoEligibleAssetError extends EngineError {
  readonly rejected: string[];

  constructor(repository: string, tag: string, rejected: string[]) {
    super(
      "NO_ELIGIBLE_ASSET",
      `No Linux-compatible asset in ${repository} ${tag} (considered: ${rejected.join(", ") || "none"})`
    );
    this.rejected = rejected;
  }
}

export class BuildSystemNotDetectedError extends EngineError {
  constructor(repository: string) {
    super(
      "BUILD_SYSTEM_NOT_DETECTED",
      `Could not detect a build system from the root files of ${repository}`
    );
  }
}

export class UnsupportedArchiveError extends EngineError {
  constructor(filename: string, reason?: string) {
    super(
      "UNSUPPORTED_ARCHIVE",
      reason ? `Could not read archive ${filename}: ${reason}` : `Unsupported archive format: ${filename}`
    );
  }
}

export class GitHubApiError extends EngineError {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string, message: string) {
    super("GITHUB_API_ERROR", `GitHub API ${status} for ${url}: ${message}`);
    this.status = status;
    this.url = url;
  }
}

export class DownloadError extends EngineError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, status?: number) {
    super("DOWNLOAD_FAILED", `Download failed for ${url}: ${message}`);
    this.url = url;
    this.status = status;
  }
}

export class ChecksumMismatchError extends EngineError {
  readonly assetName: string;
  readonly expected: string;
  readonly actual: string;

  constructor(assetName: string, expected: string, actual: string) {
    super(
      "CHECKSUM_MISMATCH",
      `Checksum mismatch for ${assetName}: upstream ${expected}, downloaded ${actual}`
    );
    this.assetName = assetName;
    this.expected = expected;
    this.actual = actual;
  }
}

export class ManifestRenderError extends EngineError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super("MANIFEST_RENDER_FAILED", `Manifest data is invalid: ${errors.join("; ")}`);
    this.errors = errors;
  }
}

export class ValidationError extends EngineError {
  constructor(message: string) {
    super("VALIDATION_ERROR", message);
  }
}
