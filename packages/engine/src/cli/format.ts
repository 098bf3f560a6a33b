import type {
  CheckPayload,
  ErrorResponse,
  GenerateResponse,
  IssueResponse,
  ValidateDirectoryResponse,
  ValidateFileResponse,
  ValidationPayload
} from "../../../shared/src/contracts";
import type { IssueRequest } from "../../../core/src/issues";
import type { CheckResult, ValidationReport } from "../../../core/src/release";
import { EngineError } from "../errors";
import type { GenerationResult } from "../generator/manifest-generator";
import type { DirectoryValidation, FileValidation } from "../validation/tap";

export function toGenerateResponse(result: GenerationResult): GenerateResponse {
  return {
    ok: result.ok,
    kind: result.data.kind,
    package_name: result.data.kind === "cask" ? result.data.token : result.data.packageName,
    version: result.version,
    output_path: result.outputPath,
    ...(result.asset ? { asset_name: result.asset.name } : {}),
    sha256: result.checksum.digest,
    checksum_status: result.checksum.status,
    ...(result.buildSystem ? { build_system: result.buildSystem } : {}),
    ...(result.validation ? { validation: toValidationPayload(result.validation) } : {})
  };
}

export function toValidateFileResponse(result: FileValidation): ValidateFileResponse {
  return {
    path: result.path,
    kind: result.kind,
    ok: result.report.ok,
    validation: toValidationPayload(result.report)
  };
}

export function toValidateDirectoryResponse(result: DirectoryValidation): ValidateDirectoryResponse {
  return {
    root: result.root,
    files: result.files.map(toValidateFileResponse),
    failures: result.failures
  };
}

export function toIssueResponse(request: IssueRequest, generation: GenerationResult): IssueResponse {
  return {
    request: {
      repository_url: request.repositoryUrl,
      package_name: request.packageName,
      kind: request.kind,
      kind_source: request.kindSource,
      ...(request.description ? { description: request.description } : {})
    },
    generation: toGenerateResponse(generation)
  };
}

export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof EngineError) {
    return { ok: false, code: error.code, message: error.message };
  }
  return { ok: false, code: "UNKNOWN", message: error instanceof Error ? error.message : String(error) };
}

function toValidationPayload(report: ValidationReport): ValidationPayload {
  return {
    ok: report.ok,
    audit: toCheckPayload(report.audit),
    style: toCheckPayload(report.style),
    fixed: report.fixed,
    diagnostics: report.diagnostics
  };
}

function toCheckPayload(check: CheckResult): CheckPayload {
  return { status: check.status, output: check.output, ...(check.reason ? { reason: check.reason } : {}) };
}

export function describeGeneration(result: GenerationResult, tapName?: string): string[] {
  const name = result.data.kind === "cask" ? result.data.token : result.data.packageName;
  const lines = [`${result.ok ? "Generated" : "Generated with validation failures"}: ${result.outputPath}`];
  lines.push(`  ${result.data.kind} ${name} ${result.version} (${result.tag})`);
  if (result.asset) {
    lines.push(`  asset: ${result.asset.name}`);
  }
  if (result.buildSystem) {
    lines.push(`  build: ${result.buildSystem}`);
  }
  lines.push(`  sha256: ${result.checksum.digest} (${result.checksum.status})`);
  if (result.validation) {
    lines.push(...describeReport(result.validation).map((line) => `  ${line}`));
  }
  if (result.ok) {
    lines.push("Next steps:");
    const qualified = tapName ? `${tapName}/${name}` : name;
    lines.push(`  brew install ${result.data.kind === "cask" ? "--cask " : ""}${qualified}`);
    lines.push(`  tapwright validate file ${result.outputPath} --in-tap`);
  }
  return lines;
}

export function describeFileValidation(result: FileValidation): string[] {
  return [`${result.report.ok ? "PASS" : "FAIL"} ${result.path}`, ...describeReport(result.report).map((line) => `  ${line}`)];
}

export function describeDirectoryValidation(result: DirectoryValidation): string[] {
  const lines = result.files.flatMap(describeFileValidation);
  lines.push(`${result.files.length} manifests checked, ${result.failures} failed`);
  return lines;
}

function describeReport(report: ValidationReport): string[] {
  const lines = [`style: ${report.style.status}${report.fixed ? " (auto-fixed)" : ""}`];
  lines.push(`audit: ${report.audit.status}${report.audit.reason ? ` (${report.audit.reason})` : ""}`);
  for (const diagnostic of report.diagnostics) {
    lines.push(...diagnostic.split("\n").map((line) => `| ${line}`));
  }
  return lines;
}
