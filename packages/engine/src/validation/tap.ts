import fs from "fs";
import path from "path";
import type {
  ManifestValidator,
  ValidationPlacement,
  ValidationReport
} from "../../../core/src/release";
import type { PackageKind } from "../../../core/src/manifest";

export interface ValidateOptions {
  autoFix: boolean;
  placement?: ValidationPlacement;
}

export interface FileValidation {
  path: string;
  kind: PackageKind;
  report: ValidationReport;
}

export interface DirectoryValidation {
  root: string;
  files: FileValidation[];
  failures: number;
}

const KIND_DIRECTORIES: ReadonlyArray<readonly [directory: string, kind: PackageKind]> = [
  ["Formula", "formula"],
  ["Casks", "cask"]
];

/** Files under a `Casks` directory are casks; everything else is a formula. */
export function inferKind(filePath: string): PackageKind {
  const segments = path.resolve(filePath).split(path.sep);
  return segments.includes("Casks") ? "cask" : "formula";
}

export async function validateFile(
  validator: ManifestValidator,
  filePath: string,
  options: ValidateOptions
): Promise<FileValidation> {
  const kind = inferKind(filePath);
  const report = await validator.validate({
    filePath,
    kind,
    autoFix: options.autoFix,
    placement: options.placement ?? "staged"
  });
  return { path: filePath, kind, report };
}

/** Validates `Formula/*.rb` then `Casks/*.rb`, each in name order. */
export async function validateDirectory(
  validator: ManifestValidator,
  root: string,
  options: ValidateOptions
): Promise<DirectoryValidation> {
  const files: FileValidation[] = [];
  for (const [directory, kind] of KIND_DIRECTORIES) {
    for (const filePath of listManifests(path.join(root, directory))) {
      const report = await validator.validate({
        filePath,
        kind,
        autoFix: options.autoFix,
        placement: options.placement ?? "in-tap"
      });
      files.push({ path: filePath, kind, report });
    }
  }
  return { root, files, failures: files.filter((file) => !file.report.ok).length };
}

function listManifests(directory: string): string[] {
  if (!fs.existsSync(directory)) {
    return [];
  }
  return fs
    .readdirSync(directory, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(".rb"))
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(directory, name));
}
