import path from "path";
import {
  dependencies,
  installProcedure,
  strategyName,
  testProcedure,
  type BuildStrategy
} from "../buildsystem/strategies";
import { packageNameToClassName } from "../platform/naming";
import { inferCleanupPaths, rubyString } from "./text";
import type { CaskManifestData, DesktopIntegration, FormulaManifestData, ResourcePlacement } from "./types";

export interface IdentityInput {
  version: string;
  sha256: string;
  url: string;
  description: string;
  homepage?: string;
  sourceUrl?: string;
}

export interface CaskDataInput extends IdentityInput {
  token: string;
  appName: string;
  binaryPath: string;
  binaryName: string;
  desktopEntry?: ResourcePlacement;
  icon?: ResourcePlacement;
}

export interface FormulaDataInput extends IdentityInput {
  packageName: string;
  binaryName: string;
  license?: string;
}

export interface SourceFormulaInput extends FormulaDataInput {
  strategy: BuildStrategy;
}

export interface BinaryFormulaInput extends FormulaDataInput {
  /** Path of the binary relative to the unpacked archive root. */
  binaryPath: string;
}

export function createCaskData(input: CaskDataInput): CaskManifestData {
  const desktop = desktopIntegration(input.desktopEntry, input.icon);
  return Object.freeze({
    kind: "cask",
    token: input.token,
    appName: input.appName,
    ...identity(input),
    binary: Object.freeze({ path: input.binaryPath, target: input.binaryName }),
    ...(desktop ? { desktop } : {}),
    cleanupPaths: Object.freeze(inferCleanupPaths(input.appName))
  });
}

export function createSourceFormulaData(input: SourceFormulaInput): FormulaManifestData {
  return Object.freeze({
    kind: "formula",
    className: packageNameToClassName(input.packageName),
    packageName: input.packageName,
    ...identity(input),
    ...(input.license ? { license: input.license } : {}),
    buildSystem: strategyName(input.strategy),
    dependencies: Object.freeze(dependencies(input.strategy)),
    installBlock: installProcedure(input.strategy, {
      binaryName: input.binaryName,
      packageName: input.packageName
    }),
    testBlock: testProcedure(input.binaryName)
  });
}

export function createBinaryFormulaData(input: BinaryFormulaInput): FormulaManifestData {
  const installLine =
    input.binaryPath === input.binaryName
      ? `bin.install ${rubyString(input.binaryName)}`
      : `bin.install ${rubyString(input.binaryPath)} => ${rubyString(input.binaryName)}`;
  return Object.freeze({
    kind: "formula",
    className: packageNameToClassName(input.packageName),
    packageName: input.packageName,
    ...identity(input),
    ...(input.license ? { license: input.license } : {}),
    buildSystem: "Binary",
    dependencies: Object.freeze([]),
    installBlock: ["def install", `  ${installLine}`, "end"].join("\n"),
    testBlock: testProcedure(input.binaryName)
  });
}

function identity(input: IdentityInput) {
  return {
    version: input.version,
    sha256: input.sha256.toLowerCase(),
    url: input.url,
    description: input.description,
    homepage: resolveHomepage(input.homepage, input.sourceUrl),
    ...(input.sourceUrl ? { sourceUrl: input.sourceUrl } : {})
  };
}

// Repository metadata often carries a bare host such as "tool.example.org".
function resolveHomepage(homepage: string | undefined, sourceUrl: string | undefined): string {
  const value = homepage?.trim() ?? "";
  if (/^https?:\/\//i.test(value)) {
    return value;
  }
  if (/^[a-z0-9-]+(?:\.[a-z0-9-]+)+(?:\/\S*)?$/i.test(value)) {
    return `https://${value}`;
  }
  return sourceUrl ?? "";
}

function desktopIntegration(
  desktopEntry: ResourcePlacement | undefined,
  icon: ResourcePlacement | undefined
): DesktopIntegration | undefined {
  if (!desktopEntry && !icon) {
    return undefined;
  }
  const xdgDirectories: string[] = [];
  if (desktopEntry) {
    xdgDirectories.push("applications");
  }
  if (icon) {
    xdgDirectories.push("icons");
  }
  return Object.freeze({
    ...(desktopEntry ? { desktopEntry: Object.freeze({ ...desktopEntry }) } : {}),
    ...(icon ? { icon: Object.freeze({ ...icon }) } : {}),
    xdgDirectories: Object.freeze(xdgDirectories)
  });
}

/** Target file name for a resource installed under the XDG data directory. */
export function placementFor(source: string): ResourcePlacement {
  return { source, target: path.posix.basename(source) };
}
