export type { PackageKind } from "../../../shared/src/contracts";

export interface ManifestIdentity {
  readonly version: string;
  readonly sha256: string;
  readonly url: string;
  readonly description: string;
  readonly homepage: string;
  /** Repository the manifest was generated from; drives the generation header. */
  readonly sourceUrl?: string;
}

export interface ResourcePlacement {
  /** Path inside the staged archive. */
  readonly source: string;
  /** File name under the XDG data directory. */
  readonly target: string;
}

export interface DesktopIntegration {
  readonly desktopEntry?: ResourcePlacement;
  readonly icon?: ResourcePlacement;
  /** Subdirectories of XDG_DATA_HOME created before install. */
  readonly xdgDirectories: readonly string[];
}

export interface CaskManifestData extends ManifestIdentity {
  readonly kind: "cask";
  readonly token: string;
  readonly appName: string;
  readonly binary: { readonly path: string; readonly target: string };
  readonly desktop?: DesktopIntegration;
  readonly cleanupPaths: readonly string[];
}

export interface FormulaManifestData extends ManifestIdentity {
  readonly kind: "formula";
  readonly className: string;
  readonly packageName: string;
  readonly license?: string;
  /** "Go", "Rust", ... or "Binary" for prebuilt archives. */
  readonly buildSystem: string;
  readonly dependencies: readonly string[];
  readonly installBlock: string;
  readonly testBlock: string;
}

export type ManifestData = CaskManifestData | FormulaManifestData;

export type SectionName =
  | "identity"
  | "source"
  | "metadata"
  | "dependencies"
  | "install"
  | "test"
  | "preflight"
  | "cleanup";

export interface ManifestSection {
  readonly name: SectionName;
  /** Lines relative to the block body; "" is a blank line. */
  readonly lines: readonly string[];
}

export interface ManifestDocument {
  readonly magicComments: readonly string[];
  /** Comments directly above the opening line. */
  readonly comments: readonly string[];
  readonly opening: string;
  readonly sections: readonly ManifestSection[];
}

export type RenderResult = { ok: true; text: string } | { ok: false; errors: string[] };
