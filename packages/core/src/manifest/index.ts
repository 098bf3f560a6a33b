export type {
  CaskManifestData,
  DesktopIntegration,
  FormulaManifestData,
  ManifestData,
  ManifestDocument,
  ManifestIdentity,
  ManifestSection,
  PackageKind,
  RenderResult,
  ResourcePlacement,
  SectionName
} from "./types";
export type {
  BinaryFormulaInput,
  CaskDataInput,
  FormulaDataInput,
  IdentityInput,
  SourceFormulaInput
} from "./data";
export { createBinaryFormulaData, createCaskData, createSourceFormulaData, placementFor } from "./data";
export { buildCaskDocument, buildFormulaDocument, buildManifestDocument, GENERATOR_NAME } from "./builder";
export { serializeManifest } from "./serialize";
export { normalizeErrors, validateManifestData } from "./validation";
export { renderManifest } from "./render";
export { cleanDescription, escapeRubyText, inferCleanupPaths, rubyString } from "./text";
