import { buildManifestDocument } from "./builder";
import { serializeManifest } from "./serialize";
import type { ManifestData, RenderResult } from "./types";
import { validateManifestData } from "./validation";

export function renderManifest(data: ManifestData): RenderResult {
  const validation = validateManifestData(data);
  if (!validation.ok) {
    return { ok: false, errors: validation.errors };
  }
  return { ok: true, text: serializeManifest(buildManifestDocument(data)) };
}
