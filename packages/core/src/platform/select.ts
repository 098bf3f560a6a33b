import { isTarballFormat } from "./classify";
import type { ClassifiedAsset } from "./types";

export type AssetSelection =
  | { ok: true; asset: ClassifiedAsset; candidates: ClassifiedAsset[] }
  | { ok: false; reason: "no-eligible-asset"; rejected: ClassifiedAsset[] };

/**
 * Drops source archives, checksum files and assets for other operating systems.
 * Tarballs with no OS marker are kept: many projects ship a single
 * OS-agnostic-looking tarball for their only supported platform.
 */
export function filterEligibleAssets(assets: readonly ClassifiedAsset[]): ClassifiedAsset[] {
  return assets.filter((asset) => {
    if (asset.isSourceArchive || asset.isChecksumFile) {
      return false;
    }
    if (asset.osFamily === "other") {
      return false;
    }
    if (asset.osFamily === "unknown") {
      return isTarballFormat(asset.packageFormat);
    }
    return true;
  });
}

export function selectBestAsset(assets: readonly ClassifiedAsset[]): AssetSelection {
  const eligible = filterEligibleAssets(assets);
  if (eligible.length === 0) {
    return { ok: false, reason: "no-eligible-asset", rejected: [...assets] };
  }

  const bestPriority = Math.min(...eligible.map((asset) => asset.priorityClass));
  const candidates = eligible.filter((asset) => asset.priorityClass === bestPriority);
  if (candidates.length === 1) {
    return { ok: true, asset: candidates[0], candidates };
  }

  const preferred = candidates.find((asset) => asset.architecture === "x86_64");
  return { ok: true, asset: preferred ?? candidates[0], candidates };
}
