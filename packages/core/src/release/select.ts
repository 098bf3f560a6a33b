import type { ReleaseInfo } from "./types";

/**
 * Newest non-draft entry of a release listing, which the API returns newest
 * first. Prereleases count only when allowed.
 */
export function pickFallbackRelease(
  releases: readonly ReleaseInfo[],
  allowPrerelease: boolean
): ReleaseInfo | undefined {
  return releases.find((release) => !release.draft && (allowPrerelease || !release.prerelease));
}

export function sourceTarballUrl(owner: string, repo: string, tag: string): string {
  return `https://github.com/${owner}/${repo}/archive/refs/tags/${encodeURIComponent(tag)}.tar.gz`;
}
