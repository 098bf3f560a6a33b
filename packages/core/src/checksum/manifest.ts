import { createHash } from "crypto";

/** Conventional names probed beside a release asset, in order. */
export const CHECKSUM_MANIFEST_NAMES: readonly string[] = [
  "checksums.txt",
  "sha256sums.txt",
  "SHA256SUMS",
  "SHA256SUMS.txt",
  "checksums.sha256"
];

const CHECKSUM_LINE = /^([a-fA-F0-9]{64})\s+\*?(.+)$/;

export function sha256Hex(data: Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}

/**
 * Parses `sha256sum` output: `<digest>  <name>` or `<digest> *<name>`.
 * Digests are lower-cased; blank lines and `#` comments are skipped.
 */
export function parseChecksumManifest(content: string): Map<string, string> {
  const checksums = new Map<string, string>();
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) {
      continue;
    }
    const match = CHECKSUM_LINE.exec(line);
    if (!match) {
      continue;
    }
    const name = match[2].trim();
    if (name) {
      checksums.set(name, match[1].toLowerCase());
    }
  }
  return checksums;
}

export function formatChecksumLine(digest: string, name: string): string {
  return `${digest.toLowerCase()}  ${name}`;
}

/** Directory URL of a release asset, with trailing slash. */
export function checksumManifestBaseUrl(assetUrl: string): string {
  const index = assetUrl.lastIndexOf("/");
  return index === -1 ? assetUrl : assetUrl.slice(0, index + 1);
}

export function digestsMatch(expected: string, actual: string): boolean {
  return expected.trim().toLowerCase() === actual.trim().toLowerCase();
}
