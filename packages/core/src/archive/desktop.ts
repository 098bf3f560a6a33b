import path from "path";
import type { DesktopEntryInfo, IconInfo, IconSizeToken } from "./types";

const ICON_EXTENSIONS = [".png", ".svg", ".xpm", ".ico"];

const ICON_DIR_SEGMENTS = [
  "icons/",
  "icon/",
  "pixmaps/",
  "share/icons/",
  "share/pixmaps/",
  ".local/share/icons/"
];

const NAMED_SIZE_TOKENS = new Set(["hicolor", "scalable"]);

const SIZE_SCORES: Record<string, number> = {
  "512x512": 1000,
  "256x256": 900,
  hicolor: 850,
  scalable: 850,
  "128x128": 800,
  "64x64": 700,
  "48x48": 600,
  "32x32": 500,
  "16x16": 400
};

const UNKNOWN_SIZE_SCORE = 300;

export function isDesktopEntryPath(memberPath: string): boolean {
  return memberPath.toLowerCase().endsWith(".desktop");
}

export function isIconPath(memberPath: string): boolean {
  const lower = memberPath.toLowerCase();
  if (!ICON_EXTENSIONS.some((ext) => lower.endsWith(ext))) {
    return false;
  }
  return ICON_DIR_SEGMENTS.some((segment) => lower.includes(segment)) || lower.includes("icon");
}

export function detectDesktopEntry(members: readonly string[]): DesktopEntryInfo | undefined {
  const match = members.find(isDesktopEntryPath);
  if (!match) {
    return undefined;
  }
  return { path: match, filename: path.posix.basename(match) };
}

/**
 * Picks the icon with the highest size + format score. A named theme segment
 * ("hicolor", "scalable") beats a numeric NxN segment anywhere in the path.
 */
export function detectIcon(members: readonly string[]): IconInfo | undefined {
  let best: IconInfo | undefined;
  for (const member of members) {
    if (!isIconPath(member)) {
      continue;
    }
    const sizeToken = extractIconSizeToken(member);
    const candidate: IconInfo = {
      path: member,
      filename: path.posix.basename(member),
      sizeToken,
      score: scoreIcon(member, sizeToken)
    };
    if (!best || candidate.score > best.score) {
      best = candidate;
    }
  }
  return best;
}

export function extractIconSizeToken(memberPath: string): IconSizeToken {
  const segments = memberPath.toLowerCase().split("/");
  const named = segments.find((segment) => NAMED_SIZE_TOKENS.has(segment));
  if (named) {
    return named;
  }
  return segments.find((segment) => /^\d+x\d+$/.test(segment)) ?? "unknown";
}

export function scoreIcon(memberPath: string, sizeToken: IconSizeToken): number {
  const sizeScore = SIZE_SCORES[sizeToken] ?? UNKNOWN_SIZE_SCORE;
  const lower = memberPath.toLowerCase();
  let formatScore = 50;
  if (lower.endsWith(".svg")) {
    formatScore = 100;
  } else if (lower.endsWith(".png")) {
    formatScore = 90;
  }
  return sizeScore + formatScore;
}
