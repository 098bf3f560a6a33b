import path from "path";
import type { ArchiveMember, MemberRole } from "./types";
import { extractIconSizeToken, isDesktopEntryPath, isIconPath } from "./desktop";

const BINARY_DIR_SEGMENTS = ["bin/", "usr/bin/", "usr/local/bin/"];

const DOC_PREFIXES = [
  "LICENSE",
  "README",
  "CHANGELOG",
  "COPYING",
  "AUTHORS",
  "NOTICE",
  "PATENTS",
  "VERSION",
  "MANIFEST",
  "TODO"
];

const SUPPORT_SEGMENTS = [
  "autocomplete/",
  "completions/",
  "bash_completion/",
  "zsh/",
  "fish/",
  "man/",
  "doc/",
  "docs/"
];

const TEXT_EXTENSIONS = new Set([
  ".txt",
  ".md",
  ".rst",
  ".pdf",
  ".html",
  ".xml",
  ".json",
  ".yaml",
  ".yml"
]);

// The fallback pass scans the whole archive, so config files are excluded too.
const FALLBACK_EXCLUDED_EXTENSIONS = new Set([...TEXT_EXTENSIONS, ".conf", ".cfg", ".ini"]);

const SCRIPT_SUFFIXES = [".sh", ".bash"];

const BINARY_EXTENSIONS = new Set(["", ".bin", ".elf"]);

export function classifyMember(memberPath: string): ArchiveMember {
  if (isDesktopEntryPath(memberPath)) {
    return { path: memberPath, role: "desktop-entry" };
  }
  if (isIconPath(memberPath)) {
    return {
      path: memberPath,
      role: "icon",
      iconSizeToken: extractIconSizeToken(memberPath)
    };
  }
  const role: MemberRole =
    isPrimaryBinaryCandidate(memberPath) || isFallbackBinaryCandidate(memberPath)
      ? "executable-candidate"
      : "other";
  return { path: memberPath, role };
}

/**
 * Binaries under a conventional bin directory win; when there are none, any
 * extensionless (or .bin/.elf) member outside docs and support directories is
 * taken instead. Order follows the archive.
 */
export function detectBinaries(members: readonly string[]): string[] {
  const candidates = members.filter((member) => {
    const role = classifyMember(member).role;
    return role !== "desktop-entry" && role !== "icon";
  });
  const primary = candidates.filter(isPrimaryBinaryCandidate);
  if (primary.length > 0) {
    return primary;
  }
  return candidates.filter(isFallbackBinaryCandidate);
}

export function selectBestBinary(binaries: readonly string[], packageName: string): string | undefined {
  if (binaries.length <= 1) {
    return binaries[0];
  }
  const wanted = packageName.toLowerCase();
  const exact = binaries.find((binary) => baseName(binary).toLowerCase() === wanted);
  if (exact) {
    return exact;
  }
  const partial = binaries.find((binary) => {
    const base = baseName(binary).toLowerCase();
    return base.includes(wanted) || wanted.includes(base);
  });
  return partial ?? binaries[0];
}

/** Common top-level directory such as `app-1.0.0/`, when every member shares one. */
export function findRootDirectory(members: readonly string[]): string | undefined {
  if (members.length === 0) {
    return undefined;
  }
  const parts = members[0].split("/");
  if (parts.length < 2 || !parts[0]) {
    return undefined;
  }
  const candidate = `${parts[0]}/`;
  return members.every((member) => member.startsWith(candidate)) ? candidate : undefined;
}

export function baseName(memberPath: string): string {
  return path.posix.basename(memberPath);
}

function isPrimaryBinaryCandidate(memberPath: string): boolean {
  if (isExcluded(memberPath, TEXT_EXTENSIONS)) {
    return false;
  }
  if (!BINARY_DIR_SEGMENTS.some((segment) => memberPath.includes(segment))) {
    return false;
  }
  const base = baseName(memberPath);
  return !SCRIPT_SUFFIXES.some((suffix) => base.endsWith(suffix));
}

function isFallbackBinaryCandidate(memberPath: string): boolean {
  if (isExcluded(memberPath, FALLBACK_EXCLUDED_EXTENSIONS)) {
    return false;
  }
  return BINARY_EXTENSIONS.has(extension(memberPath));
}

function isExcluded(memberPath: string, excludedExtensions: ReadonlySet<string>): boolean {
  const upperBase = baseName(memberPath).toUpperCase();
  if (DOC_PREFIXES.some((prefix) => upperBase.startsWith(prefix))) {
    return true;
  }
  const lower = memberPath.toLowerCase();
  if (SUPPORT_SEGMENTS.some((segment) => lower.includes(segment))) {
    return true;
  }
  return excludedExtensions.has(extension(memberPath));
}

function extension(memberPath: string): string {
  return path.posix.extname(memberPath).toLowerCase();
}
