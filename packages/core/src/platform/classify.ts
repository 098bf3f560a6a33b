import {
  ARCHITECTURE_MARKERS,
  CHECKSUM_FILE_MARKERS,
  DELIMITED_MARKERS,
  EXCLUDED_OS_MARKERS,
  FORMAT_SUFFIXES,
  SOURCE_ARCHIVE_MARKERS,
  TARGET_OS_MARKERS
} from "./markers";
import type {
  Architecture,
  ClassifiedAsset,
  FilenameClassification,
  MarkerTable,
  OsFamily,
  PackageFormat,
  PriorityClass,
  ReleaseAsset
} from "./types";

const TARBALL_FORMATS: ReadonlySet<PackageFormat> = new Set([
  "tarball-gz",
  "tarball-xz",
  "tarball-bz2",
  "tarball-plain"
]);

export function classifyAsset(asset: ReleaseAsset): ClassifiedAsset {
  return Object.freeze({
    name: asset.name,
    downloadUrl: asset.downloadUrl,
    sizeBytes: asset.sizeBytes,
    ...classifyFilename(asset.name)
  });
}

export function classifyFilename(filename: string): FilenameClassification {
  const lower = filename.toLowerCase();
  const packageFormat = detectFormat(lower);
  return {
    osFamily: detectOsFamily(lower, packageFormat),
    architecture: detectArchitecture(lower),
    packageFormat,
    priorityClass: priorityForFormat(packageFormat),
    isSourceArchive: containsAny(lower, SOURCE_ARCHIVE_MARKERS),
    isChecksumFile: containsAny(lower, CHECKSUM_FILE_MARKERS)
  };
}

export function detectFormat(lowerName: string): PackageFormat {
  for (const [suffix, format] of FORMAT_SUFFIXES) {
    if (lowerName.endsWith(suffix)) {
      return format;
    }
  }
  return "unknown";
}

export function detectOsFamily(lowerName: string, format: PackageFormat): OsFamily {
  if (format === "debian-package" || format === "rpm-package") {
    return "target-os";
  }
  return (
    firstMarkerMatch(lowerName, TARGET_OS_MARKERS) ??
    firstMarkerMatch(lowerName, EXCLUDED_OS_MARKERS) ??
    "unknown"
  );
}

export function detectArchitecture(lowerName: string): Architecture {
  return firstMarkerMatch(lowerName, ARCHITECTURE_MARKERS) ?? "unknown";
}

export function priorityForFormat(format: PackageFormat): PriorityClass {
  if (isTarballFormat(format)) {
    return 1;
  }
  if (format === "debian-package") {
    return 2;
  }
  return 3;
}

export function isTarballFormat(format: PackageFormat): boolean {
  return TARBALL_FORMATS.has(format);
}

function firstMarkerMatch<T>(value: string, table: MarkerTable<T>): T | undefined {
  for (const [marker, result] of table) {
    if (containsMarker(value, marker)) {
      return result;
    }
  }
  return undefined;
}

function containsMarker(value: string, marker: string): boolean {
  if (!DELIMITED_MARKERS.has(marker)) {
    return value.includes(marker);
  }
  return value.split(/[-_.\s]+/).includes(marker);
}

function containsAny(value: string, markers: readonly string[]): boolean {
  return markers.some((marker) => value.includes(marker));
}
