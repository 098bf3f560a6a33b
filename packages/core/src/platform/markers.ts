import type { Architecture, MarkerTable, OsFamily, PackageFormat } from "./types";

// Compound suffixes come before the simple ones they end with.
export const FORMAT_SUFFIXES: MarkerTable<PackageFormat> = [
  [".tar.gz", "tarball-gz"],
  [".tgz", "tarball-gz"],
  [".tar.xz", "tarball-xz"],
  [".tar.bz2", "tarball-bz2"],
  [".tar", "tarball-plain"],
  [".deb", "debian-package"],
  [".rpm", "rpm-package"],
  [".appimage", "appimage"]
];

export const TARGET_OS_MARKERS: MarkerTable<OsFamily> = [
  ["linux", "target-os"],
  ["ubuntu", "target-os"],
  ["debian", "target-os"],
  ["fedora", "target-os"],
  ["rhel", "target-os"],
  ["centos", "target-os"],
  ["alpine", "target-os"],
  ["arch", "target-os"],
  ["opensuse", "target-os"]
];

// Short markers that also occur inside other words ("arch" in "aarch64") only
// count as a whole token between separators.
export const DELIMITED_MARKERS: ReadonlySet<string> = new Set(["arch"]);

export const EXCLUDED_OS_MARKERS: MarkerTable<OsFamily> = [
  ["macos", "other"],
  ["darwin", "other"],
  ["osx", "other"],
  ["mac", "other"],
  ["windows", "other"],
  ["win32", "other"],
  ["win64", "other"],
  ["android", "other"],
  ["freebsd", "other"],
  ["netbsd", "other"],
  ["openbsd", "other"],
  ["solaris", "other"],
  ["illumos", "other"]
];

// "arm" is a substring of "arm64" and "armv8", so the 64-bit rows must win first.
export const ARCHITECTURE_MARKERS: MarkerTable<Architecture> = [
  ["x86_64", "x86_64"],
  ["x86-64", "x86_64"],
  ["amd64", "x86_64"],
  ["x64", "x86_64"],
  ["arm64", "arm64"],
  ["aarch64", "arm64"],
  ["armv8", "arm64"],
  ["armv7", "arm"],
  ["armhf", "arm"],
  ["arm", "arm"]
];

export const SOURCE_ARCHIVE_MARKERS: readonly string[] = ["source", "src", "sources"];

export const CHECKSUM_FILE_MARKERS: readonly string[] = [
  "checksum",
  "sha256",
  "sha512",
  "md5",
  "sums.txt",
  "checksums.txt"
];
