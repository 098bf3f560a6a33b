export type OsFamily = "target-os" | "other" | "unknown";

export type Architecture = "x86_64" | "arm64" | "arm" | "unknown";

export type PackageFormat =
  | "tarball-gz"
  | "tarball-xz"
  | "tarball-bz2"
  | "tarball-plain"
  | "debian-package"
  | "rpm-package"
  | "appimage"
  | "unknown";

/** Lower is more preferred. */
export type PriorityClass = 1 | 2 | 3;

export interface ReleaseAsset {
  readonly name: string;
  readonly downloadUrl: string;
  readonly sizeBytes: number;
}

export interface ClassifiedAsset extends ReleaseAsset {
  readonly osFamily: OsFamily;
  readonly architecture: Architecture;
  readonly packageFormat: PackageFormat;
  readonly priorityClass: PriorityClass;
  readonly isSourceArchive: boolean;
  readonly isChecksumFile: boolean;
}

export type FilenameClassification = Omit<ClassifiedAsset, keyof ReleaseAsset>;

export type MarkerTable<T> = ReadonlyArray<readonly [marker: string, result: T]>;
