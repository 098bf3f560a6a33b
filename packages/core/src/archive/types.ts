export type MemberRole = "executable-candidate" | "desktop-entry" | "icon" | "other";

/** "128x128", "scalable", "hicolor" or "unknown". */
export type IconSizeToken = string;

export interface ArchiveMember {
  readonly path: string;
  readonly role: MemberRole;
  readonly iconSizeToken?: IconSizeToken;
}

export interface DesktopEntryInfo {
  path: string;
  filename: string;
}

export interface IconInfo {
  path: string;
  filename: string;
  sizeToken: IconSizeToken;
  score: number;
}

export interface MemberSummary {
  members: string[];
  binaries: string[];
  bestBinary?: string;
  desktopEntry?: DesktopEntryInfo;
  icon?: IconInfo;
  rootDirectory?: string;
}
