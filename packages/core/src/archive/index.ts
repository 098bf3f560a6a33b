export type {
  ArchiveMember,
  DesktopEntryInfo,
  IconInfo,
  IconSizeToken,
  MemberRole,
  MemberSummary
} from "./types";
export {
  baseName,
  classifyMember,
  detectBinaries,
  findRootDirectory,
  selectBestBinary
} from "./members";
export {
  detectDesktopEntry,
  detectIcon,
  extractIconSizeToken,
  isDesktopEntryPath,
  isIconPath,
  scoreIcon
} from "./desktop";
export { summarizeMembers } from "./summary";
