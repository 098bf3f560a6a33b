import { detectDesktopEntry, detectIcon } from "./desktop";
import { detectBinaries, findRootDirectory, selectBestBinary } from "./members";
import type { MemberSummary } from "./types";

export function summarizeMembers(members: readonly string[], packageName: string): MemberSummary {
  const binaries = detectBinaries(members);
  return {
    members: [...members],
    binaries,
    bestBinary: selectBestBinary(binaries, packageName),
    desktopEntry: detectDesktopEntry(members),
    icon: detectIcon(members),
    rootDirectory: findRootDirectory(members)
  };
}
