import { gunzipSync } from "zlib";
import { xz } from "@napi-rs/lzma";
import { decode as decodeBzip2 } from "seek-bzip";
import { Parser, type ReadEntry } from "tar";
import { summarizeMembers, type MemberSummary } from "../../../core/src/archive";
import { UnsupportedArchiveError } from "../errors";

export type Decompression = "gzip" | "xz" | "bzip2" | "none";

/** Compound suffixes first. */
const DECOMPRESSION_BY_SUFFIX: ReadonlyArray<readonly [suffix: string, method: Decompression]> = [
  [".tar.gz", "gzip"],
  [".tgz", "gzip"],
  [".tar.xz", "xz"],
  [".tar.bz2", "bzip2"],
  [".tar", "none"]
];

const REGULAR_FILE_TYPES = new Set(["File", "OldFile", "ContiguousFile"]);

export function decompressionFor(filename: string): Decompression | undefined {
  const lower = filename.toLowerCase();
  return DECOMPRESSION_BY_SUFFIX.find(([suffix]) => lower.endsWith(suffix))?.[1];
}

export async function decompress(bytes: Buffer, method: Decompression): Promise<Buffer> {
  switch (method) {
    case "gzip":
      return gunzipSync(bytes);
    case "xz":
      return xz.decompress(bytes);
    case "bzip2":
      return decodeBzip2(bytes);
    case "none":
      return bytes;
  }
}

/** Regular-file member paths in archive order. */
export function listTarMembers(tarBytes: Buffer): Promise<string[]> {
  return new Promise((resolve, reject) => {
    const members: string[] = [];
    const parser = new Parser({ strict: true });
    parser.on("entry", (entry: ReadEntry) => {
      if (REGULAR_FILE_TYPES.has(entry.type)) {
        members.push(entry.path.replace(/^(\.\/)+/, ""));
      }
      entry.resume();
    });
    parser.on("error", reject);
    parser.on("end", () => resolve(members));
    parser.end(tarBytes);
  });
}

export async function introspectArchive(
  bytes: Buffer,
  filename: string,
  packageName: string
): Promise<MemberSummary> {
  const method = decompressionFor(filename);
  if (!method) {
    throw new UnsupportedArchiveError(filename);
  }
  let members: string[];
  try {
    members = await listTarMembers(await decompress(bytes, method));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new UnsupportedArchiveError(filename, reason);
  }
  return introspectMembers(members, packageName);
}

/** Same classification over a list that was extracted elsewhere. */
export function introspectMembers(members: readonly string[], packageName: string): MemberSummary {
  return summarizeMembers(members, packageName);
}
