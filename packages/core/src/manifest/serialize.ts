import type { ManifestDocument } from "./types";

const INDENT = "  ";

/**
 * Emits the document with two-space indentation and exactly one blank line
 * between non-empty sections. Output always ends with a single newline.
 */
export function serializeManifest(document: ManifestDocument): string {
  const head: string[] = [...document.magicComments];
  if (head.length > 0) {
    head.push("");
  }
  head.push(...document.comments, document.opening);

  const body = document.sections
    .filter((section) => section.lines.length > 0)
    .map((section) => section.lines.map(indentLine).join("\n"));

  const parts = [head.join("\n")];
  if (body.length > 0) {
    parts.push(body.join("\n\n"));
  }
  parts.push("end");
  return `${parts.join("\n")}\n`;
}

function indentLine(line: string): string {
  return line.length === 0 ? "" : `${INDENT}${line}`;
}
