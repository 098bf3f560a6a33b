import { marked, type Token } from "marked";
import type { KindSource, PackageKind } from "../../../shared/src/contracts";
import { normalizePackageName, parseRepositoryRef } from "../platform/naming";

export interface IssueInput {
  title: string;
  body: string;
}

export interface IssueRequest {
  repositoryUrl: string;
  owner: string;
  repo: string;
  packageName: string;
  description?: string;
  kind: PackageKind;
  kindSource: KindSource;
}

export type IssueParseResult = { ok: true; request: IssueRequest } | { ok: false; reason: string };

type IssueSection = { heading: string; blocks: string[] };

const REPOSITORY_HEADING = /repository|url|homepage/i;
const DESCRIPTION_HEADING = /description/i;
const ANY_URL = /https?:\/\/[^\s<>"'`]+/i;
const GITHUB_URL = /https?:\/\/(?:www\.)?github\.com\/[^\s<>"'`]+/i;
/** Placeholder GitHub issue forms put in unanswered fields. */
const NO_RESPONSE = "_No response_";

const CASK_HINT = /\btype:\s*(?:cask|gui)\b/;
const FORMULA_HINT = /\btype:\s*(?:formula|cli)\b/;
const GUI_KEYWORDS = /\b(?:gui|desktop|application|app|electron|tauri|qt|gtk|visual|editor|ide)\b/;
const CLI_KEYWORDS = /\b(?:cli|command-line|terminal|shell|tool|utility|binary)\b/;

export function parseIssueRequest(issue: IssueInput): IssueParseResult {
  const sections = splitSections(issue.body);
  const url = extractRepositoryUrl(sections, issue.body);
  if (!url) {
    return { ok: false, reason: "could not find repository URL in issue body" };
  }
  if (!/github\.com\//i.test(url)) {
    return { ok: false, reason: `repository URL must be a GitHub URL: ${url}` };
  }
  const ref = parseRepositoryRef(url);
  if (!ref.ok) {
    return { ok: false, reason: ref.reason };
  }
  const packageName = normalizePackageName(ref.repo);
  if (!packageName) {
    return { ok: false, reason: `could not derive package name from repository URL: ${url}` };
  }

  const description = extractDescription(sections);
  const { kind, source } = detectPackageKind(issue.title, issue.body);
  return {
    ok: true,
    request: {
      repositoryUrl: `https://github.com/${ref.owner}/${ref.repo}`,
      owner: ref.owner,
      repo: ref.repo,
      packageName,
      ...(description ? { description } : {}),
      kind,
      kindSource: source
    }
  };
}

export function detectPackageKind(title: string, body: string): { kind: PackageKind; source: KindSource } {
  const combined = `${body} ${title}`.toLowerCase();
  if (CASK_HINT.test(combined)) {
    return { kind: "cask", source: "hint" };
  }
  if (FORMULA_HINT.test(combined)) {
    return { kind: "formula", source: "hint" };
  }
  if (GUI_KEYWORDS.test(combined)) {
    return { kind: "cask", source: "keyword" };
  }
  if (CLI_KEYWORDS.test(combined)) {
    return { kind: "formula", source: "keyword" };
  }
  return { kind: "formula", source: "default" };
}

function splitSections(body: string): IssueSection[] {
  const sections: IssueSection[] = [];
  let current: IssueSection | undefined;
  for (const token of marked.lexer(body)) {
    if (token.type === "heading") {
      current = { heading: tokenText(token), blocks: [] };
      sections.push(current);
    } else if (current && token.type !== "space") {
      current.blocks.push(token.raw.trim());
    }
  }
  return sections;
}

function extractRepositoryUrl(sections: IssueSection[], body: string): string | undefined {
  for (const section of sections) {
    if (!REPOSITORY_HEADING.test(section.heading)) {
      continue;
    }
    const text = section.blocks.join("\n");
    const match = GITHUB_URL.exec(text) ?? ANY_URL.exec(text);
    if (match) {
      return trimUrl(match[0]);
    }
  }
  const fallback = GITHUB_URL.exec(body);
  return fallback ? trimUrl(fallback[0]) : undefined;
}

function extractDescription(sections: IssueSection[]): string | undefined {
  const section = sections.find((entry) => DESCRIPTION_HEADING.test(entry.heading));
  if (!section) {
    return undefined;
  }
  const firstLine = section.blocks
    .join("\n")
    .split("\n")
    .map((line) => line.trim())
    .find((line) => line.length > 0);
  if (!firstLine || firstLine === NO_RESPONSE) {
    return undefined;
  }
  return firstLine;
}

function trimUrl(url: string): string {
  return url.trim().replace(/[.,)\]]+$/, "");
}

function tokenText(token: Token): string {
  return "text" in token && typeof token.text === "string" ? token.text.trim() : token.raw.trim();
}

export interface IssueReference {
  owner: string;
  repo: string;
  number: number;
}

/** `owner/repo#12` or `https://github.com/owner/repo/issues/12`. */
export function parseIssueReference(value: string): IssueReference | undefined {
  const match =
    /^([\w.-]+)\/([\w.-]+)#(\d+)$/.exec(value.trim()) ??
    /^https?:\/\/(?:www\.)?github\.com\/([\w.-]+)\/([\w.-]+)\/issues\/(\d+)\/?$/i.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const number = Number(match[3]);
  return number > 0 ? { owner: match[1], repo: match[2], number } : undefined;
}
