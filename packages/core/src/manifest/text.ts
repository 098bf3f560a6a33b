import { slugifyAppName } from "../platform/naming";

const LEADING_ARTICLES = ["A ", "An ", "The "];

/**
 * Repository descriptions are usually sentences; manifest descriptions are
 * noun phrases starting with a capital letter and no trailing period.
 */
export function cleanDescription(description: string): string {
  let value = description.trim();
  for (const article of LEADING_ARTICLES) {
    if (value.startsWith(article)) {
      value = value.slice(article.length);
      break;
    }
  }
  value = value.replace(/\.$/, "");
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/** Escapes text for use inside a Ruby double-quoted string. */
export function escapeRubyText(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/#\{/g, "\\#{");
}

export function rubyString(value: string): string {
  return `"${escapeRubyText(value)}"`;
}

const XDG_BASES = [
  `#{ENV.fetch("XDG_CONFIG_HOME", "#{Dir.home}/.config")}`,
  `#{ENV.fetch("XDG_CACHE_HOME", "#{Dir.home}/.cache")}`,
  `#{ENV.fetch("XDG_DATA_HOME", "#{Dir.home}/.local/share")}`
];

export const XDG_DATA_HOME = `ENV.fetch("XDG_DATA_HOME", "#{Dir.home}/.local/share")`;

export function inferCleanupPaths(appName: string): string[] {
  const slug = escapeRubyText(slugifyAppName(appName));
  return XDG_BASES.map((base) => `${base}/${slug}`).sort();
}
