export type RepositoryRef = {
  owner: string;
  repo: string;
};

export type RepositoryRefResult =
  | ({ ok: true } & RepositoryRef)
  | { ok: false; reason: string };

/**
 * Accepts `https://github.com/owner/repo`, `github.com/owner/repo` and
 * `owner/repo`, with or without a trailing slash or `.git` suffix.
 */
export function parseRepositoryRef(input: string): RepositoryRefResult {
  let value = input.trim().replace(/\/+$/, "");
  value = value.replace(/^https?:\/\//, "").replace(/^(www\.)?github\.com\//, "");

  const parts = value.split("/");
  if (parts.length < 2) {
    return {
      ok: false,
      reason: `invalid GitHub repository: ${input} (expected format: owner/repo)`
    };
  }
  const owner = parts[0];
  const repo = parts[1].replace(/\.git$/, "");
  if (!owner || !repo) {
    return { ok: false, reason: "invalid GitHub repository: owner or repo cannot be empty" };
  }
  return { ok: true, owner, repo };
}

/** `My_Cool App` becomes `my-cool-app`. */
export function normalizePackageName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[_\s]/g, "-")
    .replace(/[^a-z0-9-]/g, "")
    .replace(/-+/g, "-")
    .replace(/^-+|-+$/g, "");
}

export function ensureLinuxSuffix(name: string): string {
  return name.endsWith("-linux") ? name : `${name}-linux`;
}

/** `go-task` becomes `GoTask`, `node_exporter` becomes `NodeExporter`. */
export function packageNameToClassName(name: string): string {
  return name
    .replace(/[-_]/g, " ")
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join("");
}

export function slugifyAppName(appName: string): string {
  return appName.toLowerCase().replace(/[ _]/g, "-");
}

export function stripVersionPrefix(tag: string): string {
  return /^v\d/.test(tag) ? tag.slice(1) : tag;
}
