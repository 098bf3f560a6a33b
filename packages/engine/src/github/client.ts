import Ajv from "ajv/dist/2020";
import type { ValidateFunction } from "ajv";
import type {
  ReleaseInfo,
  ReleaseMetadataProvider,
  RepositoryFileLister,
  RepositoryInfo
} from "../../../core/src/release";
import { normalizeErrors } from "../../../core/src/manifest";
import { DEFAULT_API_URL, tokenHint, type Environment } from "../config";
import { GitHubApiError, ValidationError } from "../errors";
import type { Logger } from "../logger";
import { messageField, parseJson } from "../utils/json";
import repositorySchema from "./schemas/repository.schema.json";
import releaseSchema from "./schemas/release.schema.json";
import releaseListSchema from "./schemas/release-list.schema.json";
import contentsSchema from "./schemas/contents.schema.json";
import issueSchema from "./schemas/issue.schema.json";

type RepositoryPayload = {
  name: string;
  full_name: string;
  owner: { login: string };
  description?: string | null;
  homepage?: string | null;
  html_url: string;
  default_branch?: string;
  license?: { spdx_id?: string | null } | null;
};

type ReleasePayload = {
  tag_name: string;
  name?: string | null;
  draft: boolean;
  prerelease: boolean;
  published_at?: string | null;
  assets: Array<{ name: string; browser_download_url: string; size: number }>;
};

type ContentsPayload = Array<{ name: string; path: string; type: string }>;

type IssuePayload = {
  number: number;
  title: string;
  body?: string | null;
  state: string;
  html_url: string;
};

export interface GitHubIssue {
  number: number;
  title: string;
  body: string;
  state: string;
  htmlUrl: string;
}

export interface GitHubClientOptions {
  logger: Logger;
  apiUrl?: string;
  token?: string;
  /** Consulted for the missing-token hint. */
  env?: Environment;
}

const ajv = new Ajv({ allErrors: true, strict: true, allowUnionTypes: true });

const validateRepository = ajv.compile<RepositoryPayload>(repositorySchema);
const validateRelease = ajv.compile<ReleasePayload>(releaseSchema);
const validateReleaseList = ajv.compile<ReleasePayload[]>(releaseListSchema);
const validateContents = ajv.compile<ContentsPayload>(contentsSchema);
const validateIssue = ajv.compile<IssuePayload>(issueSchema);

const RATE_LIMIT_THRESHOLD = 100;
const RELEASES_PER_PAGE = 100;

export class GitHubClient implements ReleaseMetadataProvider, RepositoryFileLister {
  private readonly apiUrl: string;
  private readonly token?: string;
  private readonly logger: Logger;
  private readonly env: Environment;
  private tokenWarningShown = false;
  private rateLimitWarningShown = false;

  constructor(options: GitHubClientOptions) {
    this.apiUrl = (options.apiUrl ?? DEFAULT_API_URL).replace(/\/+$/, "");
    this.token = options.token;
    this.logger = options.logger;
    this.env = options.env ?? process.env;
  }

  async getRepository(owner: string, repo: string): Promise<RepositoryInfo> {
    const payload = await this.get(repoPath(owner, repo), validateRepository);
    const license = payload.license?.spdx_id;
    return {
      owner: payload.owner.login,
      name: payload.name,
      fullName: payload.full_name,
      description: payload.description ?? "",
      homepage: payload.homepage ?? "",
      ...(license && license !== "NOASSERTION" ? { license } : {}),
      htmlUrl: payload.html_url,
      defaultBranch: payload.default_branch ?? "main"
    };
  }

  async getLatestRelease(owner: string, repo: string): Promise<ReleaseInfo | undefined> {
    const payload = await this.getOptional(`${repoPath(owner, repo)}/releases/latest`, validateRelease);
    return payload ? toReleaseInfo(payload) : undefined;
  }

  async listReleases(owner: string, repo: string): Promise<ReleaseInfo[]> {
    const payload = await this.get(
      `${repoPath(owner, repo)}/releases?per_page=${RELEASES_PER_PAGE}`,
      validateReleaseList
    );
    return payload.map(toReleaseInfo);
  }

  async listRootFiles(owner: string, repo: string, ref?: string): Promise<string[]> {
    const query = ref ? `?ref=${encodeURIComponent(ref)}` : "";
    const payload = await this.get(`${repoPath(owner, repo)}/contents/${query}`, validateContents);
    return payload.filter((entry) => entry.type === "file").map((entry) => entry.name);
  }

  async getIssue(owner: string, repo: string, number: number): Promise<GitHubIssue> {
    const payload = await this.get(`${repoPath(owner, repo)}/issues/${number}`, validateIssue);
    return {
      number: payload.number,
      title: payload.title,
      body: payload.body ?? "",
      state: payload.state,
      htmlUrl: payload.html_url
    };
  }

  private async get<T>(path: string, validate: ValidateFunction<T>): Promise<T> {
    const payload = await this.getOptional(path, validate);
    if (payload === undefined) {
      throw new GitHubApiError(404, `${this.apiUrl}${path}`, "Not Found");
    }
    return payload;
  }

  /** Resolves undefined on 404. */
  private async getOptional<T>(path: string, validate: ValidateFunction<T>): Promise<T | undefined> {
    const url = `${this.apiUrl}${path}`;
    this.warnIfUnauthenticated();
    this.logger.debug("GitHub request", { url });

    let response: Response;
    try {
      response = await fetch(url, { headers: this.headers() });
    } catch (error) {
      const message = error instanceof Error ? error.message : "request failed";
      throw new GitHubApiError(0, url, message);
    }
    this.checkRateLimit(response.headers);

    if (response.status === 404) {
      await response.text();
      return undefined;
    }
    if (!response.ok) {
      throw new GitHubApiError(response.status, url, await errorMessage(response));
    }

    const body: unknown = await response.json();
    if (!validate(body)) {
      throw new ValidationError(
        `Unexpected GitHub payload from ${url}: ${normalizeErrors(validate.errors).join("; ")}`
      );
    }
    return body;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: "application/vnd.github+json",
      "X-GitHub-Api-Version": "2022-11-28",
      "User-Agent": "tapwright"
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }
    return headers;
  }

  private warnIfUnauthenticated(): void {
    if (this.token || this.tokenWarningShown) {
      return;
    }
    this.tokenWarningShown = true;
    this.logger.warn("GITHUB_TOKEN is not set; unauthenticated requests are limited to 60 per hour", {
      hint: tokenHint(this.env)
    });
  }

  private checkRateLimit(headers: Headers): void {
    if (this.rateLimitWarningShown) {
      return;
    }
    const limit = Number(headers.get("x-ratelimit-limit"));
    const remaining = Number(headers.get("x-ratelimit-remaining"));
    if (!headers.has("x-ratelimit-remaining") || !Number.isFinite(limit) || !Number.isFinite(remaining)) {
      return;
    }
    if (remaining >= rateLimitThreshold(limit)) {
      return;
    }
    this.rateLimitWarningShown = true;
    const reset = Number(headers.get("x-ratelimit-reset"));
    this.logger.warn("GitHub API rate limit low", {
      remaining,
      limit,
      ...(Number.isFinite(reset) && reset > 0 ? { resetsAt: new Date(reset * 1000).toISOString() } : {})
    });
  }
}

/** 100 requests, or a tenth of the limit when the limit is below 1000. */
export function rateLimitThreshold(limit: number): number {
  return limit < 1000 ? Math.floor(limit / 10) : RATE_LIMIT_THRESHOLD;
}

function repoPath(owner: string, repo: string): string {
  return `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`;
}

function toReleaseInfo(payload: ReleasePayload): ReleaseInfo {
  return {
    tagName: payload.tag_name,
    name: payload.name ?? payload.tag_name,
    draft: payload.draft,
    prerelease: payload.prerelease,
    ...(payload.published_at ? { publishedAt: payload.published_at } : {}),
    assets: payload.assets.map((asset) => ({
      name: asset.name,
      downloadUrl: asset.browser_download_url,
      sizeBytes: asset.size
    }))
  };
}

async function errorMessage(response: Response): Promise<string> {
  const text = await response.text();
  return messageField(parseJson(text)) ?? (text.trim() || response.statusText);
}
