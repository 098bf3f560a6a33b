import path from "path";
import { ValidationError } from "./errors";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export const DEFAULT_API_URL = "https://api.github.com";

export interface EngineConfig {
  githubToken?: string;
  apiUrl: string;
  logLevel: LogLevel;
  /** Directory holding `Formula/` and `Casks/`. */
  tapRoot: string;
  validatorCommand: string;
  tapName?: string;
}

export type Environment = Record<string, string | undefined>;

export function loadConfig(env: Environment = process.env, cwd: string = process.cwd()): EngineConfig {
  const githubToken = firstNonEmpty(env.GITHUB_TOKEN, env.GH_TOKEN);
  const tapName = firstNonEmpty(env.TAPWRIGHT_TAP_NAME);
  return {
    ...(githubToken ? { githubToken } : {}),
    apiUrl: (firstNonEmpty(env.TAPWRIGHT_API_URL) ?? DEFAULT_API_URL).replace(/\/+$/, ""),
    logLevel: parseLogLevel(env.TAPWRIGHT_LOG_LEVEL),
    tapRoot: path.resolve(cwd, firstNonEmpty(env.TAPWRIGHT_TAP_ROOT) ?? "."),
    validatorCommand: firstNonEmpty(env.TAPWRIGHT_VALIDATOR) ?? "brew",
    ...(tapName ? { tapName } : {})
  };
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) {
    return "info";
  }
  const level = LOG_LEVELS.find((entry) => entry === normalized);
  if (!level) {
    throw new ValidationError(
      `Invalid log level "${value}" (expected one of ${LOG_LEVELS.join(", ")})`
    );
  }
  return level;
}

/** Where the missing token should come from in the current environment. */
export function tokenHint(env: Environment = process.env): string {
  if (env.GITHUB_ACTIONS === "true") {
    return "add `env: GITHUB_TOKEN: ${{ secrets.GITHUB_TOKEN }}` to the workflow step";
  }
  if (env.CODESPACES === "true") {
    return "Codespaces provides GITHUB_TOKEN; check that it is exported in this shell";
  }
  return "export GITHUB_TOKEN=$(gh auth token) or create a token at https://github.com/settings/tokens";
}

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  return values.map((value) => value?.trim()).find((value): value is string => Boolean(value));
}
