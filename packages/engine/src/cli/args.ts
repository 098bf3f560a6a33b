import type { PackageKind } from "../../../core/src/manifest";
import { parseIssueReference, type IssueReference } from "../../../core/src/issues";
import { ValidationError } from "../errors";
import type { GenerationRequest } from "../generator/manifest-generator";

type Output = { json: boolean };

export type CliCommand =
  | ({ command: "generate"; request: GenerationRequest } & Output)
  | ({ command: "validate-file"; path: string; autoFix: boolean; inTap: boolean } & Output)
  | ({ command: "validate-all"; root?: string; autoFix: boolean } & Output)
  | ({
      command: "issue";
      reference?: IssueReference;
      bodyFile?: string;
      title?: string;
      validate: boolean;
      autoFix: boolean;
      output?: string;
    } & Output)
  | { command: "help" };

type Flags = {
  values: Map<string, string>;
  switches: Set<string>;
  positionals: string[];
};

const VALUE_FLAGS = new Set(["--kind", "--name", "--output", "--binary", "--root", "--issue", "--body-file", "--title"]);
const SWITCHES = new Set([
  "--allow-prerelease",
  "--fix",
  "--from-source",
  "--in-tap",
  "--json",
  "--no-fix",
  "--no-validate"
]);

export function parseCliArgs(argv: string[]): CliCommand {
  const [command, ...rest] = argv;
  if (!command || command === "help" || command === "--help" || command === "-h") {
    return { command: "help" };
  }
  switch (command) {
    case "generate":
      return parseGenerate(readFlags(rest));
    case "validate":
      return parseValidate(rest);
    case "issue":
      return parseIssue(readFlags(rest));
    default:
      throw new ValidationError(`Unknown command: ${command}`);
  }
}

function parseGenerate(flags: Flags): CliCommand {
  const [repository] = flags.positionals;
  if (!repository) {
    throw new ValidationError("generate requires a repository (owner/repo or GitHub URL)");
  }
  const request: GenerationRequest = {
    repository,
    kind: parseKind(flags.values.get("--kind") ?? "formula"),
    validate: !flags.switches.has("--no-validate"),
    autoFix: !flags.switches.has("--no-fix"),
    fromSource: flags.switches.has("--from-source"),
    allowPrerelease: flags.switches.has("--allow-prerelease")
  };
  for (const [flag, key] of [
    ["--name", "name"],
    ["--output", "output"],
    ["--binary", "binary"]
  ] as const) {
    const value = flags.values.get(flag);
    if (value) {
      request[key] = value;
    }
  }
  if (request.fromSource && request.kind === "cask") {
    throw new ValidationError("--from-source applies to formulas only");
  }
  return { command: "generate", request, json: flags.switches.has("--json") };
}

function parseValidate(argv: string[]): CliCommand {
  const [target, ...rest] = argv;
  const flags = readFlags(rest);
  const autoFix = flags.switches.has("--fix");
  const json = flags.switches.has("--json");
  if (target === "file") {
    const [filePath] = flags.positionals;
    if (!filePath) {
      throw new ValidationError("validate file requires a path");
    }
    return { command: "validate-file", path: filePath, autoFix, inTap: flags.switches.has("--in-tap"), json };
  }
  if (target === "all") {
    const root = flags.values.get("--root");
    return { command: "validate-all", ...(root ? { root } : {}), autoFix, json };
  }
  throw new ValidationError("validate expects `file <path>` or `all`");
}

function parseIssue(flags: Flags): CliCommand {
  const issue = flags.values.get("--issue");
  const bodyFile = flags.values.get("--body-file");
  if (!issue === !bodyFile) {
    throw new ValidationError("issue requires exactly one of --issue <owner/repo#n> or --body-file <path>");
  }
  const reference = issue ? parseIssueReference(issue) : undefined;
  if (issue && !reference) {
    throw new ValidationError(`Invalid issue reference: ${issue} (expected owner/repo#number)`);
  }
  const title = flags.values.get("--title");
  const output = flags.values.get("--output");
  return {
    command: "issue",
    ...(reference ? { reference } : {}),
    ...(bodyFile ? { bodyFile } : {}),
    ...(title ? { title } : {}),
    ...(output ? { output } : {}),
    validate: !flags.switches.has("--no-validate"),
    autoFix: !flags.switches.has("--no-fix"),
    json: flags.switches.has("--json")
  };
}

function parseKind(value: string): PackageKind {
  if (value === "cask" || value === "formula") {
    return value;
  }
  throw new ValidationError(`Invalid --kind ${value} (expected cask or formula)`);
}

function readFlags(argv: string[]): Flags {
  const flags: Flags = { values: new Map(), switches: new Set(), positionals: [] };
  for (let i = 0; i < argv.length; i += 1) {
    const value = argv[i];
    if (VALUE_FLAGS.has(value)) {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new ValidationError(`${value} requires a value`);
      }
      flags.values.set(value, next);
      i += 1;
    } else if (SWITCHES.has(value)) {
      flags.switches.add(value);
    } else if (value.startsWith("--")) {
      throw new ValidationError(`Unknown option: ${value}`);
    } else {
      flags.positionals.push(value);
    }
  }
  return flags;
}
