#!/usr/bin/env node
import fs from "fs";
import path from "path";
import { loadConfig, type EngineConfig } from "../config";
import { Engine } from "../engine";
import { Logger } from "../logger";
import { parseCliArgs, type CliCommand } from "./args";
import {
  describeDirectoryValidation,
  describeFileValidation,
  describeGeneration,
  toErrorResponse,
  toGenerateResponse,
  toIssueResponse,
  toValidateDirectoryResponse,
  toValidateFileResponse
} from "./format";

export interface CliIo {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

const consoleIo: CliIo = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line)
};

/** Resolves the process exit code. */
export async function runCli(
  argv: string[],
  options: { config?: EngineConfig; engine?: Engine; io?: CliIo } = {}
): Promise<number> {
  const io = options.io ?? consoleIo;
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    io.stderr(error instanceof Error ? error.message : "Invalid arguments");
    printUsage(io);
    return 1;
  }
  if (command.command === "help") {
    printUsage(io);
    return 0;
  }

  try {
    const config = options.config ?? loadConfig();
    const engine = options.engine ?? new Engine(config, { logger: new Logger(config.logLevel) });
    return await execute(engine, config, command, io);
  } catch (error) {
    if (command.json) {
      io.stdout(JSON.stringify(toErrorResponse(error), null, 2));
    } else {
      io.stderr(error instanceof Error ? error.message : "Unknown error");
    }
    return 1;
  }
}

async function execute(
  engine: Engine,
  config: EngineConfig,
  command: Exclude<CliCommand, { command: "help" }>,
  io: CliIo
): Promise<number> {
  switch (command.command) {
    case "generate": {
      const result = await engine.generate(command.request);
      emit(io, command.json, toGenerateResponse(result), describeGeneration(result, config.tapName));
      return result.ok ? 0 : 1;
    }
    case "validate-file": {
      const result = await engine.validateFile(command.path, {
        autoFix: command.autoFix,
        placement: command.inTap ? "in-tap" : "staged"
      });
      emit(io, command.json, toValidateFileResponse(result), describeFileValidation(result));
      return result.report.ok ? 0 : 1;
    }
    case "validate-all": {
      const result = await engine.validateDirectory(command.root, { autoFix: command.autoFix });
      emit(io, command.json, toValidateDirectoryResponse(result), describeDirectoryValidation(result));
      return result.failures === 0 ? 0 : 1;
    }
    case "issue": {
      const source = command.reference
        ? { reference: command.reference }
        : {
            issue: {
              title: command.title ?? "",
              body: fs.readFileSync(path.resolve(command.bodyFile ?? ""), "utf8")
            }
          };
      const { request, generation } = await engine.generateFromIssue(source, {
        validate: command.validate,
        autoFix: command.autoFix,
        ...(command.output ? { output: command.output } : {})
      });
      emit(io, command.json, toIssueResponse(request, generation), [
        `Request: ${request.repositoryUrl} as ${request.kind} (${request.kindSource})`,
        ...describeGeneration(generation, config.tapName)
      ]);
      return generation.ok ? 0 : 1;
    }
  }
}

function emit(io: CliIo, json: boolean, payload: unknown, lines: string[]): void {
  if (json) {
    io.stdout(JSON.stringify(payload, null, 2));
    return;
  }
  for (const line of lines) {
    io.stdout(line);
  }
}

function printUsage(io: CliIo): void {
  const lines = [
    "Usage:",
    "  tapwright generate <owner/repo|url> [--kind cask|formula] [--name <name>] [--output <path>]",
    "                     [--binary <name>] [--from-source] [--allow-prerelease] [--no-validate] [--no-fix]",
    "  tapwright validate file <path> [--fix] [--in-tap]",
    "  tapwright validate all [--root <dir>] [--fix]",
    "  tapwright issue (--issue <owner/repo#n> | --body-file <path> [--title <title>]) [--output <path>]",
    "                  [--no-validate] [--no-fix]",
    "Options:",
    "  --json             Print a JSON response instead of text",
    "Environment:",
    "  GITHUB_TOKEN, GH_TOKEN   GitHub API token",
    "  TAPWRIGHT_TAP_ROOT       Tap directory holding Formula/ and Casks/ (default: cwd)",
    "  TAPWRIGHT_TAP_NAME       Tap name used in audit targets and install hints",
    "  TAPWRIGHT_VALIDATOR      Validator executable (default: brew)",
    "  TAPWRIGHT_API_URL        GitHub API base URL",
    "  TAPWRIGHT_LOG_LEVEL      debug, info, warn or error (default: info)"
  ];
  for (const line of lines) {
    io.stdout(line);
  }
}

if (require.main === module) {
  void runCli(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
  });
}
