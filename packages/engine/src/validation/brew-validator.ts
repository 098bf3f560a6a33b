import fs from "fs";
import path from "path";
import type {
  CheckResult,
  ManifestValidator,
  ValidationReport,
  ValidationRequest
} from "../../../core/src/release";
import type { PackageKind } from "../../../core/src/manifest";
import type { Logger } from "../logger";
import { runCommand, type CommandRunner } from "./process";

export const AUDIT_REQUIRES_TAP =
  "audit needs the manifest registered in its tap; move it into the tap and run `validate file --in-tap`";

export interface BrewValidatorOptions {
  command: string;
  logger: Logger;
  /** Qualifies audit targets as `<tap>/<name>`. */
  tapName?: string;
  /** Placed before the subcommand, e.g. a script run by the `command` interpreter. */
  commandArgs?: string[];
  runner?: CommandRunner;
}

export class BrewValidator implements ManifestValidator {
  private readonly command: string;
  private readonly logger: Logger;
  private readonly tapName?: string;
  private readonly commandArgs: string[];
  private readonly runner: CommandRunner;

  constructor(options: BrewValidatorOptions) {
    this.command = options.command;
    this.logger = options.logger;
    this.tapName = options.tapName;
    this.commandArgs = options.commandArgs ?? [];
    this.runner = options.runner ?? runCommand;
  }

  async validate(request: ValidationRequest): Promise<ValidationReport> {
    const before = fs.readFileSync(request.filePath, "utf8");
    const style = await this.runStyle(request.filePath, request.autoFix);
    const fixed = request.autoFix && fs.readFileSync(request.filePath, "utf8") !== before;
    if (fixed) {
      this.logger.info("Style auto-fix rewrote manifest", { path: request.filePath });
    }

    const audit: CheckResult =
      request.placement === "in-tap"
        ? await this.runAudit(request.filePath, request.kind)
        : { status: "skipped", output: "", reason: AUDIT_REQUIRES_TAP };

    const diagnostics = [audit, style]
      .filter((check) => check.status === "failed" && check.output.length > 0)
      .map((check) => check.output);
    const ok = style.status !== "failed" && audit.status !== "failed";
    this.logger.debug("Validation finished", {
      path: request.filePath,
      audit: audit.status,
      style: style.status
    });
    return { ok, audit, style, fixed, diagnostics };
  }

  private async runStyle(filePath: string, autoFix: boolean): Promise<CheckResult> {
    const args = ["style", ...(autoFix ? ["--fix"] : []), filePath];
    return this.check(args);
  }

  private async runAudit(filePath: string, kind: PackageKind): Promise<CheckResult> {
    const name = path.basename(filePath, ".rb");
    const target = this.tapName ? `${this.tapName}/${name}` : name;
    return this.check(["audit", "--strict", kind === "cask" ? "--cask" : "--formula", target]);
  }

  private async check(args: string[]): Promise<CheckResult> {
    const result = await this.runner(this.command, [...this.commandArgs, ...args]);
    return { status: result.exitCode === 0 ? "passed" : "failed", output: result.output };
  }
}
