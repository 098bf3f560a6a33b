import path from "path";
import {
  parseIssueRequest,
  type IssueInput,
  type IssueReference,
  type IssueRequest
} from "../../core/src/issues";
import type { ManifestValidator } from "../../core/src/release";
import { ChecksumService } from "./checksum/service";
import type { EngineConfig } from "./config";
import { ValidationError } from "./errors";
import {
  ManifestGenerator,
  type GenerationRequest,
  type GenerationResult
} from "./generator/manifest-generator";
import { GitHubClient } from "./github/client";
import { Logger } from "./logger";
import { BrewValidator } from "./validation/brew-validator";
import {
  validateDirectory,
  validateFile,
  type DirectoryValidation,
  type FileValidation,
  type ValidateOptions
} from "./validation/tap";

export type IssueSource = { reference: IssueReference } | { issue: IssueInput };

export type IssueGenerationOptions = Pick<GenerationRequest, "output" | "validate" | "autoFix" | "allowPrerelease">;

export interface IssueGeneration {
  request: IssueRequest;
  generation: GenerationResult;
}

export interface EngineOptions {
  logger?: Logger;
  github?: GitHubClient;
  validator?: ManifestValidator;
}

/** Wires the GitHub client, checksum service and validator into one entry point. */
export class Engine {
  private readonly config: EngineConfig;
  private readonly logger: Logger;
  private readonly github: GitHubClient;
  private readonly validator: ManifestValidator;
  private readonly generator: ManifestGenerator;

  constructor(config: EngineConfig, options: EngineOptions = {}) {
    this.config = config;
    this.logger = options.logger ?? new Logger(config.logLevel);
    this.github =
      options.github ??
      new GitHubClient({
        apiUrl: config.apiUrl,
        token: config.githubToken,
        logger: this.logger.child("github")
      });
    this.validator =
      options.validator ??
      new BrewValidator({
        command: config.validatorCommand,
        tapName: config.tapName,
        logger: this.logger.child("validate")
      });
    this.generator = new ManifestGenerator({
      releases: this.github,
      files: this.github,
      verifier: new ChecksumService(this.logger.child("checksum")),
      validator: this.validator,
      logger: this.logger.child("generate"),
      tapRoot: config.tapRoot
    });
  }

  generate(request: GenerationRequest): Promise<GenerationResult> {
    return this.generator.generate(request);
  }

  validateFile(filePath: string, options: ValidateOptions): Promise<FileValidation> {
    return validateFile(this.validator, path.resolve(filePath), options);
  }

  validateDirectory(root: string | undefined, options: ValidateOptions): Promise<DirectoryValidation> {
    return validateDirectory(this.validator, path.resolve(root ?? this.config.tapRoot), options);
  }

  async generateFromIssue(source: IssueSource, options: IssueGenerationOptions = {}): Promise<IssueGeneration> {
    const issue =
      "reference" in source
        ? await this.github.getIssue(source.reference.owner, source.reference.repo, source.reference.number)
        : source.issue;
    const parsed = parseIssueRequest({ title: issue.title, body: issue.body });
    if (!parsed.ok) {
      throw new ValidationError(parsed.reason);
    }
    const { request } = parsed;
    this.logger.info("Parsed package request", {
      repository: request.repositoryUrl,
      kind: request.kind,
      kindSource: request.kindSource
    });
    const generation = await this.generator.generate({
      repository: request.repositoryUrl,
      kind: request.kind,
      name: request.packageName,
      ...options
    });
    return { request, generation };
  }
}
