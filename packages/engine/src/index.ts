export { Engine } from "./engine";
export type { EngineOptions, IssueGeneration, IssueGenerationOptions, IssueSource } from "./engine";
export { loadConfig, parseLogLevel, tokenHint } from "./config";
export type { EngineConfig, Environment, LogLevel } from "./config";
export { Logger } from "./logger";
export type { LogSink, LoggerOptions } from "./logger";
export * from "./errors";
export { GitHubClient, rateLimitThreshold } from "./github/client";
export type { GitHubClientOptions, GitHubIssue } from "./github/client";
export { ChecksumService } from "./checksum/service";
export type { ChecksumStatus } from "../../shared/src/contracts";
export type { ChecksumVerification, UpstreamChecksums } from "./checksum/service";
export { decompress, decompressionFor, introspectArchive, introspectMembers, listTarMembers } from "./archive/introspect";
export type { Decompression } from "./archive/introspect";
export { AUDIT_REQUIRES_TAP, BrewValidator } from "./validation/brew-validator";
export type { BrewValidatorOptions } from "./validation/brew-validator";
export { runCommand } from "./validation/process";
export type { CommandResult, CommandRunner } from "./validation/process";
export { inferKind, validateDirectory, validateFile } from "./validation/tap";
export type { DirectoryValidation, FileValidation, ValidateOptions } from "./validation/tap";
export { ManifestGenerator } from "./generator/manifest-generator";
export type {
  AssetVerifier,
  GenerationRequest,
  GenerationResult,
  ManifestGeneratorOptions
} from "./generator/manifest-generator";
export { runCli } from "./cli/main";
export { parseCliArgs } from "./cli/args";
export type { CliCommand } from "./cli/args";
