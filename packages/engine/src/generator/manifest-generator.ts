import fs from "fs";
import path from "path";
import {
  baseName,
  type MemberSummary
} from "../../../core/src/archive";
import { detectBuildStrategy, strategyName, type BuildStrategy } from "../../../core/src/buildsystem";
import { sha256Hex } from "../../../core/src/checksum";
import {
  createBinaryFormulaData,
  createCaskData,
  createSourceFormulaData,
  placementFor,
  renderManifest,
  type IdentityInput,
  type ManifestData,
  type PackageKind
} from "../../../core/src/manifest";
import {
  classifyAsset,
  ensureLinuxSuffix,
  isTarballFormat,
  normalizePackageName,
  parseRepositoryRef,
  selectBestAsset,
  stripVersionPrefix,
  type ClassifiedAsset
} from "../../../core/src/platform";
import {
  pickFallbackRelease,
  sourceTarballUrl,
  type ManifestValidator,
  type ReleaseInfo,
  type ReleaseMetadataProvider,
  type RepositoryFileLister,
  type RepositoryInfo,
  type ValidationReport
} from "../../../core/src/release";
import { introspectArchive } from "../archive/introspect";
import type { ChecksumVerification } from "../checksum/service";
import {
  BuildSystemNotDetectedError,
  InvalidRepositoryError,
  ManifestRenderError,
  NoEligibleAssetError,
  NoReleaseError
} from "../errors";
import type { Logger } from "../logger";

export interface GenerationRequest {
  /** `owner/repo` or a GitHub URL. */
  repository: string;
  kind: PackageKind;
  name?: string;
  output?: string;
  /** Binary name to wire into the manifest instead of the detected one. */
  binary?: string;
  /** Formulas only: skip prebuilt assets and build from the tagged source. */
  fromSource?: boolean;
  allowPrerelease?: boolean;
  validate?: boolean;
  autoFix?: boolean;
}

export interface GenerationResult {
  ok: boolean;
  outputPath: string;
  content: string;
  data: ManifestData;
  tag: string;
  version: string;
  asset?: ClassifiedAsset;
  checksum: ChecksumVerification;
  buildSystem?: string;
  validation?: ValidationReport;
}

export interface AssetVerifier {
  download(url: string): Promise<Buffer>;
  verify(bytes: Uint8Array, assetName: string, assetUrl: string): Promise<ChecksumVerification>;
}

export interface ManifestGeneratorOptions {
  releases: ReleaseMetadataProvider;
  files: RepositoryFileLister;
  verifier: AssetVerifier;
  logger: Logger;
  tapRoot: string;
  validator?: ManifestValidator;
}

type GenerationContext = {
  request: GenerationRequest;
  owner: string;
  repo: string;
  repository: RepositoryInfo;
  release: ReleaseInfo;
  version: string;
  packageName: string;
};

type Synthesis = {
  data: ManifestData;
  asset?: ClassifiedAsset;
  checksum: ChecksumVerification;
  buildSystem?: string;
};

export class ManifestGenerator {
  private readonly releases: ReleaseMetadataProvider;
  private readonly files: RepositoryFileLister;
  private readonly verifier: AssetVerifier;
  private readonly logger: Logger;
  private readonly tapRoot: string;
  private readonly validator?: ManifestValidator;

  constructor(options: ManifestGeneratorOptions) {
    this.releases = options.releases;
    this.files = options.files;
    this.verifier = options.verifier;
    this.logger = options.logger;
    this.tapRoot = options.tapRoot;
    this.validator = options.validator;
  }

  /** Nothing is written unless the manifest rendered. */
  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const context = await this.resolveContext(request);
    const synthesis =
      request.kind === "cask" ? await this.synthesizeCask(context) : await this.synthesizeFormula(context);

    const rendered = renderManifest(synthesis.data);
    if (!rendered.ok) {
      throw new ManifestRenderError(rendered.errors);
    }

    const outputPath = path.resolve(request.output ?? this.defaultOutputPath(synthesis.data));
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, rendered.text, "utf8");
    this.logger.info("Manifest written", { path: outputPath, kind: request.kind });

    const result: GenerationResult = {
      ok: true,
      outputPath,
      content: rendered.text,
      data: synthesis.data,
      tag: context.release.tagName,
      version: context.version,
      checksum: synthesis.checksum,
      ...(synthesis.asset ? { asset: synthesis.asset } : {}),
      ...(synthesis.buildSystem ? { buildSystem: synthesis.buildSystem } : {})
    };
    if (request.validate === false || !this.validator) {
      return result;
    }

    const validation = await this.validator.validate({
      filePath: outputPath,
      kind: request.kind,
      autoFix: request.autoFix ?? true,
      placement: "staged"
    });
    if (!validation.ok) {
      this.logger.warn("Manifest failed validation", {
        path: outputPath,
        diagnostics: validation.diagnostics
      });
    }
    return {
      ...result,
      ok: validation.ok,
      content: validation.fixed ? fs.readFileSync(outputPath, "utf8") : rendered.text,
      validation
    };
  }

  private async resolveContext(request: GenerationRequest): Promise<GenerationContext> {
    const ref = parseRepositoryRef(request.repository);
    if (!ref.ok) {
      throw new InvalidRepositoryError(ref.reason);
    }
    const { owner, repo } = ref;
    const repository = await this.releases.getRepository(owner, repo);
    const release = await this.resolveRelease(owner, repo, request.allowPrerelease ?? false);
    const packageName = normalizePackageName(request.name ?? repo);
    if (!packageName) {
      throw new InvalidRepositoryError(`could not derive a package name from ${request.name ?? repo}`);
    }
    const version = stripVersionPrefix(release.tagName);
    this.logger.info("Resolved release", { repository: `${owner}/${repo}`, tag: release.tagName, version });
    return { request, owner, repo, repository, release, version, packageName };
  }

  private async resolveRelease(owner: string, repo: string, allowPrerelease: boolean): Promise<ReleaseInfo> {
    const latest = await this.releases.getLatestRelease(owner, repo);
    if (latest && !latest.draft) {
      return latest;
    }
    const fallback = pickFallbackRelease(await this.releases.listReleases(owner, repo), allowPrerelease);
    if (!fallback) {
      throw new NoReleaseError(`${owner}/${repo}`);
    }
    if (fallback.prerelease) {
      this.logger.warn("Using prerelease", { tag: fallback.tagName });
    }
    return fallback;
  }

  private async synthesizeCask(context: GenerationContext): Promise<Synthesis> {
    const { release, repository, packageName, request } = context;
    const selection = selectBestAsset(release.assets.map(classifyAsset));
    if (!selection.ok) {
      throw new NoEligibleAssetError(
        `${context.owner}/${context.repo}`,
        release.tagName,
        selection.rejected.map((asset) => asset.name)
      );
    }
    const asset = selection.asset;
    this.logger.info("Selected asset", { asset: asset.name, format: asset.packageFormat });
    const { bytes, checksum } = await this.fetchVerified(asset);

    let binaryPath: string;
    let binaryName: string;
    let summary: MemberSummary | undefined;
    if (isTarballFormat(asset.packageFormat)) {
      summary = await introspectArchive(bytes, asset.name, packageName);
      this.logIntrospection(summary);
      binaryPath = this.chooseBinary(summary, packageName, request.binary);
      binaryName = request.binary ?? baseName(binaryPath);
    } else if (asset.packageFormat === "appimage") {
      binaryPath = asset.name;
      binaryName = request.binary ?? packageName;
    } else {
      binaryPath = `usr/bin/${request.binary ?? packageName}`;
      binaryName = request.binary ?? packageName;
      this.logger.warn("Binary path guessed for package asset; review before publishing", {
        asset: asset.name,
        binaryPath
      });
    }

    const data = createCaskData({
      ...this.identity(context, asset.downloadUrl, checksum.digest),
      token: ensureLinuxSuffix(packageName),
      appName: repository.name,
      binaryPath,
      binaryName,
      ...(summary?.desktopEntry ? { desktopEntry: placementFor(summary.desktopEntry.path) } : {}),
      ...(summary?.icon ? { icon: placementFor(summary.icon.path) } : {})
    });
    return { data, asset, checksum };
  }

  private async synthesizeFormula(context: GenerationContext): Promise<Synthesis> {
    const { release, packageName, request } = context;
    if (request.fromSource) {
      return this.synthesizeSourceFormula(context);
    }
    const selection = selectBestAsset(release.assets.map(classifyAsset));
    const asset = selection.ok ? selection.asset : undefined;
    if (!asset || !(isTarballFormat(asset.packageFormat) || asset.packageFormat === "appimage")) {
      this.logger.info("No prebuilt archive usable by a formula; building from source", {
        asset: asset?.name
      });
      return this.synthesizeSourceFormula(context);
    }

    const { bytes, checksum } = await this.fetchVerified(asset);
    let binaryPath: string;
    let binaryName: string;
    if (asset.packageFormat === "appimage") {
      binaryPath = asset.name;
      binaryName = request.binary ?? packageName;
    } else {
      const summary = await introspectArchive(bytes, asset.name, packageName);
      this.logIntrospection(summary);
      if (!summary.bestBinary && !request.binary) {
        this.logger.info("No binary found in archive; building from source", { asset: asset.name });
        return this.synthesizeSourceFormula(context);
      }
      const archivePath = this.chooseBinary(summary, packageName, request.binary);
      binaryName = request.binary ?? baseName(archivePath);
      // Homebrew unpacks formula archives into their single top-level directory.
      binaryPath =
        summary.rootDirectory && archivePath.startsWith(summary.rootDirectory)
          ? archivePath.slice(summary.rootDirectory.length)
          : archivePath;
    }

    const data = createBinaryFormulaData({
      ...this.identity(context, asset.downloadUrl, checksum.digest),
      packageName,
      binaryName,
      binaryPath,
      ...(context.repository.license ? { license: context.repository.license } : {})
    });
    return { data, asset, checksum, buildSystem: data.buildSystem };
  }

  private async synthesizeSourceFormula(context: GenerationContext): Promise<Synthesis> {
    const { owner, repo, release, packageName, request } = context;
    const files = await this.files.listRootFiles(owner, repo, release.tagName);
    const strategy: BuildStrategy | undefined = detectBuildStrategy(files);
    if (!strategy) {
      throw new BuildSystemNotDetectedError(`${owner}/${repo}`);
    }
    this.logger.info("Detected build system", { buildSystem: strategyName(strategy) });

    const url = sourceTarballUrl(owner, repo, release.tagName);
    const digest = sha256Hex(await this.verifier.download(url));
    const data = createSourceFormulaData({
      ...this.identity(context, url, digest),
      packageName,
      binaryName: request.binary ?? packageName,
      strategy,
      ...(context.repository.license ? { license: context.repository.license } : {})
    });
    return {
      data,
      checksum: { digest, status: "no-upstream-manifest" },
      buildSystem: data.buildSystem
    };
  }

  private async fetchVerified(asset: ClassifiedAsset): Promise<{ bytes: Buffer; checksum: ChecksumVerification }> {
    const bytes = await this.verifier.download(asset.downloadUrl);
    const checksum = await this.verifier.verify(bytes, asset.name, asset.downloadUrl);
    return { bytes, checksum };
  }

  /**
   * An explicit binary must name an archive member, by path or file name.
   * Without one, the best detected binary wins, then a guess under the root
   * directory.
   */
  private chooseBinary(summary: MemberSummary, packageName: string, requested?: string): string {
    if (requested) {
      const match = summary.members.find((member) => member === requested || baseName(member) === requested);
      if (match) {
        return match;
      }
      this.logger.warn("Requested binary not found in archive", { binary: requested });
      return `${summary.rootDirectory ?? ""}${requested}`;
    }
    if (summary.bestBinary) {
      return summary.bestBinary;
    }
    const guess = `${summary.rootDirectory ?? ""}${packageName}`;
    this.logger.warn("No binary detected in archive; guessing path", { binaryPath: guess });
    return guess;
  }

  private logIntrospection(summary: MemberSummary): void {
    this.logger.info("Archive introspected", {
      members: summary.members.length,
      binaries: summary.binaries.length,
      ...(summary.bestBinary ? { binary: summary.bestBinary } : {})
    });
    if (!summary.desktopEntry) {
      this.logger.info("No desktop entry found");
    }
    if (!summary.icon) {
      this.logger.info("No icon found");
    }
  }

  private identity(context: GenerationContext, url: string, sha256: string): IdentityInput {
    const { repository, version } = context;
    if (!repository.description) {
      this.logger.warn("Repository has no description; fill in desc before publishing");
    }
    return {
      version,
      sha256,
      url,
      description: repository.description,
      homepage: repository.homepage,
      sourceUrl: repository.htmlUrl
    };
  }

  private defaultOutputPath(data: ManifestData): string {
    return data.kind === "cask"
      ? path.join(this.tapRoot, "Casks", `${data.token}.rb`)
      : path.join(this.tapRoot, "Formula", `${data.packageName}.rb`);
  }
}
