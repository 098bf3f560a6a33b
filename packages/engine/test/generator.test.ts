import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { test } from "node:test";
import { sha256Hex } from "../../core/src/checksum";
import type {
  ManifestValidator,
  ReleaseInfo,
  ReleaseMetadataProvider,
  RepositoryFileLister,
  RepositoryInfo,
  ValidationRequest
} from "../../core/src/release";
import type { ReleaseAsset } from "../../core/src/platform";
import { ChecksumService } from "../src/checksum/service";
import type { ChecksumVerification } from "../src/checksum/service";
import { ManifestGenerator, type AssetVerifier } from "../src/generator/manifest-generator";
import { GitHubClient } from "../src/github/client";
import { Logger } from "../src/logger";
import { packTar } from "./support/archives";
import { createTempDir, startFixtureServer } from "./support/fixture-server";

const GIZMO: RepositoryInfo = {
  owner: "acme",
  name: "gizmo",
  fullName: "acme/gizmo",
  description: "Gizmo maker",
  homepage: "https://gizmo.example.test",
  license: "Apache-2.0",
  htmlUrl: "https://github.com/acme/gizmo",
  defaultBranch: "main"
};

class FakeGitHub implements ReleaseMetadataProvider, RepositoryFileLister {
  constructor(
    private readonly latest: ReleaseInfo | undefined,
    private readonly releases: ReleaseInfo[] = [],
    private readonly rootFiles: string[] = []
  ) {}

  async getRepository(): Promise<RepositoryInfo> {
    return GIZMO;
  }

  async getLatestRelease(): Promise<ReleaseInfo | undefined> {
    return this.latest;
  }

  async listReleases(): Promise<ReleaseInfo[]> {
    return this.releases;
  }

  async listRootFiles(): Promise<string[]> {
    return this.rootFiles;
  }
}

class FakeVerifier implements AssetVerifier {
  readonly downloads: string[] = [];

  constructor(private readonly bodies: Map<string, Buffer>) {}

  async download(url: string): Promise<Buffer> {
    this.downloads.push(url);
    const body = this.bodies.get(url);
    if (!body) {
      throw new Error(`unexpected download ${url}`);
    }
    return body;
  }

  async verify(bytes: Uint8Array): Promise<ChecksumVerification> {
    return { digest: sha256Hex(bytes), status: "no-upstream-manifest" };
  }
}

function release(tagName: string, assets: ReleaseAsset[], flags: Partial<ReleaseInfo> = {}): ReleaseInfo {
  return { tagName, name: tagName, draft: false, prerelease: false, assets, ...flags };
}

function releaseAsset(name: string): ReleaseAsset {
  return { name, downloadUrl: `https://downloads.example.test/${name}`, sizeBytes: 10 };
}

function generator(github: FakeGitHub, verifier: AssetVerifier, tapRoot: string, validator?: ManifestValidator) {
  return new ManifestGenerator({
    releases: github,
    files: github,
    verifier,
    logger: new Logger("error"),
    tapRoot,
    ...(validator ? { validator } : {})
  });
}

test("formula falls back to a source build when only a package asset exists", async () => {
  const tapRoot = createTempDir("source");
  const sourceUrl = "https://github.com/acme/gizmo/archive/refs/tags/v1.9.0.tar.gz";
  const sourceBytes = Buffer.from("source-bytes");
  const github = new FakeGitHub(
    undefined,
    [release("v2.0.0", [], { draft: true }), release("v1.9.0", [releaseAsset("gizmo_1.9.0_amd64.deb")])],
    ["go.mod", "Makefile", "README.md"]
  );
  const verifier = new FakeVerifier(new Map([[sourceUrl, sourceBytes]]));
  const result = await generator(github, verifier, tapRoot).generate({ repository: "acme/gizmo", kind: "formula" });

  const digest = sha256Hex(sourceBytes);
  const expected = [
    "# typed: strict",
    "# frozen_string_literal: true",
    "",
    "# Generated by tapwright from https://github.com/acme/gizmo",
    "# Regenerate with: tapwright generate https://github.com/acme/gizmo --kind formula",
    "# Gizmo maker",
    "class Gizmo < Formula",
    '  desc "Gizmo maker"',
    '  homepage "https://gizmo.example.test"',
    `  url "${sourceUrl}"`,
    `  sha256 "${digest}"`,
    '  license "Apache-2.0"',
    "",
    '  depends_on "go" => :build',
    "",
    "  def install",
    '    system "go", "build", *std_go_args(ldflags: "-s -w")',
    "  end",
    "",
    "  test do",
    '    system "#{bin}/gizmo", "--version"',
    "  end",
    "end",
    ""
  ].join("\n");
  assert.equal(result.ok, true);
  assert.equal(result.tag, "v1.9.0");
  assert.equal(result.version, "1.9.0");
  assert.equal(result.buildSystem, "Go");
  assert.deepEqual(result.checksum, { digest, status: "no-upstream-manifest" });
  assert.equal(result.outputPath, path.join(tapRoot, "Formula", "gizmo.rb"));
  assert.equal(result.content, expected);
  assert.equal(fs.readFileSync(result.outputPath, "utf8"), expected);
  assert.deepEqual(verifier.downloads, [sourceUrl]);
});

test("prebuilt tarball formula installs the binary relative to the unpacked root", async () => {
  const tapRoot = createTempDir("binary");
  const asset = releaseAsset("gizmo-1.9.0-linux-amd64.tar.gz");
  const bytes = packTar({ "gizmo-1.9.0/gizmo": "bin", "gizmo-1.9.0/LICENSE": "Apache" }, { gzip: true });
  const github = new FakeGitHub(release("v1.9.0", [asset, releaseAsset("gizmo-1.9.0-darwin-arm64.tar.gz")]));
  const verifier = new FakeVerifier(new Map([[asset.downloadUrl, bytes]]));
  const result = await generator(github, verifier, tapRoot).generate({ repository: "acme/gizmo", kind: "formula" });

  assert.equal(result.asset?.name, asset.name);
  assert.equal(result.buildSystem, "Binary");
  assert.equal(result.data.kind, "formula");
  if (result.data.kind === "formula") {
    assert.equal(result.data.installBlock, 'def install\n  bin.install "gizmo"\nend');
    assert.deepEqual(result.data.dependencies, []);
  }
});

test("missing build system is an error and nothing is written", async () => {
  const tapRoot = createTempDir("no-build");
  const github = new FakeGitHub(release("v1.0.0", []), [], ["README.md"]);
  await assert.rejects(
    generator(github, new FakeVerifier(new Map()), tapRoot).generate({
      repository: "acme/gizmo",
      kind: "formula",
      fromSource: true
    }),
    { name: "BuildSystemNotDetectedError", code: "BUILD_SYSTEM_NOT_DETECTED" }
  );
  assert.equal(fs.existsSync(path.join(tapRoot, "Formula")), false);
});

test("cask without a linux asset lists what was considered", async () => {
  const github = new FakeGitHub(release("v1.0.0", [releaseAsset("gizmo-darwin.tar.gz"), releaseAsset("checksums.txt")]));
  await assert.rejects(
    generator(github, new FakeVerifier(new Map()), createTempDir("no-asset")).generate({
      repository: "acme/gizmo",
      kind: "cask"
    }),
    {
      name: "NoEligibleAssetError",
      message: "No Linux-compatible asset in acme/gizmo v1.0.0 (considered: gizmo-darwin.tar.gz, checksums.txt)"
    }
  );
});

test("repositories without releases or with bad references fail early", async () => {
  const github = new FakeGitHub(undefined, [release("v1.0.0-rc.1", [], { prerelease: true })]);
  const subject = generator(github, new FakeVerifier(new Map()), createTempDir("no-release"));
  await assert.rejects(subject.generate({ repository: "acme/gizmo", kind: "formula" }), {
    name: "NoReleaseError",
    message: "No published release found for acme/gizmo"
  });
  await assert.rejects(subject.generate({ repository: "gizmo", kind: "formula" }), {
    name: "InvalidRepositoryError",
    message: "invalid GitHub repository: gizmo (expected format: owner/repo)"
  });
});

test("appimage cask uses the asset as the binary", async () => {
  const tapRoot = createTempDir("appimage");
  const asset = releaseAsset("Gizmo-1.9.0-linux-x86_64.AppImage");
  const github = new FakeGitHub(release("v1.9.0", [asset]));
  const verifier = new FakeVerifier(new Map([[asset.downloadUrl, Buffer.from("appimage")]]));
  const result = await generator(github, verifier, tapRoot).generate({
    repository: "acme/gizmo",
    kind: "cask",
    name: "Gizmo App"
  });
  assert.equal(result.outputPath, path.join(tapRoot, "Casks", "gizmo-app-linux.rb"));
  assert.equal(result.data.kind, "cask");
  if (result.data.kind === "cask") {
    assert.deepEqual(result.data.binary, { path: "Gizmo-1.9.0-linux-x86_64.AppImage", target: "gizmo-app" });
    assert.equal(result.data.desktop, undefined);
  }
});

test("failed validation keeps the file and marks the result", async () => {
  const tapRoot = createTempDir("invalid");
  const asset = releaseAsset("Gizmo-1.9.0-linux-x86_64.AppImage");
  const github = new FakeGitHub(release("v1.9.0", [asset]));
  const verifier = new FakeVerifier(new Map([[asset.downloadUrl, Buffer.from("appimage")]]));
  const requests: ValidationRequest[] = [];
  const validator: ManifestValidator = {
    validate: async (request) => {
      requests.push(request);
      return {
        ok: false,
        audit: { status: "skipped", output: "", reason: "staged" },
        style: { status: "failed", output: "offense" },
        fixed: false,
        diagnostics: ["offense"]
      };
    }
  };
  const result = await generator(github, verifier, tapRoot, validator).generate({ repository: "acme/gizmo", kind: "cask" });
  assert.equal(result.ok, false);
  assert.deepEqual(result.validation?.diagnostics, ["offense"]);
  assert.ok(fs.existsSync(result.outputPath));
  assert.deepEqual(requests, [
    { filePath: result.outputPath, kind: "cask", autoFix: true, placement: "staged" }
  ]);
});

test("cask is generated end to end against a GitHub-shaped server", async () => {
  const server = await startFixtureServer();
  try {
    const tapRoot = createTempDir("end-to-end");
    const assetName = "widget-1.2.0-linux-x86_64.tar.gz";
    const assetUrl = `${server.baseUrl}/dl/v1.2.0/${assetName}`;
    const tarball = packTar(
      {
        "widget-1.2.0/bin/widget": "bin",
        "widget-1.2.0/README.md": "readme",
        "widget-1.2.0/share/applications/widget.desktop": "[Desktop Entry]\nExec=widget\n",
        "widget-1.2.0/share/icons/hicolor/256x256/apps/widget.png": "png"
      },
      { gzip: true }
    );
    server.json("/repos/acme/widget", {
      name: "widget",
      full_name: "acme/widget",
      owner: { login: "acme" },
      description: "A desktop widget.",
      homepage: null,
      html_url: "https://github.com/acme/widget",
      default_branch: "main",
      license: { spdx_id: "MIT" }
    });
    server.json("/repos/acme/widget/releases/latest", {
      tag_name: "v1.2.0",
      name: "1.2.0",
      draft: false,
      prerelease: false,
      published_at: "2024-05-01T00:00:00Z",
      assets: [
        { name: "widget_1.2.0_amd64.deb", browser_download_url: `${server.baseUrl}/dl/v1.2.0/widget_1.2.0_amd64.deb`, size: 3 },
        { name: assetName, browser_download_url: assetUrl, size: tarball.length },
        { name: "checksums.txt", browser_download_url: `${server.baseUrl}/dl/v1.2.0/checksums.txt`, size: 90 }
      ]
    });
    server.route(`/dl/v1.2.0/${assetName}`, { body: tarball });
    server.route("/dl/v1.2.0/checksums.txt", { body: `${sha256Hex(tarball)}  ${assetName}\n` });

    const logger = new Logger("error");
    const github = new GitHubClient({ apiUrl: server.baseUrl, token: "test-secret", logger });
    const subject = new ManifestGenerator({
      releases: github,
      files: github,
      verifier: new ChecksumService(logger),
      logger,
      tapRoot
    });
    const result = await subject.generate({ repository: "https://github.com/acme/widget", kind: "cask" });

    assert.equal(result.outputPath, path.join(tapRoot, "Casks", "widget-linux.rb"));
    assert.deepEqual(result.checksum, {
      digest: sha256Hex(tarball),
      status: "verified",
      manifestUrl: `${server.baseUrl}/dl/v1.2.0/checksums.txt`
    });
    const lines = fs.readFileSync(result.outputPath, "utf8").split("\n");
    assert.equal(lines[5], 'cask "widget-linux" do');
    assert.ok(lines.includes(`  url "${assetUrl}"`));
    assert.ok(lines.includes('  desc "Desktop widget"'));
    assert.ok(lines.includes('  homepage "https://github.com/acme/widget"'));
    assert.ok(lines.includes('  binary "widget-1.2.0/bin/widget", target: "widget"'));
    assert.ok(lines.includes('  artifact "widget-1.2.0/share/applications/widget.desktop",'));
    assert.ok(lines.includes('      content.gsub!(/^Icon=.*$/, "Icon=#{xdg_data_home}/icons/widget.png")'));
  } finally {
    await server.close();
  }
});
