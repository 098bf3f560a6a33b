import assert from "node:assert/strict";
import { test } from "node:test";
import {
  classifyAsset,
  classifyFilename,
  ensureLinuxSuffix,
  normalizePackageName,
  packageNameToClassName,
  parseRepositoryRef,
  selectBestAsset,
  stripVersionPrefix,
  type ClassifiedAsset
} from "../src/platform";

function asset(name: string): ClassifiedAsset {
  return classifyAsset({ name, downloadUrl: `https://example.test/download/${name}`, sizeBytes: 1024 });
}

test("linux x64 tarball is a priority-1 target-os asset", () => {
  assert.deepEqual(classifyFilename("app-linux-x64.tar.gz"), {
    osFamily: "target-os",
    architecture: "x86_64",
    packageFormat: "tarball-gz",
    priorityClass: 1,
    isSourceArchive: false,
    isChecksumFile: false
  });
});

test("package formats imply the target os without any marker", () => {
  assert.equal(classifyFilename("tool_1.0.0_amd64.deb").osFamily, "target-os");
  assert.equal(classifyFilename("tool-1.0.0.x86_64.rpm").osFamily, "target-os");
  assert.equal(classifyFilename("tool_1.0.0_amd64.deb").priorityClass, 2);
  assert.equal(classifyFilename("tool-1.0.0.x86_64.rpm").priorityClass, 3);
});

test("replacing the os marker swaps the os family", () => {
  const pairs: Array<[string, string]> = [
    ["cli-1.2.0-linux-amd64.tar.gz", "cli-1.2.0-darwin-amd64.tar.gz"],
    ["cli-1.2.0-linux-amd64.tar.gz", "cli-1.2.0-windows-amd64.tar.gz"],
    ["cli-1.2.0-linux-arm64.tar.xz", "cli-1.2.0-freebsd-arm64.tar.xz"]
  ];
  for (const [target, other] of pairs) {
    assert.equal(classifyFilename(target).osFamily, "target-os");
    assert.equal(classifyFilename(other).osFamily, "other");
    const selection = selectBestAsset([asset(other), asset(target)]);
    assert.ok(selection.ok);
    assert.equal(selection.asset.name, target);
  }
});

test("aarch64 does not read as an arch linux marker", () => {
  assert.equal(classifyFilename("tool-darwin-aarch64.tar.gz").osFamily, "other");
  assert.equal(classifyFilename("tool-1.0-aarch64-apple-darwin.tar.gz").osFamily, "other");
  assert.equal(classifyFilename("tool-1.0-aarch64-unknown-linux-gnu.tar.gz").osFamily, "target-os");
  assert.equal(classifyFilename("tool-arch-x86_64.tar.gz").osFamily, "target-os");

  const mixed = selectBestAsset([
    asset("tool-1.0-aarch64-apple-darwin.tar.gz"),
    asset("tool-1.0-aarch64-unknown-linux-gnu.tar.gz")
  ]);
  assert.ok(mixed.ok);
  assert.equal(mixed.asset.name, "tool-1.0-aarch64-unknown-linux-gnu.tar.gz");

  const macOnly = selectBestAsset([
    asset("tool-1.0-x86_64-apple-darwin.tar.gz"),
    asset("tool-1.0-aarch64-apple-darwin.tar.gz")
  ]);
  assert.equal(macOnly.ok, false);
});

test("64-bit arm markers win over the generic arm marker", () => {
  assert.equal(classifyFilename("tool-linux-arm64.tar.gz").architecture, "arm64");
  assert.equal(classifyFilename("tool-linux-aarch64.tar.gz").architecture, "arm64");
  assert.equal(classifyFilename("tool-linux-armv7.tar.gz").architecture, "arm");
  assert.equal(classifyFilename("tool-linux.tar.gz").architecture, "unknown");
});

test("source archives and checksum files are flagged", () => {
  assert.equal(classifyFilename("tool-1.0.0-src.tar.gz").isSourceArchive, true);
  assert.equal(classifyFilename("checksums.txt").isChecksumFile, true);
  assert.equal(classifyFilename("tool_1.0.0_SHA256SUMS").isChecksumFile, true);
  assert.equal(classifyFilename("Tool.AppImage").packageFormat, "appimage");
  assert.equal(classifyFilename("tool.tar").packageFormat, "tarball-plain");
  assert.equal(classifyFilename("tool.zip").packageFormat, "unknown");
});

test("tarball beats debian package at the same architecture", () => {
  const selection = selectBestAsset([asset("tool_1.0.0_amd64.deb"), asset("tool-1.0.0-linux-x86_64.tar.gz")]);
  assert.ok(selection.ok);
  assert.equal(selection.asset.name, "tool-1.0.0-linux-x86_64.tar.gz");
  assert.deepEqual(
    selection.candidates.map((candidate) => candidate.name),
    ["tool-1.0.0-linux-x86_64.tar.gz"]
  );
});

test("x86_64 tarball beats arm64 tarball", () => {
  const selection = selectBestAsset([asset("tool-linux-arm64.tar.gz"), asset("tool-linux-x86_64.tar.gz")]);
  assert.ok(selection.ok);
  assert.equal(selection.asset.name, "tool-linux-x86_64.tar.gz");
});

test("first candidate wins when no x86_64 asset exists", () => {
  const selection = selectBestAsset([asset("tool-linux-armv7.tar.gz"), asset("tool-linux-arm64.tar.gz")]);
  assert.ok(selection.ok);
  assert.equal(selection.asset.name, "tool-linux-armv7.tar.gz");
});

test("markerless tarball is eligible but markerless zip is not", () => {
  const selection = selectBestAsset([asset("tool.zip"), asset("tool-1.0.0.tar.gz")]);
  assert.ok(selection.ok);
  assert.equal(selection.asset.name, "tool-1.0.0.tar.gz");
});

test("selection fails when nothing is eligible", () => {
  const assets = [asset("tool-darwin-arm64.tar.gz"), asset("tool-windows-x64.zip"), asset("checksums.txt")];
  const selection = selectBestAsset(assets);
  assert.equal(selection.ok, false);
  if (!selection.ok) {
    assert.equal(selection.reason, "no-eligible-asset");
    assert.equal(selection.rejected.length, 3);
  }
});

test("repository references accept urls and short forms", () => {
  assert.deepEqual(parseRepositoryRef("https://github.com/acme/widget"), { ok: true, owner: "acme", repo: "widget" });
  assert.deepEqual(parseRepositoryRef("github.com/acme/widget.git/"), { ok: true, owner: "acme", repo: "widget" });
  assert.deepEqual(parseRepositoryRef("acme/widget"), { ok: true, owner: "acme", repo: "widget" });
  const invalid = parseRepositoryRef("widget");
  assert.equal(invalid.ok, false);
});

test("package names normalize to lowercase hyphenated tokens", () => {
  assert.equal(normalizePackageName("My_Cool App"), "my-cool-app");
  assert.equal(normalizePackageName("--Widget!!--"), "widget");
  assert.equal(ensureLinuxSuffix("widget"), "widget-linux");
  assert.equal(ensureLinuxSuffix("widget-linux"), "widget-linux");
  assert.equal(packageNameToClassName("go-task"), "GoTask");
  assert.equal(packageNameToClassName("node_exporter"), "NodeExporter");
  assert.equal(stripVersionPrefix("v1.2.3"), "1.2.3");
  assert.equal(stripVersionPrefix("version-2"), "version-2");
  assert.equal(stripVersionPrefix("2024.01"), "2024.01");
});
