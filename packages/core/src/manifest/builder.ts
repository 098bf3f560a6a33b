import { cleanDescription, escapeRubyText, rubyString, XDG_DATA_HOME } from "./text";
import type {
  CaskManifestData,
  DesktopIntegration,
  FormulaManifestData,
  ManifestData,
  ManifestDocument,
  ManifestSection
} from "./types";

const MAGIC_COMMENTS = ["# typed: strict", "# frozen_string_literal: true"];

export const GENERATOR_NAME = "tapwright";

export function buildManifestDocument(data: ManifestData): ManifestDocument {
  return data.kind === "cask" ? buildCaskDocument(data) : buildFormulaDocument(data);
}

export function buildCaskDocument(data: CaskManifestData): ManifestDocument {
  const sections: ManifestSection[] = [
    {
      name: "identity",
      lines: [`version ${rubyString(data.version)}`, `sha256 ${rubyString(data.sha256)}`]
    },
    {
      name: "source",
      lines: [
        `url ${rubyString(data.url)}`,
        `name ${rubyString(data.appName)}`,
        `desc ${rubyString(cleanDescription(data.description))}`,
        `homepage ${rubyString(data.homepage)}`
      ]
    },
    {
      name: "install",
      lines: [
        `binary ${rubyString(data.binary.path)}, target: ${rubyString(data.binary.target)}`,
        ...(data.desktop ? artifactLines(data.desktop) : [])
      ]
    }
  ];
  if (data.desktop) {
    sections.push({ name: "preflight", lines: preflightLines(data.desktop, data.binary.target) });
  }
  sections.push({ name: "cleanup", lines: zapLines(data.cleanupPaths) });

  return {
    magicComments: MAGIC_COMMENTS,
    comments: generationHeader(data),
    opening: `cask ${rubyString(data.token)} do`,
    sections
  };
}

export function buildFormulaDocument(data: FormulaManifestData): ManifestDocument {
  const description = cleanDescription(data.description);
  const metadata = [
    `desc ${rubyString(description)}`,
    `homepage ${rubyString(data.homepage)}`,
    `url ${rubyString(data.url)}`
  ];
  if (!data.url.includes(data.version)) {
    metadata.push(`version ${rubyString(data.version)}`);
  }
  metadata.push(`sha256 ${rubyString(data.sha256)}`);
  if (data.license) {
    metadata.push(`license ${rubyString(data.license)}`);
  }

  return {
    magicComments: MAGIC_COMMENTS,
    comments: [...generationHeader(data), ...(description ? [`# ${description}`] : [])],
    opening: `class ${data.className} < Formula`,
    sections: [
      { name: "metadata", lines: metadata },
      {
        name: "dependencies",
        lines: data.dependencies.map((dependency) => `depends_on ${rubyString(dependency)} => :build`)
      },
      { name: "install", lines: data.installBlock.split("\n") },
      { name: "test", lines: data.testBlock.split("\n") }
    ]
  };
}

function generationHeader(data: ManifestData): string[] {
  if (!data.sourceUrl) {
    return [];
  }
  return [
    `# Generated by ${GENERATOR_NAME} from ${data.sourceUrl}`,
    `# Regenerate with: ${GENERATOR_NAME} generate ${data.sourceUrl} --kind ${data.kind}`
  ];
}

function artifactLines(desktop: DesktopIntegration): string[] {
  const lines: string[] = [];
  if (desktop.desktopEntry) {
    lines.push(
      `artifact ${rubyString(desktop.desktopEntry.source)},`,
      `         target: "#{${XDG_DATA_HOME}}/applications/${escapeRubyText(desktop.desktopEntry.target)}"`
    );
  }
  if (desktop.icon) {
    lines.push(
      `artifact ${rubyString(desktop.icon.source)},`,
      `         target: "#{${XDG_DATA_HOME}}/icons/${escapeRubyText(desktop.icon.target)}"`
    );
  }
  return lines;
}

/**
 * Creates the XDG directories and points the desktop entry at the linked
 * binary (and installed icon) before the artifacts are moved into place.
 */
function preflightLines(desktop: DesktopIntegration, binaryName: string): string[] {
  const lines = ["preflight do", `  xdg_data_home = ${XDG_DATA_HOME}`];
  for (const directory of desktop.xdgDirectories) {
    lines.push(`  FileUtils.mkdir_p "#{xdg_data_home}/${escapeRubyText(directory)}"`);
  }
  if (desktop.desktopEntry) {
    lines.push(
      "",
      `  desktop_file = staged_path.join(${rubyString(desktop.desktopEntry.source)})`,
      "  if desktop_file.exist?",
      "    content = desktop_file.read",
      `    content.gsub!(/^Exec=.*$/, "Exec=#{HOMEBREW_PREFIX}/bin/${escapeRubyText(binaryName)}")`
    );
    if (desktop.icon) {
      lines.push(
        `    content.gsub!(/^Icon=.*$/, "Icon=#{xdg_data_home}/icons/${escapeRubyText(desktop.icon.target)}")`
      );
    }
    lines.push("    desktop_file.write(content)", "  end");
  }
  lines.push("end");
  return lines;
}

function zapLines(paths: readonly string[]): string[] {
  if (paths.length === 0) {
    return [];
  }
  const sorted = [...paths].sort();
  return ["zap trash: [", ...sorted.map((entry) => `  "${entry}",`), "]"];
}
