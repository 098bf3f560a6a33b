export type BuildSystemKind = "go" | "rust" | "meson" | "cmake" | "makefile";

export type BuildStrategy =
  | { kind: "go"; ldflags: string[] }
  | { kind: "rust" }
  | { kind: "meson" }
  | { kind: "cmake" }
  | { kind: "makefile" };

export interface InstallOptions {
  binaryName: string;
  /** Formula name; Go builds name their output after it unless told otherwise. */
  packageName: string;
}

type StrategySignature = {
  kind: BuildSystemKind;
  detect: (files: readonly string[]) => boolean;
  create: () => BuildStrategy;
};

/**
 * First match wins. Language toolchains come before the generic Makefile so a
 * Go or Rust project that also ships a convenience Makefile keeps its real
 * toolchain.
 */
export const DETECTION_ORDER: readonly StrategySignature[] = [
  {
    kind: "go",
    detect: (files) => containsFile(files, "go.mod") || containsFile(files, "go.sum"),
    create: () => ({ kind: "go", ldflags: ["-s", "-w"] })
  },
  {
    kind: "rust",
    detect: (files) => containsFile(files, "Cargo.toml") && containsFile(files, "Cargo.lock"),
    create: () => ({ kind: "rust" })
  },
  {
    kind: "meson",
    detect: (files) => containsFile(files, "meson.build"),
    create: () => ({ kind: "meson" })
  },
  {
    kind: "cmake",
    detect: (files) => containsFile(files, "CMakeLists.txt"),
    create: () => ({ kind: "cmake" })
  },
  {
    kind: "makefile",
    detect: (files) => ["Makefile", "makefile", "GNUmakefile"].some((name) => containsFile(files, name)),
    create: () => ({ kind: "makefile" })
  }
];

export function detectBuildStrategy(files: readonly string[]): BuildStrategy | undefined {
  const match = DETECTION_ORDER.find((signature) => signature.detect(files));
  return match?.create();
}

export function strategyName(strategy: BuildStrategy): string {
  switch (strategy.kind) {
    case "go":
      return "Go";
    case "rust":
      return "Rust";
    case "meson":
      return "Meson";
    case "cmake":
      return "CMake";
    case "makefile":
      return "Makefile";
  }
}

/** Ruby `def install ... end` block, unindented. */
export function installProcedure(strategy: BuildStrategy, options: InstallOptions): string {
  const body = installCommands(strategy, options);
  return ["def install", ...body.map((line) => `  ${line}`), "end"].join("\n");
}

export function testProcedure(binaryName: string): string {
  return ["test do", `  system "#{bin}/${binaryName}", "--version"`, "end"].join("\n");
}

/** Toolchains needed at build time only. */
export function dependencies(strategy: BuildStrategy): string[] {
  switch (strategy.kind) {
    case "go":
      return ["go"];
    case "rust":
      return ["rust"];
    case "meson":
      return ["meson", "ninja"];
    case "cmake":
      return ["cmake"];
    case "makefile":
      return [];
  }
}

function installCommands(strategy: BuildStrategy, options: InstallOptions): string[] {
  switch (strategy.kind) {
    case "go":
      return [`system "go", "build", ${goArgs(strategy.ldflags, options)}`];
    case "rust":
      return [`system "cargo", "install", *std_cargo_args`];
    case "meson":
      return [
        `system "meson", "setup", "build", *std_meson_args`,
        `system "meson", "compile", "-C", "build", "--verbose"`,
        `system "meson", "install", "-C", "build"`
      ];
    case "cmake":
      return [
        `system "cmake", "-S", ".", "-B", "build", *std_cmake_args`,
        `system "cmake", "--build", "build"`,
        `system "cmake", "--install", "build"`
      ];
    case "makefile":
      return [`system "make", "install", "PREFIX=#{prefix}"`];
  }
}

function goArgs(ldflags: string[], options: InstallOptions): string {
  const args: string[] = [];
  if (options.binaryName !== options.packageName) {
    args.push(`output: bin/"${options.binaryName}"`);
  }
  if (ldflags.length > 0) {
    args.push(`ldflags: "${ldflags.join(" ")}"`);
  }
  return args.length > 0 ? `*std_go_args(${args.join(", ")})` : "*std_go_args";
}

function containsFile(files: readonly string[], target: string): boolean {
  return files.some((file) => file.endsWith(target));
}
