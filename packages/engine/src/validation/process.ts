import { spawn } from "child_process";

export interface CommandResult {
  exitCode: number;
  /** stdout and stderr interleaved in arrival order. */
  output: string;
}

export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

/** Never rejects; a command that cannot start reports exit code 127. */
export const runCommand: CommandRunner = (command, args) =>
  new Promise((resolve) => {
    const chunks: Buffer[] = [];
    const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"], windowsHide: true });
    child.stdout.on("data", (chunk: Buffer) => chunks.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => chunks.push(chunk));
    child.on("error", (error) => {
      resolve({ exitCode: 127, output: error.message });
    });
    child.on("close", (code) => {
      resolve({ exitCode: code ?? 1, output: Buffer.concat(chunks).toString("utf8").trim() });
    });
  });
