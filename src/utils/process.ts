import { execFile } from "node:child_process";
import { CommandError } from "../errors.js";

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandOptions {
  cwd?: string;
  timeoutMs?: number;
  env?: Record<string, string>;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

// yt-dlp prints the whole playlist JSON on stdout
const MAX_BUFFER = 64 * 1024 * 1024;

export const runCommand: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      {
        cwd: options?.cwd,
        env: { ...process.env, ...options?.env },
        timeout: options?.timeoutMs,
        encoding: "utf8",
        maxBuffer: MAX_BUFFER,
      },
      (err, stdout, stderr) => {
        if (err) {
          const exitCode = typeof err.code === "number" ? err.code : 1;
          reject(new CommandError(`${command} ${args.join(" ")}`, exitCode, stderr || err.message));
          return;
        }
        resolve({ stdout, stderr, exitCode: 0 });
      },
    );
  });
