import { execFile } from "node:child_process";

interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

interface CommandOptions {
  timeoutMs: number;
  cwd?: string;
}

type CommandRunner = (
  command: string,
  args: readonly string[],
  options: CommandOptions,
) => Promise<CommandResult>;

const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

class CommandNotFoundError extends Error {
  constructor(readonly command: string) {
    super(`${command} is not installed or not on PATH`);
    this.name = "CommandNotFoundError";
  }
}

/**
 * Runs a command to completion. A non-zero exit or a timeout resolves with
 * the details; only a missing executable rejects.
 */
const runCommand: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      [...args],
      {
        cwd: options.cwd,
        timeout: options.timeoutMs,
        killSignal: "SIGKILL",
        maxBuffer: MAX_OUTPUT_BYTES,
        encoding: "utf8",
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr, timedOut: false });
          return;
        }
        const code: unknown = error.code;
        if (code === "ENOENT") {
          reject(new CommandNotFoundError(command));
          return;
        }
        const timedOut = error.killed === true && error.signal === "SIGKILL";
        resolve({
          exitCode: typeof code === "number" ? code : 1,
          stdout,
          stderr,
          timedOut,
        });
      },
    );
  });

export { CommandNotFoundError, runCommand };
export type { CommandOptions, CommandResult, CommandRunner };
