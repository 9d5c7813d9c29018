import { execFile } from "node:child_process";
import type { CommandSpec } from "@fleetwarden/shared";

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Set when the process could not be started or was aborted. */
  error?: string;
}

export interface CommandRunOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Executes an argv without a shell. Implementations resolve with the outcome
 * and never reject, so callers can treat a failed invocation as data.
 */
export interface CommandRunner {
  run(argv: string[], options: CommandRunOptions): Promise<CommandResult>;
}

const MAX_OUTPUT_BYTES = 1024 * 1024;

export function toArgv(command: CommandSpec): string[] {
  if (Array.isArray(command)) {
    return command.filter(part => part.length > 0);
  }
  return command.split(/\s+/).filter(part => part.length > 0);
}

export function formatCommand(command: CommandSpec): string {
  return toArgv(command).join(" ");
}

function exitCodeOf(error: Error): number | null {
  if ("code" in error && typeof error.code === "number") {
    return error.code;
  }
  return null;
}

function wasKilledByTimeout(error: Error): boolean {
  return "killed" in error && error.killed === true && "signal" in error && error.signal === "SIGTERM";
}

export const execFileRunner: CommandRunner = {
  run(argv, options) {
    const [file, ...args] = argv;
    if (!file) {
      return Promise.resolve({
        exitCode: null,
        stdout: "",
        stderr: "",
        timedOut: false,
        error: "empty command"
      });
    }
    return new Promise(resolve => {
      execFile(
        file,
        args,
        {
          timeout: options.timeoutMs,
          signal: options.signal,
          maxBuffer: MAX_OUTPUT_BYTES,
          windowsHide: true
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ exitCode: 0, stdout, stderr, timedOut: false });
            return;
          }
          const exitCode = exitCodeOf(error);
          resolve({
            exitCode,
            stdout,
            stderr,
            timedOut: wasKilledByTimeout(error),
            error: exitCode === null ? error.message : undefined
          });
        }
      );
    });
  }
};
