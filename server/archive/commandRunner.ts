import { execFile } from "node:child_process";

export interface ArchiveCommandOptions {
  cwd?: string;
  timeoutMs?: number;
}

export interface ArchiveCommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type ArchiveCommandRunner = (
  command: string,
  args: readonly string[],
  options?: ArchiveCommandOptions
) => Promise<ArchiveCommandResult>;

const MAX_CAPTURE_BYTES = 1024 * 1024;

/**
 * Runs a tool to completion without a shell. A non-zero exit resolves with its
 * code; only a failure to launch (missing binary, killed by the timeout) rejects.
 */
export const runArchiveCommand: ArchiveCommandRunner = (command, args, options = {}) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      [...args],
      {
        cwd: options.cwd,
        timeout: options.timeoutMs ?? 0,
        maxBuffer: MAX_CAPTURE_BYTES,
        windowsHide: true
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }

        if (typeof error.code === "number" && !error.killed) {
          resolve({ exitCode: error.code, stdout, stderr });
          return;
        }

        reject(error);
      }
    );
  });
