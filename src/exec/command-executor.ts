/**
 * Command Executor
 *
 * Runs an external program as a subprocess and captures its output.
 * `run` never rejects: a launch failure (e.g. ENOENT) is reported as a
 * non-zero exit code with the error text as stderr.
 */

import { spawn as nodeSpawn } from "node:child_process";
import type { SpawnOptions } from "node:child_process";
import { errorMessage } from "../errors";

/**
 * Result of command execution
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandExecutor {
  run(command: string, args: string[]): Promise<CommandResult>;
}

/** The parts of a child process the executor reads. */
export interface SpawnedProcess {
  stdout: NodeJS.ReadableStream | null;
  stderr: NodeJS.ReadableStream | null;
  on(event: "error", listener: (err: Error) => void): unknown;
  on(event: "close", listener: (code: number | null) => void): unknown;
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => SpawnedProcess;

export interface CommandExecutorOptions {
  platform?: NodeJS.Platform;
  spawn?: SpawnFn;
}

/** Exit code reported when the process could not be launched or was killed by a signal. */
export const LAUNCH_FAILURE_EXIT_CODE = 1;

/**
 * Windows batch shims (az.cmd) can only be started through the shell.
 */
export function needsShell(command: string, platform: NodeJS.Platform): boolean {
  return platform === "win32" && /\.(cmd|bat)$/i.test(command);
}

export function createCommandExecutor(options: CommandExecutorOptions = {}): CommandExecutor {
  const platform = options.platform ?? process.platform;
  const spawn: SpawnFn = options.spawn ?? nodeSpawn;

  return {
    run(command: string, args: string[]): Promise<CommandResult> {
      return new Promise((resolve) => {
        const stdoutChunks: Buffer[] = [];
        const stderrChunks: Buffer[] = [];
        let settled = false;

        // A chunk may end inside a multibyte character; decode only the whole output.
        const stdout = () => Buffer.concat(stdoutChunks).toString();
        const stderr = () => Buffer.concat(stderrChunks).toString();

        const finish = (result: CommandResult) => {
          if (settled) return;
          settled = true;
          resolve(result);
        };

        let child: SpawnedProcess;
        try {
          child = spawn(command, args, {
            stdio: ["ignore", "pipe", "pipe"],
            shell: needsShell(command, platform),
            windowsHide: true,
          });
        } catch (err) {
          finish({
            stdout: "",
            stderr: errorMessage(err),
            exitCode: LAUNCH_FAILURE_EXIT_CODE,
          });
          return;
        }

        child.stdout?.on("data", (data: Buffer) => stdoutChunks.push(data));
        child.stderr?.on("data", (data: Buffer) => stderrChunks.push(data));

        child.on("error", (err: Error) => {
          finish({ stdout: stdout(), stderr: stderr() || err.message, exitCode: LAUNCH_FAILURE_EXIT_CODE });
        });

        child.on("close", (code: number | null) => {
          finish({ stdout: stdout(), stderr: stderr(), exitCode: code ?? LAUNCH_FAILURE_EXIT_CODE });
        });
      });
    },
  };
}
