/**
 * Shell command execution.
 *
 * ShellRunner.run() never rejects. Failures come back as a CommandResult:
 *   - exit code 127: the command could not be dispatched
 *   - exit code 124: the command ran past its timeout and was killed
 */

import { exec } from "node:child_process";
import type { Logger } from "../logging/index.js";

export interface CommandResult {
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  timeoutSeconds?: number;
}

export interface ShellRunner {
  run(command: string, options?: RunOptions): Promise<CommandResult>;
}

export const EXIT_DISPATCH_FAILURE = 127;
export const EXIT_TIMEOUT = 124;

const DEFAULT_TIMEOUT_SECONDS = 300;
const MAX_BUFFER_BYTES = 16 * 1024 * 1024;

export function isSuccess(result: CommandResult): boolean {
  return result.exitCode === 0;
}

/**
 * Runs commands through the system shell.
 */
export class ProcessShellRunner implements ShellRunner {
  constructor(private readonly logger?: Logger) {}

  run(command: string, options: RunOptions = {}): Promise<CommandResult> {
    const timeoutSeconds = options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
    this.logger?.debug("$ " + command, { cwd: options.cwd });

    return new Promise<CommandResult>((resolve) => {
      try {
        exec(
          command,
          {
            cwd: options.cwd,
            timeout: timeoutSeconds * 1000,
            maxBuffer: MAX_BUFFER_BYTES,
            encoding: "utf-8",
          },
          (error, stdout, stderr) => {
            if (!error) {
              resolve({ command, exitCode: 0, stdout, stderr });
              return;
            }
            if (error.killed) {
              resolve({
                command,
                exitCode: EXIT_TIMEOUT,
                stdout,
                stderr: `${stderr}Command timed out after ${timeoutSeconds}s`,
              });
              return;
            }
            if (typeof error.code === "number") {
              resolve({ command, exitCode: error.code, stdout, stderr });
              return;
            }
            resolve({
              command,
              exitCode: EXIT_DISPATCH_FAILURE,
              stdout,
              stderr: stderr || `Failed to run command: ${error.message}`,
            });
          }
        );
      } catch (err) {
        resolve({
          command,
          exitCode: EXIT_DISPATCH_FAILURE,
          stdout: "",
          stderr: `Failed to run command: ${err instanceof Error ? err.message : String(err)}`,
        });
      }
    });
  }
}

/**
 * Records commands instead of running them. Every command "succeeds" with
 * empty output.
 */
export class DryRunShellRunner implements ShellRunner {
  private readonly recorded: string[] = [];

  constructor(private readonly logger?: Logger) {}

  async run(command: string, options: RunOptions = {}): Promise<CommandResult> {
    this.recorded.push(command);
    this.logger?.info("[dry-run] " + command, { cwd: options.cwd });
    return { command, exitCode: 0, stdout: "", stderr: "" };
  }

  get commands(): readonly string[] {
    return [...this.recorded];
  }
}
