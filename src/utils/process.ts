import { spawn } from "child_process";
import { CommandError } from "./errors";

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunCommandOptions {
  cwd?: string;
  /** Exit codes treated as success, [0] by default */
  acceptExitCodes?: readonly number[];
  /** Builds the error thrown on a non-zero exit */
  onFailure?: (exitCode: number | null, stderr: string) => Error;
}

/**
 * Runs an external program to completion and collects its output.
 * Blocks the run (no overlap) the same way every other step does.
 * @param command The executable, resolved through PATH
 * @param args Arguments passed verbatim, no shell involved
 * @param options Working directory and error factory
 * @returns stdout and stderr as UTF-8 text
 * @throws CommandError (or the factory's error) if the process exits non-zero
 */
export function runCommand(
  command: string,
  args: readonly string[],
  options: RunCommandOptions = {}
): Promise<CommandResult> {
  return new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"]
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    child.stdout.on("data", (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderrChunks.push(chunk));

    // Kill the child if the main Node process dies
    const cleanupListener = () => {
      if (!child.killed) child.kill("SIGKILL");
    };
    process.once("exit", cleanupListener);

    child.once("error", (err) => {
      process.off("exit", cleanupListener);
      reject(err);
    });

    child.once("close", (code) => {
      process.off("exit", cleanupListener);
      const stdout = Buffer.concat(stdoutChunks).toString("utf8");
      const stderr = Buffer.concat(stderrChunks).toString("utf8");

      const accepted = options.acceptExitCodes ?? [0];
      if (code !== null && accepted.includes(code)) {
        resolve({ stdout, stderr, exitCode: code });
        return;
      }
      reject(
        options.onFailure
          ? options.onFailure(code, stderr)
          : new CommandError(command, args, code, stderr)
      );
    });
  });
}
