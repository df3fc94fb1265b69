/**
 * Raised while building an EventConfig from events.yml, or when the
 * environment holds an unusable value.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * A raw extractor entry that cannot become a VideoRecord.
 * The pipeline skips the video and keeps going with the rest of the batch.
 */
export class NormalizationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = "NormalizationError";
  }
}

/** A stored video file that is not valid JSON or lacks the mandatory fields. */
export class RecordFileError extends Error {
  constructor(
    public readonly path: string,
    message: string
  ) {
    super(`${path}: ${message}`);
    this.name = "RecordFileError";
  }
}

/** A child process (git, yt-dlp) that exited with a non-zero code. */
export class CommandError extends Error {
  constructor(
    public readonly command: string,
    public readonly args: readonly string[],
    public readonly exitCode: number | null,
    public readonly stderr: string
  ) {
    const firstLine = stderr.trim().split("\n")[0];
    super(
      `${command} ${args.join(" ")} exited with code ${exitCode}${
        firstLine ? `: ${firstLine}` : ""
      }`
    );
    this.name = "CommandError";
  }
}

export class GitCommandError extends CommandError {
  constructor(
    args: readonly string[],
    exitCode: number | null,
    stderr: string
  ) {
    super("git", args, exitCode, stderr);
    this.name = "GitCommandError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : JSON.stringify(err);
}
