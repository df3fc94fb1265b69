import { GitCommandError } from "../utils/errors";
import { runCommand } from "../utils/process";

// git's exit code for fatal errors such as "a branch named 'x' already exists"
export const GIT_FATAL_EXIT_CODE = 128;

/** The version-control operations an event needs. */
export interface VersionControl {
  checkout(branch: string): Promise<void>;
  createBranch(name: string): Promise<void>;
  add(path: string): Promise<void>;
  /** Whether the index differs from HEAD */
  hasStagedChanges(): Promise<boolean>;
  commit(message: string): Promise<void>;
  push(remote: string, branch: string): Promise<void>;
}

/**
 * Thin wrapper around the git executable, run inside the metadata repository.
 */
export class GitClient implements VersionControl {
  constructor(
    private repoDir: string,
    private gitPath: string = "git"
  ) {}

  async checkout(branch: string): Promise<void> {
    await this.run(["checkout", branch]);
  }

  /**
   * Creates `name` from the current HEAD and switches to it.
   * @throws GitCommandError with exit code 128 if the branch exists
   */
  async createBranch(name: string): Promise<void> {
    await this.run(["checkout", "-b", name]);
  }

  async add(path: string): Promise<void> {
    await this.run(["add", "--", path]);
  }

  /**
   * `git diff --cached --quiet` exits 1 when something is staged.
   */
  async hasStagedChanges(): Promise<boolean> {
    const { exitCode } = await this.run(["diff", "--cached", "--quiet"], [0, 1]);
    return exitCode === 1;
  }

  async commit(message: string): Promise<void> {
    await this.run(["commit", "-m", message]);
  }

  async push(remote: string, branch: string): Promise<void> {
    await this.run(["push", "--set-upstream", remote, branch]);
  }

  /** Returns the first line of `git --version`. */
  async version(): Promise<string> {
    const { stdout } = await this.run(["--version"]);
    return stdout.trim();
  }

  private run(args: string[], acceptExitCodes: readonly number[] = [0]) {
    return runCommand(this.gitPath, args, {
      cwd: this.repoDir,
      acceptExitCodes,
      onFailure: (exitCode, stderr) => new GitCommandError(args, exitCode, stderr)
    });
  }
}

export function isBranchConflict(err: unknown): boolean {
  return err instanceof GitCommandError && err.exitCode === GIT_FATAL_EXIT_CODE;
}
