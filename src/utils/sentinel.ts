import { LogLevel, Logger } from "../services/runReporter";
import { errorMessage } from "./errors";

export interface VersionedTool {
  version(): Promise<string>;
}

/**
 * Verifies that the external tools are runnable before any event is touched,
 * and logs their versions. Run this at the start of every scrape.
 * @param tools git and yt-dlp clients
 * @param logger The run's logger
 * @returns The reported versions
 * @throws Error if either tool cannot be executed
 */
export async function runSentinelCheck(
  tools: { git: VersionedTool; ytDlp: VersionedTool },
  logger: Logger
): Promise<{ git: string; ytDlp: string }> {
  logger.log(LogLevel.DEBUG, "Running sentinel check...");

  // --- CRITICAL: git ---
  let git: string;
  try {
    git = await tools.git.version();
    logger.log(LogLevel.DEBUG, `git version: ${git}`);
  } catch (err: unknown) {
    throw new Error(`CRITICAL: git is not runnable. Stopping run. (${errorMessage(err)})`);
  }

  // --- CRITICAL: yt-dlp ---
  let ytDlp: string;
  try {
    ytDlp = await tools.ytDlp.version();
    logger.log(LogLevel.DEBUG, `yt-dlp version: ${ytDlp}`);
  } catch (err: unknown) {
    throw new Error(
      `CRITICAL: yt-dlp is not runnable. Stopping run. (${errorMessage(err)})`
    );
  }

  return { git, ytDlp };
}
