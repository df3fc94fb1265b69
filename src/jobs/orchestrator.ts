import path from "path";
import { GitClient, VersionControl } from "../clients/gitClient";
import { YtDlpClient } from "../clients/ytDlpClient";
import { AppConfig, loadConfig } from "../config/env";
import { loadEventsFile, parseEvent } from "../config/events";
import { VideoExtractor } from "../scrapers/types";
import { LogLevel, RunReporter } from "../services/runReporter";
import { ScrapeService } from "../services/scrapeService";
import { errorMessage } from "../utils/errors";
import { runSentinelCheck, VersionedTool } from "../utils/sentinel";

export interface RunScrapeOptions {
  config?: AppConfig;
  reporter?: RunReporter;
  /** Directory events.yml is resolved against, the working directory by default */
  cwd?: string;
  /** Overrides for the external collaborators, built from config otherwise */
  createGit?: (repoDir: string) => VersionControl & VersionedTool;
  extractor?: VideoExtractor & VersionedTool;
}

/**
 * The entry point for a scrape run.
 * 1. Verifies git and yt-dlp are runnable and logs their versions.
 * 2. Loads events.yml.
 * 3. Processes the events one at a time, in file order. A failing event
 *    (bad definition, extraction, I/O or git error) is logged and counted,
 *    and the loop moves on to the next one.
 * 4. Prints the run summary.
 * @param options Config and collaborator overrides
 * @returns The reporter, holding the run's counters
 * @throws A critical error if the tools are missing or events.yml is unusable
 */
export async function runScrape(
  options: RunScrapeOptions = {}
): Promise<RunReporter> {
  const config = options.config ?? loadConfig();
  const reporter =
    options.reporter ?? new RunReporter({ minLevel: config.logLevel });
  const cwd = options.cwd ?? process.cwd();
  const eventsPath = path.resolve(cwd, config.eventsFile);

  try {
    const eventsFile = await loadEventsFile(eventsPath);
    const git = options.createGit
      ? options.createGit(eventsFile.repoDir)
      : new GitClient(eventsFile.repoDir, config.gitPath);
    const extractor = options.extractor ?? new YtDlpClient(config.ytDlpPath);

    const versions = await runSentinelCheck({ git, ytDlp: extractor }, reporter);
    reporter.startRun(
      `Scraping ${eventsFile.events.length} events from ${eventsPath} (yt-dlp ${versions.ytDlp})`
    );

    // Dependency Injection
    const scrapeService = new ScrapeService(git, extractor, reporter, {
      baseBranch: config.gitBaseBranch,
      remote: config.gitRemote,
      pushAll: config.gitPush
    });

    for (const [index, definition] of eventsFile.events.entries()) {
      const label =
        typeof definition.dir === "string" ? definition.dir : `#${index + 1}`;
      try {
        const event = parseEvent(definition, eventsFile.repoDir);
        const outcome = await scrapeService.processEvent(event);

        if (outcome.status === "skipped") {
          reporter.recordEvent("skipped");
          continue;
        }
        reporter.recordEvent("completed");
        reporter.recordVideos(outcome.scraped, outcome.invalid);
        reporter.recordFilesWritten(outcome.written);
      } catch (err: unknown) {
        reporter.recordEvent("failed");
        reporter.log(
          LogLevel.ERROR,
          `--- Event Failed ---: ${label}: ${errorMessage(err)}`
        );
        // We do NOT throw here; the next event is independent
      }
    }

    reporter.finishRun();
    return reporter;
  } catch (criticalError: unknown) {
    const error =
      criticalError instanceof Error
        ? criticalError
        : new Error(errorMessage(criticalError));
    reporter.finishRun(error);
    throw error;
  }
}
