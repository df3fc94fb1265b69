import { promises as fs } from "fs";
import path from "path";
import { stringify as stringifyYaml } from "yaml";
import { VersionControl, isBranchConflict } from "../clients/gitClient";
import { VideoRepository } from "../db/videoRepository";
import { EventConfig, OverwriteMode, RecordSet, ScrapedVideo } from "../db/types";
import { VideoExtractor } from "../scrapers/types";
import { errorMessage, NormalizationError } from "../utils/errors";
import { serializeJson } from "../utils/json";
import { reconcile } from "./reconciliation";
import { LogLevel, Logger } from "./runReporter";
import { normalizeVideo } from "./videoNormalizer";

export const CATEGORY_FILE = "category.json";

export enum SkipReason {
  BRANCH_EXISTS = "branch_exists",
  DIRECTORY_EXISTS = "directory_exists"
}

export type EventOutcome =
  | { status: "skipped"; reason: SkipReason; message: string }
  | {
      status: "completed";
      /** Videos normalized from the source */
      scraped: number;
      /** Null or malformed entries that were skipped */
      invalid: number;
      /** Files written to the videos directory */
      written: number;
    };

export type PrepareResult =
  | { ready: true }
  | { ready: false; reason: SkipReason; message: string };

export interface DownloadResult {
  videos: ScrapedVideo[];
  invalid: number;
}

export interface ScrapeServiceOptions {
  baseBranch?: string;
  remote?: string;
  /** Push every event branch, not only minimal downloads */
  pushAll?: boolean;
}

export class ScrapeService {
  private baseBranch: string;
  private remote: string;
  private pushAll: boolean;

  constructor(
    private git: VersionControl,
    private extractor: VideoExtractor,
    private logger: Logger,
    options: ScrapeServiceOptions = {}
  ) {
    this.baseBranch = options.baseBranch ?? "master";
    this.remote = options.remote ?? "origin";
    this.pushAll = options.pushAll ?? false;
  }

  /**
   * Runs the whole pipeline for one event: branch and directories, download,
   * reconciliation with stored records, files, commit.
   * An event whose branch (or, without an overwrite policy, whose directory)
   * already exists is reported as skipped.
   * @param event The validated event
   * @throws on extraction, I/O or git failures; files already written stay
   */
  async processEvent(event: EventConfig): Promise<EventOutcome> {
    const prepared = await this.prepareStep(event);
    if (!prepared.ready) {
      this.logger.log(LogLevel.WARN, `Event ${event.branch} skipped`);
      this.logger.log(LogLevel.DEBUG, prepared.message);
      await this.git.checkout(this.baseBranch);
      return { status: "skipped", reason: prepared.reason, message: prepared.message };
    }

    try {
      const { videos, invalid } = await this.downloadStep(event);
      const written = await this.saveStep(event, videos);
      await this.commitStep(event);

      return { status: "completed", scraped: videos.length, invalid, written };
    } catch (err: unknown) {
      await this.returnToBaseBranch(event);
      throw err;
    }
  }

  /**
   * Leaves a failed event's branch so the repository is not left on it.
   * A failure here is logged; the event's own error is the one reported.
   */
  private async returnToBaseBranch(event: EventConfig): Promise<void> {
    try {
      await this.git.checkout(this.baseBranch);
    } catch (err: unknown) {
      this.logger.log(
        LogLevel.WARN,
        `${event.branch}: cannot return to ${this.baseBranch}: ${errorMessage(err)}`
      );
    }
  }

  /**
   * Creates the event branch from the base branch, the event directories and
   * category.json.
   * Transitions: base branch -> event branch
   * @param event The validated event
   */
  async prepareStep(event: EventConfig): Promise<PrepareResult> {
    await this.git.checkout(this.baseBranch);
    try {
      await this.git.createBranch(event.branch);
    } catch (err: unknown) {
      if (isBranchConflict(err)) {
        return {
          ready: false,
          reason: SkipReason.BRANCH_EXISTS,
          message: errorMessage(err)
        };
      }
      throw err;
    }
    this.logger.log(LogLevel.DEBUG, `Branch ${event.branch} created`);

    const freshOnly = event.overwrite.mode === OverwriteMode.REPLACE_NEW_ONLY;
    for (const dir of [event.eventDir, event.videoDir]) {
      try {
        await fs.mkdir(dir);
        this.logger.log(LogLevel.DEBUG, `Dir ${dir} created`);
      } catch (err: unknown) {
        if (!isAlreadyExists(err)) throw err;
        if (freshOnly) {
          return {
            ready: false,
            reason: SkipReason.DIRECTORY_EXISTS,
            message: `Dir ${dir} already exists`
          };
        }
        this.logger.log(LogLevel.DEBUG, `Dir ${dir} already exists, reusing it`);
      }
    }

    const categoryPath = path.join(event.eventDir, CATEGORY_FILE);
    await fs.writeFile(categoryPath, serializeJson({ title: event.title }), "utf8");
    this.logger.log(LogLevel.DEBUG, `File ${categoryPath} created`);

    return { ready: true };
  }

  /**
   * Extracts every configured list in order and normalizes the entries.
   * Null entries (private or unavailable videos) and entries missing required
   * fields are logged and skipped; the rest of the batch goes on.
   * @param event The validated event
   */
  async downloadStep(event: EventConfig): Promise<DownloadResult> {
    const videos: ScrapedVideo[] = [];
    let invalid = 0;

    for (const list of event.youtubeLists) {
      const entries = await this.extractor.extract(list);
      this.logger.log(
        LogLevel.DEBUG,
        `Url scraped ${list} (${entries.length} entries)`
      );

      for (const entry of entries) {
        if (entry === null) {
          invalid++;
          this.logger.log(LogLevel.WARN, `Null youtube video in ${list}`);
          continue;
        }
        try {
          videos.push(normalizeVideo(entry, event));
        } catch (err: unknown) {
          if (!(err instanceof NormalizationError)) throw err;
          invalid++;
          this.logger.log(
            LogLevel.WARN,
            `Skipping video in ${list}: ${err.message}`
          );
        }
      }
    }

    this.logger.log(
      LogLevel.INFO,
      `${event.branch}: ${videos.length} videos scraped, ${invalid} skipped`
    );
    return { videos, invalid };
  }

  /**
   * Reconciles the scrape with the stored records under the event's policy
   * and writes the result. replace-all wipes the videos directory first.
   * @param event The validated event
   * @param videos This run's normalized videos
   * @returns The number of files written
   */
  async saveStep(event: EventConfig, videos: ScrapedVideo[]): Promise<number> {
    const repository = new VideoRepository(event.videoDir, this.logger);
    const stored: RecordSet =
      event.overwrite.mode === OverwriteMode.REPLACE_NEW_ONLY
        ? new Map()
        : await repository.loadAll();

    const result = reconcile({ policy: event.overwrite, scraped: videos, stored });

    const fate = event.overwrite.mode === OverwriteMode.MERGE ? "keeping" : "removing";
    for (const id of result.disappeared) {
      this.logger.log(
        LogLevel.WARN,
        `${event.branch}: video ${id} is no longer listed by the source, ${fate} it`
      );
    }
    for (const id of result.dropped) {
      this.logger.log(
        LogLevel.WARN,
        `${event.branch}: new video ${id} not added (add_new_files is off)`
      );
    }
    this.logger.log(
      LogLevel.INFO,
      `${event.branch} (${event.overwrite.mode}): ${result.videos.size} videos, ` +
        `${result.added.length} new, ${result.updated.length} updated`
    );

    if (event.overwrite.mode === OverwriteMode.REPLACE_ALL) {
      await repository.wipe();
    }
    const written = await repository.saveAll(result.videos);
    return written.length;
  }

  /**
   * Commits the event directory on the event branch and returns to the base
   * branch. Minimal downloads are pushed for review straight away.
   * A re-run that reproduces the stored files exactly has nothing to commit
   * and only returns to the base branch.
   * @param event The validated event
   */
  async commitStep(event: EventConfig): Promise<void> {
    await this.git.checkout(event.branch);
    await this.git.add(event.eventDir);

    if (!(await this.git.hasStagedChanges())) {
      await this.git.checkout(this.baseBranch);
      this.logger.log(LogLevel.INFO, `Conference ${event.branch} unchanged, nothing to commit`);
      return;
    }

    await this.git.commit(buildCommitMessage(event));

    if (event.minimalDownload || this.pushAll) {
      await this.git.push(this.remote, event.branch);
      this.logger.log(LogLevel.DEBUG, `Branch ${event.branch} pushed to ${this.remote}`);
    }

    await this.git.checkout(this.baseBranch);
    this.logger.log(LogLevel.INFO, `Conference ${event.branch} committed`);
  }
}

/**
 * Commit message for an event: the issue marker, then the event's
 * events.yml entry so that the run can be reproduced from the history.
 * @example
 * "Scraped pycon-2019\n\nFixes #123\n\n```yaml\n- title: ...```\n"
 */
export function buildCommitMessage(event: EventConfig): string {
  const marker = event.minimalDownload
    ? `minimal download executed for #${event.issue}`
    : `Fixes #${event.issue}`;
  const snippet = stringifyYaml([event.definition]);
  return `Scraped ${event.branch}\n\n${marker}\n\n\`\`\`yaml\n${snippet}\`\`\`\n`;
}

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EEXIST";
}
