export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR"
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3
};

const ICONS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "\u{1F50E}",
  [LogLevel.INFO]: "ℹ️",
  [LogLevel.WARN]: "⚠️",
  [LogLevel.ERROR]: "❌"
};

/** What every component receives to report progress. */
export interface Logger {
  log(level: LogLevel, message: string): void;
}

export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  if (level === LogLevel.ERROR) console.error(line);
  else if (level === LogLevel.WARN) console.warn(line);
  else console.log(line);
};

export interface RunCounts {
  eventsCompleted: number;
  eventsSkipped: number;
  eventsFailed: number;
  videosScraped: number;
  videosInvalid: number;
  filesWritten: number;
}

export interface RunReporterOptions {
  minLevel?: LogLevel;
  sink?: LogSink;
  now?: () => Date;
}

/**
 * Run-scoped logger and tally. Created once per process by the orchestrator
 * and handed to every component, so nothing logs through global state.
 */
export class RunReporter implements Logger {
  private counts: RunCounts = {
    eventsCompleted: 0,
    eventsSkipped: 0,
    eventsFailed: 0,
    videosScraped: 0,
    videosInvalid: 0,
    filesWritten: 0
  };
  private startedAt: Date | null = null;
  private minLevel: LogLevel;
  private sink: LogSink;
  private now: () => Date;

  constructor(options: RunReporterOptions = {}) {
    this.minLevel = options.minLevel ?? LogLevel.DEBUG;
    this.sink = options.sink ?? consoleSink;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Marks the beginning of the run; the elapsed time in the final summary
   * is measured from here.
   * @param description Free text identifying the run (tool versions, config file)
   */
  startRun(description: string): void {
    this.startedAt = this.now();
    this.log(LogLevel.DEBUG, `Time init: ${this.startedAt.toISOString()}`);
    this.log(LogLevel.INFO, description);
  }

  /**
   * Writes a timestamped line to the sink when the level is enabled.
   * @param level The severity level
   * @param message The descriptive text to be recorded
   */
  log(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    const timestamp = this.now().toISOString().slice(11, 19);
    this.sink(level, `[${timestamp}] ${ICONS[level]} ${level.padEnd(5)} ${message}`);
  }

  recordEvent(outcome: "completed" | "skipped" | "failed"): void {
    if (outcome === "completed") this.counts.eventsCompleted++;
    else if (outcome === "skipped") this.counts.eventsSkipped++;
    else this.counts.eventsFailed++;
  }

  recordVideos(scraped: number, invalid: number): void {
    this.counts.videosScraped += scraped;
    this.counts.videosInvalid += invalid;
  }

  recordFilesWritten(count: number): void {
    this.counts.filesWritten += count;
  }

  getCounts(): RunCounts {
    return { ...this.counts };
  }

  /**
   * Concludes the run and prints the summary table.
   * @param error Set when the run stopped on an unhandled failure
   */
  finishRun(error?: Error): void {
    if (error) {
      this.log(LogLevel.ERROR, `Fatal crash: ${error.message}`);
    }

    const endedAt = this.now();
    const elapsedMs = this.startedAt
      ? endedAt.getTime() - this.startedAt.getTime()
      : 0;
    this.log(LogLevel.DEBUG, `Time end: ${endedAt.toISOString()}`);

    let status = "completed";
    if (error) status = "failed";
    else if (this.counts.eventsFailed > 0) status = "completed_with_errors";

    console.log(`\n${"=".repeat(40)}`);
    console.log(`SCRAPE FINISHED: ${status}`);
    console.log(`${"=".repeat(40)}`);
    console.table([
      {
        Events: this.counts.eventsCompleted,
        Skipped: this.counts.eventsSkipped,
        Failed: this.counts.eventsFailed,
        Videos: this.counts.videosScraped,
        Invalid: this.counts.videosInvalid,
        Files: this.counts.filesWritten,
        Duration: formatDuration(elapsedMs)
      }
    ]);
  }
}

/**
 * Converts milliseconds into a short human-readable string.
 * @example
 * formatDuration(125_000) // "2m 5s"
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.round(ms / 1000);
  const mins = Math.floor(totalSeconds / 60);
  const secs = totalSeconds % 60;
  return mins > 0 ? `${mins}m ${secs}s` : `${secs}s`;
}
