import "dotenv/config";
import { LogLevel } from "../services/runReporter";
import { ConfigError } from "../utils/errors";

export interface AppConfig {
  eventsFile: string;
  ytDlpPath: string;
  gitPath: string;
  gitBaseBranch: string;
  gitRemote: string;
  /** Push every event branch, not only minimal downloads */
  gitPush: boolean;
  logLevel: LogLevel;
}

function parseBoolean(name: string, value: string | undefined): boolean {
  if (value === undefined || value === "") return false;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new ConfigError(`${name} must be a boolean, got '${value}'`);
}

function parseLogLevel(value: string | undefined): LogLevel {
  if (value === undefined || value === "") return LogLevel.DEBUG;
  const level = Object.values(LogLevel).find(
    (candidate) => candidate === value.trim().toUpperCase()
  );
  if (!level) {
    throw new ConfigError(
      `LOG_LEVEL must be one of ${Object.values(LogLevel).join(", ")}, got '${value}'`
    );
  }
  return level;
}

/**
 * Loads the scraper's environment (process.env plus an optional .env file)
 * into a structured config object. Every key has a default, so an empty
 * environment scrapes `events.yml` from the working directory.
 * @param env The variables to read, process.env unless overridden
 * @returns A validated AppConfig
 * @throws ConfigError if a boolean or log level value is not recognised
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const {
    EVENTS_FILE,
    YT_DLP_PATH,
    GIT_PATH,
    GIT_BASE_BRANCH,
    GIT_REMOTE,
    GIT_PUSH,
    LOG_LEVEL
  } = env;

  return {
    eventsFile: EVENTS_FILE || "events.yml",
    ytDlpPath: YT_DLP_PATH || "yt-dlp",
    gitPath: GIT_PATH || "git",
    gitBaseBranch: GIT_BASE_BRANCH || "master",
    gitRemote: GIT_REMOTE || "origin",
    gitPush: parseBoolean("GIT_PUSH", GIT_PUSH),
    logLevel: parseLogLevel(LOG_LEVEL)
  };
}
