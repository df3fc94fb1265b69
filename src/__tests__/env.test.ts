import { describe, it, expect } from "vitest";
import { loadConfig } from "../config/env";
import { LogLevel } from "../services/runReporter";
import { ConfigError } from "../utils/errors";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      eventsFile: "events.yml",
      ytDlpPath: "yt-dlp",
      gitPath: "git",
      gitBaseBranch: "master",
      gitRemote: "origin",
      gitPush: false,
      logLevel: LogLevel.DEBUG
    });
  });

  it("reads every key", () => {
    expect(
      loadConfig({
        EVENTS_FILE: "conf/events.yml",
        YT_DLP_PATH: "/opt/yt-dlp",
        GIT_PATH: "/usr/bin/git",
        GIT_BASE_BRANCH: "main",
        GIT_REMOTE: "upstream",
        GIT_PUSH: "yes",
        LOG_LEVEL: "warn"
      })
    ).toEqual({
      eventsFile: "conf/events.yml",
      ytDlpPath: "/opt/yt-dlp",
      gitPath: "/usr/bin/git",
      gitBaseBranch: "main",
      gitRemote: "upstream",
      gitPush: true,
      logLevel: LogLevel.WARN
    });
  });

  it("rejects values it cannot interpret", () => {
    expect(() => loadConfig({ GIT_PUSH: "maybe" })).toThrow(ConfigError);
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(
      "LOG_LEVEL must be one of DEBUG, INFO, WARN, ERROR, got 'loud'"
    );
  });
});
