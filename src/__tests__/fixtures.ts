import path from "path";
import { EventConfig, OverwriteMode, VideoRecord } from "../db/types";
import { RawVideoEntry } from "../scrapers/types";
import { RunReporter } from "../services/runReporter";

export function makeEvent(
  overrides: Partial<EventConfig> = {},
  repoDir = "/tmp/video-repo"
): EventConfig {
  const dir = overrides.dir ?? "pycon-test-2019";
  const eventDir = path.join(repoDir, dir);
  return {
    title: "PyCon Test 2019",
    dir,
    branch: dir,
    issue: "42",
    youtubeLists: ["PLtest"],
    relatedUrls: [],
    language: "eng",
    tags: [],
    dates: null,
    minimalDownload: false,
    overwrite: { mode: OverwriteMode.REPLACE_NEW_ONLY },
    eventDir,
    videoDir: path.join(eventDir, "videos"),
    definition: { title: "PyCon Test 2019", dir, issue: 42, youtube_list: "PLtest" },
    ...overrides
  };
}

export function makeRaw(overrides: RawVideoEntry = {}): RawVideoEntry {
  return {
    fulltitle: "Keynote",
    title: "Keynote (short)",
    thumbnail: "https://i.ytimg.com/vi/abc123/maxresdefault.jpg",
    webpage_url: "https://www.youtube.com/watch?v=abc123",
    upload_date: "20190502",
    duration: 1800,
    license: "Standard YouTube License",
    formats: [{ format_id: "18", language: "en" }],
    tags: ["python", "keynote"],
    description: "Slides: https://example.com/slides",
    ...overrides
  };
}

export function makeRecord(
  title: string,
  url: string,
  extra: Partial<VideoRecord> = {}
): VideoRecord {
  return {
    title,
    speakers: ["TODO"],
    thumbnail_url: "https://i.ytimg.com/vi/x/maxresdefault.jpg",
    videos: [{ type: "youtube", url }],
    recorded: "2019-05-02",
    copyright_text: null,
    duration: 600,
    language: "eng",
    related_urls: [],
    tags: [],
    description: "",
    ...extra
  };
}

export function captureLogs(): { reporter: RunReporter; lines: string[] } {
  const lines: string[] = [];
  const reporter = new RunReporter({
    sink: (level, line) => lines.push(`${level} ${line}`)
  });
  return { reporter, lines };
}
