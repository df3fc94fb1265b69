import { promises as fs } from "fs";
import path from "path";
import { RecordSet, RelatedUrl, VideoLocation, VideoRecord } from "./types";
import { LogLevel, Logger } from "../services/runReporter";
import { playbackUrl } from "../services/reconciliation";
import { nextFreeIdentifierAsync } from "../scrapers/utils";
import { RecordFileError } from "../utils/errors";
import { isJsonObject, isJsonValue, serializeJson, setOwnProperty } from "../utils/json";

export const RECORD_EXTENSION = ".json";

function isVideoLocation(value: unknown): value is VideoLocation {
  return (
    isJsonObject(value) &&
    typeof value.type === "string" &&
    typeof value.url === "string"
  );
}

function isRelatedUrl(value: unknown): value is RelatedUrl {
  return (
    isJsonObject(value) &&
    typeof value.label === "string" &&
    typeof value.url === "string"
  );
}

/**
 * Validates a parsed video file. Only `title` and `videos` are mandatory;
 * known optional fields are type-checked when present and unknown fields are
 * carried through untouched.
 * @param filePath Used in error messages
 * @param data The parsed JSON
 * @throws RecordFileError if the document does not describe a video
 */
export function parseVideoRecord(filePath: string, data: unknown): VideoRecord {
  if (!isJsonObject(data)) {
    throw new RecordFileError(filePath, "expected a JSON object");
  }

  const { title, videos } = data;
  if (typeof title !== "string") {
    throw new RecordFileError(filePath, "'title' must be a string");
  }
  if (!Array.isArray(videos) || !videos.every(isVideoLocation)) {
    throw new RecordFileError(filePath, "'videos' must be a list of {type, url}");
  }

  const checks: Record<string, (value: unknown) => boolean> = {
    speakers: (v) => Array.isArray(v) && v.every((s) => typeof s === "string"),
    tags: (v) => Array.isArray(v) && v.every((s) => typeof s === "string"),
    thumbnail_url: (v) => typeof v === "string",
    recorded: (v) => typeof v === "string",
    description: (v) => typeof v === "string",
    copyright_text: (v) => v === null || typeof v === "string",
    language: (v) => v === null || typeof v === "string",
    duration: (v) => typeof v === "number",
    related_urls: (v) => Array.isArray(v) && v.every(isRelatedUrl)
  };
  for (const [field, check] of Object.entries(checks)) {
    if (field in data && !check(data[field])) {
      throw new RecordFileError(filePath, `'${field}' has an unexpected type`);
    }
  }

  const record: VideoRecord = { title, videos };
  for (const [field, value] of Object.entries(data)) {
    if (field === "title" || field === "videos") continue;
    if (!isJsonValue(value)) {
      throw new RecordFileError(filePath, `'${field}' is not a JSON value`);
    }
    setOwnProperty(record, field, value);
  }
  return record;
}

/**
 * File-backed store for one event's `videos/` directory.
 * Each record lives in `<id>.json`; the identifier is the file stem.
 */
export class VideoRepository {
  constructor(
    private videoDir: string,
    private logger: Logger
  ) {}

  pathFor(id: string): string {
    return path.join(this.videoDir, `${id}${RECORD_EXTENSION}`);
  }

  /**
   * Loads every stored record of the event.
   * A missing directory is an empty set.
   * @returns Identifier -> record, in identifier order
   * @throws RecordFileError if a file is not a valid video document
   */
  async loadAll(): Promise<RecordSet> {
    const names = await this.listRecordFiles();
    const records: RecordSet = new Map();

    for (const name of names) {
      const filePath = path.join(this.videoDir, name);
      const text = await fs.readFile(filePath, "utf8");

      let data: unknown;
      try {
        data = JSON.parse(text);
      } catch (err: unknown) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new RecordFileError(filePath, `invalid JSON (${reason})`);
      }

      records.set(
        path.basename(name, RECORD_EXTENSION),
        parseVideoRecord(filePath, data)
      );
    }

    this.logger.log(
      LogLevel.DEBUG,
      `Loaded ${records.size} stored videos from ${this.videoDir}`
    );
    return records;
  }

  /**
   * Deletes every file in the videos directory so that no stale record
   * survives a replace-all run.
   * @returns The number of files removed
   */
  async wipe(): Promise<number> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.videoDir);
    } catch (err: unknown) {
      if (isNotFound(err)) return 0;
      throw err;
    }

    for (const entry of entries) {
      await fs.rm(path.join(this.videoDir, entry), { recursive: true, force: true });
    }
    this.logger.log(
      LogLevel.DEBUG,
      `Removed ${entries.length} files from ${this.videoDir}`
    );
    return entries.length;
  }

  /**
   * Writes the final record set, one file per record, in identifier order.
   * If `<id>.json` already holds a different video (another playback URL), the
   * record is written to the first free `<id>-N.json` instead.
   * Files written before a failure are left in place.
   * @param records The reconciled record set
   * @returns The paths written
   */
  async saveAll(records: RecordSet): Promise<string[]> {
    await fs.mkdir(this.videoDir, { recursive: true });

    const ids = [...records.keys()].sort();
    const written: string[] = [];
    const writtenThisRun = new Set<string>();

    for (const id of ids) {
      const record = records.get(id);
      if (record === undefined) continue;

      const freeId = await nextFreeIdentifierAsync(
        id,
        async (candidate) =>
          writtenThisRun.has(candidate) ||
          (await this.belongsToOtherVideo(candidate, record))
      );
      if (freeId !== id) {
        this.logger.log(
          LogLevel.WARN,
          `Identifier ${id} collides with another video, writing ${freeId}`
        );
      }

      const filePath = this.pathFor(freeId);
      await fs.writeFile(filePath, serializeJson(record), "utf8");
      writtenThisRun.add(freeId);
      written.push(filePath);
      this.logger.log(LogLevel.DEBUG, `File ${filePath} created`);
    }

    return written;
  }

  private async belongsToOtherVideo(
    id: string,
    record: VideoRecord
  ): Promise<boolean> {
    let text: string;
    try {
      text = await fs.readFile(this.pathFor(id), "utf8");
    } catch (err: unknown) {
      if (isNotFound(err)) return false;
      throw err;
    }

    let existingUrl: string | null = null;
    try {
      const existing = parseVideoRecord(this.pathFor(id), JSON.parse(text));
      existingUrl = playbackUrl(existing);
    } catch (err: unknown) {
      // Unreadable file: never overwrite what we cannot identify
      this.logger.log(
        LogLevel.WARN,
        `Cannot read ${this.pathFor(id)}: ${err instanceof Error ? err.message : String(err)}`
      );
      return true;
    }
    return existingUrl !== playbackUrl(record);
  }

  private async listRecordFiles(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.videoDir);
      return entries.filter((name) => name.endsWith(RECORD_EXTENSION)).sort();
    } catch (err: unknown) {
      if (isNotFound(err)) return [];
      throw err;
    }
  }
}

function isNotFound(err: unknown): boolean {
  return (
    err instanceof Error && "code" in err && err.code === "ENOENT"
  );
}
