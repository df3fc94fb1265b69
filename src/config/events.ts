import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { parse as parseYaml } from "yaml";
import {
  EventConfig,
  EventDates,
  OverwriteMode,
  OverwritePolicy,
  RelatedUrl
} from "../db/types";
import { isCalendarDate } from "../utils/dates";
import { ConfigError } from "../utils/errors";
import { isJsonObject, JsonObjectLike } from "../utils/json";

const MANDATORY_FIELDS = ["title", "dir", "issue", "youtube_list"] as const;
const MINIMAL_DOWNLOAD_SUFFIX = "-minimal-download";
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface EventsFile {
  /** Absolute path of the video metadata repository */
  repoDir: string;
  /** Raw event mappings, validated one at a time by {@link parseEvent} */
  events: Record<string, unknown>[];
}

/**
 * Expands a leading `~` and resolves the repository path against the
 * working directory.
 */
export function resolveRepoDir(repoDir: string): string {
  const expanded =
    repoDir === "~" || repoDir.startsWith("~/")
      ? path.join(os.homedir(), repoDir.slice(1))
      : repoDir;
  return path.resolve(expanded);
}

/**
 * Reads the events document: a `repo_dir` and a list of `events`.
 * Individual events are not validated here so that one broken entry does not
 * stop the others from being scraped.
 * @param filePath Path of the YAML file
 * @throws ConfigError if the document lacks `repo_dir` or `events`
 */
export async function loadEventsFile(filePath: string): Promise<EventsFile> {
  const text = await fs.readFile(filePath, "utf8");
  const doc: unknown = parseYaml(text);

  if (!isJsonObject(doc)) {
    throw new ConfigError(`${filePath}: expected a mapping at the top level`);
  }
  if (typeof doc.repo_dir !== "string" || doc.repo_dir === "") {
    throw new ConfigError(`${filePath}: 'repo_dir' is required`);
  }
  if (!Array.isArray(doc.events)) {
    throw new ConfigError(`${filePath}: 'events' must be a list`);
  }

  const events: Record<string, unknown>[] = [];
  doc.events.forEach((event: unknown, index: number) => {
    if (!isJsonObject(event)) {
      throw new ConfigError(`${filePath}: event #${index + 1} is not a mapping`);
    }
    events.push(event);
  });

  return { repoDir: resolveRepoDir(doc.repo_dir), events };
}

function optionalString(
  data: JsonObjectLike,
  field: string,
  eventName: string
): string | null {
  const value = data[field];
  if (value === undefined || value === null || value === "") return null;
  if (typeof value !== "string") {
    throw new ConfigError(`'${field}' must be a string in event ${eventName}`);
  }
  return value;
}

function stringList(value: unknown, field: string, eventName: string): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new ConfigError(
      `'${field}' must be a list of strings in event ${eventName}`
    );
  }
  return [...value];
}

function parseYoutubeLists(value: unknown, eventName: string): string[] {
  if (typeof value === "string") return [value];
  if (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((item): item is string => typeof item === "string" && item !== "")
  ) {
    return [...value];
  }
  throw new ConfigError(
    `'youtube_list' must be a string or a list of strings in event ${eventName}`
  );
}

function parseRelatedUrls(value: unknown, eventName: string): RelatedUrl[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ConfigError(`'related_urls' must be a list in event ${eventName}`);
  }
  return value.map((entry: unknown) => {
    if (
      !isJsonObject(entry) ||
      typeof entry.url !== "string" ||
      typeof entry.label !== "string"
    ) {
      throw new ConfigError(
        `'related_urls' entries need a 'label' and a 'url' in event ${eventName}`
      );
    }
    return { label: entry.label, url: entry.url };
  });
}

function isoDate(value: unknown, field: string, eventName: string): string {
  // A YAML timestamp tag would give a Date; keep the calendar day
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return value.toISOString().slice(0, 10);
  }
  const match = typeof value === "string" ? ISO_DATE.exec(value) : null;
  if (match && isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]))) {
    return match[0];
  }
  throw new ConfigError(
    `'dates.${field}' must be a YYYY-MM-DD date in event ${eventName}`
  );
}

/**
 * `end` and `default` fall back to `begin`.
 */
function parseDates(value: unknown, eventName: string): EventDates | null {
  if (value === undefined || value === null) return null;
  if (!isJsonObject(value)) {
    throw new ConfigError(`'dates' must be a mapping in event ${eventName}`);
  }

  const begin = isoDate(value.begin, "begin", eventName);
  const end =
    value.end === undefined || value.end === null
      ? begin
      : isoDate(value.end, "end", eventName);
  const fallback =
    value.default === undefined || value.default === null
      ? begin
      : isoDate(value.default, "default", eventName);

  if (end < begin) {
    throw new ConfigError(
      `'dates.end' (${end}) is before 'dates.begin' (${begin}) in event ${eventName}`
    );
  }
  return { begin, end, default: fallback };
}

function optionalBoolean(
  data: JsonObjectLike,
  field: string,
  eventName: string
): boolean | undefined {
  const value = data[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") {
    throw new ConfigError(`'overwrite.${field}' must be a boolean in event ${eventName}`);
  }
  return value;
}

/**
 * Reads the `overwrite` mapping. Without one the event only accepts a fresh
 * directory and stored records are never consulted.
 *
 * ```yaml
 * overwrite:
 *   all: true                # replace-all
 * overwrite:
 *   add_new_files: true      # merge
 *   overwrite_fields: [title, description]
 * ```
 */
export function parseOverwritePolicy(
  value: unknown,
  eventName: string
): OverwritePolicy {
  if (value === undefined || value === null) {
    return { mode: OverwriteMode.REPLACE_NEW_ONLY };
  }
  if (!isJsonObject(value)) {
    throw new ConfigError(`'overwrite' must be a mapping in event ${eventName}`);
  }

  const { mode, overwrite_fields: fields } = value;
  const all = optionalBoolean(value, "all", eventName);
  const addNewFiles = optionalBoolean(value, "add_new_files", eventName);
  const overwriteFields =
    fields === undefined || fields === null
      ? null
      : stringList(fields, "overwrite.overwrite_fields", eventName);
  const hasMergeOptions = addNewFiles !== undefined || overwriteFields !== null;

  let resolved: OverwriteMode;
  if (mode === undefined) {
    if (all === true) resolved = OverwriteMode.REPLACE_ALL;
    else if (hasMergeOptions) resolved = OverwriteMode.MERGE;
    else resolved = OverwriteMode.REPLACE_NEW_ONLY;
  } else {
    const known = Object.values(OverwriteMode).find((m) => m === mode);
    if (!known) {
      throw new ConfigError(
        `'overwrite.mode' must be one of ${Object.values(OverwriteMode).join(", ")} in event ${eventName}`
      );
    }
    resolved = known;
  }

  if (
    (all === true && resolved !== OverwriteMode.REPLACE_ALL) ||
    (hasMergeOptions && resolved !== OverwriteMode.MERGE)
  ) {
    throw new ConfigError(
      `'overwrite' mixes options of different modes in event ${eventName}`
    );
  }

  if (resolved === OverwriteMode.MERGE) {
    return {
      mode: OverwriteMode.MERGE,
      addNewFiles: addNewFiles ?? false,
      overwriteFields
    };
  }
  return { mode: resolved };
}

/**
 * Validates one event mapping from events.yml and resolves its paths.
 * @param data The raw mapping
 * @param repoDir Absolute path of the video metadata repository
 * @returns The event ready to be scraped
 * @throws ConfigError if a mandatory field is missing or a field has the wrong type
 */
export function parseEvent(
  data: Record<string, unknown>,
  repoDir: string
): EventConfig {
  const eventName =
    typeof data.title === "string" && data.title !== ""
      ? data.title
      : typeof data.dir === "string"
        ? data.dir
        : "<unnamed>";

  for (const field of MANDATORY_FIELDS) {
    const value = data[field];
    if (value === undefined || value === null || value === "") {
      throw new ConfigError(`No ${field} data in conference ${eventName}`);
    }
  }

  const { title, dir, issue } = data;
  if (typeof title !== "string") {
    throw new ConfigError(`'title' must be a string in event ${eventName}`);
  }
  if (typeof dir !== "string" || dir.includes("/") || dir.includes("\\") || dir.startsWith(".")) {
    throw new ConfigError(`'dir' must be a plain directory name in event ${eventName}`);
  }
  if (typeof issue !== "string" && typeof issue !== "number") {
    throw new ConfigError(`'issue' must be a number or a string in event ${eventName}`);
  }

  const minimalDownload = data.minimal_download ?? false;
  if (typeof minimalDownload !== "boolean") {
    throw new ConfigError(
      `'minimal_download' must be a boolean in event ${eventName}`
    );
  }

  const eventDir = path.join(repoDir, dir);
  return {
    title,
    dir,
    branch: minimalDownload ? `${dir}${MINIMAL_DOWNLOAD_SUFFIX}` : dir,
    issue: String(issue).replace(/^#/, ""),
    youtubeLists: parseYoutubeLists(data.youtube_list, eventName),
    relatedUrls: parseRelatedUrls(data.related_urls, eventName),
    language: optionalString(data, "language", eventName),
    tags: stringList(data.tags, "tags", eventName),
    dates: parseDates(data.dates, eventName),
    minimalDownload,
    overwrite: parseOverwritePolicy(data.overwrite, eventName),
    eventDir,
    videoDir: path.join(eventDir, "videos"),
    definition: data
  };
}
