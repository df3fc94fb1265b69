import { EventConfig, RelatedUrl, ScrapedVideo, VideoRecord } from "../db/types";
import { RawVideoEntry } from "../scrapers/types";
import { generateSlug } from "../scrapers/utils";
import { isCalendarDate } from "../utils/dates";
import { NormalizationError } from "../utils/errors";

const UNKNOWN_TITLE = "Unknown";
const SPEAKERS_PLACEHOLDER = "TODO"; // Speakers need a human pass later
const VIDEO_TYPE = "youtube";

// Best effort: stops at whitespace, brackets and quotes, keeps trailing punctuation
const URL_PATTERN = /https?:\/\/[^\s\\()[\]"']+/g;

function nonEmptyString(value: unknown): string | null {
  return typeof value === "string" && value.length > 0 ? value : null;
}

function requireString(raw: RawVideoEntry, field: string): string {
  const value = nonEmptyString(raw[field]);
  if (value === null) {
    throw new NormalizationError(`Missing or invalid '${field}'`, field);
  }
  return value;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value)
    ? value.filter((item): item is string => typeof item === "string")
    : [];
}

/**
 * Picks the most descriptive title the extractor provided.
 * @param raw The extractor entry
 */
export function selectTitle(raw: RawVideoEntry): string {
  return (
    nonEmptyString(raw.fulltitle) ??
    nonEmptyString(raw.title) ??
    nonEmptyString(raw._filename) ??
    UNKNOWN_TITLE
  );
}

/**
 * Converts yt-dlp's 'YYYYMMDD' into 'YYYY-MM-DD' and clamps it to the event's
 * date range. Uploads outside [begin, end] get the event's default date.
 * @param uploadDate The raw upload_date value
 * @param event The event owning the video
 * @returns An ISO calendar date
 * @throws NormalizationError if the value is not an 8-digit calendar date
 */
export function calculateRecordedDate(
  uploadDate: unknown,
  event: Pick<EventConfig, "dates">
): string {
  const match =
    typeof uploadDate === "string" ? /^(\d{4})(\d{2})(\d{2})$/.exec(uploadDate) : null;
  if (
    !match ||
    !isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]))
  ) {
    throw new NormalizationError(
      `Invalid 'upload_date': ${JSON.stringify(uploadDate)}`,
      "upload_date"
    );
  }

  const [, year, month, day] = match;
  const recorded = `${year}-${month}-${day}`;

  if (!event.dates) return recorded;

  // ISO dates compare correctly as strings
  const { begin, end } = event.dates;
  if (recorded < begin || recorded > end) {
    return event.dates.default;
  }
  return recorded;
}

/**
 * Scans free text for http(s) links and turns the unseen ones into related
 * URL entries. The pattern is a heuristic, not a URL grammar: a link followed
 * by a period keeps the period.
 * @param text The video description
 * @param known Entries already present on the record
 */
export function extractRelatedUrls(
  text: string,
  known: readonly RelatedUrl[] = []
): RelatedUrl[] {
  const seen = new Set(known.map((entry) => entry.url));
  const found: RelatedUrl[] = [];

  for (const url of text.match(URL_PATTERN) ?? []) {
    if (seen.has(url)) continue;
    seen.add(url);
    found.push({ label: url, url });
  }
  return found;
}

function firstFormatLanguage(formats: unknown): string | null {
  if (!Array.isArray(formats) || formats.length === 0) return null;
  const first: unknown = formats[0];
  if (first === null || typeof first !== "object") return null;
  return "language" in first ? nonEmptyString(first.language) : null;
}

/**
 * Builds the canonical record for one extracted video.
 * In minimal-download mode only the fields that need no human review are
 * filled: no speakers placeholder, event tags only and an empty description.
 * @param raw The extractor entry
 * @param event The event owning the video
 * @returns The record with its title-derived identifier
 * @throws NormalizationError if a required field is missing or malformed
 */
export function normalizeVideo(
  raw: RawVideoEntry,
  event: EventConfig
): ScrapedVideo {
  const title = selectTitle(raw);
  const thumbnailUrl = requireString(raw, "thumbnail");
  const webpageUrl = requireString(raw, "webpage_url");
  const recorded = calculateRecordedDate(raw.upload_date, event);

  const duration = raw.duration;
  if (typeof duration !== "number" || !Number.isFinite(duration)) {
    throw new NormalizationError(
      `Missing or invalid 'duration' for ${webpageUrl}`,
      "duration"
    );
  }

  const relatedUrls = event.relatedUrls.map((entry) => ({ ...entry }));
  const record: VideoRecord = {
    title,
    speakers: [],
    thumbnail_url: thumbnailUrl,
    videos: [{ type: VIDEO_TYPE, url: webpageUrl }],
    recorded,
    copyright_text: nonEmptyString(raw.license),
    duration,
    language: firstFormatLanguage(raw.formats) ?? event.language,
    related_urls: relatedUrls,
    tags: [...event.tags],
    description: ""
  };

  if (!event.minimalDownload) {
    const description = typeof raw.description === "string" ? raw.description : "";
    record.speakers = [SPEAKERS_PLACEHOLDER];
    record.description = description;
    record.related_urls = [
      ...relatedUrls,
      ...extractRelatedUrls(description, relatedUrls)
    ];
    record.tags = [...new Set([...stringList(raw.tags), ...event.tags])].sort();
  }

  return { id: generateSlug(title), record };
}
