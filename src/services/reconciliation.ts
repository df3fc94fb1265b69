import {
  OverwriteMode,
  OverwritePolicy,
  RecordSet,
  ScrapedVideo,
  VideoRecord
} from "../db/types";
import { nextFreeIdentifier } from "../scrapers/utils";
import { setOwnProperty } from "../utils/json";

export interface ReconcileInput {
  policy: OverwritePolicy;
  /** Freshly normalized videos, identifiers still title-derived */
  scraped: readonly ScrapedVideo[];
  /** Records already stored for the event */
  stored: RecordSet;
}

export interface ReconcileResult {
  /** The record set to persist, in identifier order */
  videos: RecordSet;
  /** New-only identifiers that made it into the final set */
  added: string[];
  /** Identifiers present in both sets whose fields were overwritten */
  updated: string[];
  /** Stored identifiers that the source no longer lists (kept only under merge) */
  disappeared: string[];
  /** New-only identifiers left out because the policy does not add files */
  dropped: string[];
}

/**
 * The first playback location identifies a video across scrapes.
 * Titles, and therefore slugs, may be edited on the source in between.
 */
export function playbackUrl(record: VideoRecord): string | null {
  return record.videos[0]?.url ?? null;
}

function sortedById(entries: Iterable<[string, VideoRecord]>): RecordSet {
  return new Map([...entries].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

/**
 * Gives every scraped video its final identifier.
 * Videos already stored under the same playback URL keep the stored identifier;
 * the rest get their slug, suffixed with -2, -3, ... when it is taken.
 * Unmatched videos are allocated in (slug, url) order so that the order the
 * source lists them in never changes the outcome.
 */
function assignIdentifiers(
  scraped: readonly ScrapedVideo[],
  stored: RecordSet,
  reserveStoredIds: boolean
): Map<string, VideoRecord> {
  const storedIdByUrl = new Map<string, string>();
  for (const [id, record] of stored) {
    const url = playbackUrl(record);
    if (url !== null && !storedIdByUrl.has(url)) storedIdByUrl.set(url, id);
  }

  const assigned = new Map<string, VideoRecord>();
  const unmatched: ScrapedVideo[] = [];
  const seenUrls = new Set<string>();

  for (const video of scraped) {
    const url = playbackUrl(video.record);
    if (url !== null) {
      // Same video listed twice (e.g. in two playlists): first one wins
      if (seenUrls.has(url)) continue;
      seenUrls.add(url);
    }

    const storedId = url !== null ? storedIdByUrl.get(url) : undefined;
    if (storedId !== undefined) {
      assigned.set(storedId, video.record);
    } else {
      unmatched.push(video);
    }
  }

  const isTaken = (id: string) =>
    assigned.has(id) || (reserveStoredIds && stored.has(id));

  const byIdThenUrl = [...unmatched].sort((a, b) => {
    if (a.id !== b.id) return a.id < b.id ? -1 : 1;
    const urlA = playbackUrl(a.record) ?? "";
    const urlB = playbackUrl(b.record) ?? "";
    return urlA < urlB ? -1 : urlA > urlB ? 1 : 0;
  });
  for (const video of byIdThenUrl) {
    assigned.set(nextFreeIdentifier(video.id, isTaken), video.record);
  }

  return assigned;
}

/**
 * Overwrites the named fields of a stored record with the scraped values.
 * Every other field, hand edits included, stays as stored. A field the scraped
 * record does not carry keeps its stored value.
 */
export function mergeRecord(
  stored: VideoRecord,
  scraped: VideoRecord,
  fields: readonly string[]
): VideoRecord {
  const merged: VideoRecord = { ...stored };
  for (const field of fields) {
    const value = scraped[field];
    if (value !== undefined) setOwnProperty(merged, field, value);
  }
  return merged;
}

/**
 * Computes the record set to persist for an event from this run's scrape and
 * what is already stored, under the event's overwrite policy.
 *
 * - replace-all: the scrape, with identifiers carried over from stored records
 *   of the same playback URL.
 * - replace-new-only: the scrape alone; stored records are not consulted.
 * - merge: the stored records, with `overwriteFields` taken from the scrape
 *   for videos in both sets, plus the new-only videos when `addNewFiles` is on.
 *
 * An event with nothing stored yields the scrape under every policy.
 * @param input The policy, scraped videos and stored records
 * @returns The final set plus the identifiers worth reporting
 */
export function reconcile(input: ReconcileInput): ReconcileResult {
  const { policy } = input;
  const stored: RecordSet =
    policy.mode === OverwriteMode.REPLACE_NEW_ONLY ? new Map() : input.stored;

  const scraped = assignIdentifiers(
    input.scraped,
    stored,
    policy.mode === OverwriteMode.MERGE
  );

  if (policy.mode !== OverwriteMode.MERGE) {
    return {
      videos: sortedById(scraped),
      added: [...scraped.keys()].filter((id) => !stored.has(id)).sort(),
      updated: [...scraped.keys()].filter((id) => stored.has(id)).sort(),
      disappeared: [...stored.keys()].filter((id) => !scraped.has(id)).sort(),
      dropped: []
    };
  }

  const final = new Map(stored);
  const result: Omit<ReconcileResult, "videos"> = {
    added: [],
    updated: [],
    disappeared: [],
    dropped: []
  };

  for (const [id, record] of stored) {
    const fresh = scraped.get(id);
    if (fresh === undefined) {
      result.disappeared.push(id);
    } else if (policy.overwriteFields !== null) {
      final.set(id, mergeRecord(record, fresh, policy.overwriteFields));
      result.updated.push(id);
    }
  }

  for (const [id, record] of scraped) {
    if (stored.has(id)) continue;
    if (policy.addNewFiles) {
      final.set(id, record);
      result.added.push(id);
    } else {
      result.dropped.push(id);
    }
  }

  return {
    videos: sortedById(final),
    added: result.added.sort(),
    updated: result.updated.sort(),
    disappeared: result.disappeared.sort(),
    dropped: result.dropped.sort()
  };
}
