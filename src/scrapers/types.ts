/**
 * One video's info dict as printed by `yt-dlp -J`.
 * Only the keys the normalizer reads are listed; all of them are validated
 * before use, since extractors differ in what they fill in.
 */
export interface RawVideoEntry {
  fulltitle?: unknown;
  title?: unknown;
  _filename?: unknown;

  thumbnail?: unknown;
  /** The page the video plays on, e.g. 'https://www.youtube.com/watch?v=...' */
  webpage_url?: unknown;
  /** 'YYYYMMDD' */
  upload_date?: unknown;
  /** Seconds */
  duration?: unknown;
  license?: unknown;
  formats?: unknown;
  tags?: unknown;
  description?: unknown;

  [key: string]: unknown;
}

/** A private or unavailable video comes back as null when errors are ignored */
export type ExtractedEntry = RawVideoEntry | null;

export interface VideoExtractor {
  /**
   * Lists every video behind a URL or playlist id.
   * A single video URL yields a one-element list.
   */
  extract(url: string): Promise<ExtractedEntry[]>;
}
