export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type VideoLocation = {
  type: string;
  url: string;
};

export type RelatedUrl = {
  label: string;
  url: string;
};

/**
 * One talk as it is persisted in `<event>/videos/<id>.json`.
 * Records scraped in this run carry every known field; records loaded from
 * disk may lack the optional ones and may hold extra hand-edited fields.
 */
export type VideoRecord = {
  title: string;
  videos: VideoLocation[];
  speakers?: string[];
  thumbnail_url?: string;
  recorded?: string; // YYYY-MM-DD
  copyright_text?: string | null;
  duration?: number; // seconds
  language?: string | null;
  related_urls?: RelatedUrl[];
  tags?: string[];
  description?: string;
  [field: string]: JsonValue | undefined;
};

/** Identifier (file stem) -> record, iterated in identifier order. */
export type RecordSet = Map<string, VideoRecord>;

export interface ScrapedVideo {
  /** Slug derived from the title */
  id: string;
  record: VideoRecord;
}

export enum OverwriteMode {
  REPLACE_ALL = "replace-all", // wipe stored files, keep only this scrape
  MERGE = "merge", // stored files are the base set
  REPLACE_NEW_ONLY = "replace-new-only" // default, stored files are ignored
}

export type OverwritePolicy =
  | { mode: OverwriteMode.REPLACE_ALL }
  | { mode: OverwriteMode.REPLACE_NEW_ONLY }
  | {
      mode: OverwriteMode.MERGE;
      addNewFiles: boolean;
      /** null when no field-level overwrite was configured */
      overwriteFields: string[] | null;
    };

export interface EventDates {
  begin: string;
  end: string;
  default: string;
}

export interface EventConfig {
  title: string;
  dir: string;
  branch: string;
  issue: string;
  youtubeLists: string[];
  relatedUrls: RelatedUrl[];
  language: string | null;
  tags: string[];
  dates: EventDates | null;
  minimalDownload: boolean;
  overwrite: OverwritePolicy;

  /** `<repo_dir>/<dir>` */
  eventDir: string;
  /** `<repo_dir>/<dir>/videos` */
  videoDir: string;

  /** The event's mapping from events.yml, embedded in the commit message */
  definition: Record<string, unknown>;
}
