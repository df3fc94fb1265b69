export const METADATA_ARGS = [
  // Print the whole info dict (playlist entries included) as one JSON
  // document on stdout; nothing is downloaded.
  "--dump-single-json",

  // Private and unavailable videos become null entries instead of
  // aborting the whole playlist.
  "--ignore-errors",

  // Resolve every playlist entry fully; flat entries lack upload_date,
  // formats and description.
  "--no-flat-playlist",

  // Keep stderr readable in our error messages.
  "--no-warnings",
  "--no-progress",

  // If the server doesn't respond within 30 seconds, the connection is dropped.
  // Prevents the run from hanging indefinitely on a dead link.
  "--socket-timeout",
  "30"
];

/**
 * Builds the yt-dlp arguments for a metadata-only extraction.
 * @param url A video URL, playlist URL or bare playlist id
 * @returns A flat array of strings suitable for spawning a child process
 * @example
 * getYtDlpArgs("PLxyz")
 * // returns [...METADATA_ARGS, "https://www.youtube.com/playlist?list=PLxyz"]
 */
export function getYtDlpArgs(url: string): string[] {
  return [...METADATA_ARGS, toSourceUrl(url)];
}

/**
 * Accepts the forms events.yml uses for a list: a full URL, or a bare
 * YouTube playlist id.
 */
export function toSourceUrl(list: string): string {
  if (/^https?:\/\//.test(list)) return list;
  return `https://www.youtube.com/playlist?list=${encodeURIComponent(list)}`;
}
