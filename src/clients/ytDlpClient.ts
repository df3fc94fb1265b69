import { getYtDlpArgs } from "../config/yt-dlp";
import { ExtractedEntry, RawVideoEntry, VideoExtractor } from "../scrapers/types";
import { CommandError } from "../utils/errors";
import { isJsonObject } from "../utils/json";
import { runCommand } from "../utils/process";

/**
 * Splits yt-dlp's info dict into video entries. A playlist carries them under
 * `entries`, where skipped videos show up as null; a single video is its own
 * entry.
 * @param info The parsed `--dump-single-json` output
 */
export function entriesFromInfo(info: unknown): ExtractedEntry[] {
  if (!isJsonObject(info)) {
    throw new Error("yt-dlp returned no info dict");
  }

  const { entries } = info;
  if (entries === undefined) {
    return [info];
  }
  if (!Array.isArray(entries)) {
    throw new Error("yt-dlp 'entries' is not a list");
  }

  return entries.flatMap((entry: unknown): ExtractedEntry[] => {
    if (!isJsonObject(entry)) return [null];
    // Nested playlists (a channel's tabs) are flattened
    if (Array.isArray(entry.entries)) return entriesFromInfo(entry);
    const video: RawVideoEntry = entry;
    return [video];
  });
}

/**
 * Metadata-only extraction through the yt-dlp executable.
 */
export class YtDlpClient implements VideoExtractor {
  constructor(private ytDlpPath: string = "yt-dlp") {}

  /**
   * Lists every video behind a playlist or video URL, without downloading.
   * @param url A video URL, playlist URL or bare playlist id
   * @returns Raw entries, null for private or unavailable videos
   * @throws CommandError if yt-dlp cannot read the list at all
   */
  async extract(url: string): Promise<ExtractedEntry[]> {
    const args = getYtDlpArgs(url);
    // With --ignore-errors yt-dlp exits 1 when some entries failed but still
    // prints the info dict for the rest
    const { stdout, stderr, exitCode } = await runCommand(this.ytDlpPath, args, {
      acceptExitCodes: [0, 1]
    });
    if (stdout.trim() === "") {
      throw new CommandError(this.ytDlpPath, args, exitCode, stderr);
    }

    let info: unknown;
    try {
      info = JSON.parse(stdout);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`yt-dlp output for ${url} is not JSON (${reason})`);
    }
    return entriesFromInfo(info);
  }

  async version(): Promise<string> {
    const { stdout } = await runCommand(this.ytDlpPath, ["--version"]);
    return stdout.trim();
  }
}
