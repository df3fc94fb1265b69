import { describe, it, expect } from "vitest";
import { entriesFromInfo } from "../clients/ytDlpClient";
import { getYtDlpArgs, METADATA_ARGS, toSourceUrl } from "../config/yt-dlp";

describe("entriesFromInfo", () => {
  it("returns playlist entries with unavailable videos as null", () => {
    const info = {
      _type: "playlist",
      entries: [{ id: "a", title: "A" }, null, { id: "b", title: "B" }]
    };
    expect(entriesFromInfo(info)).toEqual([
      { id: "a", title: "A" },
      null,
      { id: "b", title: "B" }
    ]);
  });

  it("treats a single video as its own entry", () => {
    const info = { id: "a", title: "A" };
    expect(entriesFromInfo(info)).toEqual([info]);
  });

  it("flattens nested playlists", () => {
    const info = {
      entries: [{ entries: [{ id: "a" }, { id: "b" }] }, { id: "c" }]
    };
    expect(entriesFromInfo(info)).toEqual([{ id: "a" }, { id: "b" }, { id: "c" }]);
  });

  it("rejects output that is not an info dict", () => {
    expect(() => entriesFromInfo([1, 2])).toThrow("yt-dlp returned no info dict");
    expect(() => entriesFromInfo({ entries: "none" })).toThrow(
      "yt-dlp 'entries' is not a list"
    );
  });
});

describe("getYtDlpArgs", () => {
  it("expands a bare playlist id into a playlist URL", () => {
    expect(getYtDlpArgs("PLxyz")).toEqual([
      ...METADATA_ARGS,
      "https://www.youtube.com/playlist?list=PLxyz"
    ]);
  });

  it("passes URLs through", () => {
    expect(toSourceUrl("https://www.youtube.com/watch?v=abc123")).toBe(
      "https://www.youtube.com/watch?v=abc123"
    );
  });

  it("never asks yt-dlp to download media", () => {
    expect(METADATA_ARGS).toContain("--dump-single-json");
  });
});
