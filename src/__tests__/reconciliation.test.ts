import { describe, it, expect } from "vitest";
import {
  OverwriteMode,
  OverwritePolicy,
  RecordSet,
  ScrapedVideo
} from "../db/types";
import { mergeRecord, reconcile } from "../services/reconciliation";
import { makeRecord } from "./fixtures";

const U1 = "https://www.youtube.com/watch?v=u1";
const U2 = "https://www.youtube.com/watch?v=u2";
const U3 = "https://www.youtube.com/watch?v=u3";

const REPLACE_ALL: OverwritePolicy = { mode: OverwriteMode.REPLACE_ALL };
const REPLACE_NEW_ONLY: OverwritePolicy = { mode: OverwriteMode.REPLACE_NEW_ONLY };

function merge(
  overwriteFields: string[] | null,
  addNewFiles = false
): OverwritePolicy {
  return { mode: OverwriteMode.MERGE, addNewFiles, overwriteFields };
}

function scraped(id: string, title: string, url: string): ScrapedVideo {
  return { id, record: makeRecord(title, url, { description: "fresh" }) };
}

describe("reconcile", () => {
  it("returns the scrape under every policy when nothing is stored", () => {
    const videos = [scraped("talk-a", "Talk A", U1), scraped("talk-b", "Talk B", U2)];

    for (const policy of [REPLACE_ALL, REPLACE_NEW_ONLY, merge(["title"], true)]) {
      const result = reconcile({ policy, scraped: videos, stored: new Map() });
      expect([...result.videos.keys()]).toEqual(["talk-a", "talk-b"]);
      expect(result.videos.get("talk-a")).toBe(videos[0].record);
    }
  });

  it("suffixes duplicate slugs within one scrape", () => {
    const result = reconcile({
      policy: REPLACE_NEW_ONLY,
      scraped: [scraped("keynote", "Keynote", U2), scraped("keynote", "Keynote", U1)],
      stored: new Map()
    });

    expect([...result.videos.keys()]).toEqual(["keynote", "keynote-2"]);
    // Allocation follows the playback URL, not the order of the scrape
    expect(result.videos.get("keynote")?.videos[0].url).toBe(U1);
    expect(result.videos.get("keynote-2")?.videos[0].url).toBe(U2);
  });

  it("collapses the same video listed twice", () => {
    const result = reconcile({
      policy: REPLACE_NEW_ONLY,
      scraped: [scraped("talk", "Talk", U1), scraped("talk-again", "Talk again", U1)],
      stored: new Map()
    });

    expect([...result.videos.keys()]).toEqual(["talk"]);
  });

  describe("replace-all", () => {
    it("keeps exactly the scrape, dropping every stored record", () => {
      const stored: RecordSet = new Map([
        ["old-talk", makeRecord("Old talk", U3)],
        ["other", makeRecord("Other", U2)]
      ]);
      const videos = [scraped("talk-a", "Talk A", U1)];

      const result = reconcile({ policy: REPLACE_ALL, scraped: videos, stored });

      expect([...result.videos.entries()]).toEqual([["talk-a", videos[0].record]]);
      expect(result.disappeared).toEqual(["old-talk", "other"]);
    });

    it("keeps the stored identifier of a video whose title changed", () => {
      const stored: RecordSet = new Map([["foo", makeRecord("Foo", U1)]]);

      const result = reconcile({
        policy: REPLACE_ALL,
        scraped: [scraped("foo-renamed", "Foo renamed", U1)],
        stored
      });

      expect([...result.videos.keys()]).toEqual(["foo"]);
      expect(result.videos.get("foo")?.title).toBe("Foo renamed");
    });

    it("lets a new video take the slug of a stored record that is being replaced", () => {
      const stored: RecordSet = new Map([["keynote", makeRecord("Keynote", U3)]]);

      const result = reconcile({
        policy: REPLACE_ALL,
        scraped: [scraped("keynote", "Keynote", U1)],
        stored
      });

      expect([...result.videos.keys()]).toEqual(["keynote"]);
      expect(result.videos.get("keynote")?.videos[0].url).toBe(U1);
    });
  });

  describe("replace-new-only", () => {
    it("ignores stored records entirely", () => {
      const stored: RecordSet = new Map([["foo", makeRecord("Foo", U1)]]);

      const result = reconcile({
        policy: REPLACE_NEW_ONLY,
        scraped: [scraped("foo-renamed", "Foo renamed", U1)],
        stored
      });

      expect([...result.videos.keys()]).toEqual(["foo-renamed"]);
      expect(result.disappeared).toEqual([]);
    });
  });

  describe("merge", () => {
    const stored = (): RecordSet =>
      new Map([
        ["foo", makeRecord("Foo", U1, { speakers: ["Ada Lovelace"], quality_notes: "audio drops" })],
        ["gone", makeRecord("Gone", U3)]
      ]);

    it("overwrites only the configured fields of matching records", () => {
      const result = reconcile({
        policy: merge(["title"]),
        scraped: [scraped("foo-v2", "Foo v2", U1)],
        stored: stored()
      });

      expect(result.videos.get("foo")).toEqual(
        makeRecord("Foo v2", U1, { speakers: ["Ada Lovelace"], quality_notes: "audio drops" })
      );
      expect(result.updated).toEqual(["foo"]);
    });

    it("keeps stored records unchanged without overwrite_fields", () => {
      const before = stored();
      const result = reconcile({
        policy: merge(null),
        scraped: [scraped("foo-v2", "Foo v2", U1)],
        stored: before
      });

      expect(result.videos.get("foo")).toBe(before.get("foo"));
      expect(result.updated).toEqual([]);
    });

    it("keeps and reports stored videos the source no longer lists", () => {
      const before = stored();
      const result = reconcile({
        policy: merge(["title"]),
        scraped: [scraped("foo", "Foo", U1)],
        stored: before
      });

      expect(result.videos.get("gone")).toBe(before.get("gone"));
      expect(result.disappeared).toEqual(["gone"]);
    });

    it("adds new-only videos when add_new_files is on", () => {
      const fresh = scraped("new-talk", "New talk", U2);
      const result = reconcile({
        policy: merge(["title"], true),
        scraped: [fresh],
        stored: stored()
      });

      expect([...result.videos.keys()]).toEqual(["foo", "gone", "new-talk"]);
      expect(result.videos.get("new-talk")).toBe(fresh.record);
      expect(result.added).toEqual(["new-talk"]);
    });

    it("drops and reports new-only videos when add_new_files is off", () => {
      const result = reconcile({
        policy: merge(["title"]),
        scraped: [scraped("new-talk", "New talk", U2)],
        stored: stored()
      });

      expect([...result.videos.keys()]).toEqual(["foo", "gone"]);
      expect(result.dropped).toEqual(["new-talk"]);
    });

    it("never gives a new video the identifier of a stored one", () => {
      const result = reconcile({
        policy: merge(null, true),
        scraped: [scraped("foo", "Foo", U2)],
        stored: stored()
      });

      expect([...result.videos.keys()]).toEqual(["foo", "foo-2", "gone"]);
      expect(result.videos.get("foo-2")?.videos[0].url).toBe(U2);
    });
  });
});

describe("mergeRecord", () => {
  it("keeps stored values for fields the scraped record lacks", () => {
    const stored = makeRecord("Foo", U1, { summary: "hand written" });
    const fresh = makeRecord("Foo v2", U1);

    expect(mergeRecord(stored, fresh, ["title", "summary"])).toEqual(
      makeRecord("Foo v2", U1, { summary: "hand written" })
    );
  });

  it("does not modify its inputs", () => {
    const stored = makeRecord("Foo", U1);
    mergeRecord(stored, makeRecord("Bar", U1), ["title"]);
    expect(stored.title).toBe("Foo");
  });
});
