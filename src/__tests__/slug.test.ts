import { describe, it, expect } from "vitest";
import {
  generateSlug,
  nextFreeIdentifier,
  nextFreeIdentifierAsync
} from "../scrapers/utils";

describe("generateSlug", () => {
  it("lowercases and joins words with hyphens", () => {
    expect(generateSlug("Keynote: Python 4.0 & Beyond!")).toBe(
      "keynote-python-4-0-beyond"
    );
  });

  it("strips accents", () => {
    expect(generateSlug("Café Málaga Ñandú")).toBe("cafe-malaga-nandu");
  });

  it("collapses runs of separators and trims them at both ends", () => {
    expect(generateSlug("  --Hello___World--  ")).toBe("hello-world");
  });

  it("is deterministic and idempotent", () => {
    const title = "Async I/O in 2024 (Part 2)";
    const slug = generateSlug(title);

    expect(slug).toBe("async-i-o-in-2024-part-2");
    expect(generateSlug(title)).toBe(slug);
    expect(generateSlug(slug)).toBe(slug);
  });

  it("falls back to 'video' when nothing alphanumeric is left", () => {
    expect(generateSlug("!!!")).toBe("video");
    expect(generateSlug("")).toBe("video");
  });
});

describe("nextFreeIdentifier", () => {
  it("returns the base when it is free", () => {
    expect(nextFreeIdentifier("keynote", () => false)).toBe("keynote");
  });

  it("appends -2, -3, ... until a free identifier is found", () => {
    const taken = new Set(["keynote", "keynote-2"]);
    expect(nextFreeIdentifier("keynote", (id) => taken.has(id))).toBe("keynote-3");
  });

  it("has an async flavour with the same rule", async () => {
    const taken = new Set(["keynote"]);
    await expect(
      nextFreeIdentifierAsync("keynote", async (id) => taken.has(id))
    ).resolves.toBe("keynote-2");
  });
});
