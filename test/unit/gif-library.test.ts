import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { GifLibrary, tagsFromName } from "../../src/media/gif-library.js";

describe("tagsFromName", () => {
  it("splits on underscores, dashes and spaces", () => {
    expect(tagsFromName("Happy-Dance_party time")).toEqual(["happy", "dance", "party", "time"]);
    expect(tagsFromName("__wave__")).toEqual(["wave"]);
  });
});

describe("GifLibrary", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "nudgebot-gifs-"));
    for (const name of ["wave_hello.gif", "happy-dance.GIF", "happy_cat.gif", "notes.txt"]) {
      writeFileSync(join(dir, name), "");
    }
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("indexes gif files by name tokens", () => {
    const lib = new GifLibrary(dir);
    expect(lib.tags()).toEqual(["cat", "dance", "happy", "hello", "wave"]);
  });

  it("picks among candidates with the random source", () => {
    expect(new GifLibrary(dir, () => 0).pickGif("happy")).toBe(join(dir, "happy-dance.GIF"));
    expect(new GifLibrary(dir, () => 0.99).pickGif("happy")).toBe(join(dir, "happy_cat.gif"));
  });

  it("matches tags case-insensitively", () => {
    expect(new GifLibrary(dir, () => 0).pickGif("WAVE")).toBe(join(dir, "wave_hello.gif"));
  });

  it("returns null for unknown or empty tags", () => {
    const lib = new GifLibrary(dir);
    expect(lib.pickGif("missing")).toBeNull();
    expect(lib.pickGif("")).toBeNull();
    expect(lib.pickGif(null)).toBeNull();
  });

  it("picks up new files on rebuild", () => {
    const lib = new GifLibrary(dir, () => 0);
    writeFileSync(join(dir, "thumbs_up.gif"), "");
    expect(lib.pickGif("thumbs")).toBeNull();
    lib.rebuild();
    expect(lib.pickGif("thumbs")).toBe(join(dir, "thumbs_up.gif"));
  });

  it("is empty when the folder does not exist", () => {
    expect(new GifLibrary(join(dir, "missing")).tags()).toEqual([]);
  });
});
