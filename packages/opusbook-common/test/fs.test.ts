import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ensureDir, getUserCacheDir, listFilesByExtension, pathExists } from "@opusbook/common";

const TEMP_PREFIX = path.join(os.tmpdir(), "opusbook-fs-");

describe("fs helpers", () => {
  let base: string;

  beforeEach(async () => {
    base = await mkdtemp(TEMP_PREFIX);
  });

  afterEach(async () => {
    await rm(base, { recursive: true, force: true });
  });

  it("ensures nested directories exist", async () => {
    const target = path.join(base, "a", "b", "c");
    await ensureDir(target);
    await ensureDir(target);
    expect(await pathExists(target)).toBe(true);
  });

  it("reports missing paths", async () => {
    expect(await pathExists(path.join(base, "nothing"))).toBe(false);
  });

  it("lists matching files case-insensitively in name order", async () => {
    await writeFile(path.join(base, "b-part.MP3"), "");
    await writeFile(path.join(base, "a-part.mp3"), "");
    await writeFile(path.join(base, "cover.jpg"), "");
    await mkdir(path.join(base, "folder.mp3"));

    expect(await listFilesByExtension(base, ["mp3"])).toEqual([
      path.join(base, "a-part.mp3"),
      path.join(base, "b-part.MP3")
    ]);
    expect(await listFilesByExtension(base, [".jpg", ".png"])).toEqual([path.join(base, "cover.jpg")]);
  });
});

describe("getUserCacheDir", () => {
  it("follows XDG on linux", () => {
    expect(getUserCacheDir("app", { XDG_CACHE_HOME: "/xdg" }, "linux", "/home/u")).toBe(path.join("/xdg", "app"));
    expect(getUserCacheDir("app", {}, "linux", "/home/u")).toBe(path.join("/home/u", ".cache", "app"));
  });

  it("uses Library/Caches on macOS", () => {
    expect(getUserCacheDir("app", {}, "darwin", "/Users/u")).toBe(path.join("/Users/u", "Library", "Caches", "app"));
  });

  it("uses LOCALAPPDATA on Windows", () => {
    expect(getUserCacheDir("app", { LOCALAPPDATA: "/local" }, "win32", "/home/u")).toBe(
      path.join("/local", "app", "Cache")
    );
  });
});
