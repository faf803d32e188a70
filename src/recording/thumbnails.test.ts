/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * thumbnails.test.ts: Tests for the thumbnail watcher.
 */
import type { FFmpegRunResult, FFmpegRunner } from "../utils/index.js";
import { ThumbnailWatcher, formatSeekTimestamp } from "./thumbnails.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

const NOW = new Date(2024, 2, 1, 14, 0, 0);

describe("ThumbnailWatcher", () => {

  let root: string;
  let dayDir: string;
  let settingsFile: string;
  let calls: string[][];
  let failures: Set<string>;

  const runner: FFmpegRunner = async (args: string[]): Promise<FFmpegRunResult> => {

    calls.push(args);

    const input = args[args.indexOf("-i") + 1];

    if(failures.has(path.basename(input))) {

      failures.delete(path.basename(input));

      return { code: 1, signal: null, stderr: "Invalid data found when processing input" };
    }

    await fs.writeFile(args[args.length - 1], "jpeg", "utf-8");

    return { code: 0, signal: null, stderr: "" };
  };

  function createWatcher(now: () => Date = (): Date => NOW): ThumbnailWatcher {

    return new ThumbnailWatcher({ now, root, runner, scanInterval: 60000, seekSeconds: 1, settingsFile, stabilityWindow: 15000, width: 320 });
  }

  async function writeSegment(name: string, modified: Date): Promise<string> {

    const filePath = path.join(dayDir, name);

    await fs.writeFile(filePath, "video", "utf-8");
    await fs.utimes(filePath, modified, modified);

    return filePath;
  }

  async function exists(filePath: string): Promise<boolean> {

    return fs.access(filePath).then(() => true, () => false);
  }

  beforeEach(async () => {

    root = await fs.mkdtemp(path.join(os.tmpdir(), "camloop-thumbnails-"));
    dayDir = path.join(root, "Cam", "2024", "03", "01");
    settingsFile = path.join(root, "settings.env");
    calls = [];
    failures = new Set();

    await fs.mkdir(dayDir, { recursive: true });
    await fs.writeFile(settingsFile, "SUBFOLDER=\"Cam\"\n", "utf-8");
  });

  afterEach(async () => {

    await fs.rm(root, { force: true, recursive: true });
  });

  it("generates thumbnails for stable segments and skips hot ones", async () => {

    const first = await writeSegment("PM-01-00-00.mp4", new Date(2024, 2, 1, 13, 15, 0));

    await writeSegment("PM-01-15-00.mp4", new Date(2024, 2, 1, 13, 30, 0));
    await writeSegment("PM-01-30-00.mp4", new Date(2024, 2, 1, 13, 59, 55));

    const watcher = createWatcher();

    expect(await watcher.scanOnce()).toEqual({ failed: 0, generated: 2, skipped: 1 });
    expect(calls[0]).toEqual([ "-ss", "00:00:01", "-i", first, "-frames:v", "1", "-vf", "scale=320:-1", "-q:v", "5", "-y",
      path.join(dayDir, "PM-01-00-00.thumb.jpg") ]);
    expect(await exists(path.join(dayDir, "PM-01-15-00.thumb.jpg"))).toBe(true);
    expect(await exists(path.join(dayDir, "PM-01-30-00.thumb.jpg"))).toBe(false);

    expect(await watcher.scanOnce()).toEqual({ failed: 0, generated: 0, skipped: 3 });
    expect(calls).toHaveLength(2);
  });

  it("retries a failed extraction on the next pass", async () => {

    await writeSegment("AM-09-00-00.mp4", new Date(2024, 2, 1, 9, 15, 0));
    failures.add("AM-09-00-00.mp4");

    const watcher = createWatcher();

    expect(await watcher.scanOnce()).toEqual({ failed: 1, generated: 0, skipped: 0 });
    expect(await exists(path.join(dayDir, "AM-09-00-00.thumb.jpg"))).toBe(false);

    expect(await watcher.scanOnce()).toEqual({ failed: 0, generated: 1, skipped: 0 });
    expect(await exists(path.join(dayDir, "AM-09-00-00.thumb.jpg"))).toBe(true);
  });

  it("treats a thumbnail already on disk as done", async () => {

    await writeSegment("AM-10-00-00.mp4", new Date(2024, 2, 1, 10, 15, 0));
    await fs.writeFile(path.join(dayDir, "AM-10-00-00.thumb.jpg"), "jpeg", "utf-8");

    expect(await createWatcher().scanOnce()).toEqual({ failed: 0, generated: 0, skipped: 1 });
    expect(calls).toHaveLength(0);
  });

  it("shares one pass between overlapping calls", async () => {

    await writeSegment("AM-11-00-00.mp4", new Date(2024, 2, 1, 11, 15, 0));

    const watcher = createWatcher();
    const [ a, b ] = await Promise.all([ watcher.scanOnce(), watcher.scanOnce() ]);

    expect(a).toEqual({ failed: 0, generated: 1, skipped: 0 });
    expect(b).toEqual(a);
    expect(calls).toHaveLength(1);
  });

  it("finishes the previous day's last segment after midnight", async () => {

    let clock = new Date(2024, 2, 1, 23, 59, 50);

    await writeSegment("PM-11-45-00.mp4", new Date(2024, 2, 1, 23, 59, 45));

    const watcher = createWatcher(() => clock);

    expect(await watcher.scanOnce()).toEqual({ failed: 0, generated: 0, skipped: 1 });

    clock = new Date(2024, 2, 2, 0, 0, 30);

    expect(await watcher.scanOnce()).toEqual({ failed: 0, generated: 1, skipped: 0 });
    expect(await exists(path.join(dayDir, "PM-11-45-00.thumb.jpg"))).toBe(true);

    // Yesterday is dropped once it is complete.
    expect(await watcher.scanOnce()).toEqual({ failed: 0, generated: 0, skipped: 0 });
    expect(calls).toHaveLength(1);
  });

  it("returns empty counts when today's directory does not exist", async () => {

    await fs.rm(dayDir, { force: true, recursive: true });

    expect(await createWatcher().scanOnce()).toEqual({ failed: 0, generated: 0, skipped: 0 });
  });
});

describe("formatSeekTimestamp", () => {

  it("formats offsets as hours, minutes and seconds", () => {

    expect(formatSeekTimestamp(1)).toBe("00:00:01");
    expect(formatSeekTimestamp(3723)).toBe("01:02:03");
  });
});
