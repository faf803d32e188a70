/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * timeline.test.ts: Tests for the timeline analyzer.
 */
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { analyzeTimeline, estimateBitrateMbps, segmentDuration } from "./timeline.js";
import type { RecordingSegment } from "../types/index.js";
import type { TimelineOptions } from "./timeline.js";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

const NOW = new Date(2024, 2, 1, 14, 0, 0);
const MB = 1048576;

describe("analyzeTimeline", () => {

  let root: string;
  let dayDir: string;
  let options: TimelineOptions;

  async function writeSegment(name: string, size: number, modified: Date): Promise<void> {

    const filePath = path.join(dayDir, name);

    await fs.writeFile(filePath, Buffer.alloc(size));
    await fs.utimes(filePath, modified, modified);
  }

  beforeEach(async () => {

    root = await fs.mkdtemp(path.join(os.tmpdir(), "camloop-timeline-"));
    dayDir = path.join(root, "Cam", "2024", "03", "01");
    options = { activeThreshold: 20000, now: () => NOW, recentFileCount: 2, root, settingsFile: path.join(root, "settings.env") };

    await fs.mkdir(dayDir, { recursive: true });
    await fs.writeFile(options.settingsFile, "SUBFOLDER=\"Cam\"\nSEGMENT_TIME=\"900\"\n", "utf-8");
  });

  afterEach(async () => {

    await fs.rm(root, { force: true, recursive: true });
  });

  it("reports an idle recorder when today has no recordings", async () => {

    await fs.rm(dayDir, { force: true, recursive: true });

    expect(await analyzeTimeline(options)).toEqual({

      avg_size_mb: 0,
      current_file: "Waiting...",
      current_size: "0.00 MB",
      elapsed_seconds: 0,
      est_bitrate_mbps: 0,
      files_today: 0,
      gaps: [],
      last_write_age_seconds: null,
      recent_files: [],
      recorder_status: "idle",
      segment_limit_seconds: 900,
      status_msg: "Idle",
      timeline: [],
      total_hours: 0,
      total_size_mb: 0
    });
  });

  it("builds the timeline, gaps and totals for an active recorder", async () => {

    await writeSegment("AM-09-00-00.mp4", MB, new Date(2024, 2, 1, 9, 15, 0));
    await writeSegment("AM-09-15-00.mp4", MB, new Date(2024, 2, 1, 9, 30, 0));
    await writeSegment("PM-01-45-00.mp4", MB / 2, new Date(2024, 2, 1, 13, 59, 50));
    await fs.writeFile(path.join(dayDir, "AM-09-00-00.thumb.jpg"), "jpeg", "utf-8");

    const report = await analyzeTimeline(options);

    expect(report.files_today).toBe(3);
    expect(report.current_file).toBe("PM-01-45-00.mp4");
    expect(report.current_size).toBe("0.50 MB");
    expect(report.recorder_status).toBe("active");
    expect(report.status_msg).toBe("Recording (Active)");
    expect(report.last_write_age_seconds).toBe(10);
    expect(report.elapsed_seconds).toBe(900);
    expect(report.timeline).toEqual([

      { offset_percent: 37.5, width_percent: 1.04 },
      { offset_percent: 38.54, width_percent: 1.04 },
      { offset_percent: 57.29, width_percent: 1.03 }
    ]);
    expect(report.gaps).toEqual([{ duration_minutes: 255, end: "1:45:00 PM", start: "9:30:00 AM" }]);
    expect(report.total_size_mb).toBe(2.5);
    expect(report.avg_size_mb).toBe(0.83);
    expect(report.total_hours).toBe(0.75);
    expect(report.recent_files).toEqual([

      { modified: "1:59:50 PM", name: "PM-01-45-00.mp4", size_mb: 0.5 },
      { modified: "9:30:00 AM", name: "AM-09-15-00.mp4", size_mb: 1 }
    ]);
  });

  it("reports a stale recorder with the age of the last write", async () => {

    await writeSegment("AM-09-00-00.mp4", MB, new Date(2024, 2, 1, 9, 15, 0));

    const report = await analyzeTimeline(options);

    expect(report.recorder_status).toBe("stale");
    expect(report.status_msg).toBe("Last write: 17100s ago");
    expect(report.last_write_age_seconds).toBe(17100);
    expect(report.elapsed_seconds).toBe(0);
    expect(report.gaps).toEqual([]);
  });

  it("estimates undecodable segments from the segment length", async () => {

    await writeSegment("clip.mp4", MB, new Date(2024, 2, 1, 12, 0, 0));

    expect((await analyzeTimeline(options)).timeline).toEqual([{ offset_percent: 48.96, width_percent: 1.04 }]);
  });

  it("does not report back-to-back segments as gaps", async () => {

    await writeSegment("AM-10-00-00.mp4", MB, new Date(2024, 2, 1, 10, 15, 0));
    await writeSegment("AM-10-45-00.mp4", MB, new Date(2024, 2, 1, 11, 0, 0));

    expect((await analyzeTimeline(options)).gaps).toEqual([]);
  });
});

describe("segmentDuration", () => {

  const segment: RecordingSegment = {

    createdAt: new Date(2024, 2, 1, 13, 55, 0).getTime(),
    end: new Date(2024, 2, 1, 13, 59, 50).getTime(),
    name: "clip.mp4",
    path: "/r/clip.mp4",
    size: 1,
    start: null
  };

  it("uses the birth time only for the hot segment", () => {

    expect(segmentDuration(segment, true, 900)).toBe(290);
    expect(segmentDuration(segment, false, 900)).toBe(900);
    expect(segmentDuration({ ...segment, createdAt: 0 }, true, 900)).toBe(900);
  });

  it("prefers the decoded start time", () => {

    expect(segmentDuration({ ...segment, start: new Date(2024, 2, 1, 13, 45, 0) }, true, 900)).toBe(890);
  });
});

describe("estimateBitrateMbps", () => {

  it("converts an average segment size to megabits per second", () => {

    expect(estimateBitrateMbps(90, 900)).toBe(0.8);
    expect(estimateBitrateMbps(90, 0)).toBe(0);
  });
});
