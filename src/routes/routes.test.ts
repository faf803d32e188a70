/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * routes.test.ts: Tests for the HTTP endpoints against stand-in services.
 */
import type { FFmpegRunResult, FFmpegRunner } from "../utils/index.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FrameCell } from "../streaming/liveFrame.js";
import type { LiveFrameProducerStatus } from "../streaming/liveFrame.js";
import type { RouteContext } from "./index.js";
import type { Server } from "node:http";
import type { SupervisorStatus } from "../recording/supervisor.js";
import { buildApp } from "../app.js";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

const NOW = new Date(2024, 2, 1, 10, 0, 0);

const SETTINGS = [

  "SUBFOLDER=\"Cam\"",
  "SEGMENT_TIME=\"900\"",
  "CAMERA_IP=\"10.0.0.5\"",
  "CAMERA_USER=\"viewer\"",
  "CAMERA_PASS=\"test-secret\"",
  "TIMELAPSE_OUTPUT_DIR=\"Timelapses\"",
  "ENABLE_AUDIO=\"true\""
].join("\n") + "\n";

describe("HTTP endpoints", () => {

  let root: string;
  let settingsFile: string;
  let server: Server;
  let baseUrl: string;
  let supervisorStatus: SupervisorStatus;
  let context: RouteContext;

  const runner: FFmpegRunner = async (): Promise<FFmpegRunResult> => Promise.resolve({ code: 0, signal: null, stderr: "" });

  async function listen(): Promise<void> {

    const app = buildApp(context, "none");

    server = app.listen(0, "127.0.0.1");

    await new Promise<void>((resolve) => {

      server.once("listening", () => {

        resolve();
      });
    });

    const address = server.address();

    if(!address || (typeof address === "string")) {

      throw new Error("Server did not bind to a TCP port.");
    }

    baseUrl = "http://127.0.0.1:" + String(address.port);
  }

  async function postJson(route: string, body: unknown): Promise<Response> {

    return fetch(baseUrl + route, { body: JSON.stringify(body), headers: { "Content-Type": "application/json" }, method: "POST" });
  }

  beforeEach(async () => {

    root = await fs.mkdtemp(path.join(os.tmpdir(), "camloop-routes-"));
    settingsFile = path.join(root, "settings.env");

    await fs.writeFile(settingsFile, SETTINGS, "utf-8");

    supervisorStatus = { currentRunStartedAt: null, lastRunEnd: null, launches: 1, outputDirectory: null, pid: 4242, state: "running" };

    const timelapse = {

      crf: 30,
      frameRate: 30,
      now: (): Date => NOW,
      preset: "ultrafast",
      root,
      runner,
      settingsFile,
      speedFactor: 100,
      storageWaitAttempts: 1,
      storageWaitInterval: 10
    };

    context = {

      live: { cell: new FrameCell(), frameRate: 10, freshness: 5000, producer: null },
      scheduler: null,
      settingsFile,
      supervisor: { getStatus: (): SupervisorStatus => supervisorStatus },
      timelapse,
      timeline: { activeThreshold: 20000, now: (): Date => NOW, recentFileCount: 5, root, settingsFile },
      watcher: null
    };
  });

  afterEach(async () => {

    await new Promise<void>((resolve) => {

      server.close(() => {

        resolve();
      });
    });

    await fs.rm(root, { force: true, maxRetries: 3, recursive: true });
  });

  describe("GET /health", () => {

    it("reports a healthy recorder", async () => {

      await listen();

      const res = await fetch(baseUrl + "/health");
      const body: unknown = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({

        live: { connected: false, enabled: false, frameAgeMs: null },
        status: "healthy",
        storageAvailable: true,
        supervisor: { pid: 4242, state: "running" },
        thumbnails: null,
        timelapse: { nextRunAt: null }
      });
    });

    it("returns 503 once the supervisor has given up", async () => {

      supervisorStatus = { ...supervisorStatus, pid: null, state: "fatal" };

      await listen();

      const res = await fetch(baseUrl + "/health");

      expect(res.status).toBe(503);
      expect(await res.json()).toMatchObject({ message: "Recording stopped: storage is unavailable.", status: "unhealthy" });
    });

    it("degrades while capture is restarting", async () => {

      supervisorStatus = { ...supervisorStatus, state: "restarting" };

      await listen();

      const res = await fetch(baseUrl + "/health");

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ message: "Capture is not running.", status: "degraded" });
    });
  });

  describe("settings", () => {

    it("masks the password on read", async () => {

      await listen();

      const res = await fetch(baseUrl + "/api/settings");

      expect(await res.json()).toEqual({

        CAMERA_IP: "10.0.0.5",
        CAMERA_PASS: "********",
        CAMERA_USER: "viewer",
        ENABLE_AUDIO: "true",
        SEGMENT_TIME: "900",
        SUBFOLDER: "Cam",
        TIMELAPSE_OUTPUT_DIR: "Timelapses"
      });
    });

    it("rejects an invalid update without touching the file", async () => {

      await listen();

      const res = await postJson("/api/settings", { SEGMENT_TIME: "abc" });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ errors: ["SEGMENT_TIME must be a whole number of seconds between 1 and 86400."], success: false });
      expect(await fs.readFile(settingsFile, "utf-8")).toBe(SETTINGS);
    });

    it("saves a valid update and keeps the password when the mask is posted back", async () => {

      await listen();

      const res = await postJson("/api/settings", { CAMERA_PASS: "********", SEGMENT_TIME: 600 });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ settings: { CAMERA_PASS: "********", SEGMENT_TIME: "600" }, success: true });
      expect(await fs.readFile(settingsFile, "utf-8")).toBe(SETTINGS.replace("SEGMENT_TIME=\"900\"", "SEGMENT_TIME=\"600\""));
    });
  });

  describe("timelapse", () => {

    it("requires a date", async () => {

      await listen();

      const res = await postJson("/api/timelapse", {});

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ message: "A date is required.", success: false });
    });

    it("refuses a day that is not over", async () => {

      await listen();

      const res = await postJson("/api/timelapse", { date: "2024-03-01" });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ message: "Cannot create a timelapse for 2024-03-01 until the day is over.", success: false });
    });

    it("starts a job for a past day", async () => {

      await listen();

      const res = await postJson("/api/timelapse", { date: "2024-02-29", force: "on" });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ message: "Timelapse generation started for 2024-02-29. Check back in a few minutes.", success: true });
    });

    it("lists existing timelapses", async () => {

      const outputDir = path.join(root, "Cam", "Timelapses");

      await fs.mkdir(outputDir, { recursive: true });
      await fs.writeFile(path.join(outputDir, "2024-02-28.mp4"), "", "utf-8");

      await listen();

      const res = await fetch(baseUrl + "/api/timelapses");
      const body: unknown = await res.json();

      expect(res.status).toBe(200);
      expect(body).toEqual([{ date: "2024-02-28", name: "2024-02-28.mp4", size_mb: 0 }]);
    });
  });

  describe("recording library", () => {

    let dayDir: string;

    beforeEach(async () => {

      dayDir = path.join(root, "Cam", "2024", "03", "01");

      await fs.mkdir(dayDir, { recursive: true });
      await fs.writeFile(path.join(dayDir, "AM-09-15-00.mp4"), "video", "utf-8");
      await fs.writeFile(path.join(dayDir, "AM-09-00-00.mp4"), "video", "utf-8");
      await fs.writeFile(path.join(dayDir, "AM-09-00-00.thumb.jpg"), "jpeg", "utf-8");
    });

    it("lists a day's segments with file and thumbnail links", async () => {

      await listen();

      const res = await fetch(baseUrl + "/api/recordings?date=2024-03-01");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual([

        { name: "AM-09-00-00.mp4", size_mb: 0, start: "9:00:00 AM", thumbnail: "/thumb/Cam/2024/03/01/AM-09-00-00.thumb.jpg",
          url: "/play_file/Cam/2024/03/01/AM-09-00-00.mp4" },
        { name: "AM-09-15-00.mp4", size_mb: 0, start: "9:15:00 AM", thumbnail: null, url: "/play_file/Cam/2024/03/01/AM-09-15-00.mp4" }
      ]);
    });

    it("defaults to today and rejects an invalid date", async () => {

      await listen();

      const today = await fetch(baseUrl + "/api/recordings");
      const invalid = await fetch(baseUrl + "/api/recordings?date=2024-02-30");

      expect(await today.json()).toHaveLength(2);
      expect(invalid.status).toBe(400);
      expect(await invalid.json()).toEqual({ error: "Invalid date parameter. Use YYYY-MM-DD." });
    });

    it("serves segment and thumbnail files from the storage root", async () => {

      await listen();

      const video = await fetch(baseUrl + "/play_file/Cam/2024/03/01/AM-09-00-00.mp4");
      const thumb = await fetch(baseUrl + "/thumb/Cam/2024/03/01/AM-09-00-00.thumb.jpg");

      expect(video.status).toBe(200);
      expect(await video.text()).toBe("video");
      expect(thumb.status).toBe(200);
      expect(thumb.headers.get("content-type")).toBe("image/jpeg");
      expect(await thumb.text()).toBe("jpeg");
    });

    it("refuses paths that climb out of the storage root", async () => {

      await listen();

      const res = await fetch(baseUrl + "/play_file/Cam/..%2F..%2Fsettings.env");

      expect(res.status).toBe(403);
      expect(await res.text()).toBe("Access denied.");
    });

    it("only serves the file type each route is for", async () => {

      await listen();

      const settings = await fetch(baseUrl + "/play_file/settings.env");
      const missing = await fetch(baseUrl + "/thumb/Cam/2024/03/01/AM-09-15-00.thumb.jpg");

      expect(settings.status).toBe(404);
      expect(await settings.text()).toBe("Recording not found.");
      expect(missing.status).toBe(404);
      expect(await missing.text()).toBe("Thumbnail not found.");
    });
  });

  describe("GET /api/stats", () => {

    it("returns the idle report with storage state and recent logs", async () => {

      await listen();

      const res = await fetch(baseUrl + "/api/stats");
      const body: unknown = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({ current_file: "Waiting...", files_today: 0, recorder_status: "idle", segment_limit_seconds: 900, storage_available: true });
      expect(body).toHaveProperty("logs", expect.any(Array));
    });
  });

  describe("live preview", () => {

    it("answers 503 with Retry-After when there is no frame", async () => {

      await listen();

      const res = await fetch(baseUrl + "/snapshot.jpg");

      expect(res.status).toBe(503);
      expect(res.headers.get("retry-after")).toBe("2");
    });

    it("serves the newest frame as a JPEG", async () => {

      const producerStatus: LiveFrameProducerStatus = { connected: true, frames: 1, lastFrameAt: Date.now(), launches: 1 };
      const jpeg = Buffer.from([ 0xFF, 0xD8, 0x01, 0x02, 0xFF, 0xD9 ]);

      context.live.producer = { getStatus: (): LiveFrameProducerStatus => producerStatus };
      context.live.cell.put(jpeg);

      await listen();

      const res = await fetch(baseUrl + "/snapshot.jpg");

      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toBe("image/jpeg");
      expect(Buffer.from(await res.arrayBuffer())).toEqual(jpeg);
    });

    it("returns 404 for the feed when the preview is disabled", async () => {

      await listen();

      const res = await fetch(baseUrl + "/video_feed");

      expect(res.status).toBe(404);
    });
  });
});
