/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * timelapse.ts: Daily timelapse compaction job and scheduler for camloop.
 */
import { LOG, formatError, isErrnoException, runWithTaskContext, toMegabytes } from "../utils/index.js";
import type { Nullable, RecordingSegment, TimelapseResult } from "../types/index.js";
import { dateKey, dayDirectory, listSegments, parseDateKey, startOfDay, timelapseDirectory, timelapsePath } from "./segments.js";
import type { FFmpegRunner } from "../utils/index.js";
import fs from "node:fs";
import { loadSettings } from "../config/settings.js";
import path from "node:path";
import { waitForStorage } from "./storage.js";

const { promises: fsPromises } = fs;

/*
 * TIMELAPSE JOB
 *
 * Once a day is over, its segments are concatenated in start order and sped up into a single video named after the day. The artifact's existence is the only
 * idempotency key: without force, a day that already has a timelapse is left alone and reported as a success. Every outcome is returned as { success, message }
 * rather than thrown, because the same result is handed back to whoever triggered the job.
 *
 * Jobs are dispatched fire-and-forget from the daily scheduler and the HTTP trigger. Two forced jobs for the same day can race. The later encode simply overwrites the
 * earlier one.
 */

/**
 * Encoder parameters for timelapse output.
 */
export interface TimelapseEncoding {

  crf: number;
  frameRate: number;
  preset: string;

  // Time acceleration factor.
  speedFactor: number;
}

/**
 * Everything a timelapse job needs.
 */
export interface TimelapseOptions extends TimelapseEncoding {

  // Clock. Defaults to the system time.
  now?: () => Date;

  // Storage root.
  root: string;

  // Runs FFmpeg to completion.
  runner: FFmpegRunner;

  // Absolute path to settings.env.
  settingsFile: string;

  // Bounded storage wait before each job.
  storageWaitAttempts: number;
  storageWaitInterval: number;
}

/**
 * An existing timelapse artifact, as listed by the API.
 */
export interface TimelapseArtifact {

  date: string;
  name: string;
  size_mb: number;
}

/**
 * Escapes a path for an FFmpeg concat manifest, where each entry is single-quoted.
 * @param filePath - The path.
 * @returns The path with each ' replaced by '\''.
 */
export function escapeManifestPath(filePath: string): string {

  return filePath.replaceAll("'", "'\\''");
}

/**
 * Builds an FFmpeg concat manifest.
 * @param filePaths - Absolute paths, in playback order.
 * @returns The manifest contents, one file '<path>' line per entry.
 */
export function buildManifest(filePaths: string[]): string {

  return filePaths.map((filePath) => "file '" + escapeManifestPath(filePath) + "'\n").join("");
}

/**
 * Builds the FFmpeg arguments for a timelapse encode.
 * @param manifestPath - The concat manifest.
 * @param outputPath - The output video.
 * @param encoding - Encoder parameters.
 * @returns The arguments, without the executable.
 */
export function buildTimelapseArgs(manifestPath: string, outputPath: string, encoding: TimelapseEncoding): string[] {

  return [

    "-f", "concat",
    "-safe", "0",
    "-i", manifestPath,
    "-filter:v", "setpts=PTS/" + String(encoding.speedFactor),
    "-an",
    "-c:v", "libx264",
    "-pix_fmt", "yuv420p",
    "-preset", encoding.preset,
    "-r", String(encoding.frameRate),
    "-crf", String(encoding.crf),
    "-y",
    outputPath
  ];
}

/**
 * Checks that a day is over.
 * @param date - Any time on the day.
 * @param now - The current time.
 * @returns True if the day ended before today began.
 */
export function isPastDay(date: Date, now: Date): boolean {

  return startOfDay(date).getTime() < startOfDay(now).getTime();
}

/**
 * Checks whether a file exists.
 * @param filePath - The file.
 * @returns True if it exists.
 */
async function fileExists(filePath: string): Promise<boolean> {

  try {

    await fsPromises.access(filePath);

    return true;
  } catch {

    return false;
  }
}

/**
 * Builds the timelapse for one day. Never throws.
 * @param date - Any time on the day.
 * @param force - Rebuild even when the artifact already exists.
 * @param options - Job options.
 * @returns The job outcome.
 */
export async function generateTimelapse(date: Date, force: boolean, options: TimelapseOptions): Promise<TimelapseResult> {

  const now = options.now?.() ?? new Date();
  const key = dateKey(date);

  if(!isPastDay(date, now)) {

    return { message: "Cannot create a timelapse for " + key + " until the day is over.", success: false };
  }

  try {

    await waitForStorage(options.root, { attempts: options.storageWaitAttempts, interval: options.storageWaitInterval });
  } catch(error) {

    return { message: formatError(error) + ".", success: false };
  }

  let manifestPath: Nullable<string> = null;

  try {

    const settings = await loadSettings(options.settingsFile);
    const sourceDirectory = dayDirectory(options.root, settings.subfolder, date);
    const outputPath = timelapsePath(options.root, settings.subfolder, settings.timelapseOutputDir, date);

    if(!force && await fileExists(outputPath)) {

      return { message: "Timelapse already exists for " + key + ". Skipping.", success: true };
    }

    let segments: RecordingSegment[];

    try {

      const stats = await fsPromises.stat(sourceDirectory);

      if(!stats.isDirectory()) {

        return { message: "No recordings folder found for " + key + ".", success: false };
      }

      segments = await listSegments(sourceDirectory, date);
    } catch(error) {

      if(isErrnoException(error, "ENOENT")) {

        return { message: "No recordings folder found for " + key + ".", success: false };
      }

      throw error;
    }

    if(segments.length === 0) {

      return { message: "No recordings found for " + key + ".", success: false };
    }

    const valid = segments.filter((segment) => segment.size > 0);

    for(const segment of segments.filter((candidate) => candidate.size === 0)) {

      LOG.debug("recording:timelapse", "Skipping empty recording %s.", segment.name);
    }

    if(valid.length === 0) {

      return { message: "No valid recordings found for " + key + ".", success: false };
    }

    await fsPromises.mkdir(path.dirname(outputPath), { recursive: true });

    manifestPath = path.join(path.dirname(outputPath), key + ".manifest.txt");

    await fsPromises.writeFile(manifestPath, buildManifest(valid.map((segment) => segment.path)), "utf-8");

    LOG.info("Creating timelapse for %s from %s recordings.", key, valid.length);

    const args = buildTimelapseArgs(manifestPath, outputPath, options);

    LOG.debug("recording:timelapse", "Running ffmpeg %s", args.join(" "));

    const started = Date.now();
    const run = await options.runner(args);

    if(run.error) {

      return { message: "Unable to start FFmpeg: " + formatError(run.error) + ".", success: false };
    }

    if(run.code !== 0) {

      const detail = (run.stderr.length > 0) ? ": " + run.stderr : ".";

      return { message: [ "FFmpeg failed with ", (run.signal !== null) ? "signal " + run.signal : "exit code " + String(run.code), detail ].join(""), success: false };
    }

    return { message: "Timelapse created for " + key + " in " + ((Date.now() - started) / 1000).toFixed(2) + " seconds.", success: true };
  } catch(error) {

    return { message: "Error during timelapse generation: " + formatError(error) + ".", success: false };
  } finally {

    if(manifestPath) {

      await fsPromises.rm(manifestPath, { force: true }).catch((error: unknown) => {

        LOG.warn("Unable to remove timelapse manifest %s: %s.", manifestPath, formatError(error));
      });
    }
  }
}

/**
 * Outcome of dispatching a job.
 */
export type TimelapseDispatch = { accepted: false; message: string } | { accepted: true; completion: Promise<TimelapseResult>; date: string };

/**
 * Validates a requested day and starts its job in the background. Validation happens before anything runs, so that callers can reject bad requests immediately. The
 * job logs its own outcome under a "timelapse <date>" tag.
 * @param requested - The day as YYYY-MM-DD.
 * @param force - Rebuild even when the artifact already exists.
 * @param options - Job options.
 * @returns Whether the job was started, with a promise for its result when it was.
 */
export function dispatchTimelapse(requested: string, force: boolean, options: TimelapseOptions): TimelapseDispatch {

  const date = parseDateKey(requested);

  if(!date) {

    return { accepted: false, message: "Invalid date: " + requested + ". Expected YYYY-MM-DD." };
  }

  const key = dateKey(date);

  if(!isPastDay(date, options.now?.() ?? new Date())) {

    return { accepted: false, message: "Cannot create a timelapse for " + key + " until the day is over." };
  }

  const completion = runWithTaskContext("timelapse " + key, async () => {

    const result = await generateTimelapse(date, force, options);

    if(result.success) {

      LOG.info("%s", result.message);
    } else {

      LOG.error("%s", result.message);
    }

    return result;
  });

  return { accepted: true, completion, date: key };
}

/**
 * Lists the existing timelapse artifacts, newest first.
 * @param root - The storage root.
 * @param subfolder - The recording subfolder.
 * @param timelapseDir - The timelapse subfolder.
 * @returns The artifacts. A missing directory yields an empty list.
 */
export async function listTimelapses(root: string, subfolder: string, timelapseDir: string): Promise<TimelapseArtifact[]> {

  const directory = timelapseDirectory(root, subfolder, timelapseDir);
  let names: string[];

  try {

    names = await fsPromises.readdir(directory);
  } catch(error) {

    if(isErrnoException(error, "ENOENT")) {

      return [];
    }

    throw error;
  }

  const artifacts: TimelapseArtifact[] = [];

  for(const name of names) {

    const date = name.endsWith(".mp4") ? parseDateKey(name.slice(0, -4)) : null;

    if(!date) {

      continue;
    }

    try {

      // eslint-disable-next-line no-await-in-loop
      const stats = await fsPromises.stat(path.join(directory, name));

      artifacts.push({ date: dateKey(date), name, size_mb: toMegabytes(stats.size, 2) });
    } catch(error) {

      if(!isErrnoException(error, "ENOENT")) {

        throw error;
      }
    }
  }

  return artifacts.sort((a, b) => b.date.localeCompare(a.date));
}

/*
 * SCHEDULER
 *
 * The scheduler fires once a day at the configured local time and builds the previous day's timelapse. It holds a single timer at a time and recomputes the delay
 * after every run, so daylight saving changes only shift one run.
 */

/**
 * Returns the milliseconds until the next occurrence of a local wall clock time.
 * @param now - The current time.
 * @param hour - Local hour (0-23).
 * @param minute - Local minute (0-59).
 * @returns The delay, always greater than zero.
 */
export function msUntilNextRun(now: Date, hour: number, minute: number): number {

  const target = new Date(now.getFullYear(), now.getMonth(), now.getDate(), hour, minute, 0, 0);

  if(target.getTime() <= now.getTime()) {

    target.setDate(target.getDate() + 1);
  }

  return target.getTime() - now.getTime();
}

/**
 * Runs the previous day's timelapse once a day.
 */
export class TimelapseScheduler {

  private nextRunAt: Nullable<number> = null;
  private readonly options: TimelapseOptions;
  private readonly runHour: number;
  private readonly runMinute: number;
  private timer: Nullable<ReturnType<typeof setTimeout>> = null;

  constructor(options: TimelapseOptions, runHour: number, runMinute: number) {

    this.options = options;
    this.runHour = runHour;
    this.runMinute = runMinute;
  }

  /**
   * Schedules the next run.
   */
  public start(): void {

    if(this.timer) {

      return;
    }

    const now = this.now();
    const wait = msUntilNextRun(now, this.runHour, this.runMinute);

    this.nextRunAt = now.getTime() + wait;

    LOG.debug("recording:timelapse", "Next scheduled timelapse in %s minutes.", Math.round(wait / 60000));

    this.timer = setTimeout(() => {

      this.timer = null;
      this.fire();
      this.start();
    }, wait);
  }

  /**
   * Cancels the pending run. A job already in progress finishes on its own.
   */
  public stop(): void {

    if(this.timer) {

      clearTimeout(this.timer);
    }

    this.timer = null;
    this.nextRunAt = null;
  }

  /**
   * Returns when the next run is due.
   * @returns Epoch milliseconds, or null when stopped.
   */
  public getNextRunAt(): Nullable<number> {

    return this.nextRunAt;
  }

  /**
   * Dispatches the job for the day before today.
   */
  private fire(): void {

    const now = this.now();
    const yesterday = new Date(now.getFullYear(), now.getMonth(), now.getDate() - 1);
    const dispatch = dispatchTimelapse(dateKey(yesterday), false, this.options);

    if(!dispatch.accepted) {

      LOG.warn("Scheduled timelapse not started: %s", dispatch.message);
    }
  }

  /**
   * Returns the current time from the configured clock.
   * @returns The current time.
   */
  private now(): Date {

    return this.options.now?.() ?? new Date();
  }
}

