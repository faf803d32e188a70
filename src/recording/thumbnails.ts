/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * thumbnails.ts: Background thumbnail generation for finished segments.
 */
import { LOG, delay, formatError, runWithTaskContext } from "../utils/index.js";
import { dayDirectory, listSegments, thumbnailPath } from "./segments.js";
import type { FFmpegRunner } from "../utils/index.js";
import type { Nullable } from "../types/index.js";
import fs from "node:fs";
import { loadSettings } from "../config/settings.js";
import path from "node:path";

const { promises: fsPromises } = fs;

/* The watcher periodically scans today's recording directory and extracts a single preview frame from each segment that has stopped growing. A segment counts as
 * finished once its modification time is older than the stability window: the capture process only ever appends to the newest file. Whether a thumbnail exists is
 * decided on disk. The in-memory seen set only saves repeated checks within a day, and a failed extraction is left out of it so the next pass tries again.
 */

/**
 * Counts from one scan pass.
 */
export interface ScanResult {

  failed: number;
  generated: number;
  skipped: number;
}

/**
 * Snapshot of the watcher, for the health route.
 */
export interface ThumbnailWatcherStatus {

  lastResult: Nullable<ScanResult>;
  lastScanAt: Nullable<number>;
  running: boolean;
}

/**
 * Watcher construction options.
 */
export interface ThumbnailWatcherOptions {

  // Clock. Defaults to the system time.
  now?: () => Date;

  // Storage root.
  root: string;

  // Runs FFmpeg to completion.
  runner: FFmpegRunner;

  // Interval between passes, in milliseconds.
  scanInterval: number;

  // Offset into the segment at which the frame is taken, in seconds.
  seekSeconds: number;

  // Absolute path to settings.env.
  settingsFile: string;

  // Files modified within this many milliseconds are skipped.
  stabilityWindow: number;

  // Thumbnail width in pixels.
  width: number;
}

/**
 * Formats a seek offset as an FFmpeg timestamp.
 * @param seconds - The offset in seconds.
 * @returns The offset as HH:MM:SS, e.g. "00:00:01".
 */
export function formatSeekTimestamp(seconds: number): string {

  const whole = Math.max(0, Math.floor(seconds));

  return [ Math.floor(whole / 3600), Math.floor((whole % 3600) / 60), whole % 60 ].map((part) => String(part).padStart(2, "0")).join(":");
}

/**
 * Builds the FFmpeg arguments that extract one scaled frame from a segment.
 * @param segmentPath - The segment file.
 * @param outputPath - The thumbnail file.
 * @param seekSeconds - Offset into the segment.
 * @param width - Output width in pixels.
 * @returns The arguments, without the executable.
 */
export function buildThumbnailArgs(segmentPath: string, outputPath: string, seekSeconds: number, width: number): string[] {

  return [ "-ss", formatSeekTimestamp(seekSeconds), "-i", segmentPath, "-frames:v", "1", "-vf", "scale=" + String(width) + ":-1", "-q:v", "5", "-y", outputPath ];
}

// A day directory and the date its segment names are read against.
interface ScanDay {

  date: Date;
  directory: string;
}

/**
 * Generates thumbnails for finished segments in the background.
 */
export class ThumbnailWatcher {

  private abortController: Nullable<AbortController> = null;
  private currentDay: Nullable<ScanDay> = null;
  private inFlight: Nullable<Promise<ScanResult>> = null;
  private lastResult: Nullable<ScanResult> = null;
  private lastScanAt: Nullable<number> = null;
  private loopPromise: Nullable<Promise<void>> = null;
  private readonly now: () => Date;
  private readonly options: ThumbnailWatcherOptions;
  private previousDay: Nullable<ScanDay> = null;
  private readonly seen = new Set<string>();

  constructor(options: ThumbnailWatcherOptions) {

    this.options = options;
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Starts the scan loop. The first pass runs immediately.
   */
  public start(): void {

    if(this.loopPromise) {

      return;
    }

    const controller = new AbortController();

    this.abortController = controller;
    this.loopPromise = runWithTaskContext("thumbnails", async () => this.loop(controller.signal));
  }

  /**
   * Stops the scan loop, waiting for a pass in progress to finish.
   */
  public async stop(): Promise<void> {

    this.abortController?.abort();

    if(this.loopPromise) {

      await this.loopPromise;
    }

    this.abortController = null;
    this.loopPromise = null;
  }

  /**
   * Returns a snapshot of the watcher.
   * @returns The current status.
   */
  public getStatus(): ThumbnailWatcherStatus {

    return { lastResult: this.lastResult, lastScanAt: this.lastScanAt, running: this.loopPromise !== null };
  }

  /**
   * Runs one scan pass. Passes never overlap: a call made while a pass is running returns that pass's result.
   * @returns Counts of generated, failed and skipped segments.
   */
  public async scanOnce(): Promise<ScanResult> {

    if(!this.inFlight) {

      this.inFlight = this.scan().finally(() => {

        this.inFlight = null;
      });
    }

    return this.inFlight;
  }

  /**
   * The scan loop. Pass failures are logged and never end it.
   * @param signal - Ends the loop when aborted.
   */
  private async loop(signal: AbortSignal): Promise<void> {

    while(!signal.aborted) {

      try {

        // eslint-disable-next-line no-await-in-loop
        await this.scanOnce();
      } catch(error) {

        LOG.warn("Thumbnail scan failed: %s.", formatError(error));
      }

      // eslint-disable-next-line no-await-in-loop
      await delay(this.options.scanInterval, signal);
    }
  }

  /**
   * Scans today's directory and generates missing thumbnails. After midnight the previous day stays in the pass until every one of its segments has a
   * thumbnail, so the last segment of a day is not left behind.
   * @returns The pass counts.
   */
  private async scan(): Promise<ScanResult> {

    const settings = await loadSettings(this.options.settingsFile);
    const now = this.now();
    const directory = dayDirectory(this.options.root, settings.subfolder, now);
    const result: ScanResult = { failed: 0, generated: 0, skipped: 0 };

    let today = this.currentDay;

    if(!today || (today.directory !== directory)) {

      if(this.previousDay) {

        this.forget(this.previousDay.directory);
      }

      today = { date: now, directory };
      this.previousDay = this.currentDay;
      this.currentDay = today;
    }

    const yesterday = this.previousDay;

    if(yesterday && ((await this.scanDirectory(yesterday, now, result)) === 0)) {

      LOG.debug("recording:thumbnails", "Finished with %s.", yesterday.directory);

      this.forget(yesterday.directory);
      this.previousDay = null;
    }

    await this.scanDirectory(today, now, result);

    this.lastResult = result;
    this.lastScanAt = now.getTime();

    if((result.generated > 0) || (result.failed > 0)) {

      LOG.debug("recording:thumbnails", "Scan of %s: %s generated, %s failed, %s skipped.", directory, result.generated, result.failed, result.skipped);
    }

    return result;
  }

  /**
   * Generates missing thumbnails in one day directory, adding to the pass counts.
   * @param day - The directory to scan.
   * @param now - The pass time.
   * @param result - The pass counts.
   * @returns How many segments still lack a thumbnail, whether still being written or failed.
   */
  private async scanDirectory(day: ScanDay, now: Date, result: ScanResult): Promise<number> {

    let pending = 0;

    for(const segment of await listSegments(day.directory, day.date)) {

      if((now.getTime() - segment.end) < this.options.stabilityWindow) {

        LOG.debug("recording:thumbnails", "Skipping %s, still being written.", segment.name);

        pending++;
        result.skipped++;

        continue;
      }

      if(this.seen.has(segment.path)) {

        result.skipped++;

        continue;
      }

      const outputPath = thumbnailPath(segment.path);

      // eslint-disable-next-line no-await-in-loop
      if(await this.fileExists(outputPath)) {

        this.seen.add(segment.path);
        result.skipped++;

        continue;
      }

      // eslint-disable-next-line no-await-in-loop
      if(await this.generate(segment.path, outputPath, segment.name)) {

        this.seen.add(segment.path);
        result.generated++;
      } else {

        pending++;
        result.failed++;
      }
    }

    return pending;
  }

  /**
   * Drops the seen entries of a directory that is no longer scanned.
   * @param directory - The day directory.
   */
  private forget(directory: string): void {

    for(const entry of this.seen) {

      if(path.dirname(entry) === directory) {

        this.seen.delete(entry);
      }
    }
  }

  /**
   * Extracts the thumbnail for one segment.
   * @param segmentPath - The segment file.
   * @param outputPath - The thumbnail file.
   * @param name - The segment name, for logging.
   * @returns True when the thumbnail was written.
   */
  private async generate(segmentPath: string, outputPath: string, name: string): Promise<boolean> {

    const run = await this.options.runner(buildThumbnailArgs(segmentPath, outputPath, this.options.seekSeconds, this.options.width));

    if((run.code === 0) && await this.fileExists(outputPath)) {

      LOG.debug("recording:thumbnails", "Generated thumbnail for %s.", name);

      return true;
    }

    const reason = run.error ? formatError(run.error) : ((run.stderr.length > 0) ? run.stderr.split("\n").pop() : "exit code " + String(run.code));

    LOG.warn("Unable to generate a thumbnail for %s: %s.", name, reason);

    // A partial file would otherwise count as done on the next pass.
    await fsPromises.rm(outputPath, { force: true });

    return false;
  }

  /**
   * Checks whether a file exists.
   * @param filePath - The file.
   * @returns True if it exists.
   */
  private async fileExists(filePath: string): Promise<boolean> {

    try {

      await fsPromises.access(filePath);

      return true;
    } catch {

      return false;
    }
  }
}
