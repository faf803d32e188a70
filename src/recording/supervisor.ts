/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * supervisor.ts: Capture process supervision with settings hot-reload and midnight rollover for camloop.
 */
import type { ManagedProcess, ProcessExit, ProcessLauncher } from "../utils/index.js";
import { LOG, StorageUnavailableError, delay, formatDuration, formatError, launchCapture, runWithTaskContext, terminateProcess, waitForExit } from "../utils/index.js";
import { buildStreamUrl, getSettingsMtime, loadSettings, redactStreamUrl } from "../config/settings.js";
import { captureTemplate, dayDirectory, secondsUntilMidnight } from "./segments.js";
import type { CameraSettings, Nullable } from "../types/index.js";
import fs from "node:fs";
import { waitForStorage } from "./storage.js";

const { promises: fsPromises } = fs;

/*
 * RECORDING SUPERVISOR
 *
 * The supervisor keeps exactly one FFmpeg capture process alive for as long as the service runs. Its lifecycle:
 *
 *   awaitingStorage -> running -> (exit | settings change | midnight) -> running -> ...
 *   awaitingStorage -> fatal       when the storage root never becomes writable
 *
 * Each run reloads the camera settings, creates the day's output directory and launches FFmpeg with a -t bound equal to the seconds left until midnight, so the
 * process ends on its own at the day boundary and the next run starts writing into the new day's directory. While a run is active, the supervisor polls the process
 * and the settings file's modification time once per monitor interval. A newer settings file ends the run through a graceful stop and starts the next one
 * immediately. Any other exit (crash, lost stream, the midnight bound, a spawn failure) is followed by the restart delay. Restarts are unbounded.
 *
 * The last-seen settings mtime is only read and written by the supervisor loop itself.
 */

/**
 * Observable supervisor states.
 */
export type SupervisorState = "awaitingStorage" | "fatal" | "restarting" | "running" | "stopped";

/**
 * Why a capture run ended.
 */
export type RunEndReason = "error" | "exit" | "settingsChanged" | "stopped";

/**
 * Details of the most recent run end, reported by getStatus().
 */
export interface LastRunEnd {

  at: number;
  code: Nullable<number>;
  message: Nullable<string>;
  reason: RunEndReason;
  signal: Nullable<string>;
}

/**
 * Snapshot of the supervisor, for the health route.
 */
export interface SupervisorStatus {

  currentRunStartedAt: Nullable<number>;
  lastRunEnd: Nullable<LastRunEnd>;
  launches: number;
  outputDirectory: Nullable<string>;
  pid: Nullable<number>;
  state: SupervisorState;
}

/**
 * Supervisor construction options. Everything the supervisor touches outside of the filesystem is injectable.
 */
export interface SupervisorOptions {

  // FFmpeg executable.
  ffmpegPath: string;

  // Starts the capture process. Defaults to spawning FFmpeg.
  launcher?: ProcessLauncher;

  // Interval between process and settings checks, in milliseconds.
  monitorInterval: number;

  // Clock. Defaults to the system time.
  now?: () => Date;

  // Delay before relaunching after an exit, in milliseconds.
  restartDelay: number;

  // Storage root.
  root: string;

  // RTSP transport requested from the camera.
  rtspTransport: string;

  // Absolute path to settings.env.
  settingsFile: string;

  // Time allowed after SIGTERM before SIGKILL, in milliseconds.
  stopGracePeriod: number;

  // Startup storage wait budget.
  storageWaitAttempts: number;
  storageWaitInterval: number;

  // Capture source URL template.
  streamUrlTemplate: string;
}

/**
 * Parameters of one capture invocation.
 */
export interface CaptureParameters {

  // Upper bound on the run length in seconds.
  durationSeconds: number;
  enableAudio: boolean;
  rtspTransport: string;
  segmentTime: number;

  // strftime output template.
  template: string;
  url: string;
}

/**
 * Builds the FFmpeg arguments for a capture run: stream copy into fixed-length segments named by local start time.
 * @param params - The capture parameters.
 * @returns The arguments, without the executable.
 */
export function buildCaptureArgs(params: CaptureParameters): string[] {

  return [

    "-rtsp_transport", params.rtspTransport,
    "-i", params.url,
    "-c", "copy",
    "-map", params.enableAudio ? "0" : "0:v",
    ...(params.enableAudio ? [] : ["-an"]),
    "-f", "segment",
    "-segment_time", String(params.segmentTime),
    "-strftime", "1",
    "-t", String(params.durationSeconds),
    params.template
  ];
}

/**
 * Owns the capture process lifecycle.
 */
export class RecordingSupervisor {

  private readonly abortController = new AbortController();
  private currentRunStartedAt: Nullable<number> = null;
  private lastRunEnd: Nullable<LastRunEnd> = null;
  private lastSeenMtime: Nullable<number> = null;
  private launches = 0;
  private readonly launcher: ProcessLauncher;
  private loopPromise: Nullable<Promise<void>> = null;
  private readonly now: () => Date;
  private readonly options: SupervisorOptions;
  private outputDirectory: Nullable<string> = null;
  private pid: Nullable<number> = null;
  private state: SupervisorState = "awaitingStorage";

  constructor(options: SupervisorOptions) {

    this.options = options;
    this.launcher = options.launcher ?? launchCapture;
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Waits for storage and starts the supervision loop in the background.
   * @throws StorageUnavailableError when the storage root never becomes writable. The supervisor is then in the fatal state.
   */
  public async start(): Promise<void> {

    if(this.loopPromise) {

      return;
    }

    try {

      await waitForStorage(this.options.root, {

        attempts: this.options.storageWaitAttempts,
        interval: this.options.storageWaitInterval,
        signal: this.abortController.signal
      });
    } catch(error) {

      if(this.abortController.signal.aborted) {

        this.state = "stopped";

        return;
      }

      this.state = "fatal";

      if(error instanceof StorageUnavailableError) {

        LOG.error("%s", error.message);
      }

      throw error;
    }

    this.loopPromise = runWithTaskContext("supervisor", async () => this.loop());
  }

  /**
   * Stops the current capture process gracefully and ends the loop.
   */
  public async stop(): Promise<void> {

    this.abortController.abort();

    if(this.loopPromise) {

      await this.loopPromise;
    }

    this.state = "stopped";
  }

  /**
   * Returns a snapshot of the supervisor.
   * @returns The current status.
   */
  public getStatus(): SupervisorStatus {

    return {

      currentRunStartedAt: this.currentRunStartedAt,
      lastRunEnd: this.lastRunEnd,
      launches: this.launches,
      outputDirectory: this.outputDirectory,
      pid: this.pid,
      state: this.state
    };
  }

  /**
   * The supervision loop. Never throws.
   */
  private async loop(): Promise<void> {

    const signal = this.abortController.signal;

    while(!signal.aborted) {

      let reason: RunEndReason;

      try {

        // eslint-disable-next-line no-await-in-loop
        reason = await this.runOnce();
      } catch(error) {

        LOG.error("Capture run failed: %s.", formatError(error));

        this.recordRunEnd("error", null, null, formatError(error));
        reason = "error";
      }

      this.currentRunStartedAt = null;
      this.pid = null;

      if(signal.aborted) {

        break;
      }

      // A settings change restarts capture immediately. Everything else waits out the restart delay.
      if(reason !== "settingsChanged") {

        this.state = "restarting";

        LOG.info("Restarting capture in %s seconds.", Math.round(this.options.restartDelay / 1000));

        // eslint-disable-next-line no-await-in-loop
        await delay(this.options.restartDelay, signal);
      }
    }

    this.state = "stopped";

    LOG.debug("recording:supervisor", "Supervision loop ended.");
  }

  /**
   * Performs one capture run: load settings, prepare the output directory, launch FFmpeg and monitor it until it ends.
   * @returns Why the run ended.
   */
  private async runOnce(): Promise<RunEndReason> {

    // Read the mtime before the settings themselves, so that a write landing in between is seen as a change on the first poll.
    this.lastSeenMtime = await getSettingsMtime(this.options.settingsFile);

    const settings = await loadSettings(this.options.settingsFile);
    const now = this.now();
    const outputDirectory = dayDirectory(this.options.root, settings.subfolder, now);

    await fsPromises.mkdir(outputDirectory, { recursive: true });

    const child = this.launch(settings, now);

    this.outputDirectory = outputDirectory;

    return this.monitor(child, waitForExit(child));
  }

  /**
   * Launches the capture process for a settings snapshot.
   * @param settings - The camera settings.
   * @param now - The launch time, which fixes the midnight bound.
   * @returns The process.
   */
  private launch(settings: CameraSettings, now: Date): ManagedProcess {

    const url = buildStreamUrl(this.options.streamUrlTemplate, settings);
    const args = buildCaptureArgs({

      durationSeconds: secondsUntilMidnight(now),
      enableAudio: settings.enableAudio,
      rtspTransport: this.options.rtspTransport,
      segmentTime: settings.segmentTime,
      template: captureTemplate(this.options.root, settings.subfolder),
      url
    });

    LOG.debug("recording:supervisor", "Launching %s %s", this.options.ffmpegPath, args.map((arg) => (arg === url) ? redactStreamUrl(url) : arg).join(" "));

    const child = this.launcher(this.options.ffmpegPath, args);

    this.launches++;
    this.pid = child.pid ?? null;
    this.currentRunStartedAt = now.getTime();
    this.state = "running";

    LOG.info("Recording from %s in %s second segments%s.", settings.cameraIp, settings.segmentTime, settings.enableAudio ? "" : " without audio");

    return child;
  }

  /**
   * Watches a running capture process until it exits, the settings file changes, or the supervisor is stopped.
   * @param child - The process.
   * @param exited - Its exit promise.
   * @returns Why the run ended.
   */
  private async monitor(child: ManagedProcess, exited: Promise<ProcessExit>): Promise<RunEndReason> {

    const signal = this.abortController.signal;
    const runEnded = new AbortController();
    const outcome: { exit: Nullable<ProcessExit> } = { exit: null };

    // The exit promise gets exactly one reaction per run. It records the exit and cuts the current tick short.
    void exited.then((exit) => {

      outcome.exit = exit;
      runEnded.abort();
    });

    const onStop = (): void => {

      runEnded.abort();
    };

    signal.addEventListener("abort", onStop, { once: true });

    try {

      for(;;) {

        // eslint-disable-next-line no-await-in-loop
        await delay(this.options.monitorInterval, runEnded.signal);

        if(outcome.exit) {

          const { code, error, signal: exitSignal } = outcome.exit;

          if(error) {

            LOG.error("Unable to start FFmpeg: %s.", formatError(error));
          } else {

            LOG.warn("FFmpeg exited (%s) after %s.", (exitSignal !== null) ? "signal " + exitSignal : "code " + String(code),
              formatDuration(this.now().getTime() - (this.currentRunStartedAt ?? this.now().getTime())));
          }

          this.recordRunEnd("exit", code, exitSignal, error ? formatError(error) : null);

          return "exit";
        }

        if(signal.aborted) {

          LOG.info("Stopping capture.");

          // eslint-disable-next-line no-await-in-loop
          await this.terminate(child, exited, "stopped");

          return "stopped";
        }

        // eslint-disable-next-line no-await-in-loop
        const mtime = await getSettingsMtime(this.options.settingsFile);

        if((mtime !== null) && ((this.lastSeenMtime === null) || (mtime > this.lastSeenMtime))) {

          LOG.info("Settings changed. Restarting capture with the new settings.");

          // eslint-disable-next-line no-await-in-loop
          await this.terminate(child, exited, "settingsChanged");

          return "settingsChanged";
        }
      }
    } finally {

      signal.removeEventListener("abort", onStop);
    }
  }

  /**
   * Stops the capture process and records the run end.
   * @param child - The process.
   * @param exited - Its exit promise.
   * @param reason - Why the run is being ended.
   */
  private async terminate(child: ManagedProcess, exited: Promise<ProcessExit>, reason: RunEndReason): Promise<void> {

    const outcome = await terminateProcess(child, exited, this.options.stopGracePeriod);

    if(outcome === "killed") {

      LOG.warn("FFmpeg did not exit within %sms of SIGTERM and was killed.", this.options.stopGracePeriod);
    }

    LOG.debug("recording:supervisor", "Capture process ended: %s.", outcome);

    this.recordRunEnd(reason, child.exitCode, child.signalCode, null);
  }

  /**
   * Records the end of a run for getStatus().
   * @param reason - Why the run ended.
   * @param code - Exit code, if any.
   * @param signal - Terminating signal, if any.
   * @param message - Error message, if any.
   */
  private recordRunEnd(reason: RunEndReason, code: Nullable<number>, signal: Nullable<string>, message: Nullable<string>): void {

    this.lastRunEnd = { at: this.now().getTime(), code, message, reason, signal };
  }
}
