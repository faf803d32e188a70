/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * ffmpeg.ts: FFmpeg process management for capture, thumbnails, timelapses and the live preview.
 */
import type { ChildProcess } from "node:child_process";
import { LOG } from "./logger.js";
import type { Nullable } from "../types/index.js";
import { delay } from "./delay.js";
import { spawn } from "node:child_process";

/*
 * FFMPEG PROCESSES
 *
 * Every piece of media work in camloop is delegated to an FFmpeg child process:
 *
 * - Capture: one long-lived process per supervisor run, segmenting the camera stream to disk.
 * - Thumbnails and timelapses: short-lived processes run to completion, where only the exit status and the tail of stderr matter.
 * - Live preview: one long-lived process writing MJPEG to stdout.
 *
 * The supervisor and the live producer only depend on the small ManagedProcess surface below, which a real ChildProcess satisfies and tests can fake.
 */

// FFmpeg stderr lines that carry progress, not problems.
const NOISE_PATTERNS = [ "Press [q] to stop", "frame=", "size=", "time=", "bitrate=", "speed=" ];

// Number of stderr lines kept for failure messages.
const STDERR_TAIL_LINES = 8;

/**
 * The subset of a child process that lifecycle management depends on.
 */
export interface ManagedProcess {

  readonly exitCode: number | null;
  readonly pid?: number | undefined;
  readonly signalCode: NodeJS.Signals | null;

  kill(signal?: NodeJS.Signals): boolean;
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: "error", listener: (error: Error) => void): this;
}

/**
 * Starts a long-lived process. The supervisor takes one of these so that tests can substitute a fake.
 */
export type ProcessLauncher = (command: string, args: string[]) => ManagedProcess;

/**
 * How a managed process ended.
 */
export interface ProcessExit {

  code: number | null;

  // Set when the process could not be spawned at all.
  error?: Error;
  signal: NodeJS.Signals | null;
}

/**
 * Outcome of a run-to-completion FFmpeg invocation.
 */
export interface FFmpegRunResult extends ProcessExit {

  // The last few meaningful stderr lines, joined with newlines.
  stderr: string;
}

/**
 * Runs FFmpeg to completion with the given arguments. Thumbnails and timelapses take one of these so that tests can substitute a fake.
 */
export type FFmpegRunner = (args: string[]) => Promise<FFmpegRunResult>;

/**
 * Returns true when an FFmpeg stderr line is progress noise.
 * @param line - A single stderr line.
 * @returns True if the line should not be logged.
 */
export function isFFmpegNoise(line: string): boolean {

  return NOISE_PATTERNS.some((pattern) => line.includes(pattern));
}

/**
 * Spawns FFmpeg and routes its stderr to the "ffmpeg" debug category. stdin is always closed (the equivalent of -nostdin); stdout is piped only when the caller
 * reads media from it.
 * @param command - FFmpeg executable.
 * @param args - Arguments, without the executable.
 * @param label - Short label used in debug output, e.g. "capture".
 * @param pipeStdout - Whether stdout is piped to the parent.
 * @param onStderrLine - Optional callback for each meaningful stderr line.
 * @returns The child process.
 */
export function spawnFFmpeg(command: string, args: string[], label: string, pipeStdout = false, onStderrLine?: (line: string) => void): ChildProcess {

  const ffmpeg = spawn(command, [ "-hide_banner", "-nostdin", "-loglevel", "warning", ...args ], {

    stdio: [ "ignore", pipeStdout ? "pipe" : "ignore", "pipe" ]
  });

  ffmpeg.stderr?.on("data", (data: Buffer) => {

    for(const line of data.toString().split(/\r?\n/)) {

      const trimmed = line.trim();

      if((trimmed.length === 0) || isFFmpegNoise(trimmed)) {

        continue;
      }

      LOG.debug("ffmpeg", "%s: %s", label, trimmed);
      onStderrLine?.(trimmed);
    }
  });

  return ffmpeg;
}

/**
 * Default capture launcher: FFmpeg with stdout discarded.
 * @param command - FFmpeg executable.
 * @param args - Arguments.
 * @returns The running process.
 */
export const launchCapture: ProcessLauncher = (command: string, args: string[]): ManagedProcess => spawnFFmpeg(command, args, "capture");

/**
 * Runs FFmpeg to completion. Never rejects: spawn failures are reported through the error field of the result.
 * @param command - FFmpeg executable.
 * @param args - Arguments.
 * @param label - Short label used in debug output.
 * @returns The exit status and stderr tail.
 */
export async function runFFmpeg(command: string, args: string[], label: string): Promise<FFmpegRunResult> {

  const tail: string[] = [];

  return new Promise<FFmpegRunResult>((resolve) => {

    const ffmpeg = spawnFFmpeg(command, args, label, false, (line) => {

      tail.push(line);

      if(tail.length > STDERR_TAIL_LINES) {

        tail.shift();
      }
    });

    ffmpeg.once("error", (error) => {

      resolve({ code: null, error, signal: null, stderr: tail.join("\n") });
    });

    ffmpeg.once("close", (code: number | null, signal: NodeJS.Signals | null) => {

      resolve({ code, signal, stderr: tail.join("\n") });
    });
  });
}

/**
 * Creates a runner bound to an FFmpeg executable and a debug label.
 * @param command - FFmpeg executable.
 * @param label - Short label used in debug output.
 * @returns A runner.
 */
export function createFFmpegRunner(command: string, label: string): FFmpegRunner {

  return async (args: string[]): Promise<FFmpegRunResult> => runFFmpeg(command, args, label);
}

/**
 * Returns whether a managed process has already ended.
 * @param child - The process.
 * @returns True once an exit code or signal has been recorded.
 */
export function hasExited(child: ManagedProcess): boolean {

  return (child.exitCode !== null) || (child.signalCode !== null);
}

/**
 * Waits for a managed process to end, whether it exits, is killed, or fails to spawn.
 * @param child - The process.
 * @returns How the process ended.
 */
export async function waitForExit(child: ManagedProcess): Promise<ProcessExit> {

  if(hasExited(child)) {

    return { code: child.exitCode, signal: child.signalCode };
  }

  return new Promise<ProcessExit>((resolve) => {

    child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {

      resolve({ code, signal });
    });

    child.once("error", (error: Error) => {

      resolve({ code: null, error, signal: null });
    });
  });
}

/**
 * Stops a managed process in two phases: SIGTERM, a bounded wait, then SIGKILL if it is still alive.
 * @param child - The process.
 * @param exited - The process's exit promise, from waitForExit().
 * @param graceMs - How long to wait after SIGTERM.
 * @returns "exited" when SIGTERM sufficed, "killed" when SIGKILL was needed, "already" when the process had ended before the call.
 */
export async function terminateProcess(child: ManagedProcess, exited: Promise<ProcessExit>, graceMs: number): Promise<"already" | "exited" | "killed"> {

  if(hasExited(child)) {

    return "already";
  }

  child.kill("SIGTERM");

  let settled = false;

  await Promise.race([ exited.then(() => { settled = true; }), delay(graceMs) ]);

  if(settled || hasExited(child)) {

    return "exited";
  }

  child.kill("SIGKILL");

  await Promise.race([ exited, delay(graceMs) ]);

  return "killed";
}

// Cached FFmpeg path after resolution. Null means not yet resolved, undefined means not found.
let cachedFFmpegPath: Nullable<string> | undefined = null;

/**
 * Checks that FFmpeg runs at the given path or command name.
 * @param command - The executable to try.
 * @returns True if "-version" exits cleanly.
 */
async function checkFFmpegAt(command: string): Promise<boolean> {

  return new Promise((resolve) => {

    const ffmpeg = spawn(command, ["-version"], { stdio: [ "ignore", "ignore", "ignore" ] });

    ffmpeg.on("error", () => {

      resolve(false);
    });

    ffmpeg.on("exit", (code) => {

      resolve(code === 0);
    });
  });
}

/**
 * Resolves the FFmpeg executable, trying the configured command first and the system PATH second. The result is cached.
 * @param configured - The configured executable (recording.ffmpegPath).
 * @returns The executable that works, or undefined when FFmpeg is not available.
 */
export async function resolveFFmpegPath(configured: string): Promise<string | undefined> {

  if(cachedFFmpegPath !== null) {

    return cachedFFmpegPath;
  }

  for(const candidate of [ ...new Set([ configured, "ffmpeg" ]) ]) {

    // eslint-disable-next-line no-await-in-loop
    if(await checkFFmpegAt(candidate)) {

      cachedFFmpegPath = candidate;

      return candidate;
    }
  }

  cachedFFmpegPath = undefined;

  return undefined;
}
