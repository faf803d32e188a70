/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * fileLogger.ts: Buffered file logging with size-based trimming for camloop.
 */
import type { Nullable } from "../types/index.js";
import df from "dateformat";
import fs from "node:fs";
import { isAnyDebugEnabled } from "./debugFilter.js";
import path from "node:path";

const { promises: fsPromises } = fs;

/* Entries are buffered in memory and appended to the log file once a second. Every SIZE_CHECK_FREQUENCY writes the real file size is checked, and a file above the
 * configured maximum is cut down to half of it at a line boundary, keeping the newest entries. Trimming is skipped while debug output is enabled. A failed append
 * disables the logger for a minute before it tries again.
 */

const FLUSH_INTERVAL_MS = 1000;
const SIZE_CHECK_FREQUENCY = 100;
const ERROR_RETRY_DELAY_MS = 60000;
const ANSI_RESET = "\x1b[0m";

interface FileLoggerState {

  disabledUntil: number;
  filePath: string;
  flushTimer: ReturnType<typeof setInterval>;
  maxSize: number;
  writeCount: number;
}

let state: Nullable<FileLoggerState> = null;
let writeBuffer: string[] = [];

/**
 * Initializes the file logger, creating the log file and its directory when they do not exist. File logging is best-effort: a failure here is reported on the
 * console and leaves file logging off.
 * @param logPath - Absolute path to the log file.
 * @param maxSize - Maximum log file size in bytes.
 */
export async function initializeFileLogger(logPath: string, maxSize: number): Promise<void> {

  try {

    await fsPromises.mkdir(path.dirname(logPath), { recursive: true });
    await fsPromises.appendFile(logPath, "", "utf-8");
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Failed to initialize file logger: %s. File logging disabled.", (error instanceof Error) ? error.message : String(error));

    return;
  }

  const flushTimer = setInterval((): void => {

    void flushLogBuffer();
  }, FLUSH_INTERVAL_MS);

  // The flush timer alone must not keep a finished one-shot command alive.
  flushTimer.unref();

  state = { disabledUntil: 0, filePath: logPath, flushTimer, maxSize, writeCount: 0 };
}

/**
 * Queues a log entry for the next flush.
 * @param level - Log level.
 * @param message - The formatted log message.
 * @param color - Optional ANSI color code wrapped around the entry.
 * @param categoryTag - Optional debug category, shown as [DEBUG:category].
 */
export function writeLogEntry(level: string, message: string, color?: string, categoryTag?: string): void {

  if(!state || (Date.now() < state.disabledUntil)) {

    return;
  }

  const levelTag = categoryTag ? [ level.toUpperCase(), ":", categoryTag ].join("") : level.toUpperCase();
  const levelPrefix = (level === "info") ? "" : [ "[", levelTag, "] " ].join("");

  writeBuffer.push([ "[", df(new Date(), "yyyy/mm/dd HH:MM:ss.l"), "] ", color ?? "", levelPrefix, message, color ? ANSI_RESET : "", "\n" ].join(""));

  state.writeCount++;

  if((state.writeCount % SIZE_CHECK_FREQUENCY) === 0) {

    void trimIfOversized(state);
  }
}

/**
 * Appends the buffered entries to the log file.
 */
export async function flushLogBuffer(): Promise<void> {

  if(!state || (writeBuffer.length === 0)) {

    return;
  }

  const content = writeBuffer.join("");

  writeBuffer = [];

  try {

    await fsPromises.appendFile(state.filePath, content, "utf-8");
  } catch(error) {

    state.disabledUntil = Date.now() + ERROR_RETRY_DELAY_MS;

    // eslint-disable-next-line no-console
    console.error("Failed to write to log file: %s. File logging disabled for %s seconds.",
      (error instanceof Error) ? error.message : String(error), ERROR_RETRY_DELAY_MS / 1000);
  }
}

/**
 * Writes the buffered entries synchronously. Used from the process exit handler, where asynchronous work never completes.
 */
export function flushLogBufferSync(): void {

  if(!state || (writeBuffer.length === 0)) {

    return;
  }

  const content = writeBuffer.join("");

  writeBuffer = [];

  try {

    fs.appendFileSync(state.filePath, content, "utf-8");
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Failed to write final log entries: %s.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Trims the log file to half of the maximum size when it has grown past the maximum.
 * @param current - The logger state the check was scheduled for.
 */
async function trimIfOversized(current: FileLoggerState): Promise<void> {

  try {

    const stats = await fsPromises.stat(current.filePath);

    if((stats.size <= current.maxSize) || isAnyDebugEnabled()) {

      return;
    }

    const content = await fsPromises.readFile(current.filePath, "utf-8");
    const cutPosition = content.length - Math.floor(current.maxSize / 2);

    if(cutPosition <= 0) {

      return;
    }

    // Keep whole lines only.
    const newline = content.indexOf("\n", cutPosition);
    const tempPath = current.filePath + ".tmp";

    await fsPromises.writeFile(tempPath, content.substring((newline === -1) ? cutPosition : (newline + 1)), "utf-8");
    await fsPromises.rename(tempPath, current.filePath);
  } catch(error) {

    // eslint-disable-next-line no-console
    console.warn("Error trimming log file: %s.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Stops the flush timer and writes whatever is still buffered.
 */
export function shutdownFileLogger(): void {

  if(!state) {

    return;
  }

  clearInterval(state.flushTimer);
  flushLogBufferSync();

  state = null;
}
