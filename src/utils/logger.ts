/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logger.ts: Logging utilities with color-coded output for camloop.
 */
import { initDebugFilter, isAnyDebugEnabled, isCategoryEnabled } from "./debugFilter.js";
import type { LogEntry } from "./logEmitter.js";
import df from "dateformat";
import { emitLogEntry } from "./logEmitter.js";
import { format } from "node:util";
import { getTaskTag } from "./taskContext.js";
import { writeLogEntry } from "./fileLogger.js";

/* Warnings are yellow, errors red and debug output cyan, in both console and file mode, so that `tail -f` on the log file reads the same as the console.
 */

const ANSI_COLORS = {

  cyan: "\x1b[36m",
  red: "\x1b[31m",
  reset: "\x1b[0m",
  yellow: "\x1b[33m"
};

// Console mode is selected with --console (Docker, interactive debugging). File mode is the default.
let useConsoleLogging = false;

/**
 * Sets the logging mode. When true, logs go to the console with colors. When false, logs go to the file logger.
 * @param enabled - True to enable console logging.
 */
export function setConsoleLogging(enabled: boolean): void {

  useConsoleLogging = enabled;
}

/**
 * Returns whether console logging is currently enabled.
 * @returns True if using console logging.
 */
export function isConsoleLogging(): boolean {

  return useConsoleLogging;
}

/**
 * Enables or disables all debug categories. CAMLOOP_DEBUG, when set, is applied by the entry point instead.
 * @param enabled - True to enable all debug logging.
 */
export function setDebugLogging(enabled: boolean): void {

  initDebugFilter(enabled ? "*" : "");
}

/**
 * Core logging implementation shared by all log levels.
 * @param level - The log level.
 * @param color - ANSI color code for the entry, or an empty string.
 * @param message - The format string.
 * @param args - Format arguments.
 * @param explicitTag - Task tag that overrides the ambient task context.
 * @param categoryTag - Debug category, for debug entries.
 */
function logWithLevel(level: LogEntry["level"], color: string, message: string, args: unknown[], explicitTag?: string, categoryTag?: string): void {

  const tag = explicitTag ?? getTaskTag();
  const formatted = args.length > 0 ? format(message, ...args) : message;
  const logMessage = tag ? [ "[", tag, "] ", formatted ].join("") : formatted;

  emitLogEntry({

    level,
    message: logMessage,
    timestamp: df(new Date(), "yyyy/mm/dd HH:MM:ss.l"),
    ...(categoryTag ? { categoryTag } : {})
  });

  if(!useConsoleLogging) {

    writeLogEntry(level, logMessage, color || undefined, categoryTag);

    return;
  }

  /* eslint-disable no-console */
  const consoleMethod = (level === "error") ? console.error : ((level === "warn") ? console.warn : console.log);
  /* eslint-enable no-console */

  if(color) {

    consoleMethod("%s%s%s", color, logMessage, ANSI_COLORS.reset);
  } else {

    consoleMethod(logMessage);
  }
}

/**
 * Logger bound to a fixed task tag, returned by LOG.withTag().
 */
export interface BoundLogger {

  debug: (category: string, message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
}

/* All methods take a util.format() string (%s, %d, %j, %o) followed by its arguments. Inside runWithTaskContext() the task tag is prefixed automatically; outside of
 * one, LOG.withTag() gives a logger with a fixed tag.
 */
export const LOG = {

  /**
   * Logs a debug message in cyan when its category is enabled through CAMLOOP_DEBUG or --debug.
   * @param category - The debug category (e.g., "recording:supervisor", "ffmpeg").
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  debug: function(category: string, message: string, ...args: unknown[]): void {

    if(!isAnyDebugEnabled() || !isCategoryEnabled(category)) {

      return;
    }

    logWithLevel("debug", ANSI_COLORS.cyan, message, args, undefined, category);
  },

  /**
   * Logs an error message in red. Used for failures that stop a unit of work: a storage timeout, a failed encode, a capture process that cannot be spawned.
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  error: function(message: string, ...args: unknown[]): void {

    logWithLevel("error", ANSI_COLORS.red, message, args);
  },

  /**
   * Logs an informational message.
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  info: function(message: string, ...args: unknown[]): void {

    logWithLevel("info", "", message, args);
  },

  /**
   * Logs a warning message in yellow. Used for recoverable problems: a capture process exiting, a thumbnail that could not be extracted.
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  warn: function(message: string, ...args: unknown[]): void {

    logWithLevel("warn", ANSI_COLORS.yellow, message, args);
  },

  /**
   * Creates a logger with a fixed task tag, for code that runs outside of a task context such as timer callbacks and process event handlers.
   * @param tag - The tag to include in every message.
   * @returns A bound logger.
   */
  withTag: function(tag: string): BoundLogger {

    return {

      debug: (category: string, message: string, ...args: unknown[]): void => {

        if(isAnyDebugEnabled() && isCategoryEnabled(category)) {

          logWithLevel("debug", ANSI_COLORS.cyan, message, args, tag, category);
        }
      },
      error: (message: string, ...args: unknown[]): void => { logWithLevel("error", ANSI_COLORS.red, message, args, tag); },
      info: (message: string, ...args: unknown[]): void => { logWithLevel("info", "", message, args, tag); },
      warn: (message: string, ...args: unknown[]): void => { logWithLevel("warn", ANSI_COLORS.yellow, message, args, tag); }
    };
  }
};
