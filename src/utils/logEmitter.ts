/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logEmitter.ts: Recent log history for the status API.
 */

/**
 * A structured log entry.
 */
export interface LogEntry {

  categoryTag?: string;
  level: "debug" | "error" | "info" | "warn";
  message: string;
  timestamp: string;
}

// Number of entries kept for the status API.
const HISTORY_SIZE = 50;

const history: LogEntry[] = [];

/**
 * Appends a log entry to the bounded history.
 * @param entry - The log entry.
 */
export function emitLogEntry(entry: LogEntry): void {

  history.push(entry);

  if(history.length > HISTORY_SIZE) {

    history.splice(0, history.length - HISTORY_SIZE);
  }
}

/**
 * Returns the most recent log entries formatted as plain lines, oldest first.
 * @param limit - Maximum number of lines to return.
 * @returns The formatted lines.
 */
export function getRecentLogLines(limit = HISTORY_SIZE): string[] {

  return history.slice(-limit).map((entry) => {

    const level = (entry.level === "info") ? "" : "[" + entry.level.toUpperCase() + "] ";

    return "[" + entry.timestamp + "] " + level + entry.message;
  });
}
