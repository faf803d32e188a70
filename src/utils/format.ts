/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * format.ts: Formatting utilities for camloop.
 */
import df from "dateformat";

// Bytes in one megabyte, as reported throughout the UI (binary megabytes).
export const BYTES_PER_MB = 1024 * 1024;

/**
 * Formats a duration in milliseconds as a human-readable string. The format varies based on duration length:
 * - Less than 60 seconds: "17s"
 * - Less than 1 hour: "6m 39s"
 * - 1 hour or more: "1h 23m"
 * @param ms - Duration in milliseconds.
 * @returns Formatted duration string.
 */
export function formatDuration(ms: number): string {

  const totalSeconds = Math.round(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if(hours > 0) {

    return [ String(hours), "h ", String(minutes), "m" ].join("");
  }

  if(minutes > 0) {

    return [ String(minutes), "m ", String(seconds), "s" ].join("");
  }

  return [ String(seconds), "s" ].join("");
}

/**
 * Rounds a number to a fixed number of decimal places.
 * @param value - The value to round.
 * @param places - Decimal places to keep.
 * @returns The rounded number.
 */
export function roundTo(value: number, places: number): number {

  const factor = Math.pow(10, places);

  return Math.round(value * factor) / factor;
}

/**
 * Converts a byte count to megabytes rounded to the given precision.
 * @param bytes - Size in bytes.
 * @param places - Decimal places to keep. Defaults to 1.
 * @returns Size in megabytes.
 */
export function toMegabytes(bytes: number, places = 1): number {

  return roundTo(bytes / BYTES_PER_MB, places);
}

/**
 * Formats a byte count as a fixed two-decimal megabyte string, e.g. "12.34 MB".
 * @param bytes - Size in bytes.
 * @returns The formatted size.
 */
export function formatMegabytes(bytes: number): string {

  return (bytes / BYTES_PER_MB).toFixed(2) + " MB";
}

/**
 * Formats a timestamp as a 12-hour local wall clock time, e.g. "1:18:00 PM".
 * @param time - Epoch milliseconds or a Date.
 * @returns The formatted time.
 */
export function formatClockTime(time: Date | number): string {

  return df(new Date(time), "h:MM:ss TT");
}
