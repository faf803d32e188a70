/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * utils.test.ts: Tests for the formatting, debug filter and log history helpers.
 */
import { afterEach, describe, expect, it } from "vitest";
import { emitLogEntry, getRecentLogLines } from "./logEmitter.js";
import { formatClockTime, formatDuration, formatMegabytes, roundTo, toMegabytes } from "./format.js";
import { initDebugFilter, isAnyDebugEnabled, isCategoryEnabled } from "./debugFilter.js";

describe("format helpers", () => {

  it("formats durations by magnitude", () => {

    expect(formatDuration(17000)).toBe("17s");
    expect(formatDuration(399000)).toBe("6m 39s");
    expect(formatDuration(4980000)).toBe("1h 23m");
  });

  it("rounds and converts sizes", () => {

    expect(roundTo(0.8333, 2)).toBe(0.83);
    expect(toMegabytes(1572864)).toBe(1.5);
    expect(toMegabytes(1048576 / 3, 2)).toBe(0.33);
    expect(formatMegabytes(524288)).toBe("0.50 MB");
  });

  it("formats 12-hour clock times", () => {

    expect(formatClockTime(new Date(2024, 2, 1, 13, 18, 0))).toBe("1:18:00 PM");
    expect(formatClockTime(new Date(2024, 2, 1, 0, 5, 9).getTime())).toBe("12:05:09 AM");
  });
});

describe("debug filter", () => {

  afterEach(() => {

    initDebugFilter("");
  });

  it("is off until configured", () => {

    expect(isAnyDebugEnabled()).toBe(false);
    expect(isCategoryEnabled("ffmpeg")).toBe(false);
  });

  it("matches a category and everything beneath it", () => {

    initDebugFilter("recording");

    expect(isCategoryEnabled("recording")).toBe(true);
    expect(isCategoryEnabled("recording:supervisor")).toBe(true);
    expect(isCategoryEnabled("recordings")).toBe(false);
    expect(isCategoryEnabled("live")).toBe(false);
  });

  it("lets exclusions win over the wildcard", () => {

    initDebugFilter("*, -ffmpeg");

    expect(isCategoryEnabled("live")).toBe(true);
    expect(isCategoryEnabled("ffmpeg")).toBe(false);
  });
});

describe("log history", () => {

  it("keeps the newest fifty entries and formats them as lines", () => {

    for(let i = 1; i <= 55; i++) {

      emitLogEntry({ level: (i === 55) ? "warn" : "info", message: "entry " + String(i), timestamp: "2024/03/01 10:00:00.000" });
    }

    const lines = getRecentLogLines();

    expect(lines).toHaveLength(50);
    expect(lines[0]).toBe("[2024/03/01 10:00:00.000] entry 6");
    expect(getRecentLogLines(2)).toEqual([ "[2024/03/01 10:00:00.000] entry 54", "[2024/03/01 10:00:00.000] [WARN] entry 55" ]);
  });
});
