/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * segments.ts: Segment file naming, directory layout and listing for camloop.
 */
import type { Nullable, RecordingSegment } from "../types/index.js";
import df from "dateformat";
import fs from "node:fs";
import { isErrnoException } from "../utils/index.js";
import path from "node:path";

const { promises: fsPromises } = fs;

/*
 * SEGMENT NAMING
 *
 * The capture process names each segment after its local start time on a 12-hour clock, inside a directory per calendar day:
 *
 *   <root>/<subfolder>/<YYYY>/<MM>/<DD>/<AM|PM>-<hh>-<mm>-<ss>.mp4
 *   <root>/<subfolder>/<YYYY>/<MM>/<DD>/<same-stem>.thumb.jpg
 *   <root>/<subfolder>/<timelapse folder>/<YYYY-MM-DD>.mp4
 *
 * The file name alone does not carry a date, so decoding a start time always needs the day the containing directory stands for. Everything that encodes or decodes
 * these names goes through this module: FFmpeg writes them through captureTemplate(), and the thumbnail watcher, timelapse job and timeline analyzer read them back
 * through listSegments().
 */

export const SEGMENT_EXTENSION = ".mp4";
export const THUMBNAIL_SUFFIX = ".thumb.jpg";

const SEGMENT_STEM_PATTERN = /^(AM|PM)-(\d{2})-(\d{2})-(\d{2})$/;
const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Encodes a start time as a segment file stem, e.g. "PM-01-18-00".
 * @param date - The local start time.
 * @returns The stem, without extension.
 */
export function formatSegmentStem(date: Date): string {

  return df(date, "TT-hh-MM-ss");
}

/**
 * Decodes the start time of a segment from its file name.
 * @param name - The file name or stem, e.g. "PM-01-18-00.mp4".
 * @param day - Any time on the day of the containing directory.
 * @returns The local start time, or null when the name does not follow the encoding.
 */
export function parseSegmentStart(name: string, day: Date): Nullable<Date> {

  const stem = name.endsWith(SEGMENT_EXTENSION) ? name.slice(0, -SEGMENT_EXTENSION.length) : name;
  const match = SEGMENT_STEM_PATTERN.exec(stem);

  if(!match) {

    return null;
  }

  const [ , meridiem, hourText, minuteText, secondText ] = match;
  const hour = parseInt(hourText, 10);
  const minute = parseInt(minuteText, 10);
  const second = parseInt(secondText, 10);

  if((hour < 1) || (hour > 12) || (minute > 59) || (second > 59)) {

    return null;
  }

  // 12 AM is the first hour of the day, 12 PM is noon.
  const hour24 = (hour % 12) + ((meridiem === "PM") ? 12 : 0);

  return new Date(day.getFullYear(), day.getMonth(), day.getDate(), hour24, minute, second);
}

/**
 * Returns the calendar key of a date, e.g. "2024-03-01".
 * @param date - The date.
 * @returns The local calendar date as YYYY-MM-DD.
 */
export function dateKey(date: Date): string {

  return df(date, "yyyy-mm-dd");
}

/**
 * Parses a YYYY-MM-DD calendar key strictly: "2024-02-30" is rejected rather than rolled over into March.
 * @param key - The calendar key.
 * @returns Local midnight of that day, or null when the key is not a real date.
 */
export function parseDateKey(key: string): Nullable<Date> {

  const match = DATE_KEY_PATTERN.exec(key.trim());

  if(!match) {

    return null;
  }

  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10) - 1;
  const day = parseInt(match[3], 10);
  const date = new Date(year, month, day);

  if((date.getFullYear() !== year) || (date.getMonth() !== month) || (date.getDate() !== day)) {

    return null;
  }

  return date;
}

/**
 * Returns local midnight at the start of a date's day.
 * @param date - The date.
 * @returns A new Date at 00:00:00.000 local time.
 */
export function startOfDay(date: Date): Date {

  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

/**
 * Returns the number of whole seconds until the next local midnight, never less than 1. Used to bound a capture run so that it ends at the day boundary.
 * @param now - The current time.
 * @returns Seconds until midnight, rounded up.
 */
export function secondsUntilMidnight(now: Date): number {

  const midnight = new Date(now.getFullYear(), now.getMonth(), now.getDate() + 1);

  return Math.max(1, Math.ceil((midnight.getTime() - now.getTime()) / 1000));
}

/**
 * Returns the recording directory for a day.
 * @param root - The storage root.
 * @param subfolder - The recording subfolder.
 * @param date - Any time on the day.
 * @returns <root>/<subfolder>/<YYYY>/<MM>/<DD>.
 */
export function dayDirectory(root: string, subfolder: string, date: Date): string {

  return path.join(root, subfolder, df(date, "yyyy"), df(date, "mm"), df(date, "dd"));
}

/**
 * Returns the strftime output template handed to the FFmpeg segment muxer. It expands to the same layout as dayDirectory() and formatSegmentStem().
 * @param root - The storage root.
 * @param subfolder - The recording subfolder.
 * @returns The template.
 */
export function captureTemplate(root: string, subfolder: string): string {

  return path.join(root, subfolder, "%Y", "%m", "%d", "%p-%I-%M-%S" + SEGMENT_EXTENSION);
}

/**
 * Returns the thumbnail path that belongs to a segment.
 * @param segmentPath - The segment file path.
 * @returns The sibling <stem>.thumb.jpg path.
 */
export function thumbnailPath(segmentPath: string): string {

  return path.join(path.dirname(segmentPath), path.basename(segmentPath, SEGMENT_EXTENSION) + THUMBNAIL_SUFFIX);
}

/**
 * Returns the directory timelapses are written to.
 * @param root - The storage root.
 * @param subfolder - The recording subfolder.
 * @param timelapseDir - The timelapse subfolder beneath the recording subfolder.
 * @returns The directory path.
 */
export function timelapseDirectory(root: string, subfolder: string, timelapseDir: string): string {

  return path.join(root, subfolder, timelapseDir);
}

/**
 * Returns the timelapse artifact path for a day.
 * @param root - The storage root.
 * @param subfolder - The recording subfolder.
 * @param timelapseDir - The timelapse subfolder beneath the recording subfolder.
 * @param date - Any time on the day.
 * @returns <root>/<subfolder>/<timelapseDir>/<YYYY-MM-DD>.mp4.
 */
export function timelapsePath(root: string, subfolder: string, timelapseDir: string, date: Date): string {

  return path.join(timelapseDirectory(root, subfolder, timelapseDir), dateKey(date) + SEGMENT_EXTENSION);
}

/**
 * Orders segments by parsed start time, falling back to the modification time for names that could not be parsed. Ties are broken by name.
 * @param a - First segment.
 * @param b - Second segment.
 * @returns A negative, zero or positive number, as Array.prototype.sort() expects.
 */
export function compareSegments(a: RecordingSegment, b: RecordingSegment): number {

  const difference = (a.start?.getTime() ?? a.end) - (b.start?.getTime() ?? b.end);

  if(difference !== 0) {

    return difference;
  }

  return (a.name < b.name) ? -1 : ((a.name > b.name) ? 1 : 0);
}

/**
 * Lists the segment files in a day directory, sorted with compareSegments(). Thumbnails and other files are ignored, and a file that disappears between the listing
 * and its stat is skipped.
 * @param directory - The day directory.
 * @param day - Any time on the day the directory stands for.
 * @returns The segments. A missing directory yields an empty list.
 */
export async function listSegments(directory: string, day: Date): Promise<RecordingSegment[]> {

  let entries: fs.Dirent[];

  try {

    entries = await fsPromises.readdir(directory, { withFileTypes: true });
  } catch(error) {

    if(isErrnoException(error, "ENOENT") || isErrnoException(error, "ENOTDIR")) {

      return [];
    }

    throw error;
  }

  const names = entries.filter((entry) => entry.isFile() && entry.name.endsWith(SEGMENT_EXTENSION)).map((entry) => entry.name);

  const segments = await Promise.all(names.map(async (name): Promise<Nullable<RecordingSegment>> => {

    const filePath = path.join(directory, name);

    try {

      const stats = await fsPromises.stat(filePath);

      return { createdAt: stats.birthtimeMs, end: stats.mtimeMs, name, path: filePath, size: stats.size, start: parseSegmentStart(name, day) };
    } catch(error) {

      if(isErrnoException(error, "ENOENT")) {

        return null;
      }

      throw error;
    }
  }));

  return segments.filter((segment): segment is RecordingSegment => segment !== null).sort(compareSegments);
}
