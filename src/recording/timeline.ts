/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * timeline.ts: Today's recording timeline, gaps and recorder health for camloop.
 */
import type { GapRecord, Nullable, RecentFile, RecordingSegment, RecorderStatus, TimelineEntry, TimelineReport } from "../types/index.js";
import { dayDirectory, listSegments, startOfDay } from "./segments.js";
import { formatClockTime, formatMegabytes, roundTo, toMegabytes } from "../utils/index.js";
import { loadSettings } from "../config/settings.js";

/* The analyzer derives everything from today's directory listing on each call and keeps no state between calls. A segment's end is its modification time. Its
 * start comes from the file name, or is estimated backwards from the end using the configured segment length when the name cannot be decoded. The newest file is
 * the one still being written while the recorder is active, so for that file alone the birth time gives a better estimate than the nominal length.
 */

const SECONDS_PER_DAY = 86400;

/**
 * Analyzer options.
 */
export interface TimelineOptions {

  // The newest segment counts as active when modified within this many milliseconds.
  activeThreshold: number;

  // Clock. Defaults to the system time.
  now?: () => Date;

  // Number of files listed in recent_files.
  recentFileCount: number;

  // Storage root.
  root: string;

  // Absolute path to settings.env.
  settingsFile: string;
}

interface TimedSegment {

  duration: number;
  endMs: number;
  segment: RecordingSegment;
  startMs: number;
}

/**
 * Estimates the average bitrate of a segment.
 * @param avgSizeMb - Average segment size in megabytes.
 * @param segmentSeconds - Nominal segment length in seconds.
 * @returns Megabits per second, rounded to one decimal.
 */
export function estimateBitrateMbps(avgSizeMb: number, segmentSeconds: number): number {

  if(segmentSeconds <= 0) {

    return 0;
  }

  return roundTo(avgSizeMb * 1024 * 1024 * 8 / segmentSeconds / 1e6, 1);
}

/**
 * Estimates how many seconds of footage a segment holds.
 * @param segment - The segment.
 * @param hot - True when this is the newest segment and it is still being written.
 * @param segmentSeconds - Nominal segment length in seconds.
 * @returns The duration in seconds.
 */
export function segmentDuration(segment: RecordingSegment, hot: boolean, segmentSeconds: number): number {

  if(segment.start) {

    const decoded = (segment.end - segment.start.getTime()) / 1000;

    if(decoded > 0) {

      return decoded;
    }
  }

  if(hot && (segment.createdAt > 0)) {

    const written = (segment.end - segment.createdAt) / 1000;

    if(written > 0) {

      return written;
    }
  }

  return segmentSeconds;
}

/**
 * Finds the holes in a day's recordings. A hole is reported when the next segment starts more than two segment lengths after the previous one ended.
 * @param segments - Timed segments, in start order.
 * @param segmentSeconds - Nominal segment length in seconds.
 * @returns The gaps, in order.
 */
function findGaps(segments: TimedSegment[], segmentSeconds: number): GapRecord[] {

  const gaps: GapRecord[] = [];

  for(let index = 1; index < segments.length; index++) {

    const previous = segments[index - 1];
    const next = segments[index];
    const gapSeconds = (next.startMs - previous.endMs) / 1000;

    if(gapSeconds > (2 * segmentSeconds)) {

      gaps.push({ duration_minutes: Math.round(gapSeconds / 60), end: formatClockTime(next.startMs), start: formatClockTime(previous.endMs) });
    }
  }

  return gaps;
}

/**
 * Analyzes today's recordings. Never throws on a missing directory or an empty listing.
 * @param options - Analyzer options.
 * @returns The timeline report.
 */
export async function analyzeTimeline(options: TimelineOptions): Promise<TimelineReport> {

  const now = options.now?.() ?? new Date();
  const settings = await loadSettings(options.settingsFile);
  const segmentSeconds = settings.segmentTime;
  const segments = await listSegments(dayDirectory(options.root, settings.subfolder, now), now);

  const report: TimelineReport = {

    avg_size_mb: 0,
    current_file: "Waiting...",
    current_size: "0.00 MB",
    elapsed_seconds: 0,
    est_bitrate_mbps: 0,
    files_today: segments.length,
    gaps: [],
    last_write_age_seconds: null,
    recent_files: [],
    recorder_status: "idle",
    segment_limit_seconds: segmentSeconds,
    status_msg: "Idle",
    timeline: [],
    total_hours: 0,
    total_size_mb: 0
  };

  if(segments.length === 0) {

    return report;
  }

  const byRecency = [...segments].sort((a, b) => b.end - a.end);
  const latest = byRecency[0];
  const ageMs = Math.max(0, now.getTime() - latest.end);
  const active = ageMs < options.activeThreshold;
  const status: RecorderStatus = active ? "active" : "stale";

  const timed = segments.map((segment): TimedSegment => {

    const duration = segmentDuration(segment, active && (segment === latest), segmentSeconds);

    return { duration, endMs: segment.end, segment, startMs: segment.end - (duration * 1000) };
  });

  const dayStart = startOfDay(now).getTime();
  const timeline = timed.map((entry): TimelineEntry => ({

    offset_percent: roundTo(Math.max(0, (entry.startMs - dayStart) / 1000 / SECONDS_PER_DAY * 100), 2),
    width_percent: roundTo(entry.duration / SECONDS_PER_DAY * 100, 2)
  }));

  const totalBytes = segments.reduce((sum, segment) => sum + segment.size, 0);
  const totalSeconds = timed.reduce((sum, entry) => sum + entry.duration, 0);
  const avgSizeMb = toMegabytes(totalBytes / segments.length, 2);
  const recentFiles = byRecency.slice(0, options.recentFileCount).map((segment): RecentFile => ({

    modified: formatClockTime(segment.end),
    name: segment.name,
    size_mb: toMegabytes(segment.size, 2)
  }));

  let elapsedSeconds = 0;
  const latestStart: Nullable<Date> = latest.start;

  if(active && latestStart) {

    elapsedSeconds = Math.max(0, Math.floor((now.getTime() - latestStart.getTime()) / 1000));
  }

  const ageSeconds = Math.floor(ageMs / 1000);

  return {

    ...report,
    avg_size_mb: avgSizeMb,
    current_file: latest.name,
    current_size: formatMegabytes(latest.size),
    elapsed_seconds: elapsedSeconds,
    est_bitrate_mbps: estimateBitrateMbps(avgSizeMb, segmentSeconds),
    gaps: findGaps(timed, segmentSeconds),
    last_write_age_seconds: ageSeconds,
    recent_files: recentFiles,
    recorder_status: status,
    status_msg: active ? "Recording (Active)" : "Last write: " + String(ageSeconds) + "s ago",
    timeline,
    total_hours: roundTo(totalSeconds / 3600, 2),
    total_size_mb: toMegabytes(totalBytes, 2)
  };
}
