/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Route aggregator for camloop.
 */
import type { FrameCell, LiveFrameProducer } from "../streaming/liveFrame.js";
import type { Express } from "express";
import type { Nullable } from "../types/index.js";
import type { RecordingSupervisor } from "../recording/supervisor.js";
import type { ThumbnailWatcher } from "../recording/thumbnails.js";
import type { TimelapseOptions, TimelapseScheduler } from "../recording/timelapse.js";
import type { TimelineOptions } from "../recording/timeline.js";
import { setupHealthEndpoint } from "./health.js";
import { setupLiveEndpoints } from "./live.js";
import { setupRecordingEndpoints } from "./recordings.js";
import { setupSettingsEndpoints } from "./settings.js";
import { setupStatsEndpoint } from "./stats.js";
import { setupTimelapseEndpoints } from "./timelapse.js";

/*
 * ROUTE SETUP
 *
 * This module aggregates all route setup functions and provides a single function to configure all HTTP endpoints on the Express application. Routes reach the running
 * services only through the context passed in here, so that they can be mounted against stand-ins.
 */

/**
 * The services and settings the HTTP endpoints read from.
 */
export interface RouteContext {

  live: {

    cell: FrameCell;

    // Target frame rate of the multipart feed.
    frameRate: number;

    // Frames older than this many milliseconds are not served.
    freshness: number;

    // Null when the preview is disabled.
    producer: Nullable<Pick<LiveFrameProducer, "getStatus">>;
  };

  // Null when the daily schedule is disabled.
  scheduler: Nullable<Pick<TimelapseScheduler, "getNextRunAt">>;

  // Absolute path to settings.env.
  settingsFile: string;
  supervisor: Pick<RecordingSupervisor, "getStatus">;
  timelapse: TimelapseOptions;
  timeline: TimelineOptions;

  // Null when thumbnail generation is disabled.
  watcher: Nullable<Pick<ThumbnailWatcher, "getStatus">>;
}

/**
 * Configures all HTTP endpoints on the Express application.
 * @param app - The Express application.
 * @param context - The services behind the endpoints.
 */
export function setupRoutes(app: Express, context: RouteContext): void {

  setupHealthEndpoint(app, context);
  setupLiveEndpoints(app, context);
  setupRecordingEndpoints(app, context);
  setupSettingsEndpoints(app, context);
  setupStatsEndpoint(app, context);
  setupTimelapseEndpoints(app, context);
}
