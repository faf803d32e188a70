/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * health.ts: Health check route for camloop.
 */
import type { Express, Request, Response } from "express";
import type { Nullable } from "../types/index.js";
import type { RouteContext } from "./index.js";
import type { SupervisorStatus } from "../recording/supervisor.js";
import type { ThumbnailWatcherStatus } from "../recording/thumbnails.js";
import { getPackageVersion } from "../utils/index.js";
import { isStorageAvailable } from "../recording/storage.js";

/* The health endpoint reports the state of every long-running task. It returns HTTP 503 when the supervisor has given up, which only happens when the storage root
 * never became writable, so that monitoring systems can detect it via status code. A stale live preview or a stopped thumbnail watcher degrades the report without
 * failing it, because recording continues regardless.
 */

/**
 * The health report.
 */
export interface HealthStatus {

  live: {

    connected: boolean;
    enabled: boolean;

    // Age of the newest preview frame in milliseconds, or null when there is none.
    frameAgeMs: Nullable<number>;
  };
  message?: string;
  status: "degraded" | "healthy" | "unhealthy";
  storageAvailable: boolean;
  supervisor: SupervisorStatus;
  thumbnails: Nullable<ThumbnailWatcherStatus>;
  timelapse: { nextRunAt: Nullable<number> };
  timestamp: string;
  uptime: number;
  version: string;
}

/**
 * Creates a health check endpoint for monitoring application status.
 * @param app - The Express application.
 * @param context - The services behind the endpoints.
 */
export function setupHealthEndpoint(app: Express, context: RouteContext): void {

  app.get("/health", async (_req: Request, res: Response): Promise<void> => {

    const supervisor = context.supervisor.getStatus();
    const storageAvailable = await isStorageAvailable(context.timeline.root);
    const frame = context.live.cell.get(Number.POSITIVE_INFINITY);
    const liveStatus = context.live.producer?.getStatus();

    let status: HealthStatus["status"] = "healthy";
    let message: string | undefined;

    if(supervisor.state === "fatal") {

      status = "unhealthy";
      message = "Recording stopped: storage is unavailable.";
    } else if(!storageAvailable) {

      status = "degraded";
      message = "Storage is not writable.";
    } else if(supervisor.state !== "running") {

      status = "degraded";
      message = "Capture is not running.";
    }

    const health: HealthStatus = {

      live: {

        connected: liveStatus?.connected ?? false,
        enabled: context.live.producer !== null,
        frameAgeMs: frame ? Date.now() - frame.capturedAt : null
      },
      status,
      storageAvailable,
      supervisor,
      thumbnails: context.watcher?.getStatus() ?? null,
      timelapse: { nextRunAt: context.scheduler?.getNextRunAt() ?? null },
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version: getPackageVersion()
    };

    if(message) {

      health.message = message;
    }

    res.status((status === "unhealthy") ? 503 : 200).json(health);
  });
}
