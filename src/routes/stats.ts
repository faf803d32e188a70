/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * stats.ts: Recording status route for camloop.
 */
import type { Express, Request, Response } from "express";
import { LOG, formatError, getRecentLogLines } from "../utils/index.js";
import type { RouteContext } from "./index.js";
import type { TimelineReport } from "../types/index.js";
import { analyzeTimeline } from "../recording/timeline.js";
import { isStorageAvailable } from "../recording/storage.js";

/* The dashboard polls this endpoint every few seconds. The timeline fields are the analyzer's report unchanged. Storage availability and the recent log tail are added
 * alongside.
 */

/**
 * The stats response.
 */
export interface StatsResponse extends TimelineReport {

  logs: string[];
  storage_available: boolean;
}

/**
 * Creates the recording status endpoint.
 * @param app - The Express application.
 * @param context - The services behind the endpoints.
 */
export function setupStatsEndpoint(app: Express, context: RouteContext): void {

  app.get("/api/stats", async (_req: Request, res: Response): Promise<void> => {

    try {

      const [ report, storageAvailable ] = await Promise.all([ analyzeTimeline(context.timeline), isStorageAvailable(context.timeline.root) ]);
      const stats: StatsResponse = { ...report, logs: getRecentLogLines(), storage_available: storageAvailable };

      res.json(stats);
    } catch(error) {

      LOG.error("Unable to analyze today's recordings: %s.", formatError(error));

      res.status(500).json({ error: "Unable to analyze today's recordings." });
    }
  });
}
