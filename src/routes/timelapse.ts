/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * timelapse.ts: Timelapse trigger and listing routes for camloop.
 */
import type { Express, Request, Response } from "express";
import { LOG, formatError } from "../utils/index.js";
import { dispatchTimelapse, listTimelapses } from "../recording/timelapse.js";
import type { RouteContext } from "./index.js";
import { isRecord } from "../config/userConfig.js";
import { loadSettings } from "../config/settings.js";

/* This module registers the timelapse endpoints:
 *
 * - POST /api/timelapse - Starts a job for a past day. The body is { date: "YYYY-MM-DD", force?: boolean }. The job runs in the background, so a success response
 *   only means that it started; its outcome is logged.
 * - GET /api/timelapses - Lists the existing timelapse files, newest first.
 */

/**
 * Reads the force flag from a JSON or form body.
 * @param value - The raw value.
 * @returns True for true, "true", "1" and "on".
 */
function parseForce(value: unknown): boolean {

  return (value === true) || ((typeof value === "string") && [ "1", "on", "true" ].includes(value.toLowerCase()));
}

/**
 * Creates the timelapse endpoints.
 * @param app - The Express application.
 * @param context - The services behind the endpoints.
 */
export function setupTimelapseEndpoints(app: Express, context: RouteContext): void {

  app.post("/api/timelapse", (req: Request, res: Response): void => {

    const body: unknown = req.body;
    const date = isRecord(body) ? body.date : undefined;

    if(typeof date !== "string") {

      res.status(400).json({ message: "A date is required.", success: false });

      return;
    }

    const dispatch = dispatchTimelapse(date, isRecord(body) && parseForce(body.force), context.timelapse);

    if(!dispatch.accepted) {

      res.status(400).json({ message: dispatch.message, success: false });

      return;
    }

    LOG.info("Timelapse requested for %s.", dispatch.date);

    res.json({ message: "Timelapse generation started for " + dispatch.date + ". Check back in a few minutes.", success: true });
  });

  app.get("/api/timelapses", async (_req: Request, res: Response): Promise<void> => {

    try {

      const settings = await loadSettings(context.settingsFile);

      res.json(await listTimelapses(context.timelapse.root, settings.subfolder, settings.timelapseOutputDir));
    } catch(error) {

      LOG.error("Unable to list timelapses: %s.", formatError(error));

      res.status(500).json({ error: "Unable to list timelapses." });
    }
  });
}
