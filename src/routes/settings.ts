/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * settings.ts: Camera settings routes for camloop.
 */
import type { Express, Request, Response } from "express";
import { LOG, formatError } from "../utils/index.js";
import { applySettingsUpdate, loadSettings, maskSettings, saveSettings } from "../config/settings.js";
import type { RouteContext } from "./index.js";

/* Saving writes settings.env and nothing else. The supervisor notices the new modification time on its next poll and restarts capture with the new values, and the
 * other tasks read the file again on their next pass. The password is never sent back: reads return a mask, and posting the mask keeps the stored value.
 */

/**
 * Creates the camera settings endpoints.
 * @param app - The Express application.
 * @param context - The services behind the endpoints.
 */
export function setupSettingsEndpoints(app: Express, context: RouteContext): void {

  app.get("/api/settings", async (_req: Request, res: Response): Promise<void> => {

    res.json(maskSettings(await loadSettings(context.settingsFile)));
  });

  app.post("/api/settings", async (req: Request, res: Response): Promise<void> => {

    const body: unknown = req.body;
    const result = applySettingsUpdate(await loadSettings(context.settingsFile), body);

    if(result.errors.length > 0) {

      res.status(400).json({ errors: result.errors, success: false });

      return;
    }

    try {

      await saveSettings(context.settingsFile, result.settings);
    } catch(error) {

      LOG.error("Unable to save camera settings: %s.", formatError(error));

      res.status(500).json({ errors: ["Unable to save settings."], success: false });

      return;
    }

    res.json({ message: "Settings saved. Recording restarts with the new settings shortly.", settings: maskSettings(result.settings), success: true });
  });
}
