/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * recordings.ts: Recording library and file routes for camloop.
 */
import type { Express, Request, Response } from "express";
import { LOG, formatClockTime, formatError, toMegabytes } from "../utils/index.js";
import { SEGMENT_EXTENSION, THUMBNAIL_SUFFIX, dateKey, dayDirectory, listSegments, parseDateKey, thumbnailPath } from "../recording/segments.js";
import type { Nullable } from "../types/index.js";
import type { RouteContext } from "./index.js";
import fs from "node:fs";
import { loadSettings } from "../config/settings.js";
import path from "node:path";

const { promises: fsPromises } = fs;

/* This module registers the recording library endpoints:
 *
 * - GET /api/recordings?date=YYYY-MM-DD - Lists one day's segments, oldest first, with links to each file and its thumbnail. The date defaults to today.
 * - GET /play_file/<path> - Serves a segment file from the storage root.
 * - GET /thumb/<path> - Serves a thumbnail from the storage root.
 *
 * File paths are relative to the storage root. A path with an empty, "." or ".." component is refused before it reaches the filesystem, and Express serves the file
 * with the storage root as its root, so nothing outside of it can be read.
 */

/**
 * One entry of the recording library.
 */
interface RecordingEntry {

  name: string;
  size_mb: number;

  // Wall clock start time decoded from the name, e.g. "1:18:00 PM".
  start: Nullable<string>;

  // Null until the thumbnail watcher has written one.
  thumbnail: Nullable<string>;
  url: string;
}

/**
 * Converts an absolute path under the storage root into a URL path.
 * @param root - The storage root.
 * @param filePath - The file.
 * @returns The relative path with each component URL encoded.
 */
function toUrlPath(root: string, filePath: string): string {

  return path.relative(root, filePath).split(path.sep).map((part) => encodeURIComponent(part)).join("/");
}

/**
 * Reads the file path captured by a wildcard route and checks that it stays inside the storage root.
 * @param value - The wildcard parameter: its path components, or the raw path.
 * @returns The relative path, or null when a component would escape the root.
 */
function parseStoragePath(value: unknown): Nullable<string> {

  const components: unknown[] = Array.isArray(value) ? value : ((typeof value === "string") ? [value] : []);
  const parts: string[] = [];

  for(const component of components) {

    if(typeof component !== "string") {

      return null;
    }

    // A decoded component may itself contain separators.
    parts.push(...component.split(/[\\/]/));
  }

  if((parts.length === 0) || parts.some((part) => [ "", ".", ".." ].includes(part) || part.includes("\0"))) {

    return null;
  }

  return parts.join("/");
}

/**
 * Sends one file from the storage root.
 * @param res - The response.
 * @param root - The storage root.
 * @param value - The wildcard parameter.
 * @param suffix - The file ending this route serves.
 * @param label - What the file is, for the not found message.
 */
function sendStorageFile(res: Response, root: string, value: unknown, suffix: string, label: string): void {

  const relative = parseStoragePath(value);

  if(!relative) {

    res.status(403).send("Access denied.");

    return;
  }

  if(!relative.endsWith(suffix)) {

    res.status(404).send(label + " not found.");

    return;
  }

  res.sendFile(relative, { dotfiles: "deny", root }, (error?: Error) => {

    if(!error) {

      return;
    }

    LOG.debug("library", "Unable to send %s: %s.", relative, formatError(error));

    if(!res.headersSent) {

      res.status(404).send(label + " not found.");
    }
  });
}

/**
 * Checks whether a file exists.
 * @param filePath - The file.
 * @returns True if it exists.
 */
async function fileExists(filePath: string): Promise<boolean> {

  try {

    await fsPromises.access(filePath);

    return true;
  } catch {

    return false;
  }
}

/**
 * Creates the recording library endpoints.
 * @param app - The Express application.
 * @param context - The services behind the endpoints.
 */
export function setupRecordingEndpoints(app: Express, context: RouteContext): void {

  const root = context.timeline.root;
  const now = context.timeline.now ?? ((): Date => new Date());

  app.get("/api/recordings", async (req: Request, res: Response): Promise<void> => {

    const requested = (typeof req.query.date === "string") ? req.query.date : dateKey(now());
    const day = parseDateKey(requested);

    if(!day) {

      res.status(400).json({ error: "Invalid date parameter. Use YYYY-MM-DD." });

      return;
    }

    try {

      const settings = await loadSettings(context.settingsFile);
      const segments = await listSegments(dayDirectory(root, settings.subfolder, day), day);

      const entries = await Promise.all(segments.map(async (segment): Promise<RecordingEntry> => {

        const thumb = thumbnailPath(segment.path);

        return {

          name: segment.name,
          size_mb: toMegabytes(segment.size),
          start: segment.start ? formatClockTime(segment.start) : null,
          thumbnail: (await fileExists(thumb)) ? "/thumb/" + toUrlPath(root, thumb) : null,
          url: "/play_file/" + toUrlPath(root, segment.path)
        };
      }));

      res.json(entries);
    } catch(error) {

      LOG.error("Unable to list recordings for %s: %s.", requested, formatError(error));

      res.status(500).json({ error: "Unable to list recordings." });
    }
  });

  app.get("/play_file/*file", (req: Request, res: Response): void => {

    sendStorageFile(res, root, req.params.file, SEGMENT_EXTENSION, "Recording");
  });

  app.get("/thumb/*file", (req: Request, res: Response): void => {

    sendStorageFile(res, root, req.params.file, THUMBNAIL_SUFFIX, "Thumbnail");
  });
}
