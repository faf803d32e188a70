/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * live.ts: Live preview routes for camloop.
 */
import type { Express, Request, Response } from "express";
import type { LiveFrame } from "../streaming/liveFrame.js";
import type { RouteContext } from "./index.js";

/* This module registers the live preview endpoints:
 *
 * - GET /video_feed - A multipart/x-mixed-replace MJPEG stream that browsers render directly in an <img> tag.
 * - GET /snapshot.jpg - The newest preview frame as a single image.
 *
 * Both read the frame cell and nothing else. Each feed client polls the cell at the preview frame rate and only writes a part when a new frame has arrived, so a
 * stalled preview simply stops updating the picture. A client that reads slower than the feed is written skips frames until its socket drains, which keeps the
 * response buffer at roughly one frame per client.
 */

const BOUNDARY = "frame";

/**
 * The parts of a response the feed writer uses.
 */
export interface FeedSink {

  once(event: "drain", listener: () => void): unknown;
  write(chunk: Buffer | string): boolean;
  readonly writableEnded: boolean;
}

/**
 * Creates the per-client part writer for the multipart feed. Frames offered while the sink is backed up, or that were already sent, are dropped.
 * @param sink - The client response.
 * @returns A function that writes a frame as one multipart part and reports whether it did.
 */
export function createFeedWriter(sink: FeedSink): (frame: LiveFrame) => boolean {

  let draining = false;
  let lastSequence = 0;

  return (frame: LiveFrame): boolean => {

    if(draining || sink.writableEnded || (frame.sequence === lastSequence)) {

      return false;
    }

    lastSequence = frame.sequence;

    sink.write([ "--", BOUNDARY, "\r\nContent-Type: image/jpeg\r\nContent-Length: ", String(frame.data.length), "\r\n\r\n" ].join(""));
    sink.write(frame.data);

    if(!sink.write("\r\n")) {

      draining = true;

      sink.once("drain", () => {

        draining = false;
      });
    }

    return true;
  };
}

/**
 * Creates the live preview endpoints.
 * @param app - The Express application.
 * @param context - The services behind the endpoints.
 */
export function setupLiveEndpoints(app: Express, context: RouteContext): void {

  const { live } = context;

  app.get("/snapshot.jpg", (_req: Request, res: Response): void => {

    const frame = live.producer ? live.cell.get(live.freshness) : null;

    if(!frame) {

      res.setHeader("Retry-After", "2");
      res.status(503).send("No live frame available.");

      return;
    }

    res.setHeader("Cache-Control", "no-cache, no-store");
    res.type("image/jpeg").send(frame.data);
  });

  app.get("/video_feed", (_req: Request, res: Response): void => {

    if(!live.producer) {

      res.status(404).send("Live preview is disabled.");

      return;
    }

    res.writeHead(200, {

      "Cache-Control": "no-cache, no-store",
      "Connection": "close",
      "Content-Type": "multipart/x-mixed-replace; boundary=" + BOUNDARY
    });

    const writeFrame = createFeedWriter(res);

    const timer = setInterval(() => {

      const frame = live.cell.get(live.freshness);

      if(frame) {

        writeFrame(frame);
      }
    }, Math.max(10, Math.round(1000 / live.frameRate)));

    res.on("close", () => {

      clearInterval(timer);
    });
  });
}
