/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * app.ts: Express application builder and service startup for camloop.
 */
import { CONFIG, displayConfiguration, initializeConfiguration, validateConfiguration } from "./config/index.js";
import type { Express, NextFunction, Request, Response } from "express";
import { FrameCell, LiveFrameProducer } from "./streaming/liveFrame.js";
import { LOG, StorageUnavailableError, createFFmpegRunner, createMorganStream, formatError, resolveFFmpegPath, setConsoleLogging } from "./utils/index.js";
import { TimelapseScheduler, dispatchTimelapse } from "./recording/timelapse.js";
import { getDataDir, getLogFilePath, getSettingsFilePath } from "./config/paths.js";
import { initializeFileLogger, shutdownFileLogger } from "./utils/fileLogger.js";
import type { Nullable } from "./types/index.js";
import { RecordingSupervisor } from "./recording/supervisor.js";
import type { RouteContext } from "./routes/index.js";
import type { Server } from "node:http";
import { ThumbnailWatcher } from "./recording/thumbnails.js";
import type { TimelapseOptions } from "./recording/timelapse.js";
import consoleStamp from "console-stamp";
import express from "express";
import fs from "node:fs";
import morgan from "morgan";
import { setupRoutes } from "./routes/index.js";

const { promises: fsPromises } = fs;

/*
 * LOGGING MODE
 *
 * The logging mode is set at startup based on the --console CLI flag. When console logging is enabled, timestamps are added via console-stamp and output goes to
 * stdout/stderr. When file logging is used (the default), output goes to <data-dir>/camloop.log.
 */

// Track whether console logging is enabled, set during startup.
let usingConsoleLogging = false;

/**
 * Result of parsing command-line arguments. CLI flags have the highest priority in the configuration merge order.
 */
export interface ParsedArgs {

  consoleLogging: boolean;
  dataDir?: string;
  debugLogging: boolean;
  logFile?: string;
  port?: number;
}

/*
 * APPLICATION STATE
 *
 * The HTTP server and the background services are stored globally so they can be stopped during graceful shutdown.
 */

/**
 * The long-running tasks of the daemon. Optional tasks are null when disabled in the configuration.
 */
interface Services {

  cell: FrameCell;
  producer: Nullable<LiveFrameProducer>;
  scheduler: Nullable<TimelapseScheduler>;
  supervisor: RecordingSupervisor;
  timelapse: TimelapseOptions;
  watcher: Nullable<ThumbnailWatcher>;
}

let server: Nullable<Server> = null;
let services: Nullable<Services> = null;

/**
 * Stops every background task. Each task ends its own FFmpeg process before its promise settles.
 */
async function stopServices(): Promise<void> {

  if(!services) {

    return;
  }

  const { producer, scheduler, supervisor, watcher } = services;

  scheduler?.stop();

  const results = await Promise.allSettled([ supervisor.stop(), watcher?.stop(), producer?.stop() ]);

  for(const result of results) {

    if(result.status === "rejected") {

      LOG.error("Error stopping a background task during shutdown: %s.", formatError(result.reason));
    }
  }

  services = null;
}

/*
 * GRACEFUL SHUTDOWN
 *
 * When the process receives a termination signal, we stop the capture process, the preview process and any pending work before exiting, so that the segment being
 * written is finalized by FFmpeg rather than truncated.
 */

/**
 * Sets up signal handlers for graceful shutdown. When SIGINT or SIGTERM is received, we stop every task and close the HTTP server before exiting.
 */
function setupGracefulShutdown(): void {

  let shutdownInProgress = false;

  async function shutdown(): Promise<void> {

    // Prevent multiple shutdown attempts if multiple signals are received.
    if(shutdownInProgress) {

      return;
    }

    shutdownInProgress = true;

    LOG.info("Shutting down.");

    await stopServices();

    // Close the HTTP server.
    try {

      if(server) {

        server.close((): void => {

          LOG.info("HTTP server closed successfully.");
        });
      }
    } catch(error) {

      LOG.error("Error closing server during shutdown: %s.", formatError(error));
    }

    // Shut down file logger if in use.
    if(!usingConsoleLogging) {

      shutdownFileLogger();
    }

    process.exit(0);
  }

  process.on("SIGINT", (): void => {

    void shutdown();
  });

  process.on("SIGTERM", (): void => {

    void shutdown();
  });
}

/*
 * APPLICATION BUILDER
 *
 * The buildApp function creates and configures the Express application with all middleware and routes. This is separated from the server startup so that the
 * application can be mounted against stand-in services.
 */

/**
 * Creates and configures the Express application with all middleware and routes.
 * @param context - The services behind the endpoints.
 * @param httpLogLevel - HTTP request logging level: "none", "errors", or "all".
 * @returns The configured Express application.
 */
export function buildApp(context: RouteContext, httpLogLevel = CONFIG.logging.httpLogLevel): Express {

  const app = express();

  // Add body parsing middleware for the settings form and the JSON API.
  app.use(express.urlencoded({ extended: true }));
  app.use(express.json());

  // Configure Morgan for HTTP request logging based on httpLogLevel configuration. Morgan output goes through morganStream so that request lines follow the same path
  // as application logs.
  if(httpLogLevel !== "none") {

    const morganFormat = ":method :url from :remote-addr responded :status in :response-time ms.";
    const morganStream = createMorganStream();

    // Patterns for browser-initiated asset requests that return 404. These are noise from browsers automatically requesting files that don't exist.
    const browserAssetPatterns = [ "/apple-touch-icon", "/favicon", "/robots.txt", "/site.webmanifest" ];

    if(httpLogLevel === "errors") {

      // Log requests with 4xx or 5xx status codes, but skip 404s for common browser asset requests.
      app.use(morgan(morganFormat, {

        skip: (req, res): boolean => {

          // Log all non-error responses.
          if(res.statusCode < 400) {

            return true;
          }

          // Skip 404s for browser asset requests (favicon, apple-touch-icon, etc.).
          if(res.statusCode === 404) {

            const url = req.originalUrl || req.url;

            if(browserAssetPatterns.some((pattern) => url.startsWith(pattern))) {

              return true;
            }
          }

          // Skip 503s with Retry-After header. These indicate expected temporary unavailability (no preview frame yet) rather than a real error.
          if((res.statusCode === 503) && res.getHeader("Retry-After")) {

            return true;
          }

          return false;
        },

        stream: morganStream
      }));
    } else {

      // Log all requests.
      app.use(morgan(morganFormat, { stream: morganStream }));
    }
  }

  // Set up all HTTP endpoints.
  setupRoutes(app, context);

  // Global error handler. Express error handlers require 4 parameters even if unused.
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction): void => {

    LOG.error("Unhandled error in request: %s.", formatError(err));

    if(!res.headersSent) {

      res.status(500).send("Internal server error");
    }
  });

  return app;
}

/*
 * SERVICE CONSTRUCTION
 *
 * Every task reads its parameters from CONFIG and the camera settings from settings.env. Only the supervisor is mandatory: the thumbnail watcher, the timelapse
 * schedule and the live preview can each be disabled.
 */

/**
 * Builds the timelapse job options from the active configuration.
 * @param ffmpegPath - The resolved FFmpeg executable.
 * @returns The options shared by scheduled, manual and command-line jobs.
 */
export function createTimelapseOptions(ffmpegPath: string): TimelapseOptions {

  return {

    crf: CONFIG.timelapse.crf,
    frameRate: CONFIG.timelapse.frameRate,
    preset: CONFIG.timelapse.preset,
    root: CONFIG.storage.root,
    runner: createFFmpegRunner(ffmpegPath, "timelapse"),
    settingsFile: getSettingsFilePath(CONFIG),
    speedFactor: CONFIG.timelapse.speedFactor,
    storageWaitAttempts: CONFIG.storage.waitAttempts,
    storageWaitInterval: CONFIG.storage.waitInterval
  };
}

/**
 * Creates the background tasks without starting them.
 * @param ffmpegPath - The resolved FFmpeg executable.
 * @returns The task set.
 */
function createServices(ffmpegPath: string): Services {

  const settingsFile = getSettingsFilePath(CONFIG);
  const cell = new FrameCell();
  const timelapse = createTimelapseOptions(ffmpegPath);

  const supervisor = new RecordingSupervisor({

    ffmpegPath,
    monitorInterval: CONFIG.recording.monitorInterval,
    restartDelay: CONFIG.recording.restartDelay,
    root: CONFIG.storage.root,
    rtspTransport: CONFIG.recording.rtspTransport,
    settingsFile,
    stopGracePeriod: CONFIG.recording.stopGracePeriod,
    storageWaitAttempts: CONFIG.storage.waitAttempts,
    storageWaitInterval: CONFIG.storage.waitInterval,
    streamUrlTemplate: CONFIG.recording.streamUrlTemplate
  });

  const watcher = CONFIG.thumbnails.enabled ? new ThumbnailWatcher({

    root: CONFIG.storage.root,
    runner: createFFmpegRunner(ffmpegPath, "thumbnail"),
    scanInterval: CONFIG.thumbnails.scanInterval,
    seekSeconds: CONFIG.thumbnails.seekSeconds,
    settingsFile,
    stabilityWindow: CONFIG.thumbnails.stabilityWindow,
    width: CONFIG.thumbnails.width
  }) : null;

  const scheduler = CONFIG.timelapse.scheduleEnabled ? new TimelapseScheduler(timelapse, CONFIG.timelapse.runHour, CONFIG.timelapse.runMinute) : null;

  const producer = CONFIG.live.enabled ? new LiveFrameProducer({

    cell,
    ffmpegPath,
    frameRate: CONFIG.live.frameRate,
    quality: CONFIG.live.quality,
    reconnectDelay: CONFIG.live.reconnectDelay,
    rtspTransport: CONFIG.recording.rtspTransport,
    settingsFile,
    stopGracePeriod: CONFIG.recording.stopGracePeriod,
    streamUrlTemplate: CONFIG.recording.streamUrlTemplate,
    width: CONFIG.live.width
  }) : null;

  return { cell, producer, scheduler, supervisor, timelapse, watcher };
}

/**
 * Builds the route context for a running task set.
 * @param running - The task set.
 * @returns The context handed to the routes.
 */
function createRouteContext(running: Services): RouteContext {

  return {

    live: { cell: running.cell, frameRate: CONFIG.live.frameRate, freshness: CONFIG.live.freshness, producer: running.producer },
    scheduler: running.scheduler,
    settingsFile: running.timelapse.settingsFile,
    supervisor: running.supervisor,
    timelapse: running.timelapse,
    timeline: {

      activeThreshold: CONFIG.timeline.activeThreshold,
      recentFileCount: CONFIG.timeline.recentFileCount,
      root: CONFIG.storage.root,
      settingsFile: running.timelapse.settingsFile
    },
    watcher: running.watcher
  };
}

/*
 * STARTUP
 *
 * Both the server and the one-shot timelapse command share the same preparation: logging mode, configuration, the data directory, the file logger and the FFmpeg
 * check. Any failure here ends the process with a non-zero code.
 */

/**
 * Prepares logging and configuration. Exits the process when the configuration is invalid or FFmpeg cannot be found.
 * @param parsedArgs - Parsed command-line arguments.
 * @returns The resolved FFmpeg executable.
 */
async function prepare(parsedArgs: ParsedArgs): Promise<string> {

  // Set logging mode early before any log calls.
  usingConsoleLogging = parsedArgs.consoleLogging;
  setConsoleLogging(parsedArgs.consoleLogging);

  // Apply console-stamp for timestamps only when using console logging.
  if(parsedArgs.consoleLogging) {

    consoleStamp.default(console, { format: ":date(yyyy/mm/dd HH:MM:ss.l)" });
  }

  // Initialize configuration from file and environment variables, apply CLI overrides, then validate.
  try {

    await initializeConfiguration();

    if(parsedArgs.port !== undefined) {

      CONFIG.server.port = parsedArgs.port;
    }

    if(parsedArgs.logFile) {

      CONFIG.paths.logFile = parsedArgs.logFile;
    }

    validateConfiguration();
  } catch(error) {

    LOG.error(formatError(error));

    process.exit(1);
  }

  // Ensure the data directory exists before the file logger or the settings file are touched.
  await fsPromises.mkdir(getDataDir(), { recursive: true });

  // Initialize file logger if not using console logging.
  if(!parsedArgs.consoleLogging) {

    await initializeFileLogger(getLogFilePath(CONFIG), CONFIG.logging.maxSize);
  }

  // This must be after file logger initialization so the log message is captured.
  const ffmpegPath = await resolveFFmpegPath(CONFIG.recording.ffmpegPath);

  if(!ffmpegPath) {

    LOG.error("FFmpeg is not available. Install FFmpeg or point FFMPEG_PATH at a working executable.");

    process.exit(1);
  }

  LOG.info("Using FFmpeg at: %s", ffmpegPath);

  return ffmpegPath;
}

/**
 * Initializes and starts the daemon: the recording supervisor, the optional background tasks and the HTTP server. When the storage root never becomes writable the
 * process exits with a non-zero code.
 * @param parsedArgs - Parsed command-line arguments.
 */
export async function startServer(parsedArgs: ParsedArgs): Promise<void> {

  const ffmpegPath = await prepare(parsedArgs);

  displayConfiguration();
  setupGracefulShutdown();

  const running = createServices(ffmpegPath);

  services = running;

  // The HTTP server comes up before the storage wait, so that /health can report the wait in progress.
  try {

    const app = buildApp(createRouteContext(running));

    server = app.listen(CONFIG.server.port, CONFIG.server.host, (): void => {

      LOG.info("camloop is now listening on %s:%s.", CONFIG.server.host, CONFIG.server.port);
    });
  } catch(error) {

    LOG.error("Failed to build application: %s.", formatError(error));

    throw error;
  }

  try {

    await running.supervisor.start();
  } catch(error) {

    if(error instanceof StorageUnavailableError) {

      LOG.error("Recording cannot start without storage. Exiting.");

      await stopServices();

      process.exit(1);
    }

    throw error;
  }

  running.watcher?.start();
  running.scheduler?.start();
  running.producer?.start();
}

/**
 * Runs a single timelapse job in the foreground, for the `timelapse` command.
 * @param parsedArgs - Parsed command-line arguments.
 * @param date - The day as YYYY-MM-DD.
 * @param force - Rebuild even when the artifact already exists.
 * @returns The process exit code.
 */
export async function runTimelapseCommand(parsedArgs: ParsedArgs, date: string, force: boolean): Promise<number> {

  const ffmpegPath = await prepare(parsedArgs);
  const dispatch = dispatchTimelapse(date, force, createTimelapseOptions(ffmpegPath));

  if(!dispatch.accepted) {

    LOG.error("%s", dispatch.message);

    return 1;
  }

  const result = await dispatch.completion;

  if(!usingConsoleLogging) {

    shutdownFileLogger();
  }

  return result.success ? 0 : 1;
}
