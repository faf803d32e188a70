#!/usr/bin/env node
/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Entry point for camloop.
 */
import { DEBUG_CATEGORIES, LOG, formatError, getPackageVersion, initDebugFilter, setDebugLogging } from "./utils/index.js";
import { runTimelapseCommand, startServer } from "./app.js";
import type { ParsedArgs } from "./app.js";
import { flushLogBufferSync } from "./utils/fileLogger.js";
import { initializeDataDir } from "./config/paths.js";
import path from "node:path";

/* These handlers catch unhandled promise rejections and uncaught exceptions to prevent the process from crashing. For a recorder, process stability is critical: a
 * single unhandled error should not stop the capture of the camera. The handlers log the error and allow the process to continue. A capture process that dies is
 * restarted by the supervisor.
 */

process.on("unhandledRejection", (reason: unknown): void => {

  LOG.error("Unhandled promise rejection: %s.", formatError(reason));
});

process.on("uncaughtException", (error: Error): void => {

  LOG.error("Uncaught exception: %s.", formatError(error));
});

/* The entry point supports basic command-line arguments for common operations like changing the port, showing help, and displaying the version, plus the
 * `timelapse` command that builds one day's timelapse in the foreground.
 */

/**
 * Prints usage information to the console.
 */
function printUsage(): void {

  /* eslint-disable no-console */
  console.log("Usage: camloop [command] [options]");
  console.log("");
  console.log("Commands:");
  console.log("  timelapse <YYYY-MM-DD> [--force] Build the timelapse for a past day and exit");
  console.log("");
  console.log("Options:");
  console.log("  -c, --console                   Log to console instead of file (for Docker or debugging)");
  console.log("  -d, --debug                     Enable debug logging (verbose output for troubleshooting)");
  console.log("  -h, --help                      Show this help message");
  console.log("  -p, --port <port>               Set server port (default: 8080)");
  console.log("  -v, --version                   Show version number");
  console.log("  --data-dir <path>               Set data directory (default: ~/.camloop)");
  console.log("  --list-env                      List all environment variables");
  console.log("  --log-file <path>               Set log file path (default: <data-dir>/camloop.log)");
  console.log("");
  console.log("If no command is specified, starts the recorder and its HTTP server.");
  console.log("");
  console.log("Common Environment Variables:");
  console.log("  CAMLOOP_DATA_DIR                Data directory path (default: ~/.camloop)");
  console.log("  CAMLOOP_DEBUG                   Debug category filter (e.g., 'recording:supervisor', '*,-ffmpeg')");
  console.log("  CAMLOOP_SETTINGS_FILE           Camera settings file path");
  console.log("  FFMPEG_PATH                     FFmpeg executable");
  console.log("  PORT                            HTTP server port");
  console.log("  STORAGE_ROOT                    Recording storage root");
  console.log("  STREAM_URL_TEMPLATE             Capture source URL template");
  console.log("");
  console.log("Debug Categories:");

  for(const entry of DEBUG_CATEGORIES) {

    console.log("  " + entry.category.padEnd(32) + entry.description);
  }

  console.log("");
  console.log("  Run 'camloop --list-env' for a complete list of all environment variables.");
  /* eslint-enable no-console */
}

/**
 * Prints a complete listing of all environment variables organized by category. Generates output dynamically from CONFIG_METADATA so it is always accurate. Uses a
 * dynamic import to keep the configuration module out of the import graph until it is needed.
 */
async function printEnvironmentVariables(): Promise<void> {

  const { CONFIG_METADATA, DEFAULTS, getNestedValue } = await import("./config/userConfig.js");

  /* eslint-disable no-console */

  // Category ordering: server first (most commonly configured), then alphabetical.
  const categoryOrder: { displayName: string; key: string }[] = [
    { displayName: "Server", key: "server" },
    { displayName: "Live Preview", key: "live" },
    { displayName: "Logging", key: "logging" },
    { displayName: "Paths", key: "paths" },
    { displayName: "Recording", key: "recording" },
    { displayName: "Storage", key: "storage" },
    { displayName: "Thumbnails", key: "thumbnails" },
    { displayName: "Timelapse", key: "timelapse" },
    { displayName: "Timeline", key: "timeline" }
  ];

  // Dynamic default descriptions for null path settings that resolve at runtime rather than from DEFAULTS.
  const dynamicDefaults: Record<string, string> = {

    "paths.logFile": "<data-dir>/camloop.log",
    "paths.settingsFile": "<data-dir>/settings.env"
  };

  console.log("camloop Environment Variables");
  console.log("");
  console.log("All settings can also be configured via config.json in the data directory.");
  console.log("Priority: CLI flags > environment variables > config.json > defaults.");

  for(const category of categoryOrder) {

    const settings = CONFIG_METADATA[category.key] ?? [];

    if(settings.length === 0) {

      continue;
    }

    console.log("");
    console.log(category.displayName + ":");

    let first = true;

    for(const setting of settings) {

      if(!first) {

        console.log("");
      }

      first = false;

      console.log("  " + setting.envVar);

      // Truncate description to first sentence for brevity.
      const desc = setting.description;
      const periodSpace = desc.indexOf(". ");
      const firstSentence = (periodSpace !== -1) ? desc.slice(0, periodSpace + 1) : desc;

      console.log("    " + firstSentence);

      // Format default value with appropriate context for the setting type.
      const dynamicDefault = dynamicDefaults[setting.path];
      let defaultStr: string;

      if(dynamicDefault) {

        defaultStr = dynamicDefault;
      } else {

        const defaultValue = getNestedValue(DEFAULTS, setting.path);

        defaultStr = String(defaultValue);

        if((typeof defaultValue === "number") && setting.unit) {

          defaultStr = defaultStr + " (" + setting.unit + ")";
        }
      }

      console.log("    Default: " + defaultStr);
    }
  }

  // Special environment variables that are not part of CONFIG_METADATA. CAMLOOP_DATA_DIR is resolved before config.json is loaded, so it cannot be in config.json.
  // CAMLOOP_DEBUG is a runtime-only setting parsed in the entry point.
  console.log("");
  console.log("Special:");
  console.log("  CAMLOOP_DATA_DIR");
  console.log("    Data directory path. Must be an absolute path.");
  console.log("    Default: ~/.camloop");
  console.log("");
  console.log("  CAMLOOP_DEBUG");
  console.log("    Debug category filter (e.g., 'recording:supervisor', '*,-ffmpeg').");
  console.log("    Default: (disabled)");

  /* eslint-enable no-console */
}

/**
 * Validates that a path argument is absolute. Prints an error and exits if relative.
 * @param flag - The CLI flag name for the error message.
 * @param value - The path value to validate.
 * @returns The validated path.
 */
function requireAbsolutePath(flag: string, value: string | undefined): string {

  if(!value) {

    // eslint-disable-next-line no-console
    console.error("Error: " + flag + " requires a path argument.");

    process.exit(1);
  }

  if(!path.isAbsolute(value)) {

    // eslint-disable-next-line no-console
    console.error("Error: " + flag + " requires an absolute path, got: " + value);

    process.exit(1);
  }

  return value;
}

/**
 * Parses command-line arguments into a structured result. Values are stored in ParsedArgs rather than written directly to CONFIG, so that the configuration merge
 * system can apply CLI overrides at the correct priority level (CLI > env > config.json > defaults). Arguments that are not options are returned as positionals.
 * @param args - The arguments to parse.
 * @returns Parsed argument flags and values.
 */
function parseArgs(args: string[]): { force: boolean; parsed: ParsedArgs; positionals: string[] } {

  let consoleLogging = false;
  let dataDir: string | undefined;
  let debugLogging = false;
  let force = false;
  let logFile: string | undefined;
  let port: number | undefined;
  const positionals: string[] = [];

  for(let i = 0; i < args.length; i++) {

    const arg = args[i];

    switch(arg) {

      case "-c":
      case "--console":

        consoleLogging = true;

        break;

      case "-d":
      case "--debug":

        debugLogging = true;

        break;

      case "-h":
      case "--help":

        printUsage();

        process.exit(0);

      case "-p":
      case "--port": {

        const parsed = parseInt(args[++i] ?? "", 10);

        if(!isNaN(parsed)) {

          port = parsed;
        }

        break;
      }

      case "--data-dir":

        dataDir = requireAbsolutePath("--data-dir", args[++i]);

        break;

      case "--force":

        force = true;

        break;

      case "--log-file":

        logFile = requireAbsolutePath("--log-file", args[++i]);

        break;

      case "-v":
      case "--version":

        // eslint-disable-next-line no-console
        console.log("camloop v" + getPackageVersion());

        process.exit(0);

      default:

        positionals.push(arg);

        break;
    }
  }

  return { force, parsed: { consoleLogging, dataDir, debugLogging, logFile, port }, positionals };
}

const rawArgs = process.argv.slice(2);

if(rawArgs.includes("--list-env")) {

  // Handle --list-env at the top level to avoid starting the server.
  printEnvironmentVariables().then(() => {

    process.exit(0);
  }).catch((error: unknown) => {

    // eslint-disable-next-line no-console
    console.error("Error: " + formatError(error));

    process.exit(1);
  });
} else {

  const { force, parsed: parsedArgs, positionals } = parseArgs(rawArgs);
  const [ command, commandArg ] = positionals;

  if((command !== undefined) && (command !== "timelapse")) {

    // eslint-disable-next-line no-console
    console.error("Error: unknown command: " + command + ". Run 'camloop --help' for usage.");

    process.exit(1);
  }

  if((command === "timelapse") && !commandArg) {

    // eslint-disable-next-line no-console
    console.error("Error: timelapse requires a date (YYYY-MM-DD).");

    process.exit(1);
  }

  try {

    initializeDataDir(parsedArgs.dataDir);
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Error: " + formatError(error));

    process.exit(1);
  }

  // Enable debug logging before starting so debug messages during startup are captured. The CAMLOOP_DEBUG environment variable takes precedence over the --debug CLI
  // flag, allowing fine-grained category selection.
  const debugEnv = process.env.CAMLOOP_DEBUG;

  if(debugEnv) {

    initDebugFilter(debugEnv);
  } else if(parsedArgs.debugLogging) {

    setDebugLogging(true);
  }

  /* When the process exits, whether via process.exit(1) from a fatal startup error or any other termination, buffered log entries are flushed to disk. The 'exit'
   * event runs synchronously, so only synchronous operations are safe here. The graceful shutdown path handles this through shutdownFileLogger().
   */
  process.on("exit", (): void => {

    flushLogBufferSync();
  });

  if((command === "timelapse") && commandArg) {

    runTimelapseCommand(parsedArgs, commandArg, force).then((exitCode) => {

      process.exit(exitCode);
    }).catch((error: unknown) => {

      LOG.error("Timelapse command failed: %s.", formatError(error));

      process.exit(1);
    });
  } else {

    startServer(parsedArgs).catch((error: unknown): void => {

      LOG.error("Fatal startup error occurred: %s.", formatError(error));

      process.exit(1);
    });
  }
}
