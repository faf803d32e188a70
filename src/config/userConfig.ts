/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * userConfig.ts: User configuration file management for camloop.
 */
import type { Config, Nullable } from "../types/index.js";
import { LOG, formatError, isErrnoException } from "../utils/index.js";
import fs from "node:fs";

const { promises: fsPromises } = fs;

/*
 * USER CONFIGURATION FILE
 *
 * camloop stores its tuning parameters in config.json inside the data directory. The configuration system uses a layered approach:
 *
 * 1. Hard-coded defaults (defined in DEFAULTS)
 * 2. User config file (<data-dir>/config.json)
 * 3. Environment variables (highest priority)
 *
 * Camera parameters are not part of this file. They live in settings.env, which is edited at runtime and hot-reloaded by the recording supervisor (see settings.ts).
 */

/*
 * SETTING METADATA
 *
 * Each configurable setting has metadata describing its type, valid range, environment variable name, and human-readable description. The metadata drives
 * environment variable parsing, validation, and the --list-env output.
 */

/**
 * Metadata describing a single configuration setting. Default values are not stored here to avoid duplication. Use getNestedValue(DEFAULTS, setting.path) to get
 * the default value for a setting.
 */
export interface SettingMetadata {

  // Human-readable description shown by --list-env.
  description: string;

  // Environment variable that can override this setting.
  envVar: string;

  // Maximum allowed value for numeric settings.
  max?: number;

  // Minimum allowed value for numeric settings.
  min?: number;

  // Dot-separated path to the setting (e.g., "recording.restartDelay").
  path: string;

  // Data type for parsing and validation.
  type: "boolean" | "host" | "integer" | "path" | "port" | "string";

  // Valid values for string type settings.
  validValues?: string[];

  // Unit of measurement (e.g., "ms", "bytes").
  unit?: string;
}

/**
 * Metadata for all configurable settings, organized by category.
 */
export const CONFIG_METADATA: Record<string, SettingMetadata[]> = {

  live: [
    {

      description: "Run the live preview producer behind /video_feed.",
      envVar: "LIVE_ENABLED",
      path: "live.enabled",
      type: "boolean"
    },
    {

      description: "Preview frames per second requested from FFmpeg.",
      envVar: "LIVE_FRAME_RATE",
      max: 30,
      min: 1,
      path: "live.frameRate",
      type: "integer"
    },
    {

      description: "Frames older than this are treated as absent by the preview consumers.",
      envVar: "LIVE_FRESHNESS",
      max: 60000,
      min: 500,
      path: "live.freshness",
      type: "integer",
      unit: "ms"
    },
    {

      description: "JPEG quality scale for preview frames. 2 is best, 31 is worst.",
      envVar: "LIVE_QUALITY",
      max: 31,
      min: 2,
      path: "live.quality",
      type: "integer"
    },
    {

      description: "Delay before the preview reconnects after its FFmpeg process exits.",
      envVar: "LIVE_RECONNECT_DELAY",
      max: 300000,
      min: 100,
      path: "live.reconnectDelay",
      type: "integer",
      unit: "ms"
    },
    {

      description: "Preview width. Height follows the source aspect ratio.",
      envVar: "LIVE_WIDTH",
      max: 3840,
      min: 64,
      path: "live.width",
      type: "integer",
      unit: "pixels"
    }
  ],

  logging: [
    {

      description: "HTTP request logging level. \"none\" disables logging, \"errors\" logs only 4xx/5xx responses, \"all\" logs everything.",
      envVar: "HTTP_LOG_LEVEL",
      path: "logging.httpLogLevel",
      type: "string",
      validValues: [ "none", "errors", "all" ]
    },
    {

      description: "Maximum log file size. When exceeded, the file is trimmed to half this size keeping the most recent logs.",
      envVar: "LOG_MAX_SIZE",
      max: 104857600,
      min: 10240,
      path: "logging.maxSize",
      type: "integer",
      unit: "bytes"
    }
  ],

  paths: [
    {

      description: "Log file location. Defaults to camloop.log inside the data directory.",
      envVar: "CAMLOOP_LOG_FILE",
      path: "paths.logFile",
      type: "path"
    },
    {

      description: "Camera settings file location. Defaults to settings.env inside the data directory.",
      envVar: "CAMLOOP_SETTINGS_FILE",
      path: "paths.settingsFile",
      type: "path"
    }
  ],

  recording: [
    {

      description: "FFmpeg executable name or path.",
      envVar: "FFMPEG_PATH",
      path: "recording.ffmpegPath",
      type: "path"
    },
    {

      description: "Interval between checks of the capture process and the settings file.",
      envVar: "MONITOR_INTERVAL",
      max: 60000,
      min: 100,
      path: "recording.monitorInterval",
      type: "integer",
      unit: "ms"
    },
    {

      description: "Delay before the capture process is relaunched after it exits.",
      envVar: "RESTART_DELAY",
      max: 600000,
      min: 100,
      path: "recording.restartDelay",
      type: "integer",
      unit: "ms"
    },
    {

      description: "RTSP transport requested from the camera.",
      envVar: "RTSP_TRANSPORT",
      path: "recording.rtspTransport",
      type: "string",
      validValues: [ "tcp", "udp" ]
    },
    {

      description: "Time allowed for the capture process to exit after SIGTERM before it is killed.",
      envVar: "STOP_GRACE_PERIOD",
      max: 60000,
      min: 100,
      path: "recording.stopGracePeriod",
      type: "integer",
      unit: "ms"
    },
    {

      description: "Capture source URL. {user}, {pass} and {ip} are replaced with the URL-encoded camera settings.",
      envVar: "STREAM_URL_TEMPLATE",
      path: "recording.streamUrlTemplate",
      type: "string"
    }
  ],

  server: [
    {

      description: "Address the HTTP server binds to.",
      envVar: "HOST",
      path: "server.host",
      type: "host"
    },
    {

      description: "TCP port for the HTTP server.",
      envVar: "PORT",
      max: 65535,
      min: 1,
      path: "server.port",
      type: "port"
    }
  ],

  storage: [
    {

      description: "Root directory that recordings, thumbnails and timelapses are written beneath.",
      envVar: "STORAGE_ROOT",
      path: "storage.root",
      type: "path"
    },
    {

      description: "Number of storage availability checks before startup gives up.",
      envVar: "STORAGE_WAIT_ATTEMPTS",
      max: 10000,
      min: 1,
      path: "storage.waitAttempts",
      type: "integer"
    },
    {

      description: "Delay between storage availability checks.",
      envVar: "STORAGE_WAIT_INTERVAL",
      max: 60000,
      min: 100,
      path: "storage.waitInterval",
      type: "integer",
      unit: "ms"
    }
  ],

  thumbnails: [
    {

      description: "Generate a preview image for each finished segment.",
      envVar: "THUMBNAILS_ENABLED",
      path: "thumbnails.enabled",
      type: "boolean"
    },
    {

      description: "Interval between thumbnail scan passes.",
      envVar: "THUMBNAIL_SCAN_INTERVAL",
      max: 3600000,
      min: 1000,
      path: "thumbnails.scanInterval",
      type: "integer",
      unit: "ms"
    },
    {

      description: "Offset into the segment at which the still frame is taken.",
      envVar: "THUMBNAIL_SEEK",
      max: 3600,
      min: 0,
      path: "thumbnails.seekSeconds",
      type: "integer",
      unit: "seconds"
    },
    {

      description: "Files modified more recently than this are considered still being written.",
      envVar: "THUMBNAIL_STABILITY_WINDOW",
      max: 600000,
      min: 1000,
      path: "thumbnails.stabilityWindow",
      type: "integer",
      unit: "ms"
    },
    {

      description: "Thumbnail width. Height follows the source aspect ratio.",
      envVar: "THUMBNAIL_WIDTH",
      max: 1920,
      min: 32,
      path: "thumbnails.width",
      type: "integer",
      unit: "pixels"
    }
  ],

  timelapse: [
    {

      description: "x264 constant rate factor for timelapse encodes.",
      envVar: "TIMELAPSE_CRF",
      max: 51,
      min: 0,
      path: "timelapse.crf",
      type: "integer"
    },
    {

      description: "Timelapse output frame rate.",
      envVar: "TIMELAPSE_FRAME_RATE",
      max: 120,
      min: 1,
      path: "timelapse.frameRate",
      type: "integer"
    },
    {

      description: "x264 preset for timelapse encodes.",
      envVar: "TIMELAPSE_PRESET",
      path: "timelapse.preset",
      type: "string",
      validValues: [ "ultrafast", "superfast", "veryfast", "faster", "fast", "medium", "slow", "slower", "veryslow" ]
    },
    {

      description: "Local hour of the daily timelapse run.",
      envVar: "TIMELAPSE_RUN_HOUR",
      max: 23,
      min: 0,
      path: "timelapse.runHour",
      type: "integer"
    },
    {

      description: "Local minute of the daily timelapse run.",
      envVar: "TIMELAPSE_RUN_MINUTE",
      max: 59,
      min: 0,
      path: "timelapse.runMinute",
      type: "integer"
    },
    {

      description: "Build the previous day's timelapse automatically. Manual triggers work either way.",
      envVar: "TIMELAPSE_SCHEDULE_ENABLED",
      path: "timelapse.scheduleEnabled",
      type: "boolean"
    },
    {

      description: "Time acceleration factor for timelapses.",
      envVar: "TIMELAPSE_SPEED",
      max: 10000,
      min: 1,
      path: "timelapse.speedFactor",
      type: "integer"
    }
  ],

  timeline: [
    {

      description: "The newest segment counts as actively recording when it was modified within this window.",
      envVar: "ACTIVE_THRESHOLD",
      max: 600000,
      min: 1000,
      path: "timeline.activeThreshold",
      type: "integer",
      unit: "ms"
    },
    {

      description: "Number of recent files listed by /api/stats.",
      envVar: "RECENT_FILE_COUNT",
      max: 100,
      min: 1,
      path: "timeline.recentFileCount",
      type: "integer"
    }
  ]
};

/**
 * Result of loading user config.
 */
export interface UserConfigLoadResult {

  // The loaded configuration (empty object if file missing or parse error).
  config: Record<string, unknown>;

  // True if the config file exists but does not contain a JSON object.
  parseError: boolean;

  // Error message if parseError is true.
  parseErrorMessage?: string;
}

/**
 * Narrows an unknown value to a plain object.
 * @param value - The value to check.
 * @returns True if the value is a non-null, non-array object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {

  return (typeof value === "object") && (value !== null) && !Array.isArray(value);
}

/*
 * CONFIG FILE OPERATIONS
 */

/**
 * Loads user configuration from the config file. Returns an empty config if the file doesn't exist, and sets parseError if the file exists but does not contain a
 * JSON object.
 * @param configFilePath - Absolute path to config.json.
 * @returns The loaded configuration with parse status.
 */
export async function loadUserConfig(configFilePath: string): Promise<UserConfigLoadResult> {

  let content: string;

  try {

    content = await fsPromises.readFile(configFilePath, "utf-8");
  } catch(error) {

    // File doesn't exist - this is normal, use defaults.
    if(!isErrnoException(error, "ENOENT")) {

      LOG.warn("Failed to read configuration file %s: %s. Using defaults.", configFilePath, formatError(error));
    }

    return { config: {}, parseError: false };
  }

  let parsed: unknown;

  try {

    parsed = JSON.parse(content);
  } catch(parseError) {

    const message = formatError(parseError);

    LOG.warn("Invalid JSON in configuration file %s: %s. Using defaults.", configFilePath, message);

    return { config: {}, parseError: true, parseErrorMessage: message };
  }

  if(!isRecord(parsed)) {

    LOG.warn("Configuration file %s does not contain a JSON object. Using defaults.", configFilePath);

    return { config: {}, parseError: true, parseErrorMessage: "Expected a JSON object." };
  }

  return { config: parsed, parseError: false };
}

/*
 * ENVIRONMENT VARIABLE DETECTION
 */

/**
 * Returns a map of setting paths to their environment variable values for settings that are overridden by environment variables.
 * @param env - The environment to inspect.
 * @returns Map of path -> env var value for overridden settings.
 */
export function getEnvOverrides(env: NodeJS.ProcessEnv = process.env): Map<string, string> {

  const overrides = new Map<string, string>();

  for(const settings of Object.values(CONFIG_METADATA)) {

    for(const setting of settings) {

      const envValue = env[setting.envVar];

      if(envValue !== undefined) {

        overrides.set(setting.path, envValue);
      }
    }
  }

  return overrides;
}

/*
 * CONFIGURATION MERGING
 *
 * These functions merge defaults, user config, and environment overrides into the final CONFIG object.
 */

/**
 * Hard-coded default configuration values. These are the baseline values used when neither user config nor environment variables provide a value.
 */
export const DEFAULTS: Config = {

  live: {

    enabled: true,
    frameRate: 15,
    freshness: 5000,
    quality: 7,
    reconnectDelay: 2000,
    width: 640
  },

  logging: {

    httpLogLevel: "errors",
    maxSize: 1048576
  },

  paths: {

    logFile: null,
    settingsFile: null
  },

  recording: {

    ffmpegPath: "ffmpeg",
    monitorInterval: 1000,
    restartDelay: 5000,
    rtspTransport: "tcp",
    stopGracePeriod: 5000,
    streamUrlTemplate: "rtsp://{user}:{pass}@{ip}:554/h264Preview_01_main"
  },

  server: {

    host: "0.0.0.0",
    port: 8080
  },

  storage: {

    root: "/data/box",
    waitAttempts: 60,
    waitInterval: 2000
  },

  thumbnails: {

    enabled: true,
    scanInterval: 30000,
    seekSeconds: 1,
    stabilityWindow: 15000,
    width: 320
  },

  timelapse: {

    crf: 30,
    frameRate: 30,
    preset: "ultrafast",
    runHour: 0,
    runMinute: 5,
    scheduleEnabled: true,
    speedFactor: 100
  },

  timeline: {

    activeThreshold: 20000,
    recentFileCount: 5
  }
};

/**
 * Parses an environment variable value according to the setting type.
 * @param value - The raw environment variable value.
 * @param type - The expected type of the setting.
 * @returns The parsed value, or undefined if parsing fails.
 */
export function parseEnvValue(value: string, type: SettingMetadata["type"]): Nullable<boolean | number | string> | undefined {

  switch(type) {

    case "boolean": {

      // Accept common truthy values for environment variables.
      const lower = value.toLowerCase();

      return (lower === "true") || (lower === "1") || (lower === "yes");
    }

    case "integer":
    case "port": {

      const num = parseInt(value, 10);

      return Number.isNaN(num) ? undefined : num;
    }

    case "path": {

      // An empty path means "use the default location".
      return (value.length === 0) ? null : value;
    }

    default: {

      return value;
    }
  }
}

/**
 * Checks that a value from config.json has the JavaScript type a setting expects. Mistyped values are ignored so that the default stays in effect.
 * @param value - The value read from the config file.
 * @param setting - The setting it is meant for.
 * @returns True if the value can be applied.
 */
function matchesSettingType(value: unknown, setting: SettingMetadata): boolean {

  switch(setting.type) {

    case "boolean": {

      return typeof value === "boolean";
    }

    case "integer":
    case "port": {

      return typeof value === "number";
    }

    case "path": {

      return (value === null) || (typeof value === "string");
    }

    default: {

      return typeof value === "string";
    }
  }
}

/**
 * Gets a value from a nested object using a dot-separated path.
 * @param obj - The object to read from.
 * @param settingPath - Dot-separated path (e.g., "recording.restartDelay").
 * @returns The value at the path, or undefined if not found.
 */
export function getNestedValue(obj: unknown, settingPath: string): unknown {

  let current: unknown = obj;

  for(const part of settingPath.split(".")) {

    if(!isRecord(current)) {

      return undefined;
    }

    current = current[part];
  }

  return current;
}

/**
 * Sets a value in a nested object using a dot-separated path, creating intermediate objects as needed.
 * @param obj - The object to modify.
 * @param settingPath - Dot-separated path (e.g., "recording.restartDelay").
 * @param value - The value to set.
 */
export function setNestedValue(obj: object, settingPath: string, value: unknown): void {

  const parts = settingPath.split(".");
  const leaf = parts.pop();
  let current: unknown = obj;

  for(const part of parts) {

    if(!isRecord(current)) {

      return;
    }

    if(current[part] === undefined) {

      current[part] = {};
    }

    current = current[part];
  }

  if(isRecord(current) && (leaf !== undefined)) {

    current[leaf] = value;
  }
}

/**
 * Merges user configuration with defaults and environment overrides to produce the final configuration. Priority: env vars > user config > defaults.
 * @param userConfig - User configuration from the config file.
 * @param env - The environment to read overrides from.
 * @returns The merged configuration.
 */
export function mergeConfiguration(userConfig: Record<string, unknown>, env: NodeJS.ProcessEnv = process.env): Config {

  // Start with a deep copy of defaults.
  const config = structuredClone(DEFAULTS);

  for(const settings of Object.values(CONFIG_METADATA)) {

    for(const setting of settings) {

      const userValue = getNestedValue(userConfig, setting.path);

      if(userValue !== undefined) {

        if(matchesSettingType(userValue, setting)) {

          setNestedValue(config, setting.path, userValue);
        } else {

          LOG.warn("Ignoring %s in the configuration file: expected a %s value.", setting.path, setting.type);
        }
      }

      // Apply environment variable overrides (highest priority).
      const envValue = env[setting.envVar];

      if(envValue !== undefined) {

        const parsedValue = parseEnvValue(envValue, setting.type);

        if(parsedValue !== undefined) {

          setNestedValue(config, setting.path, parsedValue);
        }
      }
    }
  }

  return config;
}
