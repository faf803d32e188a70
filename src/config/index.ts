/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Configuration management for camloop.
 */
import { CONFIG_METADATA, DEFAULTS, getEnvOverrides, getNestedValue, loadUserConfig, mergeConfiguration } from "./userConfig.js";
import type { Config, Nullable } from "../types/index.js";
import { LOG } from "../utils/index.js";
import { getConfigFilePath } from "./paths.js";

/*
 * CONFIGURATION
 *
 * The CONFIG object centralizes all tunable parameters for the application. Configuration uses a layered approach with the following priority (highest to lowest):
 *
 * 1. Environment variables (SCREAMING_SNAKE_CASE naming)
 * 2. User config file (<data-dir>/config.json)
 * 3. Hard-coded defaults (defined in userConfig.ts)
 *
 * The settings are organized by functional area:
 *
 * - server: Network binding for the HTTP server (port, host)
 * - storage: Recording root and the startup availability wait
 * - recording: FFmpeg executable, capture source template and supervisor timing
 * - thumbnails: Scan interval, stability window and output size
 * - timelapse: Daily schedule and encoder parameters
 * - timeline: Activity threshold and recent file count for the analyzer
 * - live: Live preview frame rate, size and freshness
 * - logging: HTTP log level and log file size
 * - paths: Overrides for the log file and the camera settings file
 *
 * Configuration is initialized at startup via initializeConfiguration(), which loads the user config file, merges with defaults, applies environment overrides, and
 * validates all values. If validation fails, the process exits with a descriptive error message.
 */

// The CONFIG object is initialized during startup. It starts as a copy of DEFAULTS and is replaced by the merged configuration.
export let CONFIG: Config = structuredClone(DEFAULTS);

/**
 * Initializes the configuration by loading the user config file, merging with defaults, and applying environment variable overrides. This must be called at startup
 * before any code accesses CONFIG, and after initializeDataDir().
 */
export async function initializeConfiguration(): Promise<void> {

  const result = await loadUserConfig(getConfigFilePath());

  CONFIG = mergeConfiguration(result.config);

  LOG.debug("config", "Configuration initialized from defaults, user config, and environment variables.");
}

/*
 * CONFIGURATION VALIDATION
 *
 * Before starting the server, we validate all configuration values to catch errors early. Validation runs at startup after configuration initialization. If it fails,
 * the process exits with a non-zero code and a message listing every invalid value.
 */

/**
 * Validates that a configuration value is a positive integer within an optional range. It returns an error message if validation fails, allowing the caller to
 * collect all errors before reporting them.
 * @param name - The configuration name for error messages, typically the environment variable name.
 * @param value - The value to validate.
 * @param min - Optional minimum allowed value (inclusive).
 * @param max - Optional maximum allowed value (inclusive).
 * @returns Error message if invalid, null if valid.
 */
export function validatePositiveInt(name: string, value: number, min?: number, max?: number): Nullable<string> {

  // Check for NaN (from parseInt of invalid input) and non-positive values.
  if(!Number.isInteger(value) || (value < 1)) {

    return [ name, " must be a positive integer, got: ", String(value) ].join("");
  }

  return validateIntRange(name, value, min, max);
}

/**
 * Validates that a configuration value is an integer within an optional range. Zero and negative values are accepted when the range allows them, which covers
 * settings such as the scheduled run hour.
 * @param name - The configuration name for error messages.
 * @param value - The value to validate.
 * @param min - Optional minimum allowed value (inclusive).
 * @param max - Optional maximum allowed value (inclusive).
 * @returns Error message if invalid, null if valid.
 */
export function validateIntRange(name: string, value: number, min?: number, max?: number): Nullable<string> {

  if(!Number.isInteger(value)) {

    return [ name, " must be an integer, got: ", String(value) ].join("");
  }

  if((min !== undefined) && (value < min)) {

    return [ name, " must be at least ", String(min), ", got: ", String(value) ].join("");
  }

  if((max !== undefined) && (value > max)) {

    return [ name, " must be at most ", String(max), ", got: ", String(value) ].join("");
  }

  return null;
}

/**
 * Validates all configuration values and throws an error if any are invalid. We collect all validation errors before throwing so that one restart is enough to see
 * every problem.
 * @param config - The configuration to validate. Defaults to CONFIG.
 * @throws If any configuration value is invalid. The error message lists all invalid values.
 */
export function validateConfiguration(config: Config = CONFIG): void {

  const errors: string[] = [];

  // Numeric ranges and enumerations come straight from the setting metadata.
  for(const settings of Object.values(CONFIG_METADATA)) {

    for(const setting of settings) {

      const value = getNestedValue(config, setting.path);
      let error: Nullable<string> = null;

      switch(setting.type) {

        case "integer":
        case "port": {

          if(typeof value !== "number") {

            error = [ setting.envVar, " must be a number, got: ", String(value) ].join("");
          } else if((setting.min !== undefined) && (setting.min >= 1)) {

            error = validatePositiveInt(setting.envVar, value, setting.min, setting.max);
          } else {

            error = validateIntRange(setting.envVar, value, setting.min, setting.max);
          }

          break;
        }

        case "string": {

          if(setting.validValues && ((typeof value !== "string") || !setting.validValues.includes(value))) {

            error = [ setting.envVar, " must be one of ", setting.validValues.join(", "), ", got: ", String(value) ].join("");
          }

          break;
        }

        default: {

          break;
        }
      }

      if(error) {

        errors.push(error);
      }
    }
  }

  // The capture source needs at least the camera address.
  if(!config.recording.streamUrlTemplate.includes("{ip}")) {

    errors.push("STREAM_URL_TEMPLATE must contain the {ip} placeholder, got: " + config.recording.streamUrlTemplate);
  }

  // Recordings need somewhere to go.
  if(config.storage.root.length === 0) {

    errors.push("STORAGE_ROOT must not be empty.");
  }

  // If any validation errors occurred, throw with complete list for operator to fix all issues at once.
  if(errors.length > 0) {

    throw new Error([ "Configuration validation failed:\n  ", errors.join("\n  ") ].join(""));
  }
}

/**
 * Displays the active configuration at startup. We log only the most commonly adjusted values to keep output concise.
 */
export function displayConfiguration(): void {

  const overrides = getEnvOverrides();

  LOG.info("Starting camloop with configuration:");
  LOG.info("  Server: %s:%s", CONFIG.server.host, CONFIG.server.port);
  LOG.info("  Storage root: %s", CONFIG.storage.root);
  LOG.info("  FFmpeg: %s", CONFIG.recording.ffmpegPath);
  LOG.info("  Restart delay: %sms, monitor interval: %sms", CONFIG.recording.restartDelay, CONFIG.recording.monitorInterval);
  LOG.info("  Thumbnails: %s", CONFIG.thumbnails.enabled ? "every " + String(Math.round(CONFIG.thumbnails.scanInterval / 1000)) + "s" : "disabled");
  LOG.info("  Timelapse: %s, %sx speed", CONFIG.timelapse.scheduleEnabled ?
    [ "daily at ", String(CONFIG.timelapse.runHour).padStart(2, "0"), ":", String(CONFIG.timelapse.runMinute).padStart(2, "0") ].join("") : "manual only",
  CONFIG.timelapse.speedFactor);
  LOG.info("  Live preview: %s", CONFIG.live.enabled ? String(CONFIG.live.width) + "px at " + String(CONFIG.live.frameRate) + "fps" : "disabled");

  if(overrides.size > 0) {

    LOG.info("  Environment overrides: %s", [...overrides.keys()].sort().join(", "));
  }
}
