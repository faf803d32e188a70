/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * paths.ts: Centralized filesystem path resolution for camloop.
 */
import type { Config } from "../types/index.js";
import os from "node:os";
import path from "node:path";

/* Every file camloop itself owns (config.json, settings.env, camloop.log) lives in one data directory unless overridden. Recordings are not: they live beneath
 * storage.root, which is usually a separate mount. The data directory is resolved once at startup, before config.json is loaded, because it determines where
 * config.json lives.
 *
 * Resolution priority for the data directory (highest to lowest):
 *   1. CLI flag (--data-dir)
 *   2. Environment variable (CAMLOOP_DATA_DIR)
 *   3. Default (~/.camloop)
 */

// The resolved data directory, initialized once at startup. All path getters depend on this value.
let resolvedDataDir: string | undefined;

/**
 * Initializes the data directory from the CLI flag, environment variable, or default. Must be called at startup before any config loading or path resolution.
 * @param cliDataDir - Optional data directory from the --data-dir CLI flag.
 * @throws When CAMLOOP_DATA_DIR is set to a relative path.
 */
export function initializeDataDir(cliDataDir?: string): void {

  const envDataDir = process.env.CAMLOOP_DATA_DIR;

  if(cliDataDir) {

    resolvedDataDir = cliDataDir;
  } else if(envDataDir) {

    if(!path.isAbsolute(envDataDir)) {

      throw new Error("CAMLOOP_DATA_DIR must be an absolute path, got: " + envDataDir);
    }

    resolvedDataDir = envDataDir;
  } else {

    resolvedDataDir = path.join(os.homedir(), ".camloop");
  }
}

/**
 * Returns the resolved data directory. Throws if called before initializeDataDir().
 * @returns The absolute path to the data directory.
 */
export function getDataDir(): string {

  if(!resolvedDataDir) {

    throw new Error("Data directory not initialized. Call initializeDataDir() first.");
  }

  return resolvedDataDir;
}

/**
 * Returns the path to the user configuration file.
 * @returns The absolute path to config.json inside the data directory.
 */
export function getConfigFilePath(): string {

  return path.join(getDataDir(), "config.json");
}

/**
 * Returns the camera settings file path. When config.paths.settingsFile is set, that absolute path is used directly.
 * @param config - The application configuration.
 * @returns The absolute path to settings.env.
 */
export function getSettingsFilePath(config: Config): string {

  return config.paths.settingsFile ?? path.join(getDataDir(), "settings.env");
}

/**
 * Returns the log file path. When config.paths.logFile is set, that absolute path is used directly. Otherwise, the default location inside the data directory is used.
 * @param config - The application configuration.
 * @returns The absolute path to the log file.
 */
export function getLogFilePath(config: Config): string {

  return config.paths.logFile ?? path.join(getDataDir(), "camloop.log");
}
