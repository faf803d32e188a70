/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * settings.ts: Hot-reloaded camera settings file for camloop.
 */
import type { CameraSettings, Nullable } from "../types/index.js";
import { LOG, formatError, isErrnoException } from "../utils/index.js";
import fs from "node:fs";
import { isRecord } from "./userConfig.js";
import path from "node:path";

const { promises: fsPromises } = fs;

/*
 * CAMERA SETTINGS
 *
 * Camera parameters live in settings.env rather than config.json because they change while the service runs: the settings API rewrites the file and the recording
 * supervisor notices the new modification time and restarts capture. The format is one KEY="VALUE" pair per line. Blank lines, # comments and lines without a key
 * are skipped. Keys the service does not know are kept and written back unchanged.
 *
 * Each known key falls back to the environment variable of the same name, then to a built-in value. The file is read again on every access, so there is no cache to
 * invalidate.
 */

/**
 * Keys recognized in the settings file, in the order they are written.
 */
export const SETTINGS_KEYS = [ "SUBFOLDER", "SEGMENT_TIME", "CAMERA_IP", "CAMERA_USER", "CAMERA_PASS", "TIMELAPSE_OUTPUT_DIR", "ENABLE_AUDIO" ] as const;

export type SettingsKey = typeof SETTINGS_KEYS[number];

// Shown in place of the camera password by the settings API.
export const MASKED_PASSWORD = "********";

// Longest segment the settings API accepts: one day.
const MAX_SEGMENT_TIME = 86400;

const BUILTIN_DEFAULTS: Record<SettingsKey, string> = {

  CAMERA_IP: "192.168.1.100",
  CAMERA_PASS: "",
  CAMERA_USER: "admin",
  ENABLE_AUDIO: "true",
  SEGMENT_TIME: "900",
  SUBFOLDER: "Camera",
  TIMELAPSE_OUTPUT_DIR: "Timelapses"
};

/**
 * Type guard for the known settings keys.
 * @param key - A key read from the file or a request.
 * @returns True if the key is one of SETTINGS_KEYS.
 */
export function isSettingsKey(key: string): key is SettingsKey {

  return SETTINGS_KEYS.some((known) => known === key);
}

/**
 * Returns the raw default for every known key: the environment variable of the same name when set, otherwise the built-in value.
 * @param env - The environment to read.
 * @returns Defaults keyed by settings key.
 */
export function getSettingsDefaults(env: NodeJS.ProcessEnv = process.env): Record<SettingsKey, string> {

  const defaults = { ...BUILTIN_DEFAULTS };

  for(const key of SETTINGS_KEYS) {

    const value = env[key];

    if(value !== undefined) {

      defaults[key] = value;
    }
  }

  return defaults;
}

/**
 * Parses the contents of a settings file into key/value pairs, in file order. Malformed lines are skipped.
 * @param content - The file contents.
 * @returns The parsed pairs. A key that appears twice keeps its last value.
 */
export function parseSettingsFile(content: string): Map<string, string> {

  const values = new Map<string, string>();
  const lines = content.split(/\r?\n/);

  for(const [ index, rawLine ] of lines.entries()) {

    const line = rawLine.trim();

    if((line.length === 0) || line.startsWith("#")) {

      continue;
    }

    const separator = line.indexOf("=");
    const key = (separator === -1) ? "" : line.slice(0, separator).trim();

    if(key.length === 0) {

      LOG.debug("settings", "Skipping malformed settings line %s: %s", index + 1, line);

      continue;
    }

    values.set(key, line.slice(separator + 1).trim().replace(/^"+|"+$/g, ""));
  }

  return values;
}

/**
 * Parses a segment length. Anything but a positive whole number of seconds is rejected.
 * @param value - The raw value.
 * @returns The number of seconds, or null when invalid.
 */
export function parseSegmentTime(value: string): Nullable<number> {

  if(!/^\d+$/.test(value.trim())) {

    return null;
  }

  const seconds = parseInt(value, 10);

  return (seconds > 0) ? seconds : null;
}

/**
 * Parses a boolean flag.
 * @param value - The raw value.
 * @returns The flag, or null when the value is not recognized.
 */
function parseFlag(value: string): Nullable<boolean> {

  switch(value.trim().toLowerCase()) {

    case "1":
    case "true":
    case "yes": {

      return true;
    }

    case "0":
    case "false":
    case "no": {

      return false;
    }

    default: {

      return null;
    }
  }
}

/**
 * Builds a settings snapshot from parsed file values layered over the defaults. Invalid values keep the default.
 * @param values - Pairs parsed from the settings file.
 * @param env - The environment supplying defaults.
 * @returns The snapshot.
 */
export function toCameraSettings(values: Map<string, string>, env: NodeJS.ProcessEnv = process.env): CameraSettings {

  const defaults = getSettingsDefaults(env);
  const merged = { ...defaults };
  const extra: Record<string, string> = {};

  for(const [ key, value ] of values) {

    if(isSettingsKey(key)) {

      merged[key] = value;
    } else {

      extra[key] = value;
    }
  }

  let segmentTime = parseSegmentTime(merged.SEGMENT_TIME);

  if(segmentTime === null) {

    LOG.debug("settings", "Invalid SEGMENT_TIME \"%s\", keeping the default.", merged.SEGMENT_TIME);

    segmentTime = parseSegmentTime(defaults.SEGMENT_TIME) ?? parseInt(BUILTIN_DEFAULTS.SEGMENT_TIME, 10);
  }

  let enableAudio = parseFlag(merged.ENABLE_AUDIO);

  if(enableAudio === null) {

    LOG.debug("settings", "Invalid ENABLE_AUDIO \"%s\", keeping the default.", merged.ENABLE_AUDIO);

    enableAudio = parseFlag(defaults.ENABLE_AUDIO) ?? true;
  }

  return {

    cameraIp: merged.CAMERA_IP,
    cameraPass: merged.CAMERA_PASS,
    cameraUser: merged.CAMERA_USER,
    enableAudio,
    extra,
    segmentTime,
    subfolder: merged.SUBFOLDER,
    timelapseOutputDir: merged.TIMELAPSE_OUTPUT_DIR
  };
}

/**
 * Reads the settings file and returns a fresh snapshot. A missing file yields the defaults. Other read failures are logged and also yield the defaults, so that a
 * transient problem never stops recording.
 * @param filePath - Absolute path to settings.env.
 * @param env - The environment supplying defaults.
 * @returns The snapshot.
 */
export async function loadSettings(filePath: string, env: NodeJS.ProcessEnv = process.env): Promise<CameraSettings> {

  let content = "";

  try {

    content = await fsPromises.readFile(filePath, "utf-8");
  } catch(error) {

    if(!isErrnoException(error, "ENOENT")) {

      LOG.warn("Unable to read settings file %s: %s. Using defaults.", filePath, formatError(error));
    }
  }

  return toCameraSettings(parseSettingsFile(content), env);
}

/**
 * Returns the modification time of the settings file.
 * @param filePath - Absolute path to settings.env.
 * @returns The mtime in epoch milliseconds, or null when the file does not exist or cannot be read.
 */
export async function getSettingsMtime(filePath: string): Promise<Nullable<number>> {

  try {

    return (await fsPromises.stat(filePath)).mtimeMs;
  } catch {

    return null;
  }
}

/**
 * Converts a snapshot into its raw key/value form, known keys first.
 * @param settings - The snapshot.
 * @returns Raw values keyed by settings key.
 */
export function settingsToRecord(settings: CameraSettings): Record<SettingsKey, string> {

  return {

    CAMERA_IP: settings.cameraIp,
    CAMERA_PASS: settings.cameraPass,
    CAMERA_USER: settings.cameraUser,
    ENABLE_AUDIO: settings.enableAudio ? "true" : "false",
    SEGMENT_TIME: String(settings.segmentTime),
    SUBFOLDER: settings.subfolder,
    TIMELAPSE_OUTPUT_DIR: settings.timelapseOutputDir
  };
}

/**
 * Serializes a snapshot in the settings file format. Known keys are written in SETTINGS_KEYS order, followed by any unrecognized keys in their original order.
 * @param settings - The snapshot.
 * @returns The file contents.
 */
export function serializeSettings(settings: CameraSettings): string {

  const record = settingsToRecord(settings);
  const lines = SETTINGS_KEYS.map((key) => [ key, "=\"", record[key], "\"" ].join(""));

  for(const [ key, value ] of Object.entries(settings.extra)) {

    lines.push([ key, "=\"", value, "\"" ].join(""));
  }

  return lines.join("\n") + "\n";
}

/**
 * Writes a snapshot to the settings file. The file is replaced atomically so that the supervisor never reads a half-written file.
 * @param filePath - Absolute path to settings.env.
 * @param settings - The snapshot to write.
 */
export async function saveSettings(filePath: string, settings: CameraSettings): Promise<void> {

  const tempPath = filePath + ".tmp";

  await fsPromises.mkdir(path.dirname(filePath), { recursive: true });
  await fsPromises.writeFile(tempPath, serializeSettings(settings), "utf-8");
  await fsPromises.rename(tempPath, filePath);

  LOG.info("Camera settings saved to %s.", filePath);
}

/**
 * Builds the capture source URL from a template. {user} and {pass} are URL-encoded so that credentials containing reserved characters survive.
 * @param template - The URL template, e.g. "rtsp://{user}:{pass}@{ip}:554/h264Preview_01_main".
 * @param settings - The snapshot supplying the values.
 * @returns The source URL.
 */
export function buildStreamUrl(template: string, settings: CameraSettings): string {

  return template.replaceAll("{user}", encodeURIComponent(settings.cameraUser)).replaceAll("{pass}", encodeURIComponent(settings.cameraPass))
    .replaceAll("{ip}", settings.cameraIp);
}

/**
 * Replaces the password in a source URL for logging.
 * @param url - The source URL.
 * @returns The URL with any credentials masked.
 */
export function redactStreamUrl(url: string): string {

  return url.replace(/\/\/([^:/@]*):[^@/]*@/, "//$1:" + MASKED_PASSWORD + "@");
}

/**
 * Returns the raw settings with the password masked, for the settings API.
 * @param settings - The snapshot.
 * @returns Raw values with CAMERA_PASS replaced by a placeholder when set.
 */
export function maskSettings(settings: CameraSettings): Record<SettingsKey, string> {

  const record = settingsToRecord(settings);

  return { ...record, CAMERA_PASS: (record.CAMERA_PASS.length > 0) ? MASKED_PASSWORD : "" };
}

/**
 * Result of applying a settings update.
 */
export interface SettingsUpdateResult {

  // Validation errors. When non-empty, the settings were not changed.
  errors: string[];
  settings: CameraSettings;
}

/**
 * Checks that a folder setting stays beneath the recording root.
 * @param value - The folder value.
 * @returns True if the value is a non-empty relative path without parent references.
 */
function isContainedFolder(value: string): boolean {

  return (value.length > 0) && !path.isAbsolute(value) && !value.split(/[\\/]/).includes("..");
}

/**
 * Applies an update from the settings API to a snapshot. Every field is validated before anything changes. A CAMERA_PASS equal to the mask placeholder keeps the
 * current password, so that a form posted back unchanged does not overwrite it.
 * @param current - The current snapshot.
 * @param update - The request body.
 * @returns The updated snapshot and any validation errors.
 */
export function applySettingsUpdate(current: CameraSettings, update: unknown): SettingsUpdateResult {

  if(!isRecord(update)) {

    return { errors: ["Expected a JSON object of settings."], settings: current };
  }

  const errors: string[] = [];
  const record: Record<SettingsKey, string> = settingsToRecord(current);

  for(const [ key, rawValue ] of Object.entries(update)) {

    if(!isSettingsKey(key)) {

      errors.push("Unknown setting: " + key + ".");

      continue;
    }

    if((typeof rawValue !== "string") && (typeof rawValue !== "number") && (typeof rawValue !== "boolean")) {

      errors.push(key + " must be a string, number or boolean.");

      continue;
    }

    const value = String(rawValue).trim();

    if(/[\r\n"]/.test(value)) {

      errors.push(key + " must not contain quotes or line breaks.");

      continue;
    }

    if((key === "CAMERA_PASS") && (value === MASKED_PASSWORD)) {

      continue;
    }

    record[key] = value;
  }

  const segmentTime = parseSegmentTime(record.SEGMENT_TIME);

  if((segmentTime === null) || (segmentTime > MAX_SEGMENT_TIME)) {

    errors.push("SEGMENT_TIME must be a whole number of seconds between 1 and " + String(MAX_SEGMENT_TIME) + ".");
  }

  if(parseFlag(record.ENABLE_AUDIO) === null) {

    errors.push("ENABLE_AUDIO must be true or false.");
  }

  if(record.CAMERA_IP.length === 0) {

    errors.push("CAMERA_IP must not be empty.");
  }

  for(const key of [ "SUBFOLDER", "TIMELAPSE_OUTPUT_DIR" ] as const) {

    if(!isContainedFolder(record[key])) {

      errors.push(key + " must be a relative folder name without \"..\".");
    }
  }

  if(errors.length > 0) {

    return { errors, settings: current };
  }

  // Defaults only matter for invalid values, and every value has been validated above.
  const settings = toCameraSettings(new Map(Object.entries(record)), {});

  return { errors: [], settings: { ...settings, extra: { ...current.extra } } };
}
