/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Type definitions for camloop.
 */

/**
 * A utility type that represents a value that can be null.
 * @typeParam T - The type that can be nullable.
 */
export type Nullable<T> = T | null;

/*
 * CONFIGURATION TYPES
 *
 * These interfaces define the structure of the application configuration. The Config interface is the root configuration object, with nested interfaces for each
 * functional area. Values come from hard-coded defaults, the user config file, and environment variables, and are validated at startup. Camera settings (address,
 * credentials, segment length) are deliberately not part of Config: they live in the hot-reloaded settings file and are read through config/settings.ts.
 */

/**
 * Live preview configuration. The preview is a low-rate MJPEG feed decoded from the camera independently of the recorder.
 */
export interface LiveConfig {

  // Whether the live preview producer runs at all. Environment variable: LIVE_ENABLED. Default: true.
  enabled: boolean;

  // Preview frames per second requested from FFmpeg. Environment variable: LIVE_FRAME_RATE. Default: 15.
  frameRate: number;

  // Frames older than this many milliseconds are treated as absent by consumers. Environment variable: LIVE_FRESHNESS. Default: 5000ms.
  freshness: number;

  // JPEG quality scale handed to FFmpeg (-q:v, 2 is best, 31 is worst). Environment variable: LIVE_QUALITY. Default: 7.
  quality: number;

  // Delay in milliseconds before reconnecting after the preview process exits. Environment variable: LIVE_RECONNECT_DELAY. Default: 2000ms.
  reconnectDelay: number;

  // Output width in pixels. Height follows the source aspect ratio. Environment variable: LIVE_WIDTH. Default: 640.
  width: number;
}

/**
 * Logging configuration.
 */
export interface LoggingConfig {

  // HTTP request logging level: "none", "errors", or "all". Environment variable: HTTP_LOG_LEVEL. Default: "errors".
  httpLogLevel: string;

  // Maximum log file size in bytes. When exceeded, the file is trimmed to half this size. Environment variable: LOG_MAX_SIZE. Default: 1048576 (1MB).
  maxSize: number;
}

/**
 * Filesystem path overrides. When null, the file lives inside the data directory.
 */
export interface PathsConfig {

  // Absolute path to the log file. Environment variable: CAMLOOP_LOG_FILE.
  logFile: Nullable<string>;

  // Absolute path to the camera settings file. Environment variable: CAMLOOP_SETTINGS_FILE.
  settingsFile: Nullable<string>;
}

/**
 * Recording supervisor timing and capture source configuration.
 */
export interface RecordingConfig {

  // Name or path of the FFmpeg executable. Environment variable: FFMPEG_PATH. Default: "ffmpeg".
  ffmpegPath: string;

  // Interval in milliseconds between checks of the capture process and the settings file. Environment variable: MONITOR_INTERVAL. Default: 1000ms.
  monitorInterval: number;

  // Delay in milliseconds before relaunching the capture process after it exits. Environment variable: RESTART_DELAY. Default: 5000ms.
  restartDelay: number;

  // RTSP transport protocol requested from the camera. Environment variable: RTSP_TRANSPORT. Default: "tcp".
  rtspTransport: string;

  // Time in milliseconds to wait after SIGTERM before force-killing the capture process. Environment variable: STOP_GRACE_PERIOD. Default: 5000ms.
  stopGracePeriod: number;

  // Capture source URL template. {user}, {pass} and {ip} are replaced with the URL-encoded camera settings. Environment variable: STREAM_URL_TEMPLATE.
  streamUrlTemplate: string;
}

/**
 * HTTP server configuration.
 */
export interface ServerConfig {

  // Address the HTTP server binds to. Environment variable: HOST. Default: "0.0.0.0".
  host: string;

  // TCP port for the HTTP server. Environment variable: PORT. Default: 8080.
  port: number;
}

/**
 * Recording storage configuration.
 */
export interface StorageConfig {

  // Root directory all recordings, thumbnails and timelapses are written beneath. Environment variable: STORAGE_ROOT. Default: "/data/box".
  root: string;

  // Number of availability checks before the storage is declared unavailable. Environment variable: STORAGE_WAIT_ATTEMPTS. Default: 60.
  waitAttempts: number;

  // Delay in milliseconds between availability checks. Environment variable: STORAGE_WAIT_INTERVAL. Default: 2000ms.
  waitInterval: number;
}

/**
 * Thumbnail watcher configuration.
 */
export interface ThumbnailsConfig {

  // Whether the watcher runs. Environment variable: THUMBNAILS_ENABLED. Default: true.
  enabled: boolean;

  // Interval in milliseconds between scan passes. Environment variable: THUMBNAIL_SCAN_INTERVAL. Default: 30000ms.
  scanInterval: number;

  // Offset in seconds into the segment at which the still frame is taken. Environment variable: THUMBNAIL_SEEK. Default: 1.
  seekSeconds: number;

  // Files modified within this many milliseconds are considered still being written. Environment variable: THUMBNAIL_STABILITY_WINDOW. Default: 15000ms.
  stabilityWindow: number;

  // Thumbnail width in pixels. Environment variable: THUMBNAIL_WIDTH. Default: 320.
  width: number;
}

/**
 * Timelapse job configuration.
 */
export interface TimelapseConfig {

  // x264 constant rate factor. Environment variable: TIMELAPSE_CRF. Default: 30.
  crf: number;

  // Output frame rate cap. Environment variable: TIMELAPSE_FRAME_RATE. Default: 30.
  frameRate: number;

  // x264 preset. Environment variable: TIMELAPSE_PRESET. Default: "ultrafast".
  preset: string;

  // Local hour of the daily run. Environment variable: TIMELAPSE_RUN_HOUR. Default: 0.
  runHour: number;

  // Local minute of the daily run. Environment variable: TIMELAPSE_RUN_MINUTE. Default: 5.
  runMinute: number;

  // Whether the daily schedule runs. Manual triggers work regardless. Environment variable: TIMELAPSE_SCHEDULE_ENABLED. Default: true.
  scheduleEnabled: boolean;

  // Time acceleration factor applied to the concatenated footage. Environment variable: TIMELAPSE_SPEED. Default: 100.
  speedFactor: number;
}

/**
 * Timeline analyzer configuration.
 */
export interface TimelineConfig {

  // The newest segment counts as actively recording when it was modified within this many milliseconds. Environment variable: ACTIVE_THRESHOLD. Default: 20000ms.
  activeThreshold: number;

  // Number of most recent files listed in the report. Environment variable: RECENT_FILE_COUNT. Default: 5.
  recentFileCount: number;
}

/**
 * Root application configuration.
 */
export interface Config {

  live: LiveConfig;
  logging: LoggingConfig;
  paths: PathsConfig;
  recording: RecordingConfig;
  server: ServerConfig;
  storage: StorageConfig;
  thumbnails: ThumbnailsConfig;
  timelapse: TimelapseConfig;
  timeline: TimelineConfig;
}

/*
 * CAMERA SETTINGS
 *
 * The camera settings snapshot, read fresh from the settings file on every supervisor iteration and every analyzer call.
 */

/**
 * A parsed camera settings snapshot.
 */
export interface CameraSettings {

  cameraIp: string;
  cameraPass: string;
  cameraUser: string;

  // Whether the audio track is recorded alongside video.
  enableAudio: boolean;

  // Keys present in the settings file that are not recognized. Kept so that a save does not drop them.
  extra: Record<string, string>;

  // Segment length in seconds.
  segmentTime: number;

  // Recording subfolder beneath the storage root.
  subfolder: string;

  // Timelapse subfolder beneath the recording subfolder.
  timelapseOutputDir: string;
}

/*
 * RECORDING TYPES
 */

/**
 * One capture output file, as read back from disk.
 */
export interface RecordingSegment {

  // Birth time of the file in epoch milliseconds, where the filesystem reports one (0 otherwise).
  createdAt: number;

  // End of the segment: the file modification time in epoch milliseconds.
  end: number;

  // File name including extension. This is the segment identity.
  name: string;

  // Absolute path to the file.
  path: string;

  // Size in bytes.
  size: number;

  // Start time decoded from the file name and the containing day, or null when the name does not follow the encoding.
  start: Nullable<Date>;
}

/**
 * Result of a timelapse job. This is the external trigger contract and is returned for every outcome rather than thrown.
 */
export interface TimelapseResult {

  message: string;
  success: boolean;
}

/*
 * TIMELINE REPORT
 *
 * The analyzer output is consumed by the presentation layer, so its field names are a wire contract and use snake_case.
 */

/**
 * One timeline bar, as percentages of a 24 hour span.
 */
export interface TimelineEntry {

  offset_percent: number;
  width_percent: number;
}

/**
 * An interval between two segments longer than twice the segment length.
 */
export interface GapRecord {

  duration_minutes: number;
  end: string;
  start: string;
}

/**
 * A recently written file, formatted for display.
 */
export interface RecentFile {

  modified: string;
  name: string;
  size_mb: number;
}

/**
 * Recorder health derived from the age of the newest segment.
 */
export type RecorderStatus = "active" | "idle" | "stale";

/**
 * The full analyzer output for today's recordings.
 */
export interface TimelineReport {

  avg_size_mb: number;
  current_file: string;
  current_size: string;
  elapsed_seconds: number;
  est_bitrate_mbps: number;
  files_today: number;
  gaps: GapRecord[];
  last_write_age_seconds: Nullable<number>;
  recent_files: RecentFile[];
  recorder_status: RecorderStatus;
  segment_limit_seconds: number;
  status_msg: string;
  timeline: TimelineEntry[];
  total_hours: number;
  total_size_mb: number;
}
