/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * liveFrame.ts: Live MJPEG preview frames for camloop.
 */
import { LOG, delay, formatError, hasExited, runWithTaskContext, spawnFFmpeg, terminateProcess, waitForExit } from "../utils/index.js";
import type { ManagedProcess, ProcessExit } from "../utils/index.js";
import { buildStreamUrl, loadSettings, redactStreamUrl } from "../config/settings.js";
import type { Nullable } from "../types/index.js";
import type { Readable } from "node:stream";

/* The live preview runs its own low-rate FFmpeg decode of the camera stream, independent of the recorder, and writes MJPEG to stdout. The byte stream is cut into
 * complete JPEG images on their start and end markers, and only the newest image is kept. Consumers poll the single-slot cell at their own pace and never see a
 * frame older than the freshness window, so a dead preview process shows up as no picture rather than a frozen one.
 */

// JPEG start of image and end of image markers.
const SOI = Buffer.from([ 0xff, 0xd8 ]);
const EOI = Buffer.from([ 0xff, 0xd9 ]);

// A partial image larger than this is discarded. Preview frames are tens of kilobytes.
const DEFAULT_MAX_BUFFER = 4 * 1024 * 1024;

/**
 * One complete preview image.
 */
export interface LiveFrame {

  // Epoch milliseconds at which the frame was received.
  capturedAt: number;
  data: Buffer;

  // Increases by one with every frame put into the cell.
  sequence: number;
}

/**
 * A single-slot holder for the newest preview frame.
 */
export class FrameCell {

  private frame: Nullable<LiveFrame> = null;
  private sequence = 0;

  /**
   * Replaces the current frame.
   * @param data - A complete JPEG image.
   * @param capturedAt - When the frame was received. Defaults to now.
   */
  public put(data: Buffer, capturedAt = Date.now()): void {

    this.sequence++;
    this.frame = { capturedAt, data, sequence: this.sequence };
  }

  /**
   * Returns the current frame if it is fresh enough.
   * @param maxAgeMs - Frames older than this are treated as absent.
   * @param now - The current time. Defaults to now.
   * @returns The frame, or null when the cell is empty or the frame is stale.
   */
  public get(maxAgeMs: number, now = Date.now()): Nullable<LiveFrame> {

    if(!this.frame || ((now - this.frame.capturedAt) > maxAgeMs)) {

      return null;
    }

    return this.frame;
  }

  /**
   * Empties the cell.
   */
  public clear(): void {

    this.frame = null;
  }
}

/**
 * Splits an MJPEG byte stream into complete JPEG images. Chunk boundaries may fall anywhere, including inside a marker.
 */
export class JpegFrameSplitter {

  private buffer: Buffer = Buffer.alloc(0);
  private readonly maxBuffer: number;
  private readonly onFrame: (frame: Buffer) => void;

  // Offset from which the next end-of-image search starts, so that a large partial frame is not rescanned on every chunk.
  private scanFrom = 0;

  constructor(onFrame: (frame: Buffer) => void, maxBuffer = DEFAULT_MAX_BUFFER) {

    this.maxBuffer = maxBuffer;
    this.onFrame = onFrame;
  }

  /**
   * Feeds a chunk of the stream. Each image completed by the chunk is passed to the frame callback, in order.
   * @param chunk - Bytes read from the stream.
   */
  public push(chunk: Buffer): void {

    this.buffer = (this.buffer.length === 0) ? chunk : Buffer.concat([ this.buffer, chunk ]);

    for(;;) {

      // Anything before the first start marker is discarded.
      const start = this.buffer.indexOf(SOI);

      if(start === -1) {

        // Keep a trailing 0xFF, which may be the first half of a start marker.
        this.buffer = (this.buffer.at(-1) === 0xff) ? this.buffer.subarray(-1) : Buffer.alloc(0);
        this.scanFrom = 0;

        return;
      }

      if(start > 0) {

        this.buffer = this.buffer.subarray(start);
        this.scanFrom = 0;
      }

      const end = this.buffer.indexOf(EOI, Math.max(SOI.length, this.scanFrom));

      if(end === -1) {

        if(this.buffer.length > this.maxBuffer) {

          LOG.debug("live", "Discarding a %s byte partial frame.", this.buffer.length);

          this.buffer = Buffer.alloc(0);
          this.scanFrom = 0;

          return;
        }

        // The last byte may be the first half of an end marker.
        this.scanFrom = Math.max(SOI.length, this.buffer.length - 1);

        return;
      }

      this.onFrame(Buffer.from(this.buffer.subarray(0, end + EOI.length)));
      this.buffer = this.buffer.subarray(end + EOI.length);
      this.scanFrom = 0;
    }
  }

  /**
   * Discards any partial image.
   */
  public reset(): void {

    this.buffer = Buffer.alloc(0);
    this.scanFrom = 0;
  }
}

/**
 * Parameters of a preview decode.
 */
export interface PreviewParameters {

  frameRate: number;
  quality: number;
  rtspTransport: string;
  url: string;
  width: number;
}

/**
 * Builds the FFmpeg arguments for the preview decode: scaled, rate-limited MJPEG on stdout, without audio.
 * @param parameters - The preview parameters.
 * @returns The arguments, without the executable.
 */
export function buildPreviewArgs(parameters: PreviewParameters): string[] {

  return [

    "-rtsp_transport", parameters.rtspTransport,
    "-i", parameters.url,
    "-an",
    "-vf", "fps=" + String(parameters.frameRate) + ",scale=" + String(parameters.width) + ":-2",
    "-q:v", String(parameters.quality),
    "-f", "image2pipe",
    "-vcodec", "mjpeg",
    "pipe:1"
  ];
}

/**
 * A preview process: a managed process whose stdout carries MJPEG.
 */
export interface PreviewProcess extends ManagedProcess {

  readonly stdout: Nullable<Readable>;
}

/**
 * Starts a preview process. The producer takes one of these so that tests can substitute a fake.
 */
export type PreviewLauncher = (command: string, args: string[]) => PreviewProcess;

/**
 * Snapshot of the producer, for the health route.
 */
export interface LiveFrameProducerStatus {

  connected: boolean;
  frames: number;
  lastFrameAt: Nullable<number>;
  launches: number;
}

/**
 * Producer construction options.
 */
export interface LiveFrameProducerOptions {

  // Receives the frames.
  cell: FrameCell;
  ffmpegPath: string;
  frameRate: number;
  launcher?: PreviewLauncher;

  // JPEG quality scale (-q:v).
  quality: number;

  // Delay in milliseconds before relaunching after the process exits.
  reconnectDelay: number;
  rtspTransport: string;
  settingsFile: string;

  // Time in milliseconds to wait after SIGTERM before force-killing the process.
  stopGracePeriod: number;
  streamUrlTemplate: string;
  width: number;
}

/**
 * Default preview launcher: FFmpeg with stdout piped.
 * @param command - FFmpeg executable.
 * @param args - Arguments.
 * @returns The running process.
 */
export const launchPreview: PreviewLauncher = (command: string, args: string[]): PreviewProcess => spawnFFmpeg(command, args, "live", true);

/**
 * Keeps a preview process running and feeds its frames into a cell.
 */
export class LiveFrameProducer {

  private abortController: Nullable<AbortController> = null;
  private connected = false;
  private frames = 0;
  private lastFrameAt: Nullable<number> = null;
  private readonly launcher: PreviewLauncher;
  private launches = 0;
  private loopPromise: Nullable<Promise<void>> = null;
  private readonly options: LiveFrameProducerOptions;

  constructor(options: LiveFrameProducerOptions) {

    this.options = options;
    this.launcher = options.launcher ?? launchPreview;
  }

  /**
   * Starts the producer loop.
   */
  public start(): void {

    if(this.loopPromise) {

      return;
    }

    const controller = new AbortController();

    this.abortController = controller;
    this.loopPromise = runWithTaskContext("live", async () => this.loop(controller.signal));
  }

  /**
   * Stops the preview process and ends the loop.
   */
  public async stop(): Promise<void> {

    this.abortController?.abort();

    if(this.loopPromise) {

      await this.loopPromise;
    }

    this.abortController = null;
    this.loopPromise = null;
    this.options.cell.clear();
  }

  /**
   * Returns a snapshot of the producer.
   * @returns The current status.
   */
  public getStatus(): LiveFrameProducerStatus {

    return { connected: this.connected, frames: this.frames, lastFrameAt: this.lastFrameAt, launches: this.launches };
  }

  /**
   * The producer loop. Never throws.
   * @param signal - Ends the loop when aborted.
   */
  private async loop(signal: AbortSignal): Promise<void> {

    while(!signal.aborted) {

      try {

        // eslint-disable-next-line no-await-in-loop
        await this.runOnce(signal);
      } catch(error) {

        LOG.warn("Live preview failed: %s.", formatError(error));
      }

      this.connected = false;

      if(signal.aborted) {

        break;
      }

      // eslint-disable-next-line no-await-in-loop
      await delay(this.options.reconnectDelay, signal);
    }
  }

  /**
   * Runs one preview process until it exits or the producer is stopped.
   * @param signal - Stops the process when aborted.
   */
  private async runOnce(signal: AbortSignal): Promise<void> {

    const settings = await loadSettings(this.options.settingsFile);
    const url = buildStreamUrl(this.options.streamUrlTemplate, settings);
    const args = buildPreviewArgs({ frameRate: this.options.frameRate, quality: this.options.quality, rtspTransport: this.options.rtspTransport, url,
      width: this.options.width });

    LOG.debug("live", "Launching preview from %s.", redactStreamUrl(url));

    const child = this.launcher(this.options.ffmpegPath, args);
    const exited = waitForExit(child);
    const splitter = new JpegFrameSplitter((frame) => {

      // The camera counts as connected once it has actually produced a frame.
      this.connected = true;
      this.frames++;
      this.lastFrameAt = Date.now();
      this.options.cell.put(frame, this.lastFrameAt);
    });

    this.launches++;

    child.stdout?.on("data", (chunk: Buffer) => {

      splitter.push(chunk);
    });

    const onAbort = (): void => {

      void terminateProcess(child, exited, this.options.stopGracePeriod);
    };

    signal.addEventListener("abort", onAbort, { once: true });

    if(signal.aborted && !hasExited(child)) {

      onAbort();
    }

    let exit: ProcessExit;

    try {

      exit = await exited;
    } finally {

      signal.removeEventListener("abort", onAbort);
    }

    if(signal.aborted) {

      return;
    }

    if(exit.error) {

      LOG.warn("Unable to start the live preview: %s.", formatError(exit.error));

      return;
    }

    LOG.debug("live", "Preview process exited (%s). Reconnecting in %s ms.", (exit.signal !== null) ? "signal " + exit.signal : "code " + String(exit.code),
      this.options.reconnectDelay);
  }
}
