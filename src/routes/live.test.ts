/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * live.test.ts: Tests for the multipart feed writer.
 */
import { describe, expect, it } from "vitest";
import { EventEmitter } from "node:events";
import type { FeedSink } from "./live.js";
import type { LiveFrame } from "../streaming/liveFrame.js";
import { createFeedWriter } from "./live.js";

class FakeSink extends EventEmitter implements FeedSink {

  public accepting = true;
  public readonly chunks: (Buffer | string)[] = [];
  public writableEnded = false;

  public write(chunk: Buffer | string): boolean {

    this.chunks.push(chunk);

    return this.accepting;
  }
}

function frame(sequence: number, data: number[]): LiveFrame {

  return { capturedAt: 0, data: Buffer.from(data), sequence };
}

describe("createFeedWriter", () => {

  it("writes each new frame as one multipart part", () => {

    const sink = new FakeSink();
    const writeFrame = createFeedWriter(sink);

    expect(writeFrame(frame(1, [ 0xFF, 0xD8, 0xFF, 0xD9 ]))).toBe(true);
    expect(sink.chunks).toEqual([ "--frame\r\nContent-Type: image/jpeg\r\nContent-Length: 4\r\n\r\n", Buffer.from([ 0xFF, 0xD8, 0xFF, 0xD9 ]), "\r\n" ]);

    // The same frame is not sent twice.
    expect(writeFrame(frame(1, [ 0xFF, 0xD8, 0xFF, 0xD9 ]))).toBe(false);
    expect(sink.chunks).toHaveLength(3);
  });

  it("drops frames while a slow client drains and resumes afterwards", () => {

    const sink = new FakeSink();
    const writeFrame = createFeedWriter(sink);

    sink.accepting = false;

    expect(writeFrame(frame(1, [1]))).toBe(true);
    expect(writeFrame(frame(2, [2]))).toBe(false);
    expect(writeFrame(frame(3, [3]))).toBe(false);
    expect(sink.chunks).toHaveLength(3);

    sink.accepting = true;
    sink.emit("drain");

    expect(writeFrame(frame(4, [4]))).toBe(true);
    expect(sink.chunks).toHaveLength(6);
    expect(sink.chunks[4]).toEqual(Buffer.from([4]));
  });

  it("stops writing once the response has ended", () => {

    const sink = new FakeSink();
    const writeFrame = createFeedWriter(sink);

    sink.writableEnded = true;

    expect(writeFrame(frame(1, [1]))).toBe(false);
    expect(sink.chunks).toEqual([]);
  });
});
