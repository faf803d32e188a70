/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * morganStream.ts: Morgan logging stream adapter for camloop.
 */
import type { StreamOptions } from "morgan";
import { LOG } from "./logger.js";

/* Morgan HTTP request logger needs a writable stream to output log entries. By default, Morgan writes to stdout. This adapter hands each request line to the
 * application logger under an "http" tag instead, so request lines follow the current logging mode and appear in the recent log history served by /api/stats.
 */

/**
 * Creates a Morgan stream options object that routes request lines through the application logger.
 * @returns StreamOptions object for Morgan configuration.
 */
export function createMorganStream(): StreamOptions {

  const log = LOG.withTag("http");

  return {

    write: (message: string): void => {

      // Remove trailing newline that Morgan adds since our loggers handle newlines.
      log.info("%s", message.trim());
    }
  };
}
