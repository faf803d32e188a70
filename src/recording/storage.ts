/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * storage.ts: Storage root availability checks for camloop.
 */
import { LOG, StorageUnavailableError, retryOperation } from "../utils/index.js";
import fs from "node:fs";

const { promises: fsPromises } = fs;

/* The storage root is typically a network or cloud mount that may come up after the service does. Startup waits a bounded number of attempts for it to become a
 * writable directory. If it never does, recording cannot work at all, and the caller treats StorageUnavailableError as fatal.
 */

/**
 * Checks that the storage root is an existing, writable directory.
 * @param root - The storage root.
 * @returns True if recordings can be written beneath it.
 */
export async function isStorageAvailable(root: string): Promise<boolean> {

  try {

    const stats = await fsPromises.stat(root);

    if(!stats.isDirectory()) {

      return false;
    }

    await fsPromises.access(root, fs.constants.W_OK);

    return true;
  } catch {

    return false;
  }
}

/**
 * Options for waitForStorage().
 */
export interface StorageWaitOptions {

  // Number of checks before giving up.
  attempts: number;

  // Delay between checks in milliseconds.
  interval: number;

  // Aborting ends the wait early, which is reported as unavailable.
  signal?: AbortSignal;
}

/**
 * Waits for the storage root to become available.
 * @param root - The storage root.
 * @param options - Retry budget.
 * @throws StorageUnavailableError when the root is still unavailable after every attempt.
 */
export async function waitForStorage(root: string, options: StorageWaitOptions): Promise<void> {

  try {

    await retryOperation(async (attempt): Promise<void> => {

      if(!(await isStorageAvailable(root))) {

        if((attempt === 1) || ((attempt % 10) === 0)) {

          LOG.info("Waiting for storage at %s (%s/%s).", root, attempt, options.attempts);
        }

        throw new Error("Storage at " + root + " is not a writable directory.");
      }
    }, { delayMs: options.interval, description: "storage at " + root, maxAttempts: options.attempts, signal: options.signal });
  } catch {

    throw new StorageUnavailableError(root, options.attempts);
  }

  LOG.debug("recording:supervisor", "Storage at %s is ready.", root);
}
