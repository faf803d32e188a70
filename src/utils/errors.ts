/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * errors.ts: Error formatting and handling utilities for camloop.
 */

/**
 * Formats an error for logging by extracting the message if available, falling back to string conversion for non-Error objects. Trailing punctuation is stripped
 * to allow callers to add consistent punctuation in their log format strings.
 * @param error - The error to format.
 * @returns A string representation suitable for logging, without trailing punctuation.
 */
export function formatError(error: unknown): string {

  let message: string;

  if(error instanceof Error) {

    message = error.message;
  } else if(error && (typeof error === "object") && ("message" in error) && (typeof error.message === "string")) {

    message = error.message;
  } else {

    message = String(error);
  }

  return message.replace(/[.!?]+$/, "");
}

/**
 * Checks whether an error is a Node.js system error, optionally with a specific errno code.
 * @param error - The error to check.
 * @param code - Optional code to match, e.g. "ENOENT".
 * @returns True if the error carries a string code (matching the given one, when supplied).
 */
export function isErrnoException(error: unknown, code?: string): error is NodeJS.ErrnoException {

  if(!(error instanceof Error) || !("code" in error) || (typeof error.code !== "string")) {

    return false;
  }

  return (code === undefined) || (error.code === code);
}

/**
 * Raised when the recording storage root never becomes writable within the startup retry budget. This is the one failure that ends the process.
 */
export class StorageUnavailableError extends Error {

  public readonly attempts: number;
  public readonly root: string;

  constructor(root: string, attempts: number) {

    super("Storage at " + root + " was not writable after " + String(attempts) + " attempts.");

    this.name = "StorageUnavailableError";
    this.attempts = attempts;
    this.root = root;
  }
}
