/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * delay.ts: Async delay utility for camloop.
 */

/**
 * Creates a promise that resolves after the specified delay. When an abort signal is supplied, the promise resolves early as soon as the signal fires, so that
 * loops sleeping between iterations can be shut down promptly. It never rejects.
 * @param ms - The delay duration in milliseconds.
 * @param signal - Optional signal that ends the delay early.
 * @returns A promise that resolves after the delay or on abort.
 */
export async function delay(ms: number, signal?: AbortSignal): Promise<void> {

  if(signal?.aborted) {

    return;
  }

  return new Promise<void>((resolve) => {

    const onAbort = (): void => {

      clearTimeout(timer);
      resolve();
    };

    const timer = setTimeout(() => {

      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
