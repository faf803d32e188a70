/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * taskContext.ts: AsyncLocalStorage-based task context for log correlation.
 */
import { AsyncLocalStorage } from "node:async_hooks";

/* Background work in camloop runs as a handful of long-lived tasks (the supervisor loop, the thumbnail watcher, the live preview) plus short-lived timelapse jobs that
 * can overlap each other. Running a unit of work inside a task context lets every log line it produces carry a tag such as "timelapse 2024-03-01" without passing
 * a logger through each call.
 *
 * Context does not survive into setInterval or setTimeout callbacks that were scheduled outside of it. Timer callbacks that log must call runWithTaskContext() again.
 */

/**
 * Task context for the current unit of background work.
 */
export interface TaskContext {

  // Short tag prefixed to log lines, e.g. "supervisor" or "timelapse 2024-03-01".
  tag: string;
}

const taskContextStorage = new AsyncLocalStorage<TaskContext>();

/**
 * Runs a function within a task context. Every log call made from the function, including across awaits, is prefixed with the task tag.
 * @param tag - The tag to prefix log lines with.
 * @param fn - The async function to run.
 * @returns The result of the function.
 */
export async function runWithTaskContext<T>(tag: string, fn: () => Promise<T>): Promise<T> {

  return taskContextStorage.run({ tag }, fn);
}

/**
 * Returns the tag of the current task context, if any.
 * @returns The task tag, or undefined outside of a task context.
 */
export function getTaskTag(): string | undefined {

  return taskContextStorage.getStore()?.tag;
}
