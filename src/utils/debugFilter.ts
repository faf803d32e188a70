/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * debugFilter.ts: Category-based debug log filtering for camloop.
 */

/* Debug output is grouped into colon-separated categories ("recording:supervisor", "recording:thumbnails", "ffmpeg"). The CAMLOOP_DEBUG environment variable takes
 * a comma-separated pattern list:
 *
 *   "*"          every category.
 *   "recording"  the category itself and everything beneath it ("recording:supervisor", ...).
 *   "-ffmpeg"    exclude a category and everything beneath it. Exclusions win over "*".
 *
 * Example: CAMLOOP_DEBUG=*,-ffmpeg
 */

interface FilterState {

  excludes: string[];
  includes: string[];
  wildcard: boolean;
}

let filter: FilterState | null = null;

/**
 * Tests whether a category equals a pattern or sits beneath it.
 * @param category - The category being logged.
 * @param pattern - A configured pattern.
 * @returns True on an exact or prefix match.
 */
function matches(category: string, pattern: string): boolean {

  return (category === pattern) || category.startsWith(pattern + ":");
}

/**
 * Configures the debug filter from a pattern string, replacing any previous configuration. An empty string disables debug output.
 * @param pattern - Comma-separated category patterns.
 */
export function initDebugFilter(pattern: string): void {

  const parts = pattern.split(",").map((part) => part.trim()).filter((part) => part.length > 0);

  if(parts.length === 0) {

    filter = null;

    return;
  }

  const state: FilterState = { excludes: [], includes: [], wildcard: false };

  for(const part of parts) {

    if(part === "*") {

      state.wildcard = true;
    } else if(part.startsWith("-")) {

      state.excludes.push(part.slice(1));
    } else {

      state.includes.push(part);
    }
  }

  filter = state;
}

/**
 * Checks whether debug output is enabled for a category.
 * @param category - The category to check.
 * @returns True if debug messages in this category should be written.
 */
export function isCategoryEnabled(category: string): boolean {

  if(!filter) {

    return false;
  }

  if(filter.excludes.some((pattern) => matches(category, pattern))) {

    return false;
  }

  return filter.wildcard || filter.includes.some((pattern) => matches(category, pattern));
}

/**
 * Fast-path check for whether any debug output is configured.
 * @returns True if at least one pattern is active.
 */
export function isAnyDebugEnabled(): boolean {

  return filter !== null;
}

/**
 * Known debug categories, listed by --help.
 */
export const DEBUG_CATEGORIES: readonly { category: string; description: string }[] = [

  { category: "config", description: "Configuration loading and merging." },
  { category: "ffmpeg", description: "FFmpeg stderr output from every spawned process." },
  { category: "library", description: "Recording and thumbnail file requests that could not be served." },
  { category: "live", description: "Live preview producer: connects, reconnects, frame sizes." },
  { category: "recording:supervisor", description: "Capture launches, settings polling, termination." },
  { category: "recording:thumbnails", description: "Scan passes, skipped and generated thumbnails." },
  { category: "recording:timelapse", description: "Timelapse scheduling, manifests, encode commands." },
  { category: "retry", description: "Retried operations such as the storage availability wait." },
  { category: "settings", description: "Settings file parsing, skipped lines." }
];
