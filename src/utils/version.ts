/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * version.ts: Package version lookup.
 */
import type { Nullable } from "../types/index.js";
import { fileURLToPath } from "url";
import { readFileSync } from "fs";
import { resolve } from "path";

// Cached package version.
let cachedPackageVersion: Nullable<string> = null;

/**
 * Type guard for the one package.json field we read.
 * @param value - Parsed JSON.
 * @returns True if the value carries a string version.
 */
function hasVersion(value: unknown): value is { version: string } {

  return (typeof value === "object") && (value !== null) && ("version" in value) && (typeof value.version === "string");
}

/**
 * Gets the current package version from package.json.
 * @returns The current version string (e.g., "1.0.0").
 */
export function getPackageVersion(): string {

  if(cachedPackageVersion) {

    return cachedPackageVersion;
  }

  try {

    // Resolve the path to package.json relative to this file. This file is in src/utils/ or dist/utils/, and package.json is in the project root.
    const currentDir = fileURLToPath(new URL(".", import.meta.url));
    const packageJson: unknown = JSON.parse(readFileSync(resolve(currentDir, "../../package.json"), "utf-8"));

    cachedPackageVersion = hasVersion(packageJson) ? packageJson.version : "0.0.0";

    return cachedPackageVersion;
  } catch {

    return "0.0.0";
  }
}
