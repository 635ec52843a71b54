/**
 * Version information for the wirebot CLI
 */

import { existsSync, statSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";

// Kept in sync with package.json by hand
export const VERSION = "0.1.0";

/**
 * Get the build timestamp (mtime of the compiled cli.js), null when run from source
 */
export function getBuildTime(): Date | null {
  const cliPath = join(dirname(fileURLToPath(import.meta.url)), "cli.js");
  if (!existsSync(cliPath)) return null;
  return statSync(cliPath).mtime;
}

/**
 * Format build time for display, e.g. "2025-02-07 08:15:32"
 */
export function formatBuildTime(buildTime: Date | null = getBuildTime()): string {
  if (!buildTime) return "unknown";
  return buildTime.toISOString().replace("T", " ").slice(0, 19);
}

/**
 * Get full version string with build time
 */
export function getVersionString(): string {
  return `v${VERSION} (built ${formatBuildTime()})`;
}
