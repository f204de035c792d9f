/**
 * Shared utilities
 */

import * as path from "node:path";

export * from "./logger.js";
export * from "./fs.js";

// =============================================================================
// Configuration Paths
// =============================================================================

export const CONFIG_DIR = ".reel-search";
export const CONFIG_FILE = "config.json";
export const INDEX_FILE = "index.json";
export const TEMPLATES_FILE = "templates.json";

export function getProjectRoot(): string {
  return process.env.REEL_SEARCH_HOME ?? process.cwd();
}

export function getConfigDir(projectRoot: string = getProjectRoot()): string {
  return path.join(projectRoot, CONFIG_DIR);
}

export function getConfigPath(projectRoot: string = getProjectRoot()): string {
  return path.join(getConfigDir(projectRoot), CONFIG_FILE);
}

export function getDataDir(projectRoot: string = getProjectRoot()): string {
  return path.join(getConfigDir(projectRoot), "data");
}

export function getLogsDir(projectRoot: string = getProjectRoot()): string {
  return path.join(getConfigDir(projectRoot), "logs");
}

export function getIndexPath(projectRoot: string = getProjectRoot()): string {
  return path.join(getDataDir(projectRoot), INDEX_FILE);
}

export function getTemplatesPath(projectRoot: string = getProjectRoot()): string {
  return path.join(getDataDir(projectRoot), TEMPLATES_FILE);
}

// =============================================================================
// Ordering
// =============================================================================

/**
 * Code-unit string order, independent of locale
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}
