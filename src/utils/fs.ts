/**
 * File System Utilities
 * JSON persistence helpers for snapshots and templates
 */

import * as fsPromises from "node:fs/promises";
import * as path from "node:path";

/**
 * Ensures a directory exists, creating it recursively if needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fsPromises.mkdir(dirPath, { recursive: true });
}

/**
 * Reads and parses a JSON file. Returns null when the file does not exist;
 * any other failure (unreadable, invalid JSON) propagates.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fsPromises.readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFileError(error)) return null;
    throw error;
  }
  const parsed: unknown = JSON.parse(content);
  return parsed;
}

/**
 * Writes JSON through a temp file and rename so readers never see a
 * half-written file.
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await fsPromises.writeFile(tempPath, JSON.stringify(data, null, 2), "utf-8");
  await fsPromises.rename(tempPath, filePath);
}

/**
 * Write a text file, creating parent directories as needed
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  await fsPromises.writeFile(filePath, content, "utf-8");
}

function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
