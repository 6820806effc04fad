/**
 * File system utilities
 * Handles checksums, timestamps and stat lookups
 */

import fs from "node:fs";
import crypto from "node:crypto";
import { InternalError, IoError } from "./error-handler.js";

export const HASH_ALGORITHM = "sha256";

// Files are hashed in bounded chunks, never loaded whole
export const HASH_CHUNK_SIZE = 64 * 1024;

/**
 * Calculate the content checksum of a file
 * @param {string} filePath - Path to the file
 * @returns {Promise<string>} Lowercase hex SHA-256 digest
 */
export async function calculateChecksum(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash(HASH_ALGORITHM);
    const stream = fs.createReadStream(filePath, { highWaterMark: HASH_CHUNK_SIZE });

    stream.on("data", (data) => hash.update(data));
    stream.on("end", () => resolve(hash.digest("hex")));
    stream.on("error", (error) => reject(new IoError(`Failed to read ${filePath}: ${error.message}`)));
  });
}

/**
 * Format a date as an RFC3339 timestamp
 */
export function formatTimestamp(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    throw new InternalError(`Failed to format timestamp: invalid date`);
  }
  return date.toISOString();
}

/**
 * stat() that resolves to null when the path does not exist
 */
export async function statOrNull(filePath: string): Promise<fs.Stats | null> {
  try {
    return await fs.promises.stat(filePath);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath);
    return true;
  } catch {
    return false;
  }
}
