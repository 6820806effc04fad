/**
 * Shared test helpers
 *
 * Tests work against real temporary directories; nothing here touches
 * files outside os.tmpdir().
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";
import type { ProgressEvent, ProgressObserver } from "../../src/interfaces/progress.js";

export const createTempDir = (prefix = "jozin-test-"): Promise<string> =>
  fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));

export const removeTempDir = (dirPath: string): Promise<void> =>
  fs.promises.rm(dirPath, { recursive: true, force: true });

/**
 * Write a file below `root`, creating parent directories
 * @returns {Promise<string>} Absolute path of the written file
 */
export const createTestFile = async (
  root: string,
  relativePath: string,
  contents: string | Buffer = "test image data"
): Promise<string> => {
  const filePath = path.join(root, relativePath);
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, contents);
  return filePath;
};

export const fileExists = async (filePath: string): Promise<boolean> => {
  try {
    await fs.promises.access(filePath);
    return true;
  } catch {
    return false;
  }
};

export const readText = (filePath: string): Promise<string> => fs.promises.readFile(filePath, "utf8");

/**
 * Replace console output with spies for the duration of a test
 */
export const silenceConsole = () => ({
  log: vi.spyOn(console, "log").mockImplementation(() => {}),
  warn: vi.spyOn(console, "warn").mockImplementation(() => {}),
  error: vi.spyOn(console, "error").mockImplementation(() => {}),
});

export interface RecordingObserver extends ProgressObserver {
  events: ProgressEvent[];
}

export const createRecordingObserver = (): RecordingObserver => {
  const events: ProgressEvent[] = [];
  return {
    events,
    onProgress: (event) => {
      events.push(event);
    },
  };
};
