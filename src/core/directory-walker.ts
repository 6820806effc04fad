/**
 * Directory Walker
 * Traverses a scan root and sorts every file into a candidate or a skip
 */

import fs from "node:fs";
import type { Dirent, Stats } from "node:fs";
import path from "node:path";
import type { SkipReason } from "../interfaces/file-scanner.js";
import { formatError } from "../utils/error-handler.js";
import * as logger from "../utils/logger.js";
import { getRelativePath } from "../utils/path.js";
import { isSupportedImage } from "./image-classifier.js";
import type { PatternMatcher } from "./pattern-matcher.js";

export interface WalkCandidate {
  kind: "candidate";
  path: string;
  relativePath: string;
}

export interface WalkSkip {
  kind: "skipped";
  path: string;
  relativePath: string;
  reason: SkipReason;
}

export type WalkEntry = WalkCandidate | WalkSkip;

export interface WalkOptions {
  recursive: boolean;
  include: PatternMatcher | null;
  exclude: PatternMatcher | null;
  verbosity?: number;
}

interface WalkContext extends WalkOptions {
  rootPath: string;
  accumulator: WalkEntry[];
  verbosity: number;
}

/**
 * Filter order matters: exclude, then include, then extension. The first
 * rule that fires decides the skip reason.
 */
export const classifyFile = (
  filePath: string,
  relativePath: string,
  include: PatternMatcher | null,
  exclude: PatternMatcher | null
): WalkEntry => {
  if (exclude && exclude.matches(relativePath)) {
    return { kind: "skipped", path: filePath, relativePath, reason: "excluded by pattern" };
  }
  if (include && !include.matches(relativePath)) {
    return { kind: "skipped", path: filePath, relativePath, reason: "not included by pattern" };
  }
  if (!isSupportedImage(filePath)) {
    return { kind: "skipped", path: filePath, relativePath, reason: "unsupported extension" };
  }
  return { kind: "candidate", path: filePath, relativePath };
};

const readEntries = async (dirPath: string, verbosity: number): Promise<Dirent[] | null> => {
  try {
    const entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (error) {
    logger.warning(`Failed to read directory ${dirPath}: ${formatError(error)}`, verbosity);
    return null;
  }
};

/**
 * Symlinks and unknown entry types are resolved with stat(); entries that
 * cannot be resolved (broken links, permission denied) yield null
 */
const resolveEntryStats = async (entryPath: string, verbosity: number): Promise<Stats | null> => {
  try {
    return await fs.promises.stat(entryPath);
  } catch (error) {
    logger.warning(`Failed to access ${entryPath}: ${formatError(error)}`, verbosity);
    return null;
  }
};

const walk = async (dirPath: string, context: WalkContext): Promise<void> => {
  const entries = await readEntries(dirPath, context.verbosity);
  if (!entries) {
    return;
  }

  for (const entry of entries) {
    const entryPath = path.join(dirPath, entry.name);

    let isDirectory = entry.isDirectory();
    let isFile = entry.isFile();
    if (!isDirectory && !isFile) {
      const stats = await resolveEntryStats(entryPath, context.verbosity);
      if (!stats) {
        continue;
      }
      isDirectory = stats.isDirectory();
      isFile = stats.isFile();
    }

    if (isDirectory) {
      // Linked directories are not descended into, which rules out cycles
      if (entry.isSymbolicLink()) {
        logger.verbose(`Not following directory link ${entryPath}`, context.verbosity);
        continue;
      }
      if (context.recursive) {
        await walk(entryPath, context);
      }
      continue;
    }

    // Sockets, FIFOs and devices are never candidates
    if (!isFile) {
      logger.verbose(`Ignoring special file ${entryPath}`, context.verbosity);
      continue;
    }

    const relativePath = getRelativePath(context.rootPath, entryPath);
    context.accumulator.push(classifyFile(entryPath, relativePath, context.include, context.exclude));
  }
};

/**
 * Walk a root directory. Non-recursive walks only look at direct children.
 * Entries come back in name order per directory, so a stable listing gives
 * a stable result.
 */
export const walkDirectory = async (rootPath: string, options: WalkOptions): Promise<WalkEntry[]> => {
  const accumulator: WalkEntry[] = [];
  await walk(rootPath, {
    ...options,
    rootPath,
    accumulator,
    verbosity: options.verbosity ?? logger.Verbosity.Normal,
  });
  return accumulator;
};
