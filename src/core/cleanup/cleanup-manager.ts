/**
 * Cleanup Manager
 * Removes files generated by the scanner (sidecars, backups, thumbnails,
 * cache directories). Original images are never removed.
 */

import fs from "node:fs";
import path from "node:path";
import type { ProgressObserver } from "../../interfaces/progress.js";
import { IoError, ValidationError, formatError, handleError } from "../../utils/error-handler.js";
import { statOrNull } from "../../utils/fs-utils.js";
import * as logger from "../../utils/logger.js";
import { isSupportedImage } from "../image-classifier.js";
import {
  SIDECAR_SUFFIX,
  getBackupPath,
  getSidecarPath,
  getTempSidecarPath,
  readSidecar,
} from "../sidecar/sidecar-writer.js";

export const CACHE_DIR_NAME = ".jozin";

export type GeneratedFileType = "sidecar" | "backup" | "thumbnail" | "cache";

export type CleanupTarget = "all" | "sidecars" | "backups" | "thumbnails" | "cache";

export interface DeletedFile {
  path: string;
  fileType: GeneratedFileType;
  sizeBytes: number;
}

export interface CleanupFailure {
  path: string;
  error: string;
}

export interface CleanupResult {
  deletedFiles: DeletedFile[];
  failures: CleanupFailure[];
  totalFiles: number;
  totalBytes: number;
  failed: number;
}

export interface CleanupOptions {
  recursive?: boolean;
  dryRun?: boolean;
  target?: CleanupTarget;
  observer?: ProgressObserver;
  verbosity?: number;
}

const TARGET_TYPES: Record<CleanupTarget, ReadonlySet<GeneratedFileType>> = {
  all: new Set(["sidecar", "backup", "thumbnail", "cache"]),
  sidecars: new Set(["sidecar"]),
  backups: new Set(["backup"]),
  thumbnails: new Set(["thumbnail"]),
  cache: new Set(["cache"]),
};

const BACKUP_PATTERN = /^(.+)\.json\.(?:bak[1-3]|tmp)$/;
const THUMBNAIL_PATTERN = /^(.+)_(\d+)\.(?:jpg|webp)$/i;

/**
 * Decide whether a file name is something the scanner (or its thumbnail
 * collaborator) generated. `siblings` are the other names in the same
 * directory. A thumbnail only counts when a sidecar in the directory lists
 * it, its source image sits beside it, and it has no sidecar of its own.
 */
export const classifyGeneratedFile = (
  fileName: string,
  siblings: ReadonlySet<string>,
  listedThumbnails: ReadonlySet<string> = new Set()
): GeneratedFileType | null => {
  const backup = BACKUP_PATTERN.exec(fileName);
  if (backup && isSupportedImage(backup[1])) {
    return "backup";
  }

  if (isSidecarName(fileName)) {
    return "sidecar";
  }

  const thumbnail = THUMBNAIL_PATTERN.exec(fileName);
  if (!thumbnail || !listedThumbnails.has(fileName) || siblings.has(`${fileName}${SIDECAR_SUFFIX}`)) {
    return null;
  }
  const stem = thumbnail[1];
  for (const sibling of siblings) {
    if (sibling !== fileName && isSupportedImage(sibling) && path.parse(sibling).name === stem) {
      return "thumbnail";
    }
  }
  return null;
};

const isSidecarName = (fileName: string): boolean =>
  fileName.endsWith(SIDECAR_SUFFIX) && isSupportedImage(fileName.slice(0, -SIDECAR_SUFFIX.length));

/**
 * Names of thumbnails in `dirPath` that the sidecars there list. Sidecars
 * that cannot be read contribute nothing.
 */
const loadListedThumbnails = async (
  dirPath: string,
  names: ReadonlySet<string>,
  verbosity: number
): Promise<Set<string>> => {
  const listed = new Set<string>();
  for (const name of names) {
    if (!isSidecarName(name)) {
      continue;
    }
    const originalPath = path.join(dirPath, name.slice(0, -SIDECAR_SUFFIX.length));
    try {
      const sidecar = await readSidecar(originalPath);
      for (const thumbnail of sidecar.thumbnails) {
        const thumbnailPath = path.resolve(dirPath, thumbnail.path);
        if (path.dirname(thumbnailPath) === dirPath) {
          listed.add(path.basename(thumbnailPath));
        }
      }
    } catch (error) {
      logger.warning(`Ignoring thumbnails listed in ${path.join(dirPath, name)}: ${formatError(error)}`, verbosity);
    }
  }
  return listed;
};

const directorySize = async (dirPath: string): Promise<number> => {
  let total = 0;
  const entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
  for (const entry of entries) {
    const entryPath = path.join(dirPath, entry.name);
    if (entry.isDirectory()) {
      total += await directorySize(entryPath);
    } else {
      const stats = await fs.promises.lstat(entryPath);
      total += stats.size;
    }
  }
  return total;
};

interface PendingDeletion {
  path: string;
  fileType: GeneratedFileType;
}

const collectFromDirectory = async (
  dirPath: string,
  types: ReadonlySet<GeneratedFileType>,
  recursive: boolean,
  pending: PendingDeletion[],
  verbosity: number
): Promise<void> => {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    logger.warning(`Failed to read directory ${dirPath}: ${formatError(error)}`, verbosity);
    return;
  }
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const names = new Set(entries.map((entry) => entry.name));
  const listedThumbnails = types.has("thumbnail")
    ? await loadListedThumbnails(dirPath, names, verbosity)
    : new Set<string>();

  for (const entry of entries) {
    const entryPath = path.join(dirPath, entry.name);

    if (entry.isDirectory()) {
      // The cache directory is removed whole or left alone, never walked
      if (entry.name === CACHE_DIR_NAME) {
        if (types.has("cache")) {
          pending.push({ path: entryPath, fileType: "cache" });
        }
      } else if (recursive) {
        await collectFromDirectory(entryPath, types, recursive, pending, verbosity);
      }
      continue;
    }

    if (!entry.isFile()) {
      continue;
    }

    const fileType = classifyGeneratedFile(entry.name, names, listedThumbnails);
    if (fileType && types.has(fileType)) {
      pending.push({ path: entryPath, fileType });
    }
  }
};

/**
 * For a single original, its generated companions; for a generated file, itself
 */
const collectForFile = async (
  filePath: string,
  types: ReadonlySet<GeneratedFileType>,
  verbosity: number
): Promise<PendingDeletion[]> => {
  const dirPath = path.dirname(filePath);
  const siblings = new Set(await fs.promises.readdir(dirPath));
  const listedThumbnails = types.has("thumbnail")
    ? await loadListedThumbnails(dirPath, siblings, verbosity)
    : new Set<string>();
  const ownType = classifyGeneratedFile(path.basename(filePath), siblings, listedThumbnails);
  if (ownType) {
    return types.has(ownType) ? [{ path: filePath, fileType: ownType }] : [];
  }

  const companions: PendingDeletion[] = [
    { path: getSidecarPath(filePath), fileType: "sidecar" },
    { path: getTempSidecarPath(filePath), fileType: "backup" },
    { path: getBackupPath(filePath, 1), fileType: "backup" },
    { path: getBackupPath(filePath, 2), fileType: "backup" },
    { path: getBackupPath(filePath, 3), fileType: "backup" },
  ];
  return companions.filter((companion) => types.has(companion.fileType) && siblings.has(path.basename(companion.path)));
};

/**
 * Remove generated files under a path. A dry run reports what would be
 * removed without touching anything.
 * @throws {IoError} when the path does not exist
 */
export const cleanupPath = async (targetPath: string, options: CleanupOptions = {}): Promise<CleanupResult> => {
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;
  const types = TARGET_TYPES[options.target ?? "all"];
  const resolvedPath = path.resolve(targetPath);

  const stats = await statOrNull(resolvedPath);
  if (!stats) {
    throw new IoError(`Path not found: ${resolvedPath}`);
  }

  let pending: PendingDeletion[];
  if (stats.isDirectory()) {
    pending = [];
    await collectFromDirectory(resolvedPath, types, options.recursive ?? false, pending, verbosity);
  } else if (stats.isFile()) {
    pending = await collectForFile(resolvedPath, types, verbosity);
  } else {
    throw new ValidationError(`Path is neither a file nor a directory: ${resolvedPath}`);
  }

  const result: CleanupResult = { deletedFiles: [], failures: [], totalFiles: 0, totalBytes: 0, failed: 0 };

  for (const item of pending) {
    options.observer?.onProgress({ type: "fileStarted", path: item.path });
    try {
      const sizeBytes = item.fileType === "cache"
        ? await directorySize(item.path)
        : (await fs.promises.lstat(item.path)).size;

      if (options.dryRun) {
        logger.verbose(`Would remove ${item.path}`, verbosity);
      } else {
        await fs.promises.rm(item.path, { recursive: item.fileType === "cache" });
        logger.verbose(`Removed ${item.path}`, verbosity);
      }

      result.deletedFiles.push({ path: item.path, fileType: item.fileType, sizeBytes });
      result.totalFiles++;
      result.totalBytes += sizeBytes;
      options.observer?.onProgress({ type: "fileCompleted", path: item.path, success: true, sizeBytes });
    } catch (error) {
      const { error: message } = handleError(error, `Failed to remove ${item.path}`, verbosity);
      result.failures.push({ path: item.path, error: message });
      result.failed++;
      options.observer?.onProgress({ type: "fileCompleted", path: item.path, success: false, error: message });
    }
  }

  return result;
};
