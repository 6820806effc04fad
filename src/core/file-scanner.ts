/**
 * File Scanner
 * Entry point for scanning a single image or a directory tree and writing
 * sidecars for every supported image found
 */

import fs from "node:fs";
import path from "node:path";
import type {
  ScanFileOptions,
  ScannedFile,
  ScanOptions,
  ScanResult,
} from "../interfaces/file-scanner.js";
import type { ProgressObserver } from "../interfaces/progress.js";
import type { Sidecar } from "../interfaces/sidecar.js";
import {
  InternalError,
  IoError,
  UserError,
  ValidationError,
  formatError,
  toJozinError,
} from "../utils/error-handler.js";
import { calculateChecksum, formatTimestamp, statOrNull } from "../utils/fs-utils.js";
import * as logger from "../utils/logger.js";
import { walkDirectory, type WalkCandidate } from "./directory-walker.js";
import { isSupportedImage } from "./image-classifier.js";
import { compileOptionalPatterns } from "./pattern-matcher.js";
import { runScanQueue } from "./scan-queue.js";
import { buildSidecar } from "./sidecar/sidecar-model.js";
import { getSidecarPath, writeSidecar } from "./sidecar/sidecar-writer.js";

/**
 * Scan one file and build its sidecar. Unless this is a dry run the sidecar
 * is persisted before returning; a dry run touches nothing on disk.
 * @throws {IoError} when the file is missing or unreadable
 * @throws {ValidationError} when the path is not a regular file
 */
export const scanFile = async (
  filePath: string,
  options: ScanFileOptions = {},
  verbosity: number = logger.Verbosity.Normal
): Promise<Sidecar> => {
  let stats: fs.Stats | null;
  try {
    stats = await statOrNull(filePath);
  } catch (error) {
    throw new IoError(`Failed to read metadata for ${filePath}: ${formatError(error)}`);
  }
  if (!stats) {
    throw new IoError(`File not found: ${filePath}`);
  }
  if (!stats.isFile()) {
    throw new ValidationError(`Path is not a file: ${filePath}`);
  }

  const fileModifiedAt = formatTimestamp(stats.mtime);
  logger.verbose(`Calculating checksum for ${filePath}`, verbosity);
  const fileHash = await calculateChecksum(filePath);
  const now = formatTimestamp(new Date());

  const sidecar = buildSidecar(
    {
      file_path: filePath,
      file_size_bytes: stats.size,
      file_hash: fileHash,
      file_modified_at: fileModifiedAt,
    },
    now,
    { producerVersion: options.producerVersion }
  );

  if (!options.dryRun) {
    await writeSidecar(filePath, sidecar, verbosity);
  }

  return sidecar;
};

const toScannedFile = (filePath: string, sidecar: Sidecar, dryRun: boolean): ScannedFile => {
  if (dryRun) {
    return {
      action: "skipped",
      path: filePath,
      reason: "dry run",
      hash: sidecar.source.file_hash,
      sizeBytes: sidecar.source.file_size_bytes,
    };
  }
  return {
    action: "written",
    path: filePath,
    sidecarPath: getSidecarPath(filePath),
    hash: sidecar.source.file_hash,
    sizeBytes: sidecar.source.file_size_bytes,
  };
};

/**
 * Scan one candidate, turning a per-file failure into a failed entry.
 * Internal errors are bugs and still propagate.
 */
const scanCandidate = async (
  filePath: string,
  options: ScanOptions,
  verbosity: number
): Promise<ScannedFile> => {
  try {
    const sidecar = await scanFile(
      filePath,
      { dryRun: options.dryRun, producerVersion: options.producerVersion },
      verbosity
    );
    return toScannedFile(filePath, sidecar, options.dryRun ?? false);
  } catch (error) {
    const jozinError = toJozinError(error);
    if (jozinError instanceof InternalError) {
      throw jozinError;
    }
    logger.verbose(`Failed to scan ${filePath}: ${jozinError.message}`, verbosity);
    return { action: "failed", path: filePath, error: jozinError.message };
  }
};

/**
 * Fold per-file outcomes into the aggregate counters
 */
export const summarizeScan = (scannedFiles: ScannedFile[]): ScanResult => {
  const result: ScanResult = {
    scannedFiles,
    totalFiles: scannedFiles.length,
    successful: 0,
    failed: 0,
    skipped: 0,
  };
  for (const file of scannedFiles) {
    switch (file.action) {
      case "written":
        result.successful++;
        break;
      case "failed":
        result.failed++;
        break;
      case "skipped":
        result.skipped++;
        break;
    }
  }
  return result;
};

const notifyCompleted = (observer: ProgressObserver | undefined, outcome: ScannedFile): void => {
  if (!observer) {
    return;
  }
  if (outcome.action === "failed") {
    observer.onProgress({ type: "fileCompleted", path: outcome.path, success: false, error: outcome.error });
  } else {
    observer.onProgress({ type: "fileCompleted", path: outcome.path, success: true, sizeBytes: outcome.sizeBytes });
  }
};

const scanSingleFile = async (filePath: string, options: ScanOptions, verbosity: number): Promise<ScanResult> => {
  if (!isSupportedImage(filePath)) {
    throw new ValidationError(`Not an image file: ${filePath}`);
  }

  options.observer?.onProgress({ type: "fileStarted", path: filePath });
  const outcome = await scanCandidate(filePath, options, verbosity);
  notifyCompleted(options.observer, outcome);

  return summarizeScan([outcome]);
};

const scanDirectory = async (dirPath: string, options: ScanOptions, verbosity: number): Promise<ScanResult> => {
  // Patterns are compiled before traversal so a bad glob fails the whole call
  const include = compileOptionalPatterns(options.include);
  const exclude = compileOptionalPatterns(options.exclude);

  logger.info(`Scanning ${dirPath}${options.recursive ? " recursively" : ""}...`, verbosity);
  const entries = await walkDirectory(dirPath, {
    recursive: options.recursive ?? false,
    include,
    exclude,
    verbosity,
  });

  const candidates: WalkCandidate[] = entries.filter((entry): entry is WalkCandidate => entry.kind === "candidate");
  logger.verbose(`Found ${entries.length} files, ${candidates.length} to scan`, verbosity);

  const outcomes = await runScanQueue(
    candidates,
    options.maxThreads ?? 1,
    async (candidate) => {
      options.observer?.onProgress({ type: "fileStarted", path: candidate.path });
      const outcome = await scanCandidate(candidate.path, options, verbosity);
      notifyCompleted(options.observer, outcome);
      return outcome;
    },
    verbosity
  );

  // Merge back into walk order: filtered skips keep their listing position
  let nextOutcome = 0;
  const scannedFiles = entries.map((entry): ScannedFile =>
    entry.kind === "candidate"
      ? outcomes[nextOutcome++]
      : { action: "skipped", path: entry.path, reason: entry.reason }
  );

  return summarizeScan(scannedFiles);
};

/**
 * Scan a file or a directory.
 *
 * Only path-level problems fail the call: a missing path, an unsupported
 * single file, a path that is neither file nor directory, or invalid
 * options. Per-file failures are reported in the result.
 */
export const scanPath = async (targetPath: string, options: ScanOptions = {}): Promise<ScanResult> => {
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;

  if (options.maxThreads !== undefined && (!Number.isInteger(options.maxThreads) || options.maxThreads < 1)) {
    throw new UserError(`max threads must be a positive integer, got ${options.maxThreads}`);
  }

  const resolvedPath = path.resolve(targetPath);
  let stats: fs.Stats | null;
  try {
    stats = await statOrNull(resolvedPath);
  } catch (error) {
    throw new IoError(`Failed to access ${resolvedPath}: ${formatError(error)}`);
  }
  if (!stats) {
    throw new IoError(`Path not found: ${resolvedPath}`);
  }

  if (stats.isFile()) {
    return scanSingleFile(resolvedPath, options, verbosity);
  }
  if (stats.isDirectory()) {
    return scanDirectory(resolvedPath, options, verbosity);
  }
  throw new ValidationError(`Path is neither a file nor a directory: ${resolvedPath}`);
};
