/**
 * Scan and cleanup runners used by the CLI.
 * They pick the output mode, time the operation and print the result.
 */

import path from "node:path";
import { cleanupPath, type CleanupResult, type CleanupTarget } from "./core/cleanup/cleanup-manager.js";
import { scanPath } from "./core/file-scanner.js";
import { createOperationResponse } from "./core/operation-response.js";
import { ProgressTracker } from "./core/progress/progress-tracker.js";
import type { ScanResult } from "./interfaces/file-scanner.js";
import * as logger from "./utils/logger.js";

export interface OutputOptions {
  // JSON on stdout instead of progress lines
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

export interface ScanCommandOptions extends OutputOptions {
  recursive?: boolean;
  include?: string[];
  exclude?: string[];
  dryRun?: boolean;
  maxThreads: number;
}

export interface CleanupCommandOptions extends OutputOptions {
  recursive?: boolean;
  dryRun?: boolean;
  target?: CleanupTarget;
}

// JSON output must stay parseable, so it silences the logger
const outputVerbosity = (options: OutputOptions): logger.Verbosity =>
  options.json ? logger.Verbosity.Quiet : logger.resolveVerbosity(options);

const printJson = (value: unknown): void => {
  logger.always(JSON.stringify(value, null, 2));
};

/**
 * Scan a path and print either progress lines and a summary or a timed
 * JSON response
 */
export async function runScan(targetPath: string, options: ScanCommandOptions): Promise<ScanResult> {
  const verbosity = outputVerbosity(options);
  const tracker = options.json ? undefined : new ProgressTracker(path.resolve(targetPath), verbosity);

  const startedAt = new Date();
  const result = await scanPath(targetPath, {
    recursive: options.recursive,
    include: options.include,
    exclude: options.exclude,
    dryRun: options.dryRun,
    maxThreads: options.maxThreads,
    observer: tracker,
    verbosity,
  });
  const finishedAt = new Date();

  if (tracker) {
    tracker.displayScanSummary(result, finishedAt.getTime() - startedAt.getTime());
  } else {
    printJson(createOperationResponse(result, startedAt, finishedAt));
  }
  return result;
}

export async function runCleanup(targetPath: string, options: CleanupCommandOptions): Promise<CleanupResult> {
  const verbosity = outputVerbosity(options);
  const tracker = options.json ? undefined : new ProgressTracker(path.resolve(targetPath), verbosity);

  const startedAt = new Date();
  const result = await cleanupPath(targetPath, {
    recursive: options.recursive,
    dryRun: options.dryRun,
    target: options.target,
    observer: tracker,
    verbosity,
  });
  const finishedAt = new Date();

  if (tracker) {
    tracker.displayCleanupSummary(result, finishedAt.getTime() - startedAt.getTime(), options.dryRun ?? false);
  } else {
    printJson(createOperationResponse(result, startedAt, finishedAt));
  }
  return result;
}
