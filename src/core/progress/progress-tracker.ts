/**
 * ProgressTracker
 * Prints per-file progress lines and the final summary for human output
 */

import chalk from "chalk";
import type { ProgressEvent, ProgressObserver } from "../../interfaces/progress.js";
import type { ScanResult } from "../../interfaces/file-scanner.js";
import type { CleanupResult } from "../cleanup/cleanup-manager.js";
import * as logger from "../../utils/logger.js";
import { getDisplayPath } from "../../utils/path.js";

export class ProgressTracker implements ProgressObserver {
  readonly basePath: string;
  readonly verbosity: number;
  startedFiles: number;
  completedFiles: number;
  failedFiles: number;
  processedBytes: number;

  /**
   * @param {string} basePath - Paths are printed relative to this
   */
  constructor(basePath: string, verbosity: number = logger.Verbosity.Normal) {
    this.basePath = basePath;
    this.verbosity = verbosity;
    this.startedFiles = 0;
    this.completedFiles = 0;
    this.failedFiles = 0;
    this.processedBytes = 0;
  }

  onProgress(event: ProgressEvent): void {
    const displayPath = getDisplayPath(this.basePath, event.path);

    if (event.type === "fileStarted") {
      this.startedFiles++;
      logger.verbose(`Processing ${displayPath}`, this.verbosity);
      return;
    }

    if (event.success) {
      this.completedFiles++;
      this.processedBytes += event.sizeBytes ?? 0;
      if (this.verbosity > logger.Verbosity.Quiet) {
        logger.always(`${displayPath} ... ${chalk.green("✓")}`);
      }
    } else {
      this.failedFiles++;
      // Failures are shown even in quiet mode
      logger.always(`${displayPath} ... ${chalk.red("✗")} ${event.error ?? "unknown error"}`);
    }
  }

  /**
   * Files started but not yet completed
   */
  get inFlight(): number {
    return this.startedFiles - this.completedFiles - this.failedFiles;
  }

  displayScanSummary(result: ScanResult, durationMs: number): void {
    logger.always("");
    logger.always(`Processed ${result.totalFiles} files in ${(durationMs / 1000).toFixed(2)}s`);
    logger.always(`  Successful: ${result.successful}`);
    logger.always(`  Failed: ${result.failed}`);
    logger.always(`  Skipped: ${result.skipped}`);
  }

  displayCleanupSummary(result: CleanupResult, durationMs: number, dryRun: boolean): void {
    const verb = dryRun ? "Would delete" : "Deleted";
    logger.always("");
    logger.always(`${verb} ${result.totalFiles} files (${result.totalBytes} bytes) in ${(durationMs / 1000).toFixed(2)}s`);
    if (result.failed > 0) {
      logger.always(chalk.yellow(`  Failed: ${result.failed}`));
    }
  }
}
