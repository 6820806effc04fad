/**
 * File scanner related interfaces and types
 */

import type { ProgressObserver } from "./progress.js";

export type SkipReason =
  | "excluded by pattern"
  | "not included by pattern"
  | "unsupported extension"
  | "dry run";

export interface WrittenFile {
  action: "written";
  path: string;
  sidecarPath: string;
  hash: string;
  sizeBytes: number;
}

export interface SkippedFile {
  action: "skipped";
  path: string;
  reason: SkipReason;
  // Present only when the file was read (dry run)
  hash?: string;
  sizeBytes?: number;
}

export interface FailedFile {
  action: "failed";
  path: string;
  error: string;
}

/**
 * Per-file outcome of a scan
 */
export type ScannedFile = WrittenFile | SkippedFile | FailedFile;

export type ScanAction = ScannedFile["action"];

/**
 * Aggregate outcome of one scan invocation.
 * totalFiles === successful + failed + skipped
 */
export interface ScanResult {
  scannedFiles: ScannedFile[];
  totalFiles: number;
  successful: number;
  failed: number;
  skipped: number;
}

export interface PatternOptions {
  include?: string[];
  exclude?: string[];
}

export interface ScanOptions extends PatternOptions {
  recursive?: boolean;
  dryRun?: boolean;
  // Upper bound on files scanned concurrently
  maxThreads?: number;
  observer?: ProgressObserver;
  verbosity?: number;
  producerVersion?: string;
}

export interface ScanFileOptions {
  dryRun?: boolean;
  producerVersion?: string;
}
