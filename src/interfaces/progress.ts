/**
 * Progress events emitted while files are processed
 */

export interface FileStartedEvent {
  type: "fileStarted";
  path: string;
}

export interface FileCompletedEvent {
  type: "fileCompleted";
  path: string;
  success: boolean;
  error?: string;
  sizeBytes?: number;
}

export type ProgressEvent = FileStartedEvent | FileCompletedEvent;

/**
 * Receives progress events. For any one file, fileStarted is always
 * delivered before its fileCompleted.
 */
export interface ProgressObserver {
  onProgress(event: ProgressEvent): void;
}
