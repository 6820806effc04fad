export { scanPath, scanFile, summarizeScan } from "./core/file-scanner.js";
export { compilePatterns, compileOptionalPatterns, type PatternMatcher } from "./core/pattern-matcher.js";
export { isSupportedImage, SUPPORTED_EXTENSIONS } from "./core/image-classifier.js";
export { walkDirectory, classifyFile, type WalkEntry, type WalkOptions } from "./core/directory-walker.js";
export { runScanQueue } from "./core/scan-queue.js";
export {
  SCHEMA_VERSION,
  buildSidecar,
  createPipelineSignature,
  isCompatible,
  serializeSidecar,
} from "./core/sidecar/sidecar-model.js";
export {
  getBackupPath,
  getSidecarPath,
  readSidecar,
  rotateBackups,
  writeSidecar,
} from "./core/sidecar/sidecar-writer.js";
export {
  cleanupPath,
  classifyGeneratedFile,
  type CleanupOptions,
  type CleanupResult,
  type CleanupTarget,
} from "./core/cleanup/cleanup-manager.js";
export { createOperationResponse, type OperationResponse } from "./core/operation-response.js";
export { ProgressTracker } from "./core/progress/progress-tracker.js";
export {
  JozinError,
  UserError,
  IoError,
  ValidationError,
  InternalError,
  type ErrorKind,
} from "./utils/error-handler.js";
export { calculateChecksum, HASH_ALGORITHM } from "./utils/fs-utils.js";
export { Verbosity } from "./interfaces/logger.js";
export type * from "./interfaces/file-scanner.js";
export type * from "./interfaces/progress.js";
export type * from "./interfaces/sidecar.js";
export { SidecarSchema, PipelineSignatureSchema } from "./interfaces/sidecar.js";
export { VERSION } from "./version.js";
