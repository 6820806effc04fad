/**
 * Atomic Persister
 * Writes sidecars next to their originals with crash-safe replacement and
 * three generations of backups
 */

import fs from "node:fs";
import { SidecarSchema, type Sidecar } from "../../interfaces/sidecar.js";
import { IoError, ValidationError, formatError } from "../../utils/error-handler.js";
import { pathExists } from "../../utils/fs-utils.js";
import * as logger from "../../utils/logger.js";
import { serializeSidecar } from "./sidecar-model.js";

export const SIDECAR_SUFFIX = ".json";
export const TEMP_SUFFIX = ".tmp";

export type BackupGeneration = 1 | 2 | 3;

// Oldest first, so nothing is overwritten before it has moved on
const ROTATION_STEPS: ReadonlyArray<readonly [BackupGeneration, BackupGeneration]> = [
  [2, 3],
  [1, 2],
];

export const getSidecarPath = (originalPath: string): string => `${originalPath}${SIDECAR_SUFFIX}`;

export const getTempSidecarPath = (originalPath: string): string =>
  `${getSidecarPath(originalPath)}${TEMP_SUFFIX}`;

export const getBackupPath = (originalPath: string, generation: BackupGeneration): string =>
  `${getSidecarPath(originalPath)}.bak${generation}`;

const renameOrThrow = async (from: string, to: string): Promise<void> => {
  try {
    await fs.promises.rename(from, to);
  } catch (error) {
    throw new IoError(`Failed to rename ${from} to ${to}: ${formatError(error)}`);
  }
};

/**
 * Shift the backup chain by one generation: bak2 -> bak3, bak1 -> bak2,
 * current -> bak1. The previous bak3 is overwritten.
 *
 * A failure between two renames leaves the chain partially shifted; there is
 * no rollback.
 */
export const rotateBackups = async (originalPath: string, verbosity: number = logger.Verbosity.Normal): Promise<void> => {
  for (const [from, to] of ROTATION_STEPS) {
    const fromPath = getBackupPath(originalPath, from);
    if (await pathExists(fromPath)) {
      await renameOrThrow(fromPath, getBackupPath(originalPath, to));
    }
  }

  const sidecarPath = getSidecarPath(originalPath);
  if (await pathExists(sidecarPath)) {
    await renameOrThrow(sidecarPath, getBackupPath(originalPath, 1));
  }
  logger.verbose(`Rotated sidecar backups for ${originalPath}`, verbosity);
};

/**
 * Write the serialized record to the temp file and force it to disk
 */
const writeDurably = async (tempPath: string, contents: string): Promise<void> => {
  let handle: fs.promises.FileHandle | null = null;
  try {
    handle = await fs.promises.open(tempPath, "w");
    await handle.writeFile(contents, "utf8");
    await handle.sync();
  } catch (error) {
    throw new IoError(`Failed to write ${tempPath}: ${formatError(error)}`);
  } finally {
    await handle?.close();
  }
};

/**
 * Persist a sidecar for an original file.
 *
 * Readers only ever see the previous sidecar or the new one: the record is
 * written and synced to `<original>.json.tmp`, then renamed over the target.
 * @returns {Promise<string>} Path of the written sidecar
 */
export const writeSidecar = async (
  originalPath: string,
  sidecar: Sidecar,
  verbosity: number = logger.Verbosity.Normal
): Promise<string> => {
  const sidecarPath = getSidecarPath(originalPath);
  const tempPath = getTempSidecarPath(originalPath);

  if (await pathExists(sidecarPath)) {
    await rotateBackups(originalPath, verbosity);
  }

  await writeDurably(tempPath, serializeSidecar(sidecar));
  await renameOrThrow(tempPath, sidecarPath);

  logger.verbose(`Wrote sidecar ${sidecarPath}`, verbosity);
  return sidecarPath;
};

/**
 * Load and validate the sidecar stored next to an original file
 * @throws {IoError} when the sidecar cannot be read
 * @throws {ValidationError} when it is not a valid sidecar document
 */
export const readSidecar = async (originalPath: string): Promise<Sidecar> => {
  const sidecarPath = getSidecarPath(originalPath);

  let raw: string;
  try {
    raw = await fs.promises.readFile(sidecarPath, "utf8");
  } catch (error) {
    throw new IoError(`Failed to read sidecar ${sidecarPath}: ${formatError(error)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`JSON error in ${sidecarPath}: ${formatError(error)}`);
  }

  const parsed = SidecarSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ValidationError(`Invalid sidecar ${sidecarPath}: ${issues}`);
  }
  return parsed.data;
};
