import os from "node:os";

export const MAX_THREADS_LIMIT = 64;

/**
 * Worker count for scanning: explicit value wins, otherwise twice the CPU
 * count capped at 8
 */
export const getOptimalConcurrency = (requested?: number): number => {
  if (requested !== undefined && requested > 0) {
    return Math.min(requested, MAX_THREADS_LIMIT);
  }
  return Math.max(1, Math.min(os.availableParallelism() * 2, 8));
};
