/**
 * Scan Queue
 * Runs per-file work with bounded concurrency
 */

import * as logger from "../utils/logger.js";

export type QueueHandler<T, R> = (item: T, index: number) => Promise<R>;

/**
 * Process every item with at most `maxConcurrency` handlers in flight.
 * Results are stored by input position, so their order never depends on
 * which handler finishes first. The first handler rejection rejects the
 * whole queue.
 */
export const runScanQueue = async <T, R>(
  items: readonly T[],
  maxConcurrency: number,
  handler: QueueHandler<T, R>,
  verbosity: number = logger.Verbosity.Normal
): Promise<R[]> => {
  const results = new Array<R>(items.length);
  const workerCount = Math.max(1, Math.min(maxConcurrency, items.length));
  let nextIndex = 0;

  logger.verbose(`Processing ${items.length} files with ${workerCount} workers`, verbosity);

  const worker = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      results[index] = await handler(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
};
