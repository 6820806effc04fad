import { formatTimestamp } from "../utils/fs-utils.js";

/**
 * Result wrapper with timing metadata, printed by the CLI in JSON mode
 */
export interface OperationResponse<T> {
  started_at: string;
  finished_at: string;
  duration_ms: number;
  data: T;
}

/**
 * @throws {InternalError} when either date is invalid
 */
export const createOperationResponse = <T>(data: T, startedAt: Date, finishedAt: Date): OperationResponse<T> => ({
  started_at: formatTimestamp(startedAt),
  finished_at: formatTimestamp(finishedAt),
  duration_ms: Math.max(0, finishedAt.getTime() - startedAt.getTime()),
  data,
});
