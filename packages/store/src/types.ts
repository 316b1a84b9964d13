/**
 * @exposure/store — Errors.
 */

/**
 * Error codes for store operations.
 */
export type StoreErrorCode =
  | "INVALID_RECORD"
  | "INVALID_CHECKPOINT"
  | "INVALID_LIMIT";

/**
 * Error thrown by store operations.
 */
export class StoreError extends Error {
  constructor(
    public readonly code: StoreErrorCode,
    message: string,
    public readonly filePath?: string,
  ) {
    super(message);
    this.name = "StoreError";
  }
}
