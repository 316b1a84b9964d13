/**
 * @exposure/reconciler domain types.
 *
 * Outcomes and errors of:
 * - Identifier derivation
 * - Reconciliation runs (disclosed keys → matched reports)
 * - Report submission
 */

import type {
  Checkpoint,
  DisclosureKey,
  KeyHex,
  ReceivedReport,
  UnixSeconds,
} from "@exposure/types";

// =============================================================================
// Collaborators
// =============================================================================

/** Source of the current time in Unix seconds. */
export type Clock = () => UnixSeconds;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

/**
 * Decides whether a disclosure key explains any local observation.
 */
export interface KeyMatcher {
  hasMatches(key: DisclosureKey, asOf: UnixSeconds): boolean;
}

// =============================================================================
// Reconciliation Outcome
// =============================================================================

export interface ReconciliationStats {
  /** Key strings returned by the server */
  readonly fetchedKeys: number;
  /** Key strings dropped for not being valid key hex */
  readonly invalidKeys: number;
  /** Keys left after deduplication (each evaluated once) */
  readonly uniqueKeys: number;
  readonly matchedKeys: number;
  /** Matched keys whose report fetch failed */
  readonly failedReports: number;
}

export interface ReconciliationOutcome {
  readonly reports: readonly ReceivedReport[];
  /** Checkpoint to pass to the next run */
  readonly checkpoint: Checkpoint;
  readonly stats: ReconciliationStats;
}

// =============================================================================
// Errors
// =============================================================================

export type ReconciliationErrorCode =
  | "FETCH_KEYS_FAILED"
  | "NO_REPORTS_FETCHED";

/**
 * Terminal failure of a reconciliation run.
 */
export class ReconciliationError extends Error {
  constructor(
    public readonly code: ReconciliationErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ReconciliationError";
  }
}

/**
 * A single matched key whose reports could not be fetched.
 * Recovered inside the run; never surfaced to callers.
 */
export interface ReportFetchFailure {
  readonly keyValue: KeyHex;
  readonly cause: unknown;
}

export type SubmissionErrorCode =
  | "SUBMISSION_FAILED"
  | "NO_OWN_KEYS";

/**
 * Failure of a report submission, carried by the pipeline's `failed` state.
 */
export class SubmissionError extends Error {
  constructor(
    public readonly code: SubmissionErrorCode,
    message: string,
    public readonly reportId: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "SubmissionError";
  }
}

export type DerivationErrorCode =
  | "INVALID_KEY"
  | "INVALID_WINDOW";

/**
 * Thrown when derivation is called with a malformed key or window.
 * These are caller bugs, not runtime conditions to recover from.
 */
export class DerivationError extends Error {
  constructor(
    public readonly code: DerivationErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "DerivationError";
  }
}
