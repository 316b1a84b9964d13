/**
 * @exposure/reconciler — Exposure matching and reporting engine.
 *
 * Inbound: reconciles identifiers this device has observed against keys
 * disclosed by symptomatic users, and fetches the reports of matching keys.
 *
 * Outbound: submits this device's symptom reports tagged with its own
 * recent rolling keys, publishing the submission state to observers.
 */

// Reconciliation workflow
export { Reconciler, dedupeByValue, decodeReport } from "./reconciler.js";
export type { ReconcilerConfig } from "./reconciler.js";

// Derivation
export {
  DEFAULT_WINDOW_SECONDS,
  MAX_WINDOW_INDEX,
  derive,
  deriveAll,
  deriveRange,
  isKeyValidAt,
  windowIndexOf,
  windowStart,
} from "./derivation.js";

// Matcher
export { DisclosureMatcher, DEFAULT_LOOKBACK_WINDOWS } from "./matcher.js";
export type { DisclosureMatcherConfig, ValidityInterval } from "./matcher.js";

// Submission
export {
  ReportSubmissionPipeline,
  buildReportPayload,
  DEFAULT_REPORT_KEY_COUNT,
} from "./submission-pipeline.js";
export type {
  NoOwnKeysPolicy,
  SubmissionPipelineConfig,
} from "./submission-pipeline.js";
export { OperationStateChannel } from "./state-channel.js";
export type { StateHandler } from "./state-channel.js";

// Own keys
export { KeyRotator, randomKey, DEFAULT_KEY_WINDOW_COUNT } from "./key-rotation.js";
export type { KeyRotatorConfig, BroadcastIdentifier } from "./key-rotation.js";

// Types
export {
  ReconciliationError,
  SubmissionError,
  DerivationError,
  systemClock,
} from "./types.js";
export type {
  Clock,
  KeyMatcher,
  ReconciliationOutcome,
  ReconciliationStats,
  ReconciliationErrorCode,
  ReportFetchFailure,
  SubmissionErrorCode,
  DerivationErrorCode,
} from "./types.js";
