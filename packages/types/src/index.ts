/**
 * @exposure/types — Shared domain types for the exposure reconciliation kit.
 *
 * Used across all packages:
 * - Rolling keys, identifiers, observations and disclosures
 * - Symptom reports and their wire payloads
 * - Result and operation-state values
 * - Storage and network contracts
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 */

// Exposure types
export type {
  KeyHex,
  IdentifierHex,
  UnixSeconds,
  Checkpoint,
  RollingKey,
  ObservedIdentifier,
  DisclosureKey,
} from "./exposure.js";

// Report types
export type {
  SymptomReport,
  ReportPayload,
  RawReport,
  ReceivedReport,
} from "./report.js";

// Result
export type { Ok, Err, Result } from "./result.js";
export { ok, err, partitionResults } from "./result.js";

// Operation state
export type { OperationState, OperationStatus, Subscription } from "./state.js";
export { IDLE, IN_PROGRESS, SUCCEEDED, failed } from "./state.js";

// Contracts
export type {
  ObservationStore,
  OwnKeyStore,
  CheckpointStore,
  DisclosureKeyClient,
  ReportClient,
} from "./contracts.js";

// Runtime type guards
export {
  TOKEN_BYTES,
  isKeyHex,
  isIdentifierHex,
  isUnixSeconds,
  isRollingKey,
  isObservedIdentifier,
} from "./guards.js";
