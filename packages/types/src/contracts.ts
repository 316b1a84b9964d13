/**
 * Collaborator Contracts
 *
 * What the reconciler needs from storage and from the network. Stores are
 * read-only from the reconciler's point of view except where noted;
 * network clients reject their promises on failure.
 */

import type {
  Checkpoint,
  KeyHex,
  ObservedIdentifier,
  RollingKey,
} from "./exposure.js";
import type { RawReport, ReportPayload } from "./report.js";

// =============================================================================
// Storage
// =============================================================================

/**
 * Catalogue of identifiers this device has heard.
 *
 * Writers must be safe under concurrent reads.
 */
export interface ObservationStore {
  /**
   * Record an observation.
   *
   * @returns true if newly inserted, false if the same identifier was
   *          already recorded at the same time
   */
  insert(observed: ObservedIdentifier): boolean;

  /** Every retained observation, in insertion order. */
  all(): readonly ObservedIdentifier[];
}

/**
 * History of this device's own rolling keys.
 */
export interface OwnKeyStore {
  /**
   * The `n` most recent keys, most recent first. May return fewer.
   */
  mostRecent(n: number): readonly RollingKey[];

  /** Record a newly issued key. */
  append(key: RollingKey): void;
}

/**
 * Persisted reconciliation checkpoint.
 */
export interface CheckpointStore {
  /** The saved checkpoint, or 0 if none was ever saved. */
  load(): Checkpoint;
  save(checkpoint: Checkpoint): void;
}

// =============================================================================
// Network
// =============================================================================

/**
 * Source of disclosed keys.
 */
export interface DisclosureKeyClient {
  /** Raw key strings disclosed since the checkpoint. */
  fetchKeysSince(checkpoint: Checkpoint): Promise<readonly string[]>;
}

/**
 * Report retrieval and submission.
 */
export interface ReportClient {
  /**
   * Reports attached to a disclosure key. A key disclosed more than once
   * carries more than one report.
   */
  fetchReports(keyValue: KeyHex): Promise<readonly RawReport[]>;

  submitReport(payload: ReportPayload): Promise<void>;
}
