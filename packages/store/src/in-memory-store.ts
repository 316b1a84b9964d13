/**
 * @exposure/store — In-memory stores.
 *
 * Suitable for tests and short-lived processes; all state is lost on exit.
 * The JSONL stores use these as their in-memory index.
 */

import { isObservedIdentifier, isRollingKey, isUnixSeconds } from "@exposure/types";
import type {
  Checkpoint,
  CheckpointStore,
  ObservationStore,
  ObservedIdentifier,
  OwnKeyStore,
  RollingKey,
} from "@exposure/types";
import { StoreError } from "./types.js";

function observationKey(observed: ObservedIdentifier): string {
  return `${observed.identifier}@${observed.observedAt}`;
}

export function assertObservation(value: unknown, filePath?: string): ObservedIdentifier {
  if (!isObservedIdentifier(value)) {
    throw new StoreError(
      "INVALID_RECORD",
      "Observation must carry a 32-character hex identifier and a non-negative integer observedAt",
      filePath,
    );
  }
  return { identifier: value.identifier, observedAt: value.observedAt };
}

export function assertRollingKey(value: unknown, filePath?: string): RollingKey {
  if (!isRollingKey(value)) {
    throw new StoreError(
      "INVALID_RECORD",
      "Rolling key must carry a 32-character hex value, issuedAt and windowCount",
      filePath,
    );
  }
  return { value: value.value, issuedAt: value.issuedAt, windowCount: value.windowCount };
}

// =============================================================================
// Observations
// =============================================================================

export class InMemoryObservationStore implements ObservationStore {
  private readonly _log: ObservedIdentifier[] = [];
  private readonly _seen = new Set<string>();

  insert(observed: ObservedIdentifier): boolean {
    const record = assertObservation(observed);
    const key = observationKey(record);
    if (this._seen.has(key)) {
      return false;
    }
    this._seen.add(key);
    this._log.push(record);
    return true;
  }

  has(observed: ObservedIdentifier): boolean {
    return this._seen.has(observationKey(observed));
  }

  all(): readonly ObservedIdentifier[] {
    return [...this._log];
  }

  get size(): number {
    return this._log.length;
  }
}

// =============================================================================
// Own keys
// =============================================================================

export class InMemoryOwnKeyStore implements OwnKeyStore {
  /** Oldest first */
  private readonly _keys: RollingKey[] = [];

  mostRecent(n: number): readonly RollingKey[] {
    if (!Number.isInteger(n) || n < 0) {
      throw new StoreError("INVALID_LIMIT", `Key count must be a non-negative integer, got ${n}`);
    }
    return this._keys.slice(Math.max(0, this._keys.length - n)).reverse();
  }

  append(key: RollingKey): void {
    this._keys.push(assertRollingKey(key));
  }

  get size(): number {
    return this._keys.length;
  }
}

// =============================================================================
// Checkpoint
// =============================================================================

export class InMemoryCheckpointStore implements CheckpointStore {
  private _checkpoint: Checkpoint;

  constructor(initial: Checkpoint = 0) {
    this._checkpoint = initial;
  }

  load(): Checkpoint {
    return this._checkpoint;
  }

  save(checkpoint: Checkpoint): void {
    if (!isUnixSeconds(checkpoint)) {
      throw new StoreError(
        "INVALID_CHECKPOINT",
        `Checkpoint must be a non-negative integer, got ${checkpoint}`,
      );
    }
    this._checkpoint = checkpoint;
  }
}
