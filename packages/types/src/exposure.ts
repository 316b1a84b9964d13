/**
 * Exposure Types
 *
 * Rolling keys, the contact identifiers derived from them, and the
 * observations and disclosures the reconciler works with.
 *
 * Rules:
 * - Byte values travel as lower-case hex strings
 * - Time is Unix seconds
 * - All records are immutable once created
 */

/**
 * A rolling key secret, lower-case hex (16 bytes → 32 chars).
 */
export type KeyHex = string;

/**
 * A derived contact identifier (CEN), lower-case hex (16 bytes → 32 chars).
 */
export type IdentifierHex = string;

/**
 * Seconds since the Unix epoch.
 */
export type UnixSeconds = number;

/**
 * Marker up to which disclosure keys have already been fetched.
 * `0` means "from the beginning".
 */
export type Checkpoint = UnixSeconds;

/**
 * A periodically rotated secret from which one identifier per time window
 * is derived.
 */
export interface RollingKey {
  /** The secret */
  readonly value: KeyHex;

  /** When the key came into use; its first window contains this instant */
  readonly issuedAt: UnixSeconds;

  /** Number of consecutive windows the key produces identifiers for */
  readonly windowCount: number;
}

/**
 * An identifier heard by this device's radio layer.
 */
export interface ObservedIdentifier {
  readonly identifier: IdentifierHex;
  readonly observedAt: UnixSeconds;
}

/**
 * A rolling key published by the server for a third party's disclosure.
 *
 * The server does not say when the key was in use, so the fetch time
 * anchors its validity interval.
 */
export interface DisclosureKey {
  readonly value: KeyHex;
  readonly anchoredAt: UnixSeconds;
  /** Checkpoint of the fetch that delivered this key */
  readonly checkpoint: Checkpoint;
}
