/**
 * Identifier Derivation
 *
 * Derives the contact identifier a rolling key broadcasts during a time
 * window:
 *
 *   CEN(key, i) = HMAC-SHA-256(key, "CEN" ‖ uint32be(i))[0..16)
 *
 * The derivation is one-way, so a matcher holding only observations can
 * never recover a key; it has to re-derive candidates from each disclosed
 * key instead.
 */

import { createHmac } from "node:crypto";
import { isKeyHex, TOKEN_BYTES } from "@exposure/types";
import type {
  IdentifierHex,
  KeyHex,
  RollingKey,
  UnixSeconds,
} from "@exposure/types";
import { DerivationError } from "./types.js";

/** Default window length: 15 minutes. */
export const DEFAULT_WINDOW_SECONDS = 900;

/** Largest window index that fits the 32-bit counter. */
export const MAX_WINDOW_INDEX = 0xffffffff;

const LABEL = Buffer.from("CEN", "ascii");

// =============================================================================
// Windows
// =============================================================================

export function windowIndexOf(
  timestamp: UnixSeconds,
  windowSeconds: number = DEFAULT_WINDOW_SECONDS,
): number {
  return Math.floor(timestamp / windowSeconds);
}

export function windowStart(
  windowIndex: number,
  windowSeconds: number = DEFAULT_WINDOW_SECONDS,
): UnixSeconds {
  return windowIndex * windowSeconds;
}

/**
 * Whether `timestamp` falls in one of the windows the key is valid for.
 */
export function isKeyValidAt(
  key: RollingKey,
  timestamp: UnixSeconds,
  windowSeconds: number = DEFAULT_WINDOW_SECONDS,
): boolean {
  const first = windowIndexOf(key.issuedAt, windowSeconds);
  const current = windowIndexOf(timestamp, windowSeconds);
  return current >= first && current < first + key.windowCount;
}

// =============================================================================
// Derivation
// =============================================================================

/**
 * Derive the identifier `key` broadcasts during window `windowIndex`.
 *
 * @throws DerivationError on a malformed key or window index
 */
export function derive(key: KeyHex, windowIndex: number): IdentifierHex {
  assertKey(key);
  assertWindowIndex(windowIndex);
  return computeIdentifier(Buffer.from(key, "hex"), windowIndex);
}

/**
 * Derive the identifiers for `count` consecutive windows starting at
 * `firstWindow`, in window order.
 *
 * @throws DerivationError on a malformed key or window range
 */
export function deriveRange(
  key: KeyHex,
  firstWindow: number,
  count: number,
): IdentifierHex[] {
  assertKey(key);
  if (!Number.isInteger(count) || count < 0) {
    throw new DerivationError(
      "INVALID_WINDOW",
      `Window count must be a non-negative integer, got ${count}`,
    );
  }
  if (count === 0) {
    return [];
  }
  assertWindowIndex(firstWindow);
  assertWindowIndex(firstWindow + count - 1);

  const secret = Buffer.from(key, "hex");
  const identifiers: IdentifierHex[] = [];
  for (let i = 0; i < count; i++) {
    identifiers.push(computeIdentifier(secret, firstWindow + i));
  }
  return identifiers;
}

/**
 * Derive every identifier a rolling key is valid for, starting at the
 * window containing its issuance.
 */
export function deriveAll(
  key: RollingKey,
  windowCount: number = key.windowCount,
  windowSeconds: number = DEFAULT_WINDOW_SECONDS,
): IdentifierHex[] {
  return deriveRange(key.value, windowIndexOf(key.issuedAt, windowSeconds), windowCount);
}

// =============================================================================
// Internal
// =============================================================================

function computeIdentifier(secret: Buffer, windowIndex: number): IdentifierHex {
  const message = Buffer.alloc(LABEL.length + 4);
  LABEL.copy(message, 0);
  message.writeUInt32BE(windowIndex, LABEL.length);

  return createHmac("sha256", secret)
    .update(message)
    .digest()
    .subarray(0, TOKEN_BYTES)
    .toString("hex");
}

function assertKey(key: KeyHex): void {
  if (!isKeyHex(key)) {
    throw new DerivationError(
      "INVALID_KEY",
      `Rolling key must be ${TOKEN_BYTES * 2} lower-case hex chars`,
    );
  }
}

function assertWindowIndex(windowIndex: number): void {
  if (
    !Number.isInteger(windowIndex) ||
    windowIndex < 0 ||
    windowIndex > MAX_WINDOW_INDEX
  ) {
    throw new DerivationError(
      "INVALID_WINDOW",
      `Window index must be an integer in [0, ${MAX_WINDOW_INDEX}], got ${windowIndex}`,
    );
  }
}
