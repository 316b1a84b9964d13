/**
 * Runtime Type Guards
 *
 * Narrowing functions for exposure domain types, used where data crosses
 * a boundary (files on disk, HTTP bodies, server responses).
 */

import type {
  IdentifierHex,
  KeyHex,
  ObservedIdentifier,
  RollingKey,
  UnixSeconds,
} from "./exposure.js";

/** Byte length of rolling keys and identifiers. */
export const TOKEN_BYTES = 16;

const TOKEN_HEX = new RegExp(`^[0-9a-f]{${TOKEN_BYTES * 2}}$`);

// =============================================================================
// Primitives
// =============================================================================

export function isKeyHex(value: unknown): value is KeyHex {
  return typeof value === "string" && TOKEN_HEX.test(value);
}

export function isIdentifierHex(value: unknown): value is IdentifierHex {
  return typeof value === "string" && TOKEN_HEX.test(value);
}

export function isUnixSeconds(value: unknown): value is UnixSeconds {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

// =============================================================================
// Records
// =============================================================================

export function isRollingKey(value: unknown): value is RollingKey {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isKeyHex(v.value) &&
    isUnixSeconds(v.issuedAt) &&
    typeof v.windowCount === "number" &&
    Number.isInteger(v.windowCount) &&
    v.windowCount >= 0
  );
}

export function isObservedIdentifier(value: unknown): value is ObservedIdentifier {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isIdentifierHex(v.identifier) && isUnixSeconds(v.observedAt);
}
