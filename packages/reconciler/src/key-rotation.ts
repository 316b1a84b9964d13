/**
 * Own-key rotation.
 *
 * Keeps one own rolling key current at a time. When the latest key no
 * longer covers the requested instant, a fresh random key is issued and
 * appended to the own-key store, so the store's history is exactly the
 * sequence of keys this device has broadcast with.
 */

import { randomBytes } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import { TOKEN_BYTES } from "@exposure/types";
import type {
  IdentifierHex,
  KeyHex,
  OwnKeyStore,
  RollingKey,
  UnixSeconds,
} from "@exposure/types";
import {
  DEFAULT_WINDOW_SECONDS,
  derive,
  isKeyValidAt,
  windowIndexOf,
} from "./derivation.js";

/** One day of 15-minute windows. */
export const DEFAULT_KEY_WINDOW_COUNT = 96;

export interface KeyRotatorConfig {
  readonly ownKeys: OwnKeyStore;
  /** Window length in seconds (default: 900) */
  readonly windowSeconds?: number;
  /** Windows each new key is valid for (default: 96) */
  readonly keyWindowCount?: number;
  /** Secret generator (default: 16 random bytes) */
  readonly generateKey?: () => KeyHex;
  readonly logger?: Logger;
}

export interface BroadcastIdentifier {
  readonly identifier: IdentifierHex;
  readonly windowIndex: number;
  readonly issuedAt: UnixSeconds;
}

export function randomKey(): KeyHex {
  return randomBytes(TOKEN_BYTES).toString("hex");
}

export class KeyRotator {
  private readonly ownKeys: OwnKeyStore;
  private readonly windowSeconds: number;
  private readonly keyWindowCount: number;
  private readonly generateKey: () => KeyHex;
  private readonly logger: Logger;

  constructor(config: KeyRotatorConfig) {
    if (config.keyWindowCount !== undefined && config.keyWindowCount < 1) {
      throw new Error(`keyWindowCount must be at least 1, got ${config.keyWindowCount}`);
    }
    this.ownKeys = config.ownKeys;
    this.windowSeconds = config.windowSeconds ?? DEFAULT_WINDOW_SECONDS;
    this.keyWindowCount = config.keyWindowCount ?? DEFAULT_KEY_WINDOW_COUNT;
    this.generateKey = config.generateKey ?? randomKey;
    this.logger = config.logger ?? pino({ level: "silent" });
  }

  /**
   * The own key valid at `now`, issuing a new one if the latest has expired.
   */
  currentKey(now: UnixSeconds): RollingKey {
    const [latest] = this.ownKeys.mostRecent(1);
    if (latest !== undefined && isKeyValidAt(latest, now, this.windowSeconds)) {
      return latest;
    }

    const key: RollingKey = {
      value: this.generateKey(),
      issuedAt: now,
      windowCount: this.keyWindowCount,
    };
    this.ownKeys.append(key);
    this.logger.info({ issuedAt: now, windowCount: key.windowCount }, "Rotated own key");
    return key;
  }

  /**
   * The identifier to broadcast during the window containing `now`.
   */
  currentIdentifier(now: UnixSeconds): BroadcastIdentifier {
    const key = this.currentKey(now);
    const windowIndex = windowIndexOf(now, this.windowSeconds);
    return {
      identifier: derive(key.value, windowIndex),
      windowIndex,
      issuedAt: key.issuedAt,
    };
  }
}
