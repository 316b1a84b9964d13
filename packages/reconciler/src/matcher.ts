/**
 * Disclosure Matcher
 *
 * Decides whether a disclosed key explains any identifier this device has
 * observed.
 *
 * Strategy:
 * 1. Compute the key's validity interval as of `asOf`
 * 2. Derive every identifier the key produced in that interval
 * 3. Scan the observation catalogue; an observation matches when its
 *    identifier is a candidate AND it was heard inside the interval
 * 4. Stop at the first hit
 *
 * The time check is part of correctness: an identifier heard before the
 * interval opened or after it closed cannot have come from this key.
 */

import type {
  DisclosureKey,
  ObservationStore,
  UnixSeconds,
} from "@exposure/types";
import {
  DEFAULT_WINDOW_SECONDS,
  deriveRange,
  windowIndexOf,
  windowStart,
} from "./derivation.js";
import type { KeyMatcher } from "./types.js";

/** 14 days of 15-minute windows. */
export const DEFAULT_LOOKBACK_WINDOWS = 14 * 96;

export interface DisclosureMatcherConfig {
  readonly observations: ObservationStore;
  /** Window length in seconds (default: 900) */
  readonly windowSeconds?: number;
  /** How many windows before the anchor a disclosed key covers (default: 1344) */
  readonly lookbackWindows?: number;
}

/**
 * Closed interval of instants, and the windows covering it.
 * Empty when `windowCount` is 0 (then `from > to`).
 */
export interface ValidityInterval {
  readonly firstWindow: number;
  readonly windowCount: number;
  readonly from: UnixSeconds;
  readonly to: UnixSeconds;
}

export class DisclosureMatcher implements KeyMatcher {
  private readonly observations: ObservationStore;
  private readonly windowSeconds: number;
  private readonly lookbackWindows: number;

  constructor(config: DisclosureMatcherConfig) {
    this.observations = config.observations;
    this.windowSeconds = config.windowSeconds ?? DEFAULT_WINDOW_SECONDS;
    this.lookbackWindows = config.lookbackWindows ?? DEFAULT_LOOKBACK_WINDOWS;
  }

  /**
   * The windows a disclosed key may have broadcast in: the last
   * `lookbackWindows` windows up to and including the one containing
   * the earlier of `asOf` and the key's anchor.
   */
  validityInterval(key: DisclosureKey, asOf: UnixSeconds): ValidityInterval {
    const lastWindow = windowIndexOf(Math.min(asOf, key.anchoredAt), this.windowSeconds);
    const windowCount = Math.max(0, Math.min(this.lookbackWindows, lastWindow + 1));
    const firstWindow = lastWindow - windowCount + 1;

    return {
      firstWindow,
      windowCount,
      from: windowStart(firstWindow, this.windowSeconds),
      to: windowStart(lastWindow + 1, this.windowSeconds) - 1,
    };
  }

  hasMatches(key: DisclosureKey, asOf: UnixSeconds): boolean {
    const interval = this.validityInterval(key, asOf);
    if (interval.windowCount === 0) {
      return false;
    }

    const observations = this.observations.all();
    if (observations.length === 0) {
      return false;
    }

    const candidates = new Set(
      deriveRange(key.value, interval.firstWindow, interval.windowCount),
    );

    for (const observed of observations) {
      if (observed.observedAt < interval.from || observed.observedAt > interval.to) {
        continue;
      }
      if (candidates.has(observed.identifier)) {
        return true;
      }
    }

    return false;
  }
}
