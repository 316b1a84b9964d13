/**
 * Reconciler — Disclosure reconciliation workflow
 *
 * One run:
 *   fetch keys since checkpoint → stamp → dedupe → match → fetch reports
 *   → aggregate
 *
 * Report fetches are independent: one failing key never aborts the batch.
 * A run with any report succeeds with what it got; a run where every fetch
 * failed is an error; a run with no matches is a normal, empty success.
 *
 * The checkpoint is threaded through explicitly: pass the last one in,
 * persist the returned one.
 *
 * Usage:
 *   const reconciler = new Reconciler({ keyClient, reportClient, matcher });
 *   const result = await reconciler.reconcile(checkpoint);
 *   if (result.ok) save(result.value.checkpoint);
 */

import pino from "pino";
import type { Logger } from "pino";
import { err, isKeyHex, ok, partitionResults } from "@exposure/types";
import type {
  Checkpoint,
  DisclosureKey,
  DisclosureKeyClient,
  RawReport,
  ReceivedReport,
  ReportClient,
  Result,
} from "@exposure/types";
import { ReconciliationError, systemClock } from "./types.js";
import type {
  Clock,
  KeyMatcher,
  ReconciliationOutcome,
  ReportFetchFailure,
} from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export interface ReconcilerConfig {
  readonly keyClient: DisclosureKeyClient;
  readonly reportClient: ReportClient;
  readonly matcher: KeyMatcher;
  /** Time source (default: system clock) */
  readonly clock?: Clock;
  readonly logger?: Logger;
}

// =============================================================================
// Reconciler
// =============================================================================

export class Reconciler {
  private readonly keyClient: DisclosureKeyClient;
  private readonly reportClient: ReportClient;
  private readonly matcher: KeyMatcher;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(config: ReconcilerConfig) {
    this.keyClient = config.keyClient;
    this.reportClient = config.reportClient;
    this.matcher = config.matcher;
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? pino({ level: "silent" });
  }

  /**
   * Run one reconciliation.
   *
   * The returned checkpoint is the time the key fetch was issued, so keys
   * disclosed while the run was in flight are picked up next time. When
   * any report fetch failed it is the checkpoint passed in, and reports
   * already returned may be delivered again.
   */
  async reconcile(
    checkpoint: Checkpoint = 0,
  ): Promise<Result<ReconciliationOutcome, ReconciliationError>> {
    const fetchedAt = this.clock();

    let rawKeys: readonly string[];
    try {
      rawKeys = await this.keyClient.fetchKeysSince(checkpoint);
    } catch (cause) {
      this.logger.error({ err: cause, checkpoint }, "Failed to fetch disclosure keys");
      return err(
        new ReconciliationError(
          "FETCH_KEYS_FAILED",
          `Could not fetch disclosure keys since ${checkpoint}`,
          { cause },
        ),
      );
    }

    this.logger.info({ count: rawKeys.length, checkpoint }, "Retrieved disclosure keys, start matching");
    this.logger.debug({ keys: rawKeys }, "Disclosure keys");

    const now = this.clock();
    const validKeys = rawKeys.filter((raw) => {
      if (isKeyHex(raw)) return true;
      this.logger.warn({ key: raw }, "Dropping malformed disclosure key");
      return false;
    });
    const uniqueKeys = dedupeByValue(
      validKeys.map((value): DisclosureKey => ({ value, anchoredAt: now, checkpoint })),
    );

    const matchStartedAt = Date.now();
    const matched = uniqueKeys.filter((key) => this.matcher.hasMatches(key, now));
    this.logger.info(
      { keys: uniqueKeys.length, durationMs: Date.now() - matchStartedAt },
      "Matching finished",
    );

    const stats = {
      fetchedKeys: rawKeys.length,
      invalidKeys: rawKeys.length - validKeys.length,
      uniqueKeys: uniqueKeys.length,
      matchedKeys: matched.length,
    };

    if (matched.length === 0) {
      this.logger.info("No matches found");
      return ok({ reports: [], checkpoint: fetchedAt, stats: { ...stats, failedReports: 0 } });
    }

    this.logger.info({ keys: matched.map((k) => k.value) }, "Matches found");

    const results = await Promise.all(matched.map((key) => this.fetchReportsFor(key)));
    const { values, errors } = partitionResults(results);

    for (const failure of errors) {
      this.logger.error({ err: failure.cause, key: failure.keyValue }, "Error fetching reports");
    }

    if (values.length === 0) {
      return err(
        new ReconciliationError(
          "NO_REPORTS_FETCHED",
          `Could not fetch reports for any of ${matched.length} matched keys`,
        ),
      );
    }

    // Keys whose reports failed are only listed again from the old checkpoint.
    const nextCheckpoint = errors.length > 0 ? checkpoint : fetchedAt;
    if (errors.length > 0) {
      this.logger.warn(
        { failed: errors.length, checkpoint },
        "Holding checkpoint so failed report fetches are retried",
      );
    }

    return ok({
      reports: values.flat(),
      checkpoint: nextCheckpoint,
      stats: { ...stats, failedReports: errors.length },
    });
  }

  private async fetchReportsFor(
    key: DisclosureKey,
  ): Promise<Result<readonly ReceivedReport[], ReportFetchFailure>> {
    try {
      const raw = await this.reportClient.fetchReports(key.value);
      return ok(raw.map((r) => decodeReport(r, key.value)));
    } catch (cause) {
      return err({ keyValue: key.value, cause });
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Keep the first occurrence of each key value. The same disclosure can be
 * delivered more than once when a report is re-submitted.
 */
export function dedupeByValue(keys: readonly DisclosureKey[]): DisclosureKey[] {
  const seen = new Set<string>();
  const unique: DisclosureKey[] = [];
  for (const key of keys) {
    if (seen.has(key.value)) continue;
    seen.add(key.value);
    unique.push(key);
  }
  return unique;
}

export function decodeReport(raw: RawReport, keyValue: string): ReceivedReport {
  return {
    id: raw.reportId,
    report: Buffer.from(raw.report, "base64").toString("utf8"),
    reportedAt: raw.reportTimestamp,
    keyValue,
  };
}
