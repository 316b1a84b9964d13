/**
 * Report Submission Pipeline
 *
 * Turns "send this symptom report" triggers into network submissions
 * tagged with the device's most recent own keys, and publishes the
 * lifecycle of each submission on `state`.
 *
 * Triggers are queued and processed one at a time in arrival order. Each
 * submission publishes, in sequence:
 *
 *   in-progress → succeeded | failed → idle
 *
 * and the next queued submission starts only after `idle`. `submit()`
 * itself never throws; failures are carried by the `failed` state.
 */

import pino from "pino";
import type { Logger } from "pino";
import { IDLE, IN_PROGRESS, SUCCEEDED, failed } from "@exposure/types";
import type {
  OperationState,
  OwnKeyStore,
  ReportClient,
  ReportPayload,
  RollingKey,
  SymptomReport,
} from "@exposure/types";
import { OperationStateChannel } from "./state-channel.js";
import { SubmissionError } from "./types.js";

/** Own keys attached to each outbound report. */
export const DEFAULT_REPORT_KEY_COUNT = 3;

/**
 * What to do when there are no own keys to tag a report with.
 *
 * - "fail": publish `failed` with a NO_OWN_KEYS error
 * - "skip": log an error and publish `succeeded` without sending
 */
export type NoOwnKeysPolicy = "fail" | "skip";

export interface SubmissionPipelineConfig {
  readonly ownKeys: OwnKeyStore;
  readonly reportClient: ReportClient;
  /** Own keys per report (default: 3) */
  readonly reportKeyCount?: number;
  /** Default: "fail" */
  readonly noOwnKeys?: NoOwnKeysPolicy;
  readonly logger?: Logger;
}

export class ReportSubmissionPipeline {
  readonly state: OperationStateChannel<SubmissionError>;

  private readonly ownKeys: OwnKeyStore;
  private readonly reportClient: ReportClient;
  private readonly reportKeyCount: number;
  private readonly noOwnKeys: NoOwnKeysPolicy;
  private readonly logger: Logger;

  private readonly _queue: SymptomReport[] = [];
  private _draining: Promise<void> | null = null;

  constructor(config: SubmissionPipelineConfig) {
    this.ownKeys = config.ownKeys;
    this.reportClient = config.reportClient;
    this.reportKeyCount = config.reportKeyCount ?? DEFAULT_REPORT_KEY_COUNT;
    this.noOwnKeys = config.noOwnKeys ?? "fail";
    this.logger = config.logger ?? pino({ level: "silent" });
    this.state = new OperationStateChannel<SubmissionError>(this.logger);
  }

  /**
   * Queue a report for submission. When nothing is in flight, `in-progress`
   * is published before this call returns.
   */
  submit(report: SymptomReport): void {
    this._queue.push(report);
    if (this._draining === null) {
      this._draining = this._drainQueue();
    }
  }

  /** Resolves once every queued submission has finished. */
  drain(): Promise<void> {
    return this._draining ?? Promise.resolve();
  }

  /** Submissions waiting behind the one in flight. */
  get pending(): number {
    return this._queue.length;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private async _drainQueue(): Promise<void> {
    try {
      let report = this._queue.shift();
      while (report !== undefined) {
        this.state.publish(IN_PROGRESS);
        this.state.publish(await this._send(report));
        this.state.publish(IDLE);
        report = this._queue.shift();
      }
    } finally {
      this._draining = null;
    }
  }

  private async _send(report: SymptomReport): Promise<OperationState<SubmissionError>> {
    try {
      const keys = this.ownKeys.mostRecent(this.reportKeyCount);

      if (keys.length === 0) {
        this.logger.error({ reportId: report.id }, "Can't send report: no own keys");
        if (this.noOwnKeys === "skip") {
          return SUCCEEDED;
        }
        return failed(
          new SubmissionError(
            "NO_OWN_KEYS",
            "No own keys to tag the report with; it was not sent",
            report.id,
          ),
        );
      }

      const payload = buildReportPayload(report, keys);
      this.logger.info(
        { reportId: payload.reportId, keyCount: keys.length },
        "Sending symptom report",
      );
      await this.reportClient.submitReport(payload);
      this.logger.info({ reportId: payload.reportId }, "Symptom report sent");
      return SUCCEEDED;
    } catch (cause) {
      this.logger.error({ err: cause, reportId: report.id }, "Symptom report submission failed");
      return failed(
        new SubmissionError(
          "SUBMISSION_FAILED",
          `Could not submit report ${report.id}`,
          report.id,
          { cause },
        ),
      );
    }
  }
}

/**
 * Bind a report to own keys (most recent first) for submission.
 */
export function buildReportPayload(
  report: SymptomReport,
  keys: readonly RollingKey[],
): ReportPayload {
  return {
    reportId: report.id,
    report: Buffer.from(report.description, "utf8").toString("base64"),
    cenKeys: keys.map((k) => k.value).join(","),
    reportTimestamp: report.createdAt,
  };
}
