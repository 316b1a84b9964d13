/**
 * @exposure/sdk — Disclosure server client.
 *
 * Implements the reconciler's network contracts over the server's REST
 * API:
 *
 *   GET  /cenkeys/{checkpoint}   disclosed keys since a checkpoint
 *   GET  /cenreport/{key}        reports attached to a key
 *   POST /cenreport              submit a report
 *
 * Every failure surfaces as an ExposureApiError.
 */

import type {
  Checkpoint,
  DisclosureKeyClient,
  KeyHex,
  RawReport,
  ReportClient,
  ReportPayload,
} from "@exposure/types";
import { HttpClient } from "./http-client.js";
import { CenKeysResponseSchema, CenReportsResponseSchema } from "./schemas.js";
import type { CenReport, CenReportSubmission } from "./schemas.js";
import type { ExposureClientConfig } from "./types.js";

export function toRawReport(wire: CenReport): RawReport {
  return {
    reportId: wire.reportID,
    report: wire.report,
    reportTimestamp: wire.reportTimeStamp,
  };
}

export function toSubmission(payload: ReportPayload): CenReportSubmission {
  return {
    reportID: payload.reportId,
    report: payload.report,
    cenKeys: payload.cenKeys,
    reportTimeStamp: payload.reportTimestamp,
  };
}

export class ExposureApiClient implements DisclosureKeyClient, ReportClient {
  private readonly http: HttpClient;

  constructor(config: ExposureClientConfig) {
    this.http = new HttpClient(config);
  }

  async fetchKeysSince(checkpoint: Checkpoint): Promise<readonly string[]> {
    const { data } = await this.http.get(`/cenkeys/${checkpoint}`, CenKeysResponseSchema);
    return data;
  }

  async fetchReports(keyValue: KeyHex): Promise<readonly RawReport[]> {
    const { data } = await this.http.get(
      `/cenreport/${encodeURIComponent(keyValue)}`,
      CenReportsResponseSchema,
    );
    return data.map(toRawReport);
  }

  async submitReport(payload: ReportPayload): Promise<void> {
    await this.http.post("/cenreport", toSubmission(payload));
  }
}
