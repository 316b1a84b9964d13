/**
 * Report Types
 *
 * Symptom reports authored on this device, the payload that binds them to
 * the device's own keys, and the reports fetched for matched disclosures.
 */

import type { KeyHex, UnixSeconds } from "./exposure.js";

/**
 * A user-authored description of symptoms.
 */
export interface SymptomReport {
  readonly id: string;
  readonly description: string;
  readonly createdAt: UnixSeconds;
}

/**
 * Outbound submission body. Binds one report to the device's most recent
 * own keys so that others can test their observations against them.
 */
export interface ReportPayload {
  readonly reportId: string;
  /** Base64 of the UTF-8 report text */
  readonly report: string;
  /** Own key values, comma separated, most recent first */
  readonly cenKeys: string;
  readonly reportTimestamp: UnixSeconds;
}

/**
 * A report as the server returns it for a disclosure key.
 */
export interface RawReport {
  readonly reportId: string;
  /** Base64 of the UTF-8 report text */
  readonly report: string;
  readonly reportTimestamp: UnixSeconds;
}

/**
 * A decoded report received for a matched disclosure key.
 */
export interface ReceivedReport {
  readonly id: string;
  readonly report: string;
  readonly reportedAt: UnixSeconds;
  /** The disclosure key the report was fetched for */
  readonly keyValue: KeyHex;
}
