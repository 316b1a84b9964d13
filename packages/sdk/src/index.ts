/**
 * @exposure/sdk — Typed client for the disclosure server.
 *
 * @packageDocumentation
 */

export type { ExposureClientConfig, ApiResponse, ExposureApiErrorCode } from "./types.js";
export { ExposureApiError } from "./types.js";

export { HttpClient } from "./http-client.js";

export { ExposureApiClient, toRawReport, toSubmission } from "./client.js";

export {
  CenKeysResponseSchema,
  CenReportSchema,
  CenReportsResponseSchema,
} from "./schemas.js";
export type { CenReport, CenReportSubmission } from "./schemas.js";
