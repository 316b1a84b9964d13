/**
 * Type barrel — re-exports all public types from @exposure/node.
 */

export { ObservationSchema, SendReportSchema } from "./dto.js";
export type { ObservationDto, SendReportDto } from "./dto.js";

export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

export type { AppEnv, ValidatedEnv } from "./api-contract.js";
