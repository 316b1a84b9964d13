/**
 * Global error handler.
 *
 * Produces the error envelope for anything thrown by a route handler,
 * mapping coded domain errors to HTTP status codes. Unknown errors become
 * 500 without details and are logged.
 */

import type { ErrorHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

type ErrorStatus = 400 | 409 | 500 | 502 | 503;

const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Store errors
  INVALID_RECORD: 400,
  INVALID_LIMIT: 400,

  // Reconciliation errors
  FETCH_KEYS_FAILED: 502,
  NO_REPORTS_FETCHED: 502,

  // Disclosure server errors
  CLIENT_ERROR: 502,
  SERVER_ERROR: 502,
  INVALID_RESPONSE: 502,
  NETWORK_ERROR: 503,
  TIMEOUT: 503,
};

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function statusForCode(code: string | undefined): ErrorStatus {
  if (code !== undefined) {
    return STATUS_MAP[code] ?? 500;
  }
  return 500;
}

export function createErrorHandler(logger: Logger): ErrorHandler<AppEnv> {
  return (err, c) => {
    const code = errorCode(err);
    const status = statusForCode(code);

    if (status === 500) {
      logger.error({ err, requestId: c.get("requestId") }, "Unhandled error");
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }

    return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message), status);
  };
}
