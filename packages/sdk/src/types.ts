/**
 * @exposure/sdk — SDK types.
 *
 * Types specific to the client layer. Domain types are imported from
 * @exposure/types.
 */

import type { Logger } from "pino";

// =============================================================================
// Client Configuration
// =============================================================================

/**
 * Configuration for the disclosure server client.
 */
export interface ExposureClientConfig {
  /** Base URL of the disclosure server (e.g., "https://cen.example.org") */
  readonly baseUrl: string;
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeout?: number | undefined;
  /** Maximum retry attempts for 5xx and network errors (default: 3) */
  readonly retries?: number | undefined;
  /** First retry delay in milliseconds, doubled per attempt up to 10 s (default: 1000) */
  readonly retryDelayMs?: number | undefined;
  /** Custom fetch function (for testing or polyfills) */
  readonly fetchFn?: typeof fetch | undefined;
  readonly logger?: Logger | undefined;
}

// =============================================================================
// Response Types
// =============================================================================

export interface ApiResponse<T> {
  /** Validated response payload */
  readonly data: T;
  readonly status: number;
  /** Response headers (selected) */
  readonly headers: Readonly<Record<string, string>>;
}

// =============================================================================
// Error Types
// =============================================================================

export type ExposureApiErrorCode =
  | "CLIENT_ERROR"
  | "SERVER_ERROR"
  | "NETWORK_ERROR"
  | "TIMEOUT"
  | "INVALID_RESPONSE";

/**
 * Failure talking to the disclosure server.
 */
export class ExposureApiError extends Error {
  /** HTTP status code, 0 when no response was received */
  readonly statusCode: number;
  /** Validation issues or the raw body, when available */
  readonly details?: unknown;

  constructor(
    public readonly code: ExposureApiErrorCode,
    message: string,
    statusCode: number,
    details?: unknown,
  ) {
    super(message);
    this.name = "ExposureApiError";
    this.statusCode = statusCode;
    this.details = details;
  }
}
