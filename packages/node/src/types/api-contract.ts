/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Logger } from "pino";
import type { ExposureService } from "../services/exposure-service.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Request-scoped child logger (set by logger middleware) */
    logger: Logger;

    /** The process's ExposureService (set by createApp) */
    service: ExposureService;
  };
}

/**
 * AppEnv extended with a validated request body (set by validateBody).
 */
export interface ValidatedEnv<T> {
  Variables: AppEnv["Variables"] & {
    validatedBody: T;
  };
}
