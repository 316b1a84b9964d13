/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Separated from main.ts
 * so tests can create the app without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import pino from "pino";
import type { AppEnv } from "./types/api-contract.js";
import type { ExposureService } from "./services/exposure-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createObservationRoutes } from "./routes/observations.js";
import { createIdentifierRoutes } from "./routes/identifier.js";
import { createReconcileRoutes } from "./routes/reconcile.js";
import { createReportRoutes } from "./routes/reports.js";

export interface CreateAppOptions {
  readonly service: ExposureService;
  /** Root logger (default: silent) */
  readonly logger?: Logger;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: ExposureService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { service } = options;
  const logger = options.logger ?? pino({ level: "silent" });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());
  app.use("*", loggerMiddleware(logger));
  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(logger));

  // ─── Routes ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes());
  app.route("/api/v1/observations", createObservationRoutes());
  app.route("/api/v1/identifier", createIdentifierRoutes());
  app.route("/api/v1/reconcile", createReconcileRoutes());
  app.route("/api/v1/reports", createReportRoutes());

  return { app, service };
}
