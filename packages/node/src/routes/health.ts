/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if the server is running)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      reconciling: c.get("service").reconciling,
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}
