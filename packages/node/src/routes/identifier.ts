/**
 * GET /api/v1/identifier — The identifier to broadcast right now.
 *
 * Rotates the own key first when the current one has expired.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createIdentifierRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").currentIdentifier() });
  });

  return routes;
}
