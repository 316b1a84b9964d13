/**
 * POST /api/v1/reconcile — Run reconciliation from the saved checkpoint.
 *
 * 200 with the matched reports and the new checkpoint; a failed run is
 * thrown to the error handler (502).
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createReconcileRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const result = await c.get("service").reconcile();
    if (!result.ok) {
      throw result.error;
    }

    const { reports, checkpoint, stats } = result.value;
    return c.json({ data: { reports, checkpoint, stats } });
  });

  return routes;
}
