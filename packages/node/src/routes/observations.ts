/**
 * Observation routes.
 *
 * POST /api/v1/observations — Record an identifier heard nearby
 *   201 when stored, 200 when it was already recorded
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ObservationSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createObservationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(ObservationSchema), (c) => {
    const body = c.get("validatedBody");
    const inserted = c.get("service").storeObservedCen(body);

    return c.json({ data: { ...body, inserted } }, inserted ? 201 : 200);
  });

  return routes;
}
