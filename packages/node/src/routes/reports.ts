/**
 * Symptom report routes.
 *
 * POST /api/v1/reports        — Queue a report for submission (202)
 * GET  /api/v1/reports/state  — Current submission state
 */

import { Hono } from "hono";
import type { OperationState } from "@exposure/types";
import type { SubmissionError } from "@exposure/reconciler";
import type { AppEnv } from "../types/api-contract.js";
import { SendReportSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

interface StateView {
  readonly status: OperationState["status"];
  readonly error?: { readonly code: string; readonly message: string; readonly reportId: string };
}

export function toStateView(state: OperationState<SubmissionError>): StateView {
  if (state.status === "failed") {
    return {
      status: state.status,
      error: { code: state.error.code, message: state.error.message, reportId: state.error.reportId },
    };
  }
  return { status: state.status };
}

export function createReportRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(SendReportSchema), (c) => {
    const { description } = c.get("validatedBody");
    const report = c.get("service").sendReport(description);

    return c.json({ data: { id: report.id, createdAt: report.createdAt } }, 202);
  });

  routes.get("/state", (c) => {
    return c.json({ data: toStateView(c.get("service").reportState) });
  });

  return routes;
}
