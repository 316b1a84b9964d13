/**
 * Tests for POST /api/v1/reconcile.
 */

import { describe, it, expect } from "vitest";
import { derive } from "@exposure/reconciler";
import { KEY_A, KEY_B, KEY_C, NOW, createTestApp } from "../setup.js";

describe("POST /api/v1/reconcile", () => {
  it("returns the reports of matching keys and advances the checkpoint", async () => {
    const ctx = createTestApp();
    ctx.observations.insert({ identifier: derive(KEY_C, 3999), observedAt: 3_599_300 });
    ctx.server.keys = [KEY_A, KEY_C];
    ctx.server.reports.set(KEY_C, [
      { reportId: "c-1", report: "ZmV2ZXI=", reportTimestamp: 1_700_000_000 },
    ]);

    const res = await ctx.app.request("/api/v1/reconcile", { method: "POST" });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: {
        reports: [{ id: "c-1", report: "fever", reportedAt: 1_700_000_000, keyValue: KEY_C }],
        checkpoint: NOW,
        stats: { fetchedKeys: 2, invalidKeys: 0, uniqueKeys: 2, matchedKeys: 1, failedReports: 0 },
      },
    });
    expect(ctx.checkpoints.load()).toBe(NOW);
  });

  it("fetches from the saved checkpoint", async () => {
    const ctx = createTestApp();
    ctx.checkpoints.save(1_234);

    await ctx.app.request("/api/v1/reconcile", { method: "POST" });

    expect(ctx.server.keyRequests).toEqual([1_234]);
  });

  it("answers 502 FETCH_KEYS_FAILED and keeps the checkpoint", async () => {
    const ctx = createTestApp();
    ctx.checkpoints.save(500);
    ctx.server.keys = new Error("connection refused");

    const res = await ctx.app.request("/api/v1/reconcile", { method: "POST" });

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      error: { code: "FETCH_KEYS_FAILED", message: "Could not fetch disclosure keys since 500" },
    });
    expect(ctx.checkpoints.load()).toBe(500);
  });

  it("answers 502 NO_REPORTS_FETCHED when every report fetch fails", async () => {
    const ctx = createTestApp();
    ctx.observations.insert({ identifier: derive(KEY_A, 4000), observedAt: NOW });
    ctx.observations.insert({ identifier: derive(KEY_B, 3998), observedAt: 3_598_500 });
    ctx.server.keys = [KEY_A, KEY_B];
    ctx.server.reports.set(KEY_A, new Error("503"));
    ctx.server.reports.set(KEY_B, new Error("503"));

    const res = await ctx.app.request("/api/v1/reconcile", { method: "POST" });

    expect(res.status).toBe(502);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("NO_REPORTS_FETCHED");
    expect(ctx.checkpoints.load()).toBe(0);
  });
});
