/**
 * ReportSubmissionPipeline tests
 *
 * Verifies:
 * - State sequence for success, failure and the no-own-keys path
 * - FIFO processing with no interleaving
 * - Payload binding to the most recent own keys
 * - submit() never throws
 */
import { describe, it, expect } from "vitest";
import type { OperationState, RollingKey, SymptomReport } from "@exposure/types";
import {
  ReportSubmissionPipeline,
  buildReportPayload,
} from "../src/submission-pipeline.js";
import type { SubmissionPipelineConfig } from "../src/submission-pipeline.js";
import { SubmissionError } from "../src/types.js";
import { ArrayOwnKeyStore, FakeReportClient, deferred } from "./fakes.js";

const K1: RollingKey = { value: "11111111111111111111111111111111", issuedAt: 100, windowCount: 96 };
const K2: RollingKey = { value: "22222222222222222222222222222222", issuedAt: 200, windowCount: 96 };
const K3: RollingKey = { value: "33333333333333333333333333333333", issuedAt: 300, windowCount: 96 };
const K4: RollingKey = { value: "44444444444444444444444444444444", issuedAt: 400, windowCount: 96 };

function report(id: string, description: string = "fever"): SymptomReport {
  return { id, description, createdAt: 1_700_000_000 };
}

function recordStates(
  pipeline: ReportSubmissionPipeline,
): OperationState<SubmissionError>[] {
  const states: OperationState<SubmissionError>[] = [];
  pipeline.state.subscribe((state) => states.push(state));
  return states;
}

function pipelineWith(
  overrides: Partial<Omit<SubmissionPipelineConfig, "reportClient">> & {
    client?: FakeReportClient;
  } = {},
): { pipeline: ReportSubmissionPipeline; client: FakeReportClient } {
  const { client = new FakeReportClient(), ...config } = overrides;
  const pipeline = new ReportSubmissionPipeline({
    ownKeys: new ArrayOwnKeyStore([K1, K2, K3, K4]),
    ...config,
    reportClient: client,
  });
  return { pipeline, client };
}

describe("ReportSubmissionPipeline", () => {
  describe("successful submission", () => {
    it("publishes in-progress, succeeded, idle", async () => {
      const { pipeline } = pipelineWith();
      const states = recordStates(pipeline);

      pipeline.submit(report("r-1"));
      await pipeline.drain();

      expect(states.map((s) => s.status)).toEqual(["in-progress", "succeeded", "idle"]);
      expect(pipeline.state.current.status).toBe("idle");
    });

    it("publishes in-progress before submit returns", () => {
      const { pipeline } = pipelineWith();
      const states = recordStates(pipeline);

      pipeline.submit(report("r-1"));

      expect(states.map((s) => s.status)).toEqual(["in-progress"]);
    });

    it("tags the report with the three most recent own keys", async () => {
      const { pipeline, client } = pipelineWith();

      pipeline.submit(report("r-1", "fever"));
      await pipeline.drain();

      expect(client.submitted).toEqual([
        {
          reportId: "r-1",
          report: "ZmV2ZXI=",
          cenKeys: `${K4.value},${K3.value},${K2.value}`,
          reportTimestamp: 1_700_000_000,
        },
      ]);
    });

    it("honours a custom key count", async () => {
      const { pipeline, client } = pipelineWith({ reportKeyCount: 1 });

      pipeline.submit(report("r-1"));
      await pipeline.drain();

      expect(client.submitted[0]?.cenKeys).toBe(K4.value);
    });
  });

  describe("failed submission", () => {
    it("publishes failed with the cause, then idle", async () => {
      const cause = new Error("HTTP 500");
      const client = new FakeReportClient(new Map(), async () => {
        throw cause;
      });
      const { pipeline } = pipelineWith({ client });
      const states = recordStates(pipeline);

      expect(() => pipeline.submit(report("r-1"))).not.toThrow();
      await pipeline.drain();

      expect(states.map((s) => s.status)).toEqual(["in-progress", "failed", "idle"]);
      const failure = states[1];
      expect(failure?.status).toBe("failed");
      if (failure?.status !== "failed") return;
      expect(failure.error).toBeInstanceOf(SubmissionError);
      expect(failure.error.code).toBe("SUBMISSION_FAILED");
      expect(failure.error.reportId).toBe("r-1");
      expect(failure.error.cause).toBe(cause);
    });

    it("keeps processing after a failure", async () => {
      let calls = 0;
      const client = new FakeReportClient(new Map(), async () => {
        calls++;
        if (calls === 1) throw new Error("HTTP 500");
      });
      const { pipeline } = pipelineWith({ client });
      const states = recordStates(pipeline);

      pipeline.submit(report("r-1"));
      pipeline.submit(report("r-2"));
      await pipeline.drain();

      expect(states.map((s) => s.status)).toEqual([
        "in-progress", "failed", "idle",
        "in-progress", "succeeded", "idle",
      ]);
    });
  });

  describe("ordering", () => {
    it("queues a submission made while another is in progress", async () => {
      const first = deferred();
      const order: string[] = [];
      const client = new FakeReportClient(new Map(), async (payload) => {
        order.push(`start:${payload.reportId}`);
        if (payload.reportId === "r-1") await first.promise;
        order.push(`end:${payload.reportId}`);
      });
      const { pipeline } = pipelineWith({ client });
      const states = recordStates(pipeline);

      pipeline.submit(report("r-1"));
      pipeline.submit(report("r-2"));

      expect(pipeline.pending).toBe(1);
      await Promise.resolve();
      expect(client.submitted.map((p) => p.reportId)).toEqual(["r-1"]);

      first.resolve();
      await pipeline.drain();

      expect(order).toEqual(["start:r-1", "end:r-1", "start:r-2", "end:r-2"]);
      expect(states.map((s) => s.status)).toEqual([
        "in-progress", "succeeded", "idle",
        "in-progress", "succeeded", "idle",
      ]);
    });

    it("processes many submissions in arrival order", async () => {
      const { pipeline, client } = pipelineWith();

      for (let i = 1; i <= 5; i++) {
        pipeline.submit(report(`r-${i}`));
      }
      await pipeline.drain();

      expect(client.submitted.map((p) => p.reportId)).toEqual(["r-1", "r-2", "r-3", "r-4", "r-5"]);
    });
  });

  describe("no own keys", () => {
    it("fails with NO_OWN_KEYS without calling the network by default", async () => {
      const { pipeline, client } = pipelineWith({ ownKeys: new ArrayOwnKeyStore() });
      const states = recordStates(pipeline);

      expect(() => pipeline.submit(report("r-1"))).not.toThrow();
      await pipeline.drain();

      expect(client.submitted).toEqual([]);
      expect(states.map((s) => s.status)).toEqual(["in-progress", "failed", "idle"]);
      const failure = states[1];
      if (failure?.status !== "failed") throw new Error("expected failed state");
      expect(failure.error.code).toBe("NO_OWN_KEYS");
    });

    it("reports success without calling the network under the skip policy", async () => {
      const { pipeline, client } = pipelineWith({
        ownKeys: new ArrayOwnKeyStore(),
        noOwnKeys: "skip",
      });
      const states = recordStates(pipeline);

      pipeline.submit(report("r-1"));
      await pipeline.drain();

      expect(client.submitted).toEqual([]);
      expect(states.map((s) => s.status)).toEqual(["in-progress", "succeeded", "idle"]);
    });
  });

  describe("observers", () => {
    it("does not replay past states to new subscribers", async () => {
      const { pipeline } = pipelineWith();

      pipeline.submit(report("r-1"));
      await pipeline.drain();
      const late = recordStates(pipeline);

      expect(late).toEqual([]);
    });

    it("delivers to every subscriber", async () => {
      const { pipeline } = pipelineWith();
      const a = recordStates(pipeline);
      const b = recordStates(pipeline);

      pipeline.submit(report("r-1"));
      await pipeline.drain();

      expect(a).toEqual(b);
      expect(a).toHaveLength(3);
    });
  });

  it("drain resolves immediately when idle", async () => {
    const { pipeline } = pipelineWith();
    await expect(pipeline.drain()).resolves.toBeUndefined();
  });
});

describe("buildReportPayload", () => {
  it("encodes the description and joins key values", () => {
    expect(buildReportPayload(report("r-7", "cough and fever"), [K2, K1])).toEqual({
      reportId: "r-7",
      report: "Y291Z2ggYW5kIGZldmVy",
      cenKeys: `${K2.value},${K1.value}`,
      reportTimestamp: 1_700_000_000,
    });
  });
});
