/**
 * Tests for config.ts — loadConfig.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      PORT: 3000,
      HOST: "127.0.0.1",
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      API_BASE_URL: "http://localhost:8080",
      API_TIMEOUT_MS: 30000,
      API_RETRIES: 3,
      DATA_DIR: "./data",
      RECONCILE_INTERVAL_MS: 3600000,
      WINDOW_SECONDS: 900,
      LOOKBACK_WINDOWS: 1344,
      KEY_WINDOW_COUNT: 96,
      REPORT_KEY_COUNT: 3,
      NO_OWN_KEYS_POLICY: "fail",
    });
  });

  it("coerces numeric strings", () => {
    const config = loadConfig({
      PORT: "8081",
      RECONCILE_INTERVAL_MS: "0",
      WINDOW_SECONDS: "60",
      API_RETRIES: "0",
    });

    expect(config.PORT).toBe(8081);
    expect(config.RECONCILE_INTERVAL_MS).toBe(0);
    expect(config.WINDOW_SECONDS).toBe(60);
    expect(config.API_RETRIES).toBe(0);
  });

  it("accepts the skip policy", () => {
    expect(loadConfig({ NO_OWN_KEYS_POLICY: "skip" }).NO_OWN_KEYS_POLICY).toBe("skip");
  });

  it("rejects an out-of-range port", () => {
    expect(() => loadConfig({ PORT: "70000" })).toThrow(ZodError);
  });

  it("rejects a base URL that is not a URL", () => {
    expect(() => loadConfig({ API_BASE_URL: "cen server" })).toThrow(ZodError);
  });

  it("rejects an unknown policy", () => {
    expect(() => loadConfig({ NO_OWN_KEYS_POLICY: "ignore" })).toThrow(ZodError);
  });

  it("rejects a zero window length", () => {
    expect(() => loadConfig({ WINDOW_SECONDS: "0" })).toThrow(ZodError);
  });
});
