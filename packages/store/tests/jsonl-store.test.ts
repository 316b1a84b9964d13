/**
 * Tests for the JSONL stores.
 *
 * Verifies:
 * - Persistence: records survive store recreation
 * - Crash safety: torn and invalid lines are skipped
 * - File creation: directory and file created on first write
 * - Duplicate suppression is not written to disk
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { JsonlObservationStore, JsonlOwnKeyStore } from "../src/jsonl-store.js";
import { StoreError } from "../src/types.js";

const ID_A = "aaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa";
const ID_B = "bbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb";
const KEY_1 = "11111111111111111111111111111111";
const KEY_2 = "22222222222222222222222222222222";

let testDir: string;

beforeEach(() => {
  testDir = join(tmpdir(), `exposure-jsonl-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`);
  mkdirSync(testDir, { recursive: true });
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

// =============================================================================
// Observations
// =============================================================================

describe("JsonlObservationStore", () => {
  it("creates nested directories and the file on first insert", () => {
    const filePath = join(testDir, "deep", "nested", "observations.jsonl");
    const store = new JsonlObservationStore({ filePath });

    expect(existsSync(filePath)).toBe(false);
    store.insert({ identifier: ID_A, observedAt: 10 });

    expect(readFileSync(filePath, "utf-8")).toBe(
      `{"identifier":"${ID_A}","observedAt":10}\n`,
    );
  });

  it("reloads observations from disk", () => {
    const filePath = join(testDir, "observations.jsonl");
    const first = new JsonlObservationStore({ filePath });
    first.insert({ identifier: ID_A, observedAt: 10 });
    first.insert({ identifier: ID_B, observedAt: 20 });

    const second = new JsonlObservationStore({ filePath });

    expect(second.all()).toEqual([
      { identifier: ID_A, observedAt: 10 },
      { identifier: ID_B, observedAt: 20 },
    ]);
  });

  it("does not append duplicates", () => {
    const filePath = join(testDir, "observations.jsonl");
    const store = new JsonlObservationStore({ filePath });

    expect(store.insert({ identifier: ID_A, observedAt: 10 })).toBe(true);
    expect(store.insert({ identifier: ID_A, observedAt: 10 })).toBe(false);

    expect(readFileSync(filePath, "utf-8").split("\n").filter(Boolean)).toHaveLength(1);
  });

  it("suppresses duplicates against records loaded from disk", () => {
    const filePath = join(testDir, "observations.jsonl");
    new JsonlObservationStore({ filePath }).insert({ identifier: ID_A, observedAt: 10 });

    const reopened = new JsonlObservationStore({ filePath });

    expect(reopened.insert({ identifier: ID_A, observedAt: 10 })).toBe(false);
  });

  it("skips a torn last line", () => {
    const filePath = join(testDir, "observations.jsonl");
    new JsonlObservationStore({ filePath }).insert({ identifier: ID_A, observedAt: 10 });
    writeFileSync(filePath, `{"identifier":"${ID_B}","obs`, { flag: "a" });

    const store = new JsonlObservationStore({ filePath });

    expect(store.all()).toEqual([{ identifier: ID_A, observedAt: 10 }]);
    expect(store.skippedLines).toBe(1);
  });

  it("skips well-formed JSON that is not an observation", () => {
    const filePath = join(testDir, "observations.jsonl");
    writeFileSync(
      filePath,
      [
        `{"identifier":"${ID_A}","observedAt":10}`,
        `{"identifier":"not-hex","observedAt":10}`,
        `[1,2,3]`,
        ``,
        `{"identifier":"${ID_B}","observedAt":20}`,
        ``,
      ].join("\n"),
    );

    const store = new JsonlObservationStore({ filePath });

    expect(store.size).toBe(2);
    expect(store.skippedLines).toBe(2);
  });

  it("loads an empty file", () => {
    const filePath = join(testDir, "observations.jsonl");
    writeFileSync(filePath, "");

    expect(new JsonlObservationStore({ filePath }).all()).toEqual([]);
  });

  it("refuses to write an invalid observation", () => {
    const filePath = join(testDir, "observations.jsonl");
    const store = new JsonlObservationStore({ filePath });

    expect(() => store.insert({ identifier: ID_A, observedAt: -5 })).toThrow(StoreError);
    expect(existsSync(filePath)).toBe(false);
  });
});

// =============================================================================
// Own keys
// =============================================================================

describe("JsonlOwnKeyStore", () => {
  it("persists keys and returns the most recent first after reload", () => {
    const filePath = join(testDir, "own-keys.jsonl");
    const first = new JsonlOwnKeyStore({ filePath });
    first.append({ value: KEY_1, issuedAt: 100, windowCount: 96 });
    first.append({ value: KEY_2, issuedAt: 200, windowCount: 96 });

    const second = new JsonlOwnKeyStore({ filePath });

    expect(second.mostRecent(3).map((k) => k.value)).toEqual([KEY_2, KEY_1]);
    expect(second.size).toBe(2);
  });

  it("skips corrupt lines", () => {
    const filePath = join(testDir, "own-keys.jsonl");
    writeFileSync(
      filePath,
      `NOT JSON\n{"value":"${KEY_1}","issuedAt":100,"windowCount":96}\n`,
    );

    const store = new JsonlOwnKeyStore({ filePath });

    expect(store.mostRecent(1)).toEqual([{ value: KEY_1, issuedAt: 100, windowCount: 96 }]);
    expect(store.skippedLines).toBe(1);
  });
});
