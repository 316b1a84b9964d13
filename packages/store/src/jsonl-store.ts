/**
 * @exposure/store — JSONL file stores.
 *
 * Each store is a `.jsonl` file of records plus an in-memory index rebuilt
 * on construction. The file is the source of truth: a record is appended
 * and fsynced before the index sees it, and the file is never rewritten.
 *
 * File format:
 *   observations: {"identifier":"<32 hex>","observedAt":1700000000}
 *   own keys:     {"value":"<32 hex>","issuedAt":1700000000,"windowCount":96}
 */

import { isObservedIdentifier, isRollingKey } from "@exposure/types";
import type {
  ObservationStore,
  ObservedIdentifier,
  OwnKeyStore,
  RollingKey,
} from "@exposure/types";
import { appendJsonl, readJsonl } from "./jsonl-file.js";
import {
  InMemoryObservationStore,
  InMemoryOwnKeyStore,
  assertObservation,
  assertRollingKey,
} from "./in-memory-store.js";

export interface JsonlStoreOptions {
  /** Path to the JSONL file; parent directories are created on first write */
  readonly filePath: string;
}

export class JsonlObservationStore implements ObservationStore {
  private readonly _filePath: string;
  private readonly _index = new InMemoryObservationStore();
  private readonly _skipped: number;

  constructor(options: JsonlStoreOptions) {
    this._filePath = options.filePath;
    const { records, skipped } = readJsonl(this._filePath, isObservedIdentifier);
    for (const record of records) {
      this._index.insert(record);
    }
    this._skipped = skipped;
  }

  insert(observed: ObservedIdentifier): boolean {
    const record = assertObservation(observed, this._filePath);
    if (this._index.has(record)) {
      return false;
    }
    appendJsonl(this._filePath, [record]);
    return this._index.insert(record);
  }

  all(): readonly ObservedIdentifier[] {
    return this._index.all();
  }

  get size(): number {
    return this._index.size;
  }

  /** Lines dropped while loading. */
  get skippedLines(): number {
    return this._skipped;
  }

  get filePath(): string {
    return this._filePath;
  }
}

export class JsonlOwnKeyStore implements OwnKeyStore {
  private readonly _filePath: string;
  private readonly _index = new InMemoryOwnKeyStore();
  private readonly _skipped: number;

  constructor(options: JsonlStoreOptions) {
    this._filePath = options.filePath;
    const { records, skipped } = readJsonl(this._filePath, isRollingKey);
    for (const record of records) {
      this._index.append(record);
    }
    this._skipped = skipped;
  }

  mostRecent(n: number): readonly RollingKey[] {
    return this._index.mostRecent(n);
  }

  append(key: RollingKey): void {
    const record = assertRollingKey(key, this._filePath);
    appendJsonl(this._filePath, [record]);
    this._index.append(record);
  }

  get size(): number {
    return this._index.size;
  }

  get skippedLines(): number {
    return this._skipped;
  }

  get filePath(): string {
    return this._filePath;
  }
}
