/**
 * @exposure/store — File-backed checkpoint.
 *
 * Stored as a small JSON document:
 *   {"checkpoint":1700000000,"savedAt":"2024-01-01T00:00:00.000Z"}
 *
 * Saves go to a temporary file that is then renamed over the old one, so
 * a reader sees either the previous or the new checkpoint.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { isUnixSeconds } from "@exposure/types";
import type { Checkpoint, CheckpointStore } from "@exposure/types";
import { StoreError } from "./types.js";

interface CheckpointFile {
  readonly checkpoint: Checkpoint;
  readonly savedAt: string;
}

export class FileCheckpointStore implements CheckpointStore {
  private readonly _filePath: string;

  constructor(filePath: string) {
    this._filePath = filePath;
  }

  /**
   * The saved checkpoint. A missing or unreadable file yields 0, which
   * makes the next reconciliation start from the beginning.
   */
  load(): Checkpoint {
    if (!existsSync(this._filePath)) {
      return 0;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this._filePath, "utf-8"));
    } catch {
      return 0;
    }

    if (parsed === null || typeof parsed !== "object" || !("checkpoint" in parsed)) {
      return 0;
    }
    return isUnixSeconds(parsed.checkpoint) ? parsed.checkpoint : 0;
  }

  save(checkpoint: Checkpoint): void {
    if (!isUnixSeconds(checkpoint)) {
      throw new StoreError(
        "INVALID_CHECKPOINT",
        `Checkpoint must be a non-negative integer, got ${checkpoint}`,
        this._filePath,
      );
    }

    const doc: CheckpointFile = { checkpoint, savedAt: new Date().toISOString() };
    const tmpPath = `${this._filePath}.tmp`;

    mkdirSync(dirname(this._filePath), { recursive: true });
    writeFileSync(tmpPath, JSON.stringify(doc), "utf-8");
    renameSync(tmpPath, this._filePath);
  }

  get filePath(): string {
    return this._filePath;
  }
}
