/**
 * @exposure/store — JSONL file primitives.
 *
 * One JSON value per line. Appends are flushed with fsync before
 * returning; on load, lines that fail to parse or fail the record guard
 * (torn writes from an unclean shutdown, hand edits) are skipped.
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
} from "node:fs";
import { dirname } from "node:path";

export interface JsonlLoadResult<T> {
  readonly records: T[];
  /** Non-empty lines that were dropped */
  readonly skipped: number;
}

/**
 * Read every valid record from a JSONL file. A missing file reads as empty.
 */
export function readJsonl<T>(
  filePath: string,
  isRecord: (value: unknown) => value is T,
): JsonlLoadResult<T> {
  if (!existsSync(filePath)) {
    return { records: [], skipped: 0 };
  }

  const records: T[] = [];
  let skipped = 0;

  for (const line of readFileSync(filePath, "utf-8").split("\n")) {
    const trimmed = line.trim();
    if (trimmed.length === 0) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      // Torn line
      skipped++;
      continue;
    }

    if (isRecord(parsed)) {
      records.push(parsed);
    } else {
      skipped++;
    }
  }

  return { records, skipped };
}

/**
 * Append records in a single write, then fsync.
 */
export function appendJsonl(filePath: string, records: readonly unknown[]): void {
  if (records.length === 0) return;

  mkdirSync(dirname(filePath), { recursive: true });
  const data = records.map((r) => JSON.stringify(r) + "\n").join("");

  const fd = openSync(filePath, "a");
  try {
    appendFileSync(fd, data, "utf-8");
    fsyncSync(fd);
  } finally {
    closeSync(fd);
  }
}
