/**
 * Checkpoint snapshot of a collection run.
 */

import type { AttendeeRecord } from "./attendee.js";
import { isJsonObject } from "./json.js";

/**
 * Full accumulated state of one run, as written to the checkpoint file.
 *
 * `seenIds` holds exactly the ids of `records`, in first-seen order, so
 * `seenIds.length === records.length` always holds.
 */
export interface RunState {
  records: AttendeeRecord[];
  seenIds: string[];
  /** Total count reported by the first page, when the platform sent one. */
  expectedTotal: number | null;
  /** Last page number fetched (the first page is 1). */
  pageNumber: number;
  /** ISO 8601 time the snapshot was taken. */
  timestamp: string;
}

export function snapshotRunState(
  records: readonly AttendeeRecord[],
  seen: ReadonlySet<string>,
  expectedTotal: number | null,
  pageNumber: number,
  now: Date = new Date(),
): RunState {
  return {
    records: [...records],
    seenIds: [...seen],
    expectedTotal,
    pageNumber,
    timestamp: now.toISOString(),
  };
}

/** Narrow a parsed JSON value to a RunState. */
export function isRunState(value: unknown): value is RunState {
  return (
    isJsonObject(value) &&
    Array.isArray(value.records) &&
    Array.isArray(value.seenIds) &&
    (value.expectedTotal === null || typeof value.expectedTotal === "number") &&
    typeof value.pageNumber === "number" &&
    typeof value.timestamp === "string"
  );
}
