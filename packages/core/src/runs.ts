/**
 * Run directory layout.
 *
 * Every collection run writes its artifacts to `<dataDir>/runs/<name>/`,
 * where the name is the local start time as `YYYY-MM-DD_HHMMSS`.
 * `<dataDir>/runs/latest` links to the newest finished run.
 */

import { join } from "node:path";

export const RUNS_DIR = "runs";
export const LATEST_LINK = "latest";

export const RUN_FILES = {
  attendeesJson: "all_attendees.json",
  attendeesCsv: "all_attendees.csv",
  detailedJson: "all_attendees_with_details.json",
  detailedCsv: "all_attendees_with_details.csv",
  organizedCsv: "all_attendees_organized.csv",
  failedIds: "failed_ids.json",
  checkpoint: "checkpoint.json",
} as const;

const RUN_NAME = /^(\d{4})-(\d{2})-(\d{2})_(\d{2})(\d{2})(\d{2})$/;

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatRunTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** Parse a run directory name back to its start time, or null if it isn't one. */
export function parseRunTimestamp(name: string): Date | null {
  const match = RUN_NAME.exec(name);
  if (!match) return null;
  const [year, month, day, hours, minutes, seconds] = match.slice(1).map(Number);
  const date = new Date(year, month - 1, day, hours, minutes, seconds);
  // Reject rolled-over values such as month 13
  if (formatRunTimestamp(date) !== name) return null;
  return date;
}

export function runsRoot(dataDir: string): string {
  return join(dataDir, RUNS_DIR);
}

export function runPath(dataDir: string, runName: string, file?: string): string {
  return file ? join(runsRoot(dataDir), runName, file) : join(runsRoot(dataDir), runName);
}
