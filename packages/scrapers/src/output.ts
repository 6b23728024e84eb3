/**
 * Run artifacts: JSON and CSV files in a per-run directory.
 */

import { mkdir, rm, symlink, writeFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import {
  LATEST_LINK,
  RUN_FILES,
  attendeesToCsv,
  detailedColumns,
  flattenDetailedAttendee,
  formatRunTimestamp,
  organizeRows,
  runPath,
  runsRoot,
  toCsv,
  type AttendeeRecord,
  type DetailedAttendee,
} from "@attendee-sync/core";
import type { EnrichResult } from "./enrich.js";

export async function writeText(path: string, text: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, text, "utf-8");
}

/** 2-space indented, newline-terminated. */
export async function writeJson(path: string, value: unknown): Promise<void> {
  await writeText(path, JSON.stringify(value, null, 2) + "\n");
}

export async function writeAttendeesCsv(path: string, records: readonly AttendeeRecord[]): Promise<void> {
  await writeText(path, attendeesToCsv(records));
}

export async function writeDetailedCsv(path: string, rows: readonly DetailedAttendee[]): Promise<void> {
  const flat = rows.map(flattenDetailedAttendee);
  await writeText(path, toCsv(flat, detailedColumns(flat)));
}

export async function writeOrganizedCsv(path: string, rows: readonly DetailedAttendee[]): Promise<void> {
  const { columns, rows: organized } = organizeRows(rows.map(flattenDetailedAttendee));
  await writeText(path, toCsv(organized, columns));
}

export interface RunDirectory {
  name: string;
  /** Absolute, whatever form `dataDir` was given in. */
  path: string;
}

export async function createRunDirectory(dataDir: string, startedAt: Date = new Date()): Promise<RunDirectory> {
  const name = formatRunTimestamp(startedAt);
  const path = resolve(runPath(dataDir, name));
  await mkdir(join(path, "logs"), { recursive: true });
  return { name, path };
}

export async function removeRunDirectory(run: RunDirectory): Promise<void> {
  await rm(run.path, { recursive: true, force: true });
}

/** Point `runs/latest` at the given run, replacing any previous link. */
export async function updateLatestLink(dataDir: string, runName: string): Promise<void> {
  const link = join(runsRoot(dataDir), LATEST_LINK);
  await rm(link, { force: true });
  await symlink(runName, link, "dir");
}

/**
 * Write every artifact of a run. The attendee list is always written, even
 * when the collection stopped early; detail files only when enrichment ran.
 * `all_attendees.json` goes last and marks the run as finished.
 * Returns the file names written, relative to the run directory.
 */
export async function writeRunArtifacts(
  run: RunDirectory,
  records: readonly AttendeeRecord[],
  enrichment: EnrichResult | null,
): Promise<string[]> {
  const written: string[] = [];
  const file = async (name: string, write: (path: string) => Promise<void>) => {
    await write(join(run.path, name));
    written.push(name);
  };

  if (enrichment) {
    await file(RUN_FILES.detailedJson, (path) => writeJson(path, enrichment.enriched));
    await file(RUN_FILES.detailedCsv, (path) => writeDetailedCsv(path, enrichment.enriched));
    await file(RUN_FILES.organizedCsv, (path) => writeOrganizedCsv(path, enrichment.enriched));
    if (enrichment.failedIds.length > 0) {
      await file(RUN_FILES.failedIds, (path) => writeJson(path, enrichment.failedIds));
    }
  }

  await file(RUN_FILES.attendeesCsv, (path) => writeAttendeesCsv(path, records));
  await file(RUN_FILES.attendeesJson, (path) => writeJson(path, records));

  return written;
}
