/**
 * Sync run output into the attendee history.
 *
 * Every run gets a `scraper_runs` row. Attendees are upserted by platform id;
 * a changed tracked column is recorded in `attendee_changes` and bumps
 * `update_count`, while `first_seen_at` keeps the run that first listed the
 * attendee.
 */

import { readFile, readdir } from "node:fs/promises";
import { join } from "node:path";
import {
  RUN_FILES,
  isJsonObject,
  parseRunTimestamp,
  runPath,
  runsRoot,
  toAttendeeRecord,
  type DetailedAttendee,
} from "@attendee-sync/core";
import type { DB } from "./db.js";

const TRACKED_COLUMNS = [
  "user_id",
  "email",
  "first_name",
  "last_name",
  "job_title",
  "organization",
  "biography",
  "mobile_phone",
  "landline_phone",
  "website_url",
  "photo_url",
  "details",
  "socials",
] as const;

/** Columns filled from the detail lookup; a bare list record leaves them alone. */
const DETAIL_COLUMNS: ReadonlySet<string> = new Set([
  "email",
  "mobile_phone",
  "landline_phone",
  "website_url",
  "details",
  "socials",
]);

const BASE_COLUMNS = TRACKED_COLUMNS.filter((column) => !DETAIL_COLUMNS.has(column));

type TrackedColumn = (typeof TRACKED_COLUMNS)[number];
type AttendeeRow = { id: string } & Record<TrackedColumn, string | null>;

export interface UpsertResult {
  inserted: number;
  updated: number;
  unchanged: number;
  /** Rows skipped because they carry no usable id. */
  errors: number;
}

export interface SyncSummary extends UpsertResult {
  runName: string;
  runId: number;
  /** File(s) the rows were read from, relative to the run directory. */
  source: string;
  total: number;
}

/** "2026-03-04_050607" → "2026-03-04 05:06:07" */
export function sqlTimestamp(runName: string): string {
  if (!parseRunTimestamp(runName)) throw new Error(`Not a run directory name: ${runName}`);
  return `${runName.slice(0, 10)} ${runName.slice(11, 13)}:${runName.slice(13, 15)}:${runName.slice(15, 17)}`;
}

function str(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}

function stringMap(value: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (!isJsonObject(value)) return out;
  for (const [key, entry] of Object.entries(value)) {
    const text = str(entry);
    if (text) out[key] = text;
  }
  return out;
}

const DETAIL_KEYS = ["email", "mobilePhone", "landlinePhone", "websiteUrl", "fields", "socials"];

/** Whether a run file entry carries detail fields, as opposed to a bare list record. */
export function hasDetail(item: unknown): boolean {
  return isJsonObject(item) && DETAIL_KEYS.some((key) => key in item);
}

/** Read one entry of a run file. Entries without detail get empty detail fields. */
export function toSyncRow(item: unknown): DetailedAttendee | null {
  const record = toAttendeeRecord(item);
  if (!record || !isJsonObject(item)) return null;
  return {
    ...record,
    email: str(item.email),
    mobilePhone: str(item.mobilePhone),
    landlinePhone: str(item.landlinePhone),
    websiteUrl: str(item.websiteUrl),
    fields: stringMap(item.fields),
    socials: stringMap(item.socials),
  };
}

function sortedJson(map: Record<string, string>): string {
  return JSON.stringify(Object.fromEntries(Object.entries(map).sort(([a], [b]) => a.localeCompare(b))));
}

function orNull(value: string): string | null {
  return value === "" ? null : value;
}

function toAttendeeRow(a: DetailedAttendee): AttendeeRow {
  return {
    id: a.id,
    user_id: orNull(a.userId),
    email: orNull(a.email),
    first_name: orNull(a.firstName),
    last_name: orNull(a.lastName),
    job_title: orNull(a.jobTitle),
    organization: orNull(a.organization),
    biography: orNull(a.biography),
    mobile_phone: orNull(a.mobilePhone),
    landline_phone: orNull(a.landlinePhone),
    website_url: orNull(a.websiteUrl),
    photo_url: orNull(a.photoUrl),
    details: sortedJson(a.fields),
    socials: sortedJson(a.socials),
  };
}

/** Run id for the given run directory name, creating the row on first use. */
export function getOrCreateRun(
  db: DB,
  runName: string,
  totalAttendees: number,
  metadata: Record<string, unknown> = {},
): number {
  const timestamp = sqlTimestamp(runName);
  const existing = db
    .prepare<[string], { id: number }>("SELECT id FROM scraper_runs WHERE run_timestamp = ?")
    .get(timestamp);
  if (existing) return existing.id;

  const info = db
    .prepare<[string, string, number, string]>(
      `INSERT INTO scraper_runs (run_timestamp, run_date, total_attendees, metadata)
       VALUES (?, ?, ?, ?)`,
    )
    .run(timestamp, timestamp.slice(0, 10), totalAttendees, JSON.stringify(metadata));
  return Number(info.lastInsertRowid);
}

type RowParams = AttendeeRow & { seen_at: string; run_id: number; raw_data: string };

/**
 * Upsert the rows of one run in a single transaction and write the
 * new/updated counts back to the run row.
 */
export function upsertAttendees(
  db: DB,
  runId: number,
  runName: string,
  rows: readonly unknown[],
): UpsertResult {
  const seenAt = sqlTimestamp(runName);
  const result: UpsertResult = { inserted: 0, updated: 0, unchanged: 0, errors: 0 };

  const columns = ["id", ...TRACKED_COLUMNS];
  const select = db.prepare<[string], AttendeeRow>(
    `SELECT ${columns.join(", ")} FROM attendees WHERE id = ?`,
  );
  const insert = db.prepare<RowParams>(
    `INSERT INTO attendees (${columns.join(", ")}, first_seen_at, last_updated_at, last_seen_run_id, raw_data)
     VALUES (${columns.map((c) => `@${c}`).join(", ")}, @seen_at, @seen_at, @run_id, @raw_data)`,
  );
  const updateStatement = (tracked: readonly TrackedColumn[]) =>
    db.prepare<RowParams>(
      `UPDATE attendees SET ${tracked.map((c) => `${c} = @${c}`).join(", ")},
         last_updated_at = @seen_at, last_seen_run_id = @run_id,
         update_count = update_count + 1, raw_data = @raw_data
       WHERE id = @id`,
    );
  const update = updateStatement(TRACKED_COLUMNS);
  const updateBase = updateStatement(BASE_COLUMNS);
  const touch = db.prepare<[number, string, string]>(
    "UPDATE attendees SET last_seen_run_id = ?, raw_data = ? WHERE id = ?",
  );
  const recordChange = db.prepare<[string, number, string, string | null, string | null, string]>(
    `INSERT INTO attendee_changes (attendee_id, run_id, field_name, old_value, new_value, changed_at)
     VALUES (?, ?, ?, ?, ?, ?)`,
  );
  const setCounts = db.prepare<[number, number, number]>(
    "UPDATE scraper_runs SET new_attendees = ?, updated_attendees = ? WHERE id = ?",
  );

  const apply = db.transaction((items: readonly unknown[]) => {
    for (const item of items) {
      const attendee = toSyncRow(item);
      if (!attendee) {
        console.warn(`⚠️  Skipping row without an id`);
        result.errors++;
        continue;
      }

      const row = toAttendeeRow(attendee);
      const params: RowParams = { ...row, seen_at: seenAt, run_id: runId, raw_data: JSON.stringify(item) };
      const existing = select.get(row.id);

      if (!existing) {
        insert.run(params);
        result.inserted++;
        continue;
      }

      const detailed = hasDetail(item);
      const compared = detailed ? TRACKED_COLUMNS : BASE_COLUMNS;
      const changed = compared.filter((column) => existing[column] !== row[column]);
      if (changed.length === 0) {
        touch.run(runId, params.raw_data, row.id);
        result.unchanged++;
        continue;
      }

      for (const column of changed) {
        recordChange.run(row.id, runId, column, existing[column], row[column], seenAt);
      }
      (detailed ? update : updateBase).run(params);
      result.updated++;
    }
    setCounts.run(result.inserted, result.updated, runId);
  });

  apply(rows);
  return result;
}

export interface Statistics {
  totalAttendees: number;
  organizations: number;
  countries: number;
  industries: number;
  withBiography: number;
  withInterests: number;
}

export function getStatistics(db: DB): Statistics {
  const row = db
    .prepare<[], {
      total: number;
      organizations: number;
      countries: number;
      industries: number;
      with_biography: number;
      with_interests: number;
    }>(
      `SELECT
         COUNT(*) AS total,
         COUNT(DISTINCT organization) AS organizations,
         COUNT(DISTINCT json_extract(details, '$.country')) AS countries,
         COUNT(DISTINCT json_extract(details, '$.industry')) AS industries,
         COUNT(biography) AS with_biography,
         COUNT(json_extract(details, '$.interests')) AS with_interests
       FROM attendees`,
    )
    .get();

  return {
    totalAttendees: row?.total ?? 0,
    organizations: row?.organizations ?? 0,
    countries: row?.countries ?? 0,
    industries: row?.industries ?? 0,
    withBiography: row?.with_biography ?? 0,
    withInterests: row?.with_interests ?? 0,
  };
}

export interface RunReport {
  id: number;
  runTimestamp: string;
  totalAttendees: number;
  newAttendees: number;
  updatedAttendees: number;
}

export interface NewAttendee {
  firstName: string | null;
  lastName: string | null;
  organization: string | null;
  jobTitle: string | null;
  country: string | null;
}

export interface LatestRunReport {
  run: RunReport;
  /** Attendees first seen in this run, up to the requested limit. */
  newAttendees: NewAttendee[];
  /** Organizations with more than one new attendee, largest first. */
  topOrganizations: { organization: string; count: number }[];
}

export function getLatestRunReport(db: DB, limit = 50): LatestRunReport | null {
  const run = db
    .prepare<[], {
      id: number;
      run_timestamp: string;
      total_attendees: number;
      new_attendees: number;
      updated_attendees: number;
    }>(
      `SELECT id, run_timestamp, total_attendees, new_attendees, updated_attendees
       FROM scraper_runs ORDER BY run_timestamp DESC LIMIT 1`,
    )
    .get();
  if (!run) return null;

  const newAttendees = db
    .prepare<[string, number], {
      first_name: string | null;
      last_name: string | null;
      organization: string | null;
      job_title: string | null;
      country: string | null;
    }>(
      `SELECT first_name, last_name, organization, job_title,
              json_extract(details, '$.country') AS country
       FROM attendees
       WHERE first_seen_at = ?
       ORDER BY organization, last_name, first_name
       LIMIT ?`,
    )
    .all(run.run_timestamp, limit);

  const topOrganizations = db
    .prepare<[string], { organization: string; count: number }>(
      `SELECT organization, COUNT(*) AS count
       FROM attendees
       WHERE first_seen_at = ? AND organization IS NOT NULL
       GROUP BY organization
       HAVING COUNT(*) > 1
       ORDER BY count DESC, organization
       LIMIT 10`,
    )
    .all(run.run_timestamp);

  return {
    run: {
      id: run.id,
      runTimestamp: run.run_timestamp,
      totalAttendees: run.total_attendees,
      newAttendees: run.new_attendees,
      updatedAttendees: run.updated_attendees,
    },
    newAttendees: newAttendees.map((a) => ({
      firstName: a.first_name,
      lastName: a.last_name,
      organization: a.organization,
      jobTitle: a.job_title,
      country: a.country,
    })),
    topOrganizations,
  };
}

function hasCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

/** Newest run directory name under `<dataDir>/runs`, or null when there is none. */
export async function findLatestRun(dataDir: string): Promise<string | null> {
  let names: string[];
  try {
    const entries = await readdir(runsRoot(dataDir), { withFileTypes: true });
    names = entries
      .filter((entry) => entry.isDirectory() && parseRunTimestamp(entry.name) !== null)
      .map((entry) => entry.name);
  } catch (err) {
    if (hasCode(err, "ENOENT")) return null;
    throw err;
  }
  return names.sort().pop() ?? null;
}

async function readRunFile(runDir: string, file: string): Promise<unknown[] | null> {
  let text: string;
  try {
    text = await readFile(join(runDir, file), "utf-8");
  } catch (err) {
    if (hasCode(err, "ENOENT")) return null;
    throw err;
  }
  const parsed: unknown = JSON.parse(text);
  if (!Array.isArray(parsed)) throw new Error(`${file} in ${runDir} is not a JSON array`);
  return parsed;
}

function rowId(item: unknown): string | null {
  return toAttendeeRecord(item)?.id ?? null;
}

/**
 * The plain attendee list with the detailed entries laid over it by id.
 * Attendees whose detail lookup failed keep their list record.
 */
async function loadRunRows(runDir: string): Promise<{ source: string; rows: unknown[] }> {
  const base = await readRunFile(runDir, RUN_FILES.attendeesJson);
  const detailed = await readRunFile(runDir, RUN_FILES.detailedJson);

  if (!base && !detailed) throw new Error(`No attendee file in ${runDir}`);
  if (!detailed) return { source: RUN_FILES.attendeesJson, rows: base ?? [] };
  if (!base) return { source: RUN_FILES.detailedJson, rows: detailed };

  const byId = new Map<string, unknown>();
  for (const item of detailed) {
    const id = rowId(item);
    if (id !== null && !byId.has(id)) byId.set(id, item);
  }
  const rows = base.map((item) => {
    const id = rowId(item);
    const match = id === null ? undefined : byId.get(id);
    if (id !== null) byId.delete(id);
    return match ?? item;
  });
  rows.push(...byId.values());
  return { source: `${RUN_FILES.attendeesJson} + ${RUN_FILES.detailedJson}`, rows };
}

/** Sync one run directory (the newest when no name is given). */
export async function syncRun(db: DB, dataDir: string, runName?: string): Promise<SyncSummary> {
  const name = runName ?? (await findLatestRun(dataDir));
  if (!name) throw new Error(`No run directories in ${runsRoot(dataDir)}`);

  const { source, rows } = await loadRunRows(runPath(dataDir, name));
  console.log(`📥 ${rows.length} attendees from ${name}/${source}`);

  const runId = getOrCreateRun(db, name, rows.length, { source });
  const result = upsertAttendees(db, runId, name, rows);
  console.log(
    `   +${result.inserted} new, ~${result.updated} updated, =${result.unchanged} unchanged, ${result.errors} errors`,
  );

  return { runName: name, runId, source, total: rows.length, ...result };
}

function column(value: string | null, width: number): string {
  const text = value || "N/A";
  return text.length > width ? `${text.slice(0, width - 1)}…` : text.padEnd(width);
}

/** Plain-text report lines for a terminal. */
export function formatRunReport(report: LatestRunReport): string[] {
  const { run } = report;
  const lines = [
    `Run:              ${run.runTimestamp}`,
    `Total attendees:  ${run.totalAttendees}`,
    `New attendees:    ${run.newAttendees}`,
    `Updated profiles: ${run.updatedAttendees}`,
  ];

  if (report.newAttendees.length > 0) {
    lines.push("", `New attendees (showing ${report.newAttendees.length} of ${run.newAttendees})`);
    for (const a of report.newAttendees) {
      const name = `${a.firstName ?? ""} ${a.lastName ?? ""}`.trim();
      lines.push(
        `  ${column(name, 28)} ${column(a.organization, 28)} ${column(a.jobTitle, 28)} ${column(a.country, 16)}`.trimEnd(),
      );
    }
  }

  if (report.topOrganizations.length > 0) {
    lines.push("", "Top new organizations");
    for (const { organization, count } of report.topOrganizations) {
      lines.push(`  ${organization}: ${count}`);
    }
  }
  return lines;
}
