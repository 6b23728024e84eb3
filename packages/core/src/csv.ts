/**
 * CSV output for attendee lists.
 *
 * Follows RFC 4180: CRLF line endings, and fields containing a quote,
 * comma or line break are wrapped in quotes with inner quotes doubled.
 */

import { ATTENDEE_FIELDS, type AttendeeRecord, type DetailedAttendee } from "./attendee.js";

export type CsvRow = Record<string, string | undefined>;

/** Quote a single field if it needs it. */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Serialize rows under the given header. Missing values become empty fields. */
export function toCsv(rows: readonly CsvRow[], columns: readonly string[]): string {
  const lines = [columns.map(escapeCsvField).join(",")];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCsvField(row[column] ?? "")).join(","));
  }
  return lines.join("\r\n") + "\r\n";
}

export function attendeesToCsv(records: readonly AttendeeRecord[]): string {
  return toCsv(records.map((record) => ({ ...record })), ATTENDEE_FIELDS);
}

/** Flatten a detailed attendee to one string per column. */
export function flattenDetailedAttendee(attendee: DetailedAttendee): Record<string, string> {
  const row: Record<string, string> = {};
  for (const field of ATTENDEE_FIELDS) row[field] = attendee[field];

  row.email = attendee.email;
  row.mobilePhone = attendee.mobilePhone;
  row.landlinePhone = attendee.landlinePhone;
  row.websiteUrl = attendee.websiteUrl;

  for (const [key, value] of Object.entries(attendee.fields)) row[`detail_${key}`] = value;
  for (const [key, value] of Object.entries(attendee.socials)) row[`social_${key}`] = value;
  return row;
}

/** Sorted union of every column present in the flattened rows. */
export function detailedColumns(rows: readonly Record<string, string>[]): string[] {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) columns.add(key);
  }
  return [...columns].sort();
}

/** Flattened column → readable label, in the order the organized CSV uses. */
export const ORGANIZED_COLUMNS: readonly (readonly [source: string, label: string])[] = [
  ["firstName", "First Name"],
  ["lastName", "Last Name"],
  ["jobTitle", "Job Title"],
  ["organization", "Organization"],
  ["detail_country", "Country"],
  ["detail_province", "Province/State"],
  ["detail_category", "Attendee Category"],
  ["detail_industry", "Industry"],
  ["detail_organization_type", "Organization Type"],
  ["detail_position_type", "Position Type"],
  ["detail_ai_maturity", "AI Maturity Level"],
  ["detail_motivation", "Event Motivation"],
  ["detail_language", "Language"],
  ["email", "Email"],
  ["mobilePhone", "Mobile Phone"],
  ["landlinePhone", "Landline Phone"],
  ["websiteUrl", "Website"],
  ["detail_interests", "Interests"],
  ["biography", "Biography"],
  ["id", "Attendee ID"],
];

/**
 * Relabel flattened rows for human readers.
 *
 * Known columns come first, in ORGANIZED_COLUMNS order and only if some row
 * has them; every other column follows under its original name.
 */
export function organizeRows(rows: readonly Record<string, string>[]): {
  columns: string[];
  rows: CsvRow[];
} {
  const present = detailedColumns(rows);
  const presentSet = new Set(present);
  const mapped = new Set(ORGANIZED_COLUMNS.map(([source]) => source));

  const known = ORGANIZED_COLUMNS.filter(([source]) => presentSet.has(source));
  const remaining = present.filter((column) => !mapped.has(column));

  const organized = rows.map((row) => {
    const out: CsvRow = {};
    for (const [source, label] of known) out[label] = row[source];
    for (const column of remaining) out[column] = row[column];
    return out;
  });

  return { columns: [...known.map(([, label]) => label), ...remaining], rows: organized };
}
