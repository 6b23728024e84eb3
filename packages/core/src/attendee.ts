/**
 * Core attendee model.
 *
 * An attendee is one participant listed by the event platform. The base
 * record comes from the paginated people list; the detail part comes from
 * a per-person query and is merged in during enrichment.
 */

import { isJsonObject } from "./json.js";

/** One participant as listed by the people view. */
export interface AttendeeRecord {
  /** Opaque id assigned by the platform. Primary dedup key. */
  id: string;

  firstName: string;
  lastName: string;
  jobTitle: string;
  organization: string;
  photoUrl: string;
  biography: string;

  /** Platform user id (differs from the event-scoped person id). */
  userId: string;
}

/** Field order used for JSON output and the attendee CSV header. */
export const ATTENDEE_FIELDS = [
  "id",
  "firstName",
  "lastName",
  "jobTitle",
  "organization",
  "photoUrl",
  "biography",
  "userId",
] as const satisfies readonly (keyof AttendeeRecord)[];

/** Per-person detail fetched separately for each known attendee. */
export interface AttendeeDetail {
  email: string;
  mobilePhone: string;
  landlinePhone: string;
  websiteUrl: string;

  /** Profile questions ("About me" fields), keyed by a slug of the label. */
  fields: Record<string, string>;

  /** Social network type (e.g. "linkedin") → profile URL or handle. */
  socials: Record<string, string>;
}

/** A base record merged with its detail. */
export type DetailedAttendee = AttendeeRecord & AttendeeDetail;

function asText(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}

/**
 * Build an AttendeeRecord from an untyped upstream node.
 * Returns null when the node has no usable id.
 */
export function toAttendeeRecord(node: unknown): AttendeeRecord | null {
  if (!isJsonObject(node)) return null;
  if (typeof node.id !== "string" || node.id === "") return null;

  return {
    id: node.id,
    firstName: asText(node.firstName),
    lastName: asText(node.lastName),
    jobTitle: asText(node.jobTitle),
    organization: asText(node.organization),
    photoUrl: asText(node.photoUrl),
    biography: asText(node.biography),
    userId: asText(node.userId),
  };
}

/** Turn a question label into a column-safe key: "AI Maturity" → "ai_maturity". */
export function slugifyFieldLabel(label: string): string {
  return label
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

/** "First Last", trimmed, or the id when the record carries no name. */
export function displayName(record: AttendeeRecord): string {
  const name = `${record.firstName} ${record.lastName}`.trim();
  return name || record.id;
}
