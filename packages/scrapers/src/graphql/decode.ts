/**
 * Decode raw platform responses into typed variants.
 *
 * The platform answers a batch with a JSON array of per-operation results.
 * Everything past this module works on `UpstreamResponse`, never on the
 * raw JSON tree.
 */

import {
  isJsonObject as isObject,
  slugifyFieldLabel,
  toAttendeeRecord,
  type AttendeeDetail,
  type AttendeeRecord,
  type JsonObject,
} from "@attendee-sync/core";
import { MalformedResponseError } from "../errors.js";

export interface ListPageResponse {
  kind: "list";
  records: AttendeeRecord[];
  hasNextPage: boolean;
  /** Only set when `hasNextPage` is true. */
  endCursor: string | null;
  totalCount: number | null;
}

export interface DetailResponse {
  kind: "detail";
  detail: AttendeeDetail;
}

export interface ErrorResponse {
  kind: "error";
  message: string;
}

export type UpstreamResponse = ListPageResponse | DetailResponse | ErrorResponse;

function text(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}

/** Multi-select answers are joined with " | ". */
function answerText(value: unknown): string {
  if (Array.isArray(value)) return value.map(text).filter(Boolean).join(" | ");
  if (isObject(value)) return text(value.value ?? value.name ?? value.text);
  return text(value);
}

function decodePeople(people: JsonObject): ListPageResponse {
  const nodes = Array.isArray(people.nodes) ? people.nodes : [];
  const records: AttendeeRecord[] = [];
  for (const node of nodes) {
    const record = toAttendeeRecord(node);
    if (record) records.push(record);
  }

  const pageInfo: JsonObject = isObject(people.pageInfo) ? people.pageInfo : {};
  const hasNextPage = pageInfo.hasNextPage === true;
  const endCursor =
    hasNextPage && typeof pageInfo.endCursor === "string" ? pageInfo.endCursor : null;
  const totalCount =
    typeof people.totalCount === "number" && Number.isFinite(people.totalCount)
      ? people.totalCount
      : null;

  return { kind: "list", records, hasNextPage, endCursor, totalCount };
}

function decodePerson(person: JsonObject): DetailResponse {
  const fields: Record<string, string> = {};
  if (Array.isArray(person.fields)) {
    for (const field of person.fields) {
      if (!isObject(field)) continue;
      const key = slugifyFieldLabel(text(field.name ?? field.label));
      const value = answerText(field.value);
      if (key && value) fields[key] = value;
    }
  }

  const socials: Record<string, string> = {};
  if (Array.isArray(person.socialNetworks)) {
    for (const network of person.socialNetworks) {
      if (!isObject(network)) continue;
      const key = slugifyFieldLabel(text(network.type));
      const profile = text(network.profile);
      if (key && profile) socials[key] = profile;
    }
  }

  return {
    kind: "detail",
    detail: {
      email: text(person.email),
      mobilePhone: text(person.mobilePhone),
      landlinePhone: text(person.landlinePhone),
      websiteUrl: text(person.websiteUrl),
      fields,
      socials,
    },
  };
}

/**
 * Classify a response payload. The first per-operation result carrying
 * `data.view.people` or `data.eventPerson` wins; otherwise the result is an
 * ErrorResponse describing what was missing.
 */
export function decodeUpstreamResponse(payload: unknown): UpstreamResponse {
  const results = Array.isArray(payload) ? payload : [payload];
  let message = "response has no data";

  for (const result of results) {
    if (!isObject(result)) continue;

    if (Array.isArray(result.errors) && result.errors.length > 0) {
      const first = result.errors[0];
      message = isObject(first) && typeof first.message === "string" ? first.message : "GraphQL error";
    }

    const data = result.data;
    if (!isObject(data)) continue;

    if (isObject(data.view) && isObject(data.view.people)) {
      return decodePeople(data.view.people);
    }
    if (isObject(data.eventPerson)) {
      return decodePerson(data.eventPerson);
    }
    message = "response data has neither view.people nor eventPerson";
  }

  return { kind: "error", message };
}

function malformed(response: UpstreamResponse, expected: string): MalformedResponseError {
  if (response.kind === "error") return new MalformedResponseError(response.message);
  return new MalformedResponseError(`expected a ${expected} response, got ${response.kind}`);
}

/** Narrow to a list page or throw MalformedResponseError. */
export function expectListPage(response: UpstreamResponse): ListPageResponse {
  if (response.kind === "list") return response;
  throw malformed(response, "list");
}

/** Narrow to a person detail or throw MalformedResponseError. */
export function expectDetail(response: UpstreamResponse): DetailResponse {
  if (response.kind === "detail") return response;
  throw malformed(response, "detail");
}
