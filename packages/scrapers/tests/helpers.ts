import { vi } from "vitest";
import type { AttendeeDetail, AttendeeRecord } from "@attendee-sync/core";
import type { DetailSource, FirstPage, NextPage, PageSource } from "../src/scraper.js";

export function person(id: string, overrides: Partial<AttendeeRecord> = {}): AttendeeRecord {
  return {
    id,
    firstName: id.toUpperCase(),
    lastName: "Tester",
    jobTitle: "",
    organization: "",
    photoUrl: "",
    biography: "",
    userId: `u-${id}`,
    ...overrides,
  };
}

export function detail(overrides: Partial<AttendeeDetail> = {}): AttendeeDetail {
  return {
    email: "",
    mobilePhone: "",
    landlinePhone: "",
    websiteUrl: "",
    fields: {},
    socials: {},
    ...overrides,
  };
}

type NextStep = NextPage | Error;

/**
 * In-memory page and detail source. `next` maps a cursor to the page (or
 * error) it returns; it may be a lookup table or a function.
 */
export class FakeSource implements PageSource, DetailSource {
  readonly nextCalls: string[] = [];
  readonly detailCalls: string[] = [];

  constructor(
    private readonly first: FirstPage | Error,
    private readonly next: Record<string, NextStep> | ((cursor: string, call: number) => NextStep) = {},
    private readonly details: Record<string, AttendeeDetail | null | Error> = {},
  ) {}

  async fetchFirstPage(): Promise<FirstPage> {
    if (this.first instanceof Error) throw this.first;
    return this.first;
  }

  async fetchNextPage(cursor: string): Promise<NextPage> {
    this.nextCalls.push(cursor);
    const step =
      typeof this.next === "function" ? this.next(cursor, this.nextCalls.length) : this.next[cursor];
    if (step === undefined) throw new Error(`no page scripted for cursor ${cursor}`);
    if (step instanceof Error) throw step;
    return step;
  }

  async fetchAttendeeDetail(id: string): Promise<AttendeeDetail | null> {
    this.detailCalls.push(id);
    const result = this.details[id];
    if (result instanceof Error) throw result;
    return result ?? null;
  }
}

export const noSleep = async (): Promise<void> => {};

/** Silence progress output for the current test file. */
export function quietConsole(): void {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
}

export function ids(records: readonly AttendeeRecord[]): string[] {
  return records.map((r) => r.id);
}
