/**
 * Page source interface: what the collector needs from the platform.
 */

import type { AttendeeDetail, AttendeeRecord } from "@attendee-sync/core";

/** Result of the first, cursor-less request. */
export interface FirstPage {
  records: AttendeeRecord[];
  /** Opaque continuation token, passed back verbatim. */
  cursor: string | null;
  hasMore: boolean;
  /** Total item count; the platform only sends it on the first page. */
  expectedTotal: number | null;
}

/** Result of a cursor-bearing request. */
export interface NextPage {
  records: AttendeeRecord[];
  cursor: string | null;
  hasMore: boolean;
}

export interface PageSource {
  fetchFirstPage(): Promise<FirstPage>;

  /** `cursor` must be the most recently returned one. */
  fetchNextPage(cursor: string): Promise<NextPage>;
}

export interface DetailSource {
  /** Resolves to null when the platform returned no usable detail. */
  fetchAttendeeDetail(id: string): Promise<AttendeeDetail | null>;
}
