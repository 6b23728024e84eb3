/**
 * Detail enrichment: fetch per-person detail for every collected attendee.
 *
 * Each id is an independent request, so they run on a small worker pool.
 * A failed id is recorded and skipped; it never stops the batch. The
 * shared success/failure lists are only touched between awaits, so no
 * locking is needed on Node's single thread.
 */

import { setTimeout as delay } from "node:timers/promises";
import type { AttendeeRecord, DetailedAttendee } from "@attendee-sync/core";
import { mapConcurrent } from "./concurrency.js";
import type { DetailSource } from "./scraper.js";

export interface EnrichOptions {
  workers: number;
  /** Pause before each detail request. */
  delayMs: number;
}

export const DEFAULT_ENRICH_OPTIONS: EnrichOptions = { workers: 5, delayMs: 500 };

export interface EnrichResult {
  /** Completion order, not input order. */
  enriched: DetailedAttendee[];
  failedIds: string[];
}

const PROGRESS_EVERY = 50;

export async function enrichAttendees(
  records: readonly AttendeeRecord[],
  source: DetailSource,
  options: Partial<EnrichOptions> = {},
  sleep: (ms: number) => Promise<void> = (ms) => delay(ms),
): Promise<EnrichResult> {
  const { workers, delayMs } = { ...DEFAULT_ENRICH_OPTIONS, ...options };
  const enriched: DetailedAttendee[] = [];
  const failedIds: string[] = [];
  let processed = 0;

  console.log(`🔍 Fetching details for ${records.length} attendees (workers: ${workers})…`);

  await mapConcurrent(records, workers, async (record) => {
    await sleep(delayMs);
    try {
      const detail = await source.fetchAttendeeDetail(record.id);
      if (detail) {
        enriched.push({ ...record, ...detail });
      } else {
        console.warn(`⚠️  No detail returned for ${record.id}`);
        failedIds.push(record.id);
      }
    } catch (err) {
      console.error(`❌ Detail for ${record.id} failed: ${err instanceof Error ? err.message : err}`);
      failedIds.push(record.id);
    }

    processed++;
    if (processed % PROGRESS_EVERY === 0) {
      console.log(`   ${processed}/${records.length} processed`);
    }
  });

  console.log(`   Details: ${enriched.length} ok, ${failedIds.length} failed`);
  return { enriched, failedIds };
}
