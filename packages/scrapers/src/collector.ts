/**
 * Paginated collector: walks a cursor-paginated people list from the
 * first page to the last, keeping each attendee exactly once.
 *
 * The loop is strictly sequential: every request needs the cursor from the
 * previous response. State lives on the instance and is reset at the start
 * of each run, so a run never resumes from an earlier one.
 */

import { setTimeout as delay } from "node:timers/promises";
import { displayName, snapshotRunState, type AttendeeRecord, type RunState } from "@attendee-sync/core";
import { TransportError } from "./errors.js";
import type { PageSource } from "./scraper.js";
import type { PlatformConfig } from "./graphql/client.js";

/** How a run ended. Every outcome is a successful completion with a usable result. */
export type CollectionOutcome =
  | "exhausted"
  | "safety-limit-hit"
  | "stalled"
  | "target-reached"
  | "transport-error"
  | "aborted";

export interface RunOptions {
  /** Safety limit on loop iterations after the first page. */
  maxPages: number;
  /** Stop after this many consecutive pages without a new record. */
  emptyPageTolerance: number;
  /** Write a checkpoint every N pages. */
  checkpointEvery: number;
}

export const DEFAULT_RUN_OPTIONS: RunOptions = {
  maxPages: 200,
  emptyPageTolerance: 3,
  checkpointEvery: 10,
};

export interface CollectionResult {
  /** Deduplicated records in first-seen order. */
  records: AttendeeRecord[];
  /** Number of pages fetched successfully. */
  pages: number;
  expectedTotal: number | null;
  outcome: CollectionOutcome;
  /** The error that ended the run early, for "transport-error" and "aborted". */
  error?: Error;
}

export type CheckpointSink = (state: RunState) => Promise<void>;

export interface CollectorDeps {
  checkpoint?: CheckpointSink;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

function validate(options: RunOptions): void {
  for (const key of ["maxPages", "emptyPageTolerance", "checkpointEvery"] as const) {
    const value = options[key];
    if (!Number.isInteger(value) || value < 1) {
      throw new RangeError(`${key} must be a positive integer, got ${value}`);
    }
  }
}

export class PaginatedCollector {
  private records: AttendeeRecord[] = [];
  private seen = new Set<string>();
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(
    private readonly source: PageSource,
    private readonly config: Pick<PlatformConfig, "pageSizeHint" | "rateLimitDelayMs">,
    private readonly deps: CollectorDeps = {},
  ) {
    this.sleep = deps.sleep ?? ((ms) => delay(ms));
    this.now = deps.now ?? (() => new Date());
  }

  async run(options: Partial<RunOptions> = {}): Promise<CollectionResult> {
    const opts: RunOptions = { ...DEFAULT_RUN_OPTIONS, ...options };
    validate(opts);

    this.records = [];
    this.seen = new Set();

    let page = 1;
    let fetched = 0;
    let consecutiveEmpty = 0;
    let expectedTotal: number | null = null;

    try {
      console.log(`📄 Fetching page 1…`);
      const first = await this.source.fetchFirstPage();
      fetched = 1;
      let cursor = first.cursor;
      let hasMore = first.hasMore;
      expectedTotal = first.expectedTotal;

      if (expectedTotal !== null) {
        const estimate = Math.ceil(expectedTotal / this.config.pageSizeHint);
        console.log(`📊 ${expectedTotal} attendees available (~${estimate} pages)`);
      }
      const added = this.appendNew(first.records);
      this.logPage(1, added, expectedTotal);
      await this.sleep(this.config.rateLimitDelayMs);

      while (cursor !== null && hasMore && page <= opts.maxPages) {
        page += 1;
        const next = await this.source.fetchNextPage(cursor);
        fetched = page;
        cursor = next.cursor;
        hasMore = next.hasMore;

        const newCount = this.appendNew(next.records);
        this.logPage(page, newCount, expectedTotal);

        if (newCount === 0) {
          consecutiveEmpty += 1;
          if (consecutiveEmpty >= opts.emptyPageTolerance) {
            console.log(`⚠️  No new attendees for ${consecutiveEmpty} consecutive pages, stopping`);
            return this.result(fetched, expectedTotal, "stalled");
          }
        } else {
          consecutiveEmpty = 0;
        }

        if (page % opts.checkpointEvery === 0) {
          await this.persist(expectedTotal, page);
        }

        if (expectedTotal !== null && this.seen.size >= expectedTotal) {
          console.log(`✅ Reached expected total of ${expectedTotal} attendees`);
          return this.result(fetched, expectedTotal, "target-reached");
        }

        await this.sleep(this.config.rateLimitDelayMs);
      }

      if (cursor === null || !hasMore) {
        console.log(`🎉 Reached the last page`);
        return this.result(fetched, expectedTotal, "exhausted");
      }
      console.log(`⚠️  Reached safety limit of ${opts.maxPages} pages`);
      return this.result(fetched, expectedTotal, "safety-limit-hit");
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      const outcome: CollectionOutcome = err instanceof TransportError ? "transport-error" : "aborted";
      console.error(`❌ Page ${fetched + 1} failed: ${error.message}`);
      console.error(`   Keeping ${this.records.length} attendees collected so far`);
      await this.persist(expectedTotal, fetched);
      return { ...this.result(fetched, expectedTotal, outcome), error };
    }
  }

  /** Append records whose id hasn't been seen, in response order. Returns how many were added. */
  private appendNew(records: readonly AttendeeRecord[]): number {
    let added = 0;
    for (const record of records) {
      if (this.seen.has(record.id)) continue;
      this.seen.add(record.id);
      this.records.push(record);
      added++;
    }
    return added;
  }

  private logPage(page: number, added: number, expectedTotal: number | null): void {
    const total = this.seen.size;
    if (added === 0) {
      console.log(`   page ${page}: no new attendees`);
      return;
    }
    const last = this.records[this.records.length - 1];
    const progress =
      expectedTotal !== null && expectedTotal > 0
        ? `${total}/${expectedTotal} (${((total / expectedTotal) * 100).toFixed(1)}%)`
        : `${total} collected`;
    console.log(`   page ${page}: +${added} (last: ${displayName(last)}), ${progress}`);
  }

  /** Checkpoint failures are logged and the run continues. */
  private async persist(expectedTotal: number | null, page: number): Promise<void> {
    if (!this.deps.checkpoint) return;
    try {
      await this.deps.checkpoint(
        snapshotRunState(this.records, this.seen, expectedTotal, page, this.now()),
      );
      console.log(`💾 Checkpoint saved at page ${page}`);
    } catch (err) {
      console.error(`❌ Checkpoint at page ${page} failed:`, err);
    }
  }

  private result(
    pages: number,
    expectedTotal: number | null,
    outcome: CollectionOutcome,
  ): CollectionResult {
    return { records: [...this.records], pages, expectedTotal, outcome };
  }
}
