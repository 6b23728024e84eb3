/**
 * One complete scrape: collect, write artifacts, enrich, link, clean up.
 *
 * Shared by the production runner and the CLI. Never exits the process;
 * callers turn the summary into an exit code.
 */

import { RUN_FILES, runPath, type AttendeeRecord } from "@attendee-sync/core";
import { fileCheckpoint } from "./checkpoint.js";
import { cleanupRuns } from "./cleanup.js";
import { PaginatedCollector, type CollectionOutcome } from "./collector.js";
import type { AppConfig } from "./config.js";
import { enrichAttendees, type EnrichResult } from "./enrich.js";
import { GraphqlClient } from "./graphql/client.js";
import {
  createRunDirectory,
  removeRunDirectory,
  updateLatestLink,
  writeRunArtifacts,
} from "./output.js";
import type { DetailSource, PageSource } from "./scraper.js";

export interface ScrapeOptions {
  skipDetails?: boolean;
}

export interface ScrapeDeps {
  /** Defaults to a GraphqlClient built from the platform config. */
  source?: PageSource & DetailSource;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface ScrapeSummary {
  /** Null when nothing was collected and the run directory was removed. */
  runName: string | null;
  outcome: CollectionOutcome;
  pages: number;
  total: number;
  expectedTotal: number | null;
  /** Collected / expected, as a percentage. */
  coverage: number | null;
  organizations: number;
  detailed: number;
  failedIds: number;
  files: string[];
  removedRuns: string[];
}

export function countOrganizations(records: readonly AttendeeRecord[]): number {
  return new Set(records.map((r) => r.organization.trim()).filter(Boolean)).size;
}

export async function runScrape(
  config: AppConfig,
  options: ScrapeOptions = {},
  deps: ScrapeDeps = {},
): Promise<ScrapeSummary> {
  const now = deps.now ?? (() => new Date());
  const source = deps.source ?? new GraphqlClient(config.platform, { sleep: deps.sleep });
  const run = await createRunDirectory(config.dataDir, now());
  console.log(`📁 Run directory: ${run.path}`);

  const collector = new PaginatedCollector(source, config.platform, {
    checkpoint: fileCheckpoint(runPath(config.dataDir, run.name, RUN_FILES.checkpoint)),
    sleep: deps.sleep,
    now,
  });
  const result = await collector.run(config.run);
  const total = result.records.length;

  const summary: ScrapeSummary = {
    runName: run.name,
    outcome: result.outcome,
    pages: result.pages,
    total,
    expectedTotal: result.expectedTotal,
    coverage:
      result.expectedTotal !== null && result.expectedTotal > 0
        ? (total / result.expectedTotal) * 100
        : null,
    organizations: countOrganizations(result.records),
    detailed: 0,
    failedIds: 0,
    files: [],
    removedRuns: [],
  };

  if (total === 0) {
    console.error(`❌ No attendees collected (${result.outcome}); removing ${run.name}`);
    await removeRunDirectory(run);
    return { ...summary, runName: null };
  }

  let enrichment: EnrichResult | null = null;
  if (options.skipDetails) {
    console.log(`⏭️  Details skipped`);
  } else {
    enrichment = await enrichAttendees(result.records, source, config.enrichment, deps.sleep);
    summary.detailed = enrichment.enriched.length;
    summary.failedIds = enrichment.failedIds.length;
  }

  summary.files = await writeRunArtifacts(run, result.records, enrichment);
  await updateLatestLink(config.dataDir, run.name);

  if (config.cleanup.enabled) {
    console.log(`🧹 Cleaning up runs older than ${config.cleanup.retentionDays} days`);
    const cleaned = await cleanupRuns(config.dataDir, {
      removeIncomplete: false,
      maxAgeDays: config.cleanup.retentionDays,
      now: now(),
    });
    summary.removedRuns = cleaned.removed;
  }

  return summary;
}

export function printSummary(summary: ScrapeSummary, log: (line: string) => void = console.log): void {
  log(`\n📊 Summary`);
  log(`   Outcome:        ${summary.outcome}`);
  log(`   Pages fetched:  ${summary.pages}`);
  log(`   Attendees:      ${summary.total}`);
  if (summary.expectedTotal !== null) {
    log(`   Expected:       ${summary.expectedTotal}`);
  }
  if (summary.coverage !== null) {
    log(`   Coverage:       ${summary.coverage.toFixed(1)}%`);
  }
  log(`   Organizations:  ${summary.organizations}`);
  if (summary.detailed > 0 || summary.failedIds > 0) {
    log(`   Details:        ${summary.detailed} ok, ${summary.failedIds} failed`);
  }
  if (summary.runName) {
    log(`   Run:            ${summary.runName}`);
  }
}
