/**
 * Configuration from environment variables.
 *
 *   EVENT_API_URL         : GraphQL endpoint (required)
 *   EVENT_API_TOKEN       : bearer token copied from a browser session (required)
 *   EVENT_API_COOKIES     : optional "name=value; other=value" cookie string
 *   EVENT_ID, EVENT_VIEW_ID, LIST_QUERY_HASH, DETAIL_QUERY_HASH (required)
 *   DATA_DIR              : output root (default: data)
 *   MAX_PAGES, EMPTY_PAGE_TOLERANCE, CHECKPOINT_EVERY, PAGE_SIZE_HINT,
 *   RATE_LIMIT_DELAY_MS, DETAIL_WORKERS, DETAIL_DELAY_MS, REQUEST_TIMEOUT_MS,
 *   PAGE_RETRIES, RETRY_BASE_DELAY_MS, CLEANUP_OLD_RUNS, RUN_RETENTION_DAYS
 *
 * Every problem is collected and reported at once.
 */

import { ConfigError } from "./errors.js";
import { DEFAULT_RUN_OPTIONS, type RunOptions } from "./collector.js";
import { DEFAULT_ENRICH_OPTIONS, type EnrichOptions } from "./enrich.js";
import type { PlatformConfig } from "./graphql/client.js";

export interface AppConfig {
  platform: PlatformConfig;
  run: RunOptions;
  enrichment: EnrichOptions;
  dataDir: string;
  cleanup: {
    enabled: boolean;
    retentionDays: number;
  };
}

type Env = Record<string, string | undefined>;

class EnvReader {
  readonly problems: string[] = [];

  constructor(private readonly env: Env) {}

  string(name: string): string {
    const value = this.env[name]?.trim();
    if (!value) {
      this.problems.push(`${name} is required`);
      return "";
    }
    return value;
  }

  optional(name: string, fallback: string): string {
    return this.env[name]?.trim() || fallback;
  }

  int(name: string, fallback: number, min: number): number {
    const raw = this.env[name]?.trim();
    if (!raw) return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
      this.problems.push(`${name} must be an integer >= ${min}, got "${raw}"`);
      return fallback;
    }
    return value;
  }

  bool(name: string): boolean {
    return ["1", "true", "yes"].includes(this.env[name]?.trim().toLowerCase() ?? "");
  }

  url(name: string): URL {
    const raw = this.string(name);
    try {
      return new URL(raw);
    } catch {
      if (raw) this.problems.push(`${name} is not a valid URL: ${raw}`);
      return new URL("http://invalid.localhost/");
    }
  }
}

/** Build the headers every request carries. Accepts the token with or without "Bearer ". */
export function buildStaticHeaders(token: string, cookies?: string): Record<string, string> {
  const bare = token.replace(/^Bearer\s+/i, "");
  const headers: Record<string, string> = { Authorization: `Bearer ${bare}` };
  if (cookies?.trim()) headers.Cookie = cookies.trim();
  return headers;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const read = new EnvReader(env);

  const endpoint = read.url("EVENT_API_URL");
  const token = read.string("EVENT_API_TOKEN");
  const platform: PlatformConfig = {
    endpoint,
    staticHeaders: buildStaticHeaders(token, env.EVENT_API_COOKIES),
    pageSizeHint: read.int("PAGE_SIZE_HINT", 30, 1),
    rateLimitDelayMs: read.int("RATE_LIMIT_DELAY_MS", 300, 0),
    eventId: read.string("EVENT_ID"),
    viewId: read.string("EVENT_VIEW_ID"),
    listQueryHash: read.string("LIST_QUERY_HASH"),
    detailQueryHash: read.string("DETAIL_QUERY_HASH"),
    requestTimeoutMs: read.int("REQUEST_TIMEOUT_MS", 30_000, 1),
    retries: read.int("PAGE_RETRIES", 0, 0),
    retryBaseDelayMs: read.int("RETRY_BASE_DELAY_MS", 1_000, 0),
  };

  const config: AppConfig = {
    platform,
    run: {
      maxPages: read.int("MAX_PAGES", DEFAULT_RUN_OPTIONS.maxPages, 1),
      emptyPageTolerance: read.int("EMPTY_PAGE_TOLERANCE", DEFAULT_RUN_OPTIONS.emptyPageTolerance, 1),
      checkpointEvery: read.int("CHECKPOINT_EVERY", DEFAULT_RUN_OPTIONS.checkpointEvery, 1),
    },
    enrichment: {
      workers: read.int("DETAIL_WORKERS", DEFAULT_ENRICH_OPTIONS.workers, 1),
      delayMs: read.int("DETAIL_DELAY_MS", DEFAULT_ENRICH_OPTIONS.delayMs, 0),
    },
    dataDir: read.optional("DATA_DIR", "data"),
    cleanup: {
      enabled: read.bool("CLEANUP_OLD_RUNS"),
      retentionDays: read.int("RUN_RETENTION_DAYS", 30, 1),
    },
  };

  if (read.problems.length > 0) throw new ConfigError(read.problems);
  return config;
}
