import { describe, it, expect } from "vitest";
import { buildStaticHeaders, loadConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

const baseEnv = {
  EVENT_API_URL: "https://events.example.test/api/graphql",
  EVENT_API_TOKEN: "test-token",
  EVENT_ID: "event-1",
  EVENT_VIEW_ID: "view-1",
  LIST_QUERY_HASH: "list-hash",
  DETAIL_QUERY_HASH: "detail-hash",
};

function problemsOf(env: Record<string, string>): string[] {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) return err.problems;
    throw err;
  }
  return [];
}

describe("loadConfig", () => {
  it("fills defaults around the required settings", () => {
    const config = loadConfig(baseEnv);

    expect(config.platform.endpoint.href).toBe("https://events.example.test/api/graphql");
    expect(config.platform.staticHeaders).toEqual({ Authorization: "Bearer test-token" });
    expect(config.platform).toMatchObject({
      eventId: "event-1",
      viewId: "view-1",
      listQueryHash: "list-hash",
      detailQueryHash: "detail-hash",
      pageSizeHint: 30,
      rateLimitDelayMs: 300,
      requestTimeoutMs: 30_000,
      retries: 0,
    });
    expect(config.run).toEqual({ maxPages: 200, emptyPageTolerance: 3, checkpointEvery: 10 });
    expect(config.enrichment).toEqual({ workers: 5, delayMs: 500 });
    expect(config.dataDir).toBe("data");
    expect(config.cleanup).toEqual({ enabled: false, retentionDays: 30 });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      ...baseEnv,
      MAX_PAGES: "5",
      EMPTY_PAGE_TOLERANCE: "2",
      DETAIL_WORKERS: "8",
      DETAIL_DELAY_MS: "0",
      PAGE_RETRIES: "3",
      DATA_DIR: "/tmp/attendees",
      CLEANUP_OLD_RUNS: "true",
      RUN_RETENTION_DAYS: "7",
    });

    expect(config.run.maxPages).toBe(5);
    expect(config.run.emptyPageTolerance).toBe(2);
    expect(config.enrichment).toEqual({ workers: 8, delayMs: 0 });
    expect(config.platform.retries).toBe(3);
    expect(config.dataDir).toBe("/tmp/attendees");
    expect(config.cleanup).toEqual({ enabled: true, retentionDays: 7 });
  });

  it("lists every missing setting at once", () => {
    expect(problemsOf({})).toEqual([
      "EVENT_API_URL is required",
      "EVENT_API_TOKEN is required",
      "EVENT_ID is required",
      "EVENT_VIEW_ID is required",
      "LIST_QUERY_HASH is required",
      "DETAIL_QUERY_HASH is required",
    ]);
  });

  it("rejects malformed values", () => {
    expect(
      problemsOf({
        ...baseEnv,
        EVENT_API_URL: "not a url",
        RATE_LIMIT_DELAY_MS: "-1",
        MAX_PAGES: "abc",
        DETAIL_WORKERS: "0",
      }),
    ).toEqual([
      "EVENT_API_URL is not a valid URL: not a url",
      'RATE_LIMIT_DELAY_MS must be an integer >= 0, got "-1"',
      'MAX_PAGES must be an integer >= 1, got "abc"',
      'DETAIL_WORKERS must be an integer >= 1, got "0"',
    ]);
  });
});

describe("buildStaticHeaders", () => {
  it("accepts the token with or without its scheme", () => {
    expect(buildStaticHeaders("Bearer test-token")).toEqual({ Authorization: "Bearer test-token" });
    expect(buildStaticHeaders("test-token")).toEqual({ Authorization: "Bearer test-token" });
  });

  it("adds the cookie header when cookies are given", () => {
    expect(buildStaticHeaders("test-token", " session=test-cookie ")).toEqual({
      Authorization: "Bearer test-token",
      Cookie: "session=test-cookie",
    });
    expect(buildStaticHeaders("test-token", "  ")).toEqual({ Authorization: "Bearer test-token" });
  });
});
