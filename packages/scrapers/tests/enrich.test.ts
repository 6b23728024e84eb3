import { describe, it, expect, beforeEach, vi } from "vitest";
import { enrichAttendees } from "../src/enrich.js";
import { mapConcurrent } from "../src/concurrency.js";
import { TransportError } from "../src/errors.js";
import { FakeSource, detail, noSleep, person, quietConsole } from "./helpers.js";

beforeEach(() => {
  vi.restoreAllMocks();
  quietConsole();
});

describe("mapConcurrent", () => {
  it("keeps input order in the results", async () => {
    const results = await mapConcurrent([30, 10, 20], 3, async (ms, index) => {
      await new Promise((resolve) => setTimeout(resolve, ms));
      return `${index}:${ms}`;
    });
    expect(results).toEqual(["0:30", "1:10", "2:20"]);
  });

  it("never runs more than the given number of tasks at once", async () => {
    let inFlight = 0;
    let peak = 0;
    await mapConcurrent([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
    });
    expect(peak).toBe(3);
  });

  it("handles an empty list", async () => {
    expect(await mapConcurrent([], 4, async () => 1)).toEqual([]);
  });
});

describe("enrichAttendees", () => {
  it("merges each detail into its record", async () => {
    const source = new FakeSource(
      { records: [], cursor: null, hasMore: false, expectedTotal: null },
      {},
      { a: detail({ email: "a@example.com", fields: { country: "Austria" } }) },
    );
    const result = await enrichAttendees([person("a")], source, { workers: 1, delayMs: 0 }, noSleep);

    expect(result.failedIds).toEqual([]);
    expect(result.enriched).toEqual([
      { ...person("a"), ...detail({ email: "a@example.com", fields: { country: "Austria" } }) },
    ]);
  });

  it("records missing and failed details without stopping the batch", async () => {
    const source = new FakeSource(
      { records: [], cursor: null, hasMore: false, expectedTotal: null },
      {},
      {
        a: detail({ email: "a@example.com" }),
        b: null,
        c: new TransportError("upstream answered 500", 500),
        d: detail({ email: "d@example.com" }),
      },
    );
    const records = ["a", "b", "c", "d"].map((id) => person(id));
    const result = await enrichAttendees(records, source, { workers: 2, delayMs: 0 }, noSleep);

    expect(result.enriched.map((r) => r.id).sort()).toEqual(["a", "d"]);
    expect([...result.failedIds].sort()).toEqual(["b", "c"]);
    expect([...source.detailCalls].sort()).toEqual(["a", "b", "c", "d"]);
  });

  it("waits the configured delay before every request", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const source = new FakeSource(
      { records: [], cursor: null, hasMore: false, expectedTotal: null },
      {},
      { a: detail(), b: detail() },
    );
    await enrichAttendees([person("a"), person("b")], source, { workers: 2, delayMs: 250 }, sleep);

    expect(sleep.mock.calls).toEqual([[250], [250]]);
  });
});
