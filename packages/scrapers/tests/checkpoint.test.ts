import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { snapshotRunState } from "@attendee-sync/core";
import { fileCheckpoint, readCheckpoint, writeCheckpoint } from "../src/checkpoint.js";
import { person } from "./helpers.js";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "attendee-checkpoint-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("checkpoint files", () => {
  const when = new Date("2026-02-03T04:05:06.000Z");

  it("writes a state that reads back unchanged", async () => {
    const state = snapshotRunState([person("a"), person("b")], new Set(["a", "b"]), 10, 3, when);
    const path = join(dir, "run", "checkpoint.json");

    await writeCheckpoint(path, state);

    expect(await readCheckpoint(path)).toEqual(state);
    expect(await readdir(join(dir, "run"))).toEqual(["checkpoint.json"]);
  });

  it("replaces the previous snapshot", async () => {
    const path = join(dir, "checkpoint.json");
    const sink = fileCheckpoint(path);

    await sink(snapshotRunState([person("a")], new Set(["a"]), null, 1, when));
    await sink(snapshotRunState([person("a"), person("b")], new Set(["a", "b"]), null, 2, when));

    const state = await readCheckpoint(path);
    expect(state.pageNumber).toBe(2);
    expect(state.seenIds).toEqual(["a", "b"]);
    expect(await readdir(dir)).toEqual(["checkpoint.json"]);
  });

  it("rejects a file that is not a checkpoint", async () => {
    const path = join(dir, "checkpoint.json");
    await writeFile(path, JSON.stringify({ records: [] }), "utf-8");

    await expect(readCheckpoint(path)).rejects.toThrow("is not a checkpoint file");
  });
});
