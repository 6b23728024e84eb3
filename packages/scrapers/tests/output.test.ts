import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readFile, readdir, readlink, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  createRunDirectory,
  updateLatestLink,
  writeJson,
  writeRunArtifacts,
} from "../src/output.js";
import { detail, person } from "./helpers.js";

let dataDir: string;

beforeEach(async () => {
  dataDir = await mkdtemp(join(tmpdir(), "attendee-output-"));
});

afterEach(async () => {
  await rm(dataDir, { recursive: true, force: true });
});

describe("run output", () => {
  it("names the run directory after its local start time", async () => {
    const run = await createRunDirectory(dataDir, new Date(2026, 0, 2, 3, 4, 5));

    expect(run.name).toBe("2026-01-02_030405");
    expect(run.path).toBe(join(dataDir, "runs", "2026-01-02_030405"));
    expect((await stat(join(run.path, "logs"))).isDirectory()).toBe(true);
  });

  it("returns an absolute path for a relative data directory", async () => {
    const cwd = vi.spyOn(process, "cwd").mockReturnValue(dataDir);
    try {
      const run = await createRunDirectory("data", new Date(2026, 0, 2, 3, 4, 5));

      expect(run.path).toBe(join(dataDir, "data", "runs", "2026-01-02_030405"));
      expect((await stat(join(run.path, "logs"))).isDirectory()).toBe(true);
    } finally {
      cwd.mockRestore();
    }
  });

  it("writes indented JSON with a trailing newline", async () => {
    const path = join(dataDir, "nested", "value.json");
    await writeJson(path, { a: [1] });

    expect(await readFile(path, "utf-8")).toBe('{\n  "a": [\n    1\n  ]\n}\n');
  });

  it("writes only the attendee list when enrichment did not run", async () => {
    const run = await createRunDirectory(dataDir, new Date(2026, 0, 2, 3, 4, 5));
    const files = await writeRunArtifacts(run, [person("a")], null);

    expect(files).toEqual(["all_attendees.csv", "all_attendees.json"]);
    expect(await readFile(join(run.path, "all_attendees.csv"), "utf-8")).toBe(
      "id,firstName,lastName,jobTitle,organization,photoUrl,biography,userId\r\n" +
        "a,A,Tester,,,,,u-a\r\n",
    );
    expect(JSON.parse(await readFile(join(run.path, "all_attendees.json"), "utf-8"))).toEqual([
      person("a"),
    ]);
  });

  it("writes detail files and failed ids after enrichment", async () => {
    const run = await createRunDirectory(dataDir, new Date(2026, 0, 2, 3, 4, 5));
    const enriched = [
      { ...person("a", { organization: "Org, Inc" }), ...detail({ fields: { country: "Austria" } }) },
    ];
    const files = await writeRunArtifacts(run, [person("a"), person("b")], {
      enriched,
      failedIds: ["b"],
    });

    expect(files).toEqual([
      "all_attendees_with_details.json",
      "all_attendees_with_details.csv",
      "all_attendees_organized.csv",
      "failed_ids.json",
      "all_attendees.csv",
      "all_attendees.json",
    ]);
    expect((await readdir(run.path)).sort()).toEqual([...files, "logs"].sort());
    expect(JSON.parse(await readFile(join(run.path, "failed_ids.json"), "utf-8"))).toEqual(["b"]);

    const organized = await readFile(join(run.path, "all_attendees_organized.csv"), "utf-8");
    expect(organized.split("\r\n")[1]).toBe('A,Tester,,"Org, Inc",Austria,,,,,,a,,u-a');
  });

  it("points latest at the newest run", async () => {
    await updateLatestLink(dataDir, "2026-01-01_000000");
    await updateLatestLink(dataDir, "2026-01-02_000000");

    expect(await readlink(join(dataDir, "runs", "latest"))).toBe("2026-01-02_000000");
  });
});
