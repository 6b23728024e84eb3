/**
 * Run directory cleanup.
 *
 * A run is complete once its attendee list JSON exists and is non-empty; it
 * is the last file a run writes, with or without details. Incomplete runs (interrupted scrapes) and runs past the
 * retention period can be removed; a dangling `latest` link is repointed at
 * the newest complete run.
 */

import { readdir, readlink, rm, stat, symlink } from "node:fs/promises";
import { join } from "node:path";
import { LATEST_LINK, RUN_FILES, runsRoot } from "@attendee-sync/core";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface RunInfo {
  name: string;
  path: string;
  complete: boolean;
  /** Whole days since the directory was last modified. */
  ageDays: number;
}

export interface CleanupOptions {
  removeIncomplete: boolean;
  /** Remove runs older than this many days; null keeps every complete run. */
  maxAgeDays: number | null;
  /** Incomplete runs younger than this may still be in progress. */
  incompleteGraceDays?: number;
  now?: Date;
}

export interface CleanupResult {
  removed: string[];
  /** Run the `latest` link points at afterwards, if any. */
  latest: string | null;
}

function hasCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

function isMissing(err: unknown): boolean {
  return hasCode(err, "ENOENT");
}

async function nonEmptyFile(path: string): Promise<boolean> {
  try {
    const info = await stat(path);
    return info.isFile() && info.size > 0;
  } catch (err) {
    if (isMissing(err)) return false;
    throw err;
  }
}

export async function isRunComplete(runDir: string): Promise<boolean> {
  return nonEmptyFile(join(runDir, RUN_FILES.attendeesJson));
}

async function listEntries(root: string) {
  try {
    return await readdir(root, { withFileTypes: true });
  } catch (err) {
    if (isMissing(err)) return [];
    throw err;
  }
}

/** Every run directory, oldest name first. The `latest` link is skipped. */
export async function scanRuns(dataDir: string, now: Date = new Date()): Promise<RunInfo[]> {
  const root = runsRoot(dataDir);
  const runs: RunInfo[] = [];

  for (const entry of await listEntries(root)) {
    if (entry.name === LATEST_LINK || !entry.isDirectory()) continue;
    const path = join(root, entry.name);
    const info = await stat(path);
    runs.push({
      name: entry.name,
      path,
      complete: await isRunComplete(path),
      ageDays: Math.floor((now.getTime() - info.mtime.getTime()) / DAY_MS),
    });
  }
  return runs.sort((a, b) => a.name.localeCompare(b.name));
}

type LatestLink = { state: "missing" } | { state: "dangling" } | { state: "ok"; target: string };

async function readLatest(root: string): Promise<LatestLink> {
  const link = join(root, LATEST_LINK);
  let target: string;
  try {
    target = await readlink(link);
  } catch (err) {
    // EINVAL: a plain directory or file sits where the link should be
    if (isMissing(err) || hasCode(err, "EINVAL")) {
      return { state: "missing" };
    }
    throw err;
  }
  try {
    await stat(link);
    return { state: "ok", target };
  } catch (err) {
    if (isMissing(err)) return { state: "dangling" };
    throw err;
  }
}

export async function cleanupRuns(dataDir: string, options: CleanupOptions): Promise<CleanupResult> {
  const now = options.now ?? new Date();
  const grace = options.incompleteGraceDays ?? 1;
  const runs = await scanRuns(dataDir, now);
  const removed: string[] = [];

  for (const run of runs) {
    const stale = !run.complete && options.removeIncomplete && run.ageDays >= grace;
    const expired = options.maxAgeDays !== null && run.ageDays > options.maxAgeDays;
    if (!stale && !expired) continue;

    console.log(`   🗑️  ${run.name} (${run.complete ? `complete, ${run.ageDays} days old` : "incomplete"})`);
    await rm(run.path, { recursive: true, force: true });
    removed.push(run.name);
  }

  const root = runsRoot(dataDir);
  const latest = await readLatest(root);

  if (latest.state === "ok") {
    return { removed, latest: latest.target };
  }
  if (latest.state === "dangling") {
    await rm(join(root, LATEST_LINK), { force: true });
    const newest = runs.filter((run) => run.complete && !removed.includes(run.name)).pop();
    if (newest) {
      await symlink(newest.name, join(root, LATEST_LINK), "dir");
      console.log(`   🔗 latest → ${newest.name}`);
      return { removed, latest: newest.name };
    }
  }
  return { removed, latest: null };
}
