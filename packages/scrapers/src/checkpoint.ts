/**
 * Checkpoint files: the full run state, replaced atomically.
 *
 * The snapshot is written to a temporary sibling and renamed over the
 * target, so readers see either the previous snapshot or the new one.
 * Checkpoints are for manual recovery and inspection; runs never resume
 * from them.
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { isRunState, type RunState } from "@attendee-sync/core";
import type { CheckpointSink } from "./collector.js";

export async function writeCheckpoint(path: string, state: RunState): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.${process.pid}.tmp`;
  await writeFile(tmp, JSON.stringify(state, null, 2) + "\n", "utf-8");
  await rename(tmp, path);
}

export async function readCheckpoint(path: string): Promise<RunState> {
  const parsed: unknown = JSON.parse(await readFile(path, "utf-8"));
  if (!isRunState(parsed)) {
    throw new Error(`${path} is not a checkpoint file`);
  }
  return parsed;
}

/** A collector sink that always overwrites the same file. */
export function fileCheckpoint(path: string): CheckpointSink {
  return (state) => writeCheckpoint(path, state);
}
