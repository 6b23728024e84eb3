#!/usr/bin/env node
/**
 * Remove incomplete and expired run directories: run-once job.
 * Invoked by `attendee-job cleanup` (or `cleanup --once`).
 *
 *   DATA_DIR            : data root (default: data)
 *   RUN_RETENTION_DAYS  : remove complete runs older than this (default: 30)
 */

import { config } from "dotenv";
import { resolve } from "node:path";

config({ path: resolve(process.cwd(), ".env") });
config();

import { cleanupRuns } from "./cleanup.js";

const dataDir = process.env.DATA_DIR?.trim() || "data";
const retention = parseInt(process.env.RUN_RETENTION_DAYS || "30", 10);

console.log(`🧹 Cleaning ${resolve(dataDir)} (retention: ${retention} days)`);

cleanupRuns(dataDir, {
  removeIncomplete: true,
  maxAgeDays: Number.isNaN(retention) ? 30 : retention,
})
  .then(({ removed, latest }) => {
    console.log(`✅ Removed ${removed.length} run(s). latest → ${latest ?? "(none)"}`);
    process.exit(0);
  })
  .catch((err) => {
    console.error("Cleanup job failed:", err);
    process.exit(1);
  });
