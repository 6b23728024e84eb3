#!/usr/bin/env node
/**
 * Sync the newest run (or RUN_TIMESTAMP) into the database: run-once job.
 * Invoked by `attendee-job sync` (or `sync --once`).
 *
 * Exits 1 when any row was skipped or the sync failed.
 */

import { config } from "dotenv";
import { resolve } from "node:path";

// Load .env from monorepo root (cwd when run via attendee-job)
config({ path: resolve(process.cwd(), ".env") });
config({ path: resolve(process.cwd(), "packages/store/.env") });
config();

import { initDatabase } from "../db.js";
import { getStatistics, syncRun } from "../sync.js";

const dataDir = process.env.DATA_DIR?.trim() || "data";
const dbPath = process.env.DATABASE_PATH || resolve(process.cwd(), dataDir, "attendees.db");
const runName = process.env.RUN_TIMESTAMP?.trim() || undefined;

async function main(): Promise<number> {
  const db = initDatabase(dbPath);
  try {
    console.log(`🗄️  Database sync: ${dbPath}`);
    const summary = await syncRun(db, dataDir, runName);

    const stats = getStatistics(db);
    console.log(`\n📊 Database now holds:`);
    console.log(`   Attendees:      ${stats.totalAttendees}`);
    console.log(`   Organizations:  ${stats.organizations}`);
    console.log(`   Countries:      ${stats.countries}`);
    console.log(`   Industries:     ${stats.industries}`);

    if (summary.errors > 0) {
      console.error(`❌ ${summary.errors} row(s) could not be synced`);
      return 1;
    }
    console.log(`✅ Run ${summary.runName} synced`);
    return 0;
  } finally {
    db.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error("Sync job failed:", err);
    process.exit(1);
  });
