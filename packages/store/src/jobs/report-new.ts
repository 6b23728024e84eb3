#!/usr/bin/env node
/**
 * Print the attendees first seen in the newest synced run.
 */

import { config } from "dotenv";
import { resolve } from "node:path";

config({ path: resolve(process.cwd(), ".env") });
config();

import { initDatabase } from "../db.js";
import { formatRunReport, getLatestRunReport } from "../sync.js";

const dataDir = process.env.DATA_DIR?.trim() || "data";
const dbPath = process.env.DATABASE_PATH || resolve(process.cwd(), dataDir, "attendees.db");
const limit = parseInt(process.env.REPORT_LIMIT || "50", 10);

const db = initDatabase(dbPath);
try {
  const report = getLatestRunReport(db, Number.isNaN(limit) ? 50 : limit);
  if (!report) {
    console.log("No runs found in database");
  } else {
    for (const line of formatRunReport(report)) console.log(line);
  }
} catch (err) {
  console.error("Report failed:", err);
  process.exitCode = 1;
} finally {
  db.close();
}
