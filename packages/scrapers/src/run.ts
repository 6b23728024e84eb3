#!/usr/bin/env node
/**
 * Production scrape runner: one full scrape into a new run directory, then exit.
 * Invoked by `attendee-job scrape` (or `scrape --once`).
 *
 * Exits 0 whenever attendees were collected, even if the run stopped early.
 * Exits 1 on a configuration error or when nothing was collected.
 */

import { config } from "dotenv";
import { resolve } from "node:path";

// Load .env from monorepo root (cwd when run via attendee-job)
config({ path: resolve(process.cwd(), ".env") });
config({ path: resolve(process.cwd(), "packages/scrapers/.env") });
config();

import { loadConfig, type AppConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { printSummary, runScrape } from "./pipeline.js";

async function main(): Promise<number> {
  let appConfig: AppConfig;
  try {
    appConfig = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`❌ ${err.message}`);
      return 1;
    }
    throw err;
  }

  console.log(`👥 Attendee scrape: ${new Date().toISOString()}`);
  console.log(`   Endpoint: ${appConfig.platform.endpoint.host}`);
  console.log(`   Data dir: ${resolve(appConfig.dataDir)}\n`);

  const summary = await runScrape(appConfig);
  printSummary(summary);
  return summary.runName ? 0 : 1;
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error("Fatal:", err);
    process.exit(1);
  });
