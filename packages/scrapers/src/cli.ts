#!/usr/bin/env node
/**
 * Attendee scrape CLI
 *
 * Usage:
 *   attendee-scrape                          # full scrape into $DATA_DIR/runs/<timestamp>
 *   attendee-scrape --skip-details           # attendee list only
 *   attendee-scrape --max-pages 5 --out tmp  # quick trial run into ./tmp
 *
 * Connection settings come from the environment (see .env.example). The
 * summary goes to stderr; the run directory path is printed on stdout so it
 * can be piped into other tools.
 */

import { config } from "dotenv";
import { resolve } from "node:path";
import { runPath } from "@attendee-sync/core";
import { applyArgs, parseArgs, USAGE, type CliArgs } from "./cli-args.js";
import { loadConfig, type AppConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { printSummary, runScrape } from "./pipeline.js";

config({ path: resolve(process.cwd(), ".env") });
config();

async function main(): Promise<number> {
  let args: CliArgs;
  let appConfig: AppConfig;
  try {
    args = parseArgs(process.argv.slice(2));
    if (args.help) {
      console.log(USAGE);
      return 0;
    }
    appConfig = applyArgs(loadConfig(), args);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  const summary = await runScrape(appConfig, { skipDetails: args.skipDetails });
  printSummary(summary, (line) => console.error(line));
  if (!summary.runName) return 1;
  console.log(runPath(appConfig.dataDir, summary.runName));
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error("Fatal:", err);
    process.exit(1);
  });
