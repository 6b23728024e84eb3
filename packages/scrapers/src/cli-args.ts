/**
 * Argument handling for the attendee-scrape CLI.
 */

import type { AppConfig } from "./config.js";
import { ConfigError } from "./errors.js";

export const USAGE = `Usage: attendee-scrape [options]

Options:
  --skip-details            Collect the attendee list only
  --max-pages N             Stop after N pages past the first (default: MAX_PAGES or 200)
  --out DIR                 Data directory (default: DATA_DIR or ./data)
  --help, -h                Show this help`;

export interface CliArgs {
  help: boolean;
  skipDetails: boolean;
  maxPages?: number;
  out?: string;
}

export function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = {
    help: args.includes("--help") || args.includes("-h"),
    skipDetails: args.includes("--skip-details"),
  };

  const maxIdx = args.indexOf("--max-pages");
  if (maxIdx >= 0) {
    const value = Number(args[maxIdx + 1]);
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigError([`--max-pages needs a positive integer, got "${args[maxIdx + 1] ?? ""}"`]);
    }
    parsed.maxPages = value;
  }

  const outIdx = args.indexOf("--out");
  if (outIdx >= 0) {
    const value = args[outIdx + 1];
    if (!value || value.startsWith("--")) throw new ConfigError(["--out needs a directory"]);
    parsed.out = value;
  }

  return parsed;
}

export function applyArgs(base: AppConfig, args: CliArgs): AppConfig {
  return {
    ...base,
    dataDir: args.out ?? base.dataDir,
    run: { ...base.run, maxPages: args.maxPages ?? base.run.maxPages },
  };
}
