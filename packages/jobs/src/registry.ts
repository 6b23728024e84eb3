/**
 * Job registry: name → script path (relative to monorepo root) and cron schedule.
 */

export const JOBS = {
  scrape: {
    script: "packages/scrapers/dist/run.js",
    schedule: "0 6 * * *", // daily at 06:00
  },
  sync: {
    script: "packages/store/dist/jobs/sync-latest.js",
    schedule: "30 6 * * *", // after the daily scrape
  },
  cleanup: {
    script: "packages/scrapers/dist/cleanup-runs.js",
    schedule: "0 3 * * 0", // Sundays at 03:00
  },
} as const;

export type JobName = keyof typeof JOBS;

export const JOB_NAMES: readonly JobName[] = ["scrape", "sync", "cleanup"];

export function isJobName(value: string): value is JobName {
  return Object.hasOwn(JOBS, value);
}

/** "all" selects every job in registry order; an unknown name selects none. */
export function resolveJobNames(arg: string): JobName[] {
  if (arg === "all") return [...JOB_NAMES];
  return isJobName(arg) ? [arg] : [];
}

export const RUNNER_USAGE = `attendee-job: run the attendee pipeline jobs

  attendee-job [job] [--once]

  job     ${["all", ...JOB_NAMES].join(" | ")} (default: all)
  --once  run the selected jobs one after another and exit,
          instead of waiting for their cron schedules`;

export interface RunnerArgs {
  jobs: JobName[];
  once: boolean;
}

/** Null when the job name is unknown. */
export function parseRunnerArgs(argv: readonly string[]): RunnerArgs | null {
  const jobs = resolveJobNames(argv.find((arg) => !arg.startsWith("--")) ?? "all");
  if (jobs.length === 0) return null;
  return { jobs, once: argv.includes("--once") };
}
