#!/usr/bin/env node
/**
 * Runs the scrape, sync and cleanup scripts as child processes, either on
 * their cron schedules or once in a row (`--once`, for an external scheduler).
 * Scripts resolve against the working directory, which must be the repo root.
 */

import cron from "node-cron";
import { spawn } from "node:child_process";
import { resolve } from "node:path";
import { JOBS, RUNNER_USAGE, parseRunnerArgs, type JobName } from "./registry.js";

const parsed = parseRunnerArgs(process.argv.slice(2));
if (!parsed) {
  console.error(RUNNER_USAGE);
  process.exit(1);
}
const { jobs, once } = parsed;
const root = process.cwd();

function runJob(jobName: JobName): Promise<void> {
  const scriptPath = resolve(root, JOBS[jobName].script);
  return new Promise((done, fail) => {
    const child = spawn(process.execPath, [scriptPath], { stdio: "inherit", cwd: root, env: process.env });
    child.on("error", fail);
    child.on("close", (code) => {
      if (code === 0) done();
      else fail(new Error(`${jobName} exited with code ${code}`));
    });
  });
}

async function runInSequence(): Promise<void> {
  for (const jobName of jobs) {
    console.log(`▶️  ${jobName}`);
    await runJob(jobName);
    console.log(`✅ ${jobName} finished`);
  }
}

if (once) {
  runInSequence()
    .then(() => process.exit(0))
    .catch((err) => {
      console.error("❌", err);
      process.exit(1);
    });
} else {
  for (const jobName of jobs) {
    const { schedule } = JOBS[jobName];
    console.log(`⏰ ${jobName}: ${schedule}`);
    cron.schedule(schedule, () => {
      console.log(`▶️  ${jobName} (scheduled)`);
      runJob(jobName)
        .then(() => console.log(`✅ ${jobName} finished`))
        .catch((err) => console.error(`❌ ${jobName} failed:`, err));
    });
  }
  // node-cron's timers keep the process alive
}
