#!/usr/bin/env node
import { CommanderError } from "commander";
import { parseArgs, type CliOptions } from "./cli.js";
import { parseConfig, useColor } from "./config.js";
import { createFetcher } from "./fetcher.js";
import { listWatched, runCycle, type CycleOptions } from "./run.js";
import { startSchedule } from "./schedule.js";

async function main(): Promise<void> {
  const appConfig = parseConfig(process.env);
  let cli: CliOptions;
  try {
    cli = parseArgs(process.argv.slice(2), {
      timeDeltaMinutes: appConfig.STALENESS_WINDOW_MINUTES,
      db: appConfig.DATABASE_PATH,
      schedule: appConfig.CRON_SCHEDULE,
    });
  } catch (err) {
    if (err instanceof CommanderError) process.exit(err.exitCode);
    throw err;
  }

  if (cli.list) {
    await listWatched(cli);
    return;
  }

  const cycle: CycleOptions = {
    cli,
    fetchContent: createFetcher({ timeoutMs: appConfig.FETCH_TIMEOUT_MS, userAgent: appConfig.USER_AGENT }),
    color: useColor(appConfig.DIFF_COLOR, Boolean(process.stdout.isTTY)),
    applyWatchListChanges: true,
  };

  const schedule = cli.schedule;
  if (!schedule) {
    await runCycle(cycle);
    return;
  }

  await startSchedule(schedule, cycle);
}

main().catch((e) => {
  console.error("[SENTINEL] Fatal:", e);
  process.exit(1);
});
