import cron from "node-cron";
import { runCycle, type CycleOptions } from "./run.js";
import type { MonitorStats } from "./types.js";
import { errorMessage } from "./utils.js";

export interface ScheduleDeps {
  schedule: (expression: string, task: () => Promise<void>) => void;
  runCycle: (options: CycleOptions) => Promise<MonitorStats>;
}

const cronDeps: ScheduleDeps = {
  schedule: (expression, task) => {
    cron.schedule(expression, task);
  },
  runCycle: (options) => runCycle(options),
};

/**
 * Builds the task for each cron tick. Watch-list edits were applied by the
 * first cycle, so ticks only evaluate. A tick that fires while the previous
 * cycle is still fetching is skipped.
 */
export function createScheduledTask(
  cycle: CycleOptions,
  run: ScheduleDeps["runCycle"] = cronDeps.runCycle
): () => Promise<void> {
  const scheduled: CycleOptions = { ...cycle, applyWatchListChanges: false };
  let running = false;

  return async () => {
    if (running) {
      console.log("[SENTINEL] Previous run still in progress, skipping this tick.");
      return;
    }
    running = true;
    console.log(`[SENTINEL] Scheduled run started at ${new Date().toISOString()}`);
    try {
      await run(scheduled);
      console.log("[SENTINEL] Scheduled run completed.");
    } catch (err) {
      console.error("[SENTINEL] Scheduled run error:", errorMessage(err));
    } finally {
      running = false;
    }
  };
}

export async function startSchedule(expression: string, cycle: CycleOptions, deps: ScheduleDeps = cronDeps): Promise<void> {
  if (!cron.validate(expression)) {
    throw new Error(`Invalid cron schedule: ${expression}`);
  }

  console.log(`[SENTINEL] Page monitor starting. Schedule: ${expression}`);
  await deps.runCycle(cycle);
  console.log("[SENTINEL] Initial run completed.");

  deps.schedule(expression, createScheduledTask(cycle, deps.runCycle));
}
