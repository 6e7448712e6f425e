import { withStore } from "./db.js";
import { runMonitorOnce } from "./monitor.js";
import type { CliOptions } from "./cli.js";
import type { BatchResult, FetchContent, MonitorStats } from "./types.js";

export interface CycleOptions {
  cli: CliOptions;
  fetchContent: FetchContent;
  color: boolean;
  applyWatchListChanges: boolean;
}

function logFailures(action: string, result: BatchResult): void {
  for (const f of result.failures) {
    console.error(`[STORE] Failed to ${action} ${f.url}: ${f.reason}`);
  }
}

export async function runCycle(options: CycleOptions, clock?: () => Date): Promise<MonitorStats> {
  const { cli } = options;
  const { stats } = await withStore(cli.db, async (store) => {
    if (options.applyWatchListChanges) {
      const added = store.addWatched(cli.newUrls);
      logFailures("add", added);
      console.log(`Added ${added.count} url(s).`);

      const removed = store.removeWatched(cli.delUrls);
      logFailures("delete", removed);
      console.log(`Deleted ${removed.count} url(s).`);
    }

    const urls = store.listWatched();
    console.log(`Number of URLs to evaluate: ${urls.length}`);

    return runMonitorOnce(store, urls, {
      windowMinutes: cli.timeDeltaMinutes,
      fetchContent: options.fetchContent,
      color: options.color,
    });
  }, clock);

  if (stats.fetches > 0) {
    console.log(`Total new pages added: ${stats.newPages}`);
    console.log(`Total pages changed: ${stats.changes}`);
    console.log(`Total errors: ${stats.errors}`);
  }
  return stats;
}

export async function listWatched(cli: CliOptions): Promise<void> {
  const urls = await withStore(cli.db, async (store) => store.listWatched());
  for (const url of urls) console.log(url);
}
