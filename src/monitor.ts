import { highlightDiff } from "./diff.js";
import type { RecordStore } from "./store.js";
import type { FetchContent, FetchDecision, MonitorReport, MonitorStats, UrlOutcome } from "./types.js";
import { minutesSince, sha256 } from "./utils.js";

export interface MonitorOptions {
  windowMinutes: number;
  fetchContent: FetchContent;
  color?: boolean;
}

export function shouldFetchContent(store: RecordStore, url: string, windowMinutes: number, now: Date): FetchDecision {
  const priorHash = store.getSnapshot(url);
  const lastChecked = store.getLastChecked(url);

  if (priorHash === null) {
    return { shouldFetch: true, priorHash: null };
  }
  if (minutesSince(lastChecked, now) >= windowMinutes) {
    return { shouldFetch: true, priorHash };
  }
  console.log(`URL ${url} has been checked in last ${windowMinutes} minutes.`);
  return { shouldFetch: false };
}

/**
 * Evaluates each URL in turn. Fetch failures are counted and leave the URL
 * untouched; a missing snapshot during archiving throws and ends the run.
 */
export async function runMonitorOnce(store: RecordStore, urls: string[], options: MonitorOptions): Promise<MonitorReport> {
  const stats: MonitorStats = { fetches: 0, errors: 0, newPages: 0, changes: 0 };
  const outcomes: UrlOutcome[] = [];

  for (const url of urls) {
    const decision = shouldFetchContent(store, url, options.windowMinutes, store.now());
    if (!decision.shouldFetch) {
      outcomes.push({ url, status: "skipped" });
      continue;
    }

    stats.fetches += 1;
    console.log(`Evaluating URL: ${url}`);
    const result = await options.fetchContent(url);
    if (!result.ok) {
      stats.errors += 1;
      outcomes.push({ url, status: "error", reason: result.reason });
      continue;
    }

    const currentHash = sha256(result.content);
    if (decision.priorHash === null) {
      console.log(`Adding new page: ${url}`);
      stats.newPages += 1;
      store.writeSnapshot(url, result.content);
      outcomes.push({ url, status: "new" });
    } else if (decision.priorHash !== currentHash) {
      console.log(`Page has changed: ${url}`);
      stats.changes += 1;
      const archived = store.archiveAndClear(url);
      const diff = highlightDiff(archived.content, result.content, { color: options.color });
      console.log(diff);
      store.writeSnapshot(url, result.content);
      outcomes.push({ url, status: "changed", diff });
    } else {
      outcomes.push({ url, status: "unchanged" });
    }

    store.touchLastChecked(url);
  }

  return { stats, outcomes };
}
