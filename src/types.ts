export interface WatchedUrl {
  url: string;
  lastChecked: Date;
}

export interface Snapshot {
  url: string;
  timestamp: Date;
  contentHash: string; // sha256 of raw content
  content: string;
}

export interface ArchivedSnapshot extends Snapshot {
  id: number;
}

export type FetchResult =
  | { ok: true; content: string }
  | { ok: false; reason: string };

export type FetchContent = (url: string) => Promise<FetchResult>;

export interface StoreFailure {
  url: string;
  reason: string;
}

export interface BatchResult {
  count: number; // requests issued, not distinct rows touched
  failures: StoreFailure[];
}

export type FetchDecision =
  | { shouldFetch: true; priorHash: string | null }
  | { shouldFetch: false };

export interface MonitorStats {
  fetches: number;
  errors: number;
  newPages: number;
  changes: number;
}

export type UrlOutcome =
  | { url: string; status: "skipped" }
  | { url: string; status: "error"; reason: string }
  | { url: string; status: "new" }
  | { url: string; status: "changed"; diff: string }
  | { url: string; status: "unchanged" };

export interface MonitorReport {
  stats: MonitorStats;
  outcomes: UrlOutcome[];
}

export class SentinelError extends Error {
  constructor(message: string, public code?: string) {
    super(message);
    this.name = "SentinelError";
  }
}

export class PreconditionError extends SentinelError {
  constructor(message: string) {
    super(message, "PRECONDITION");
    this.name = "PreconditionError";
  }
}

export class NotWatchedError extends SentinelError {
  constructor(public url: string) {
    super(`URL is not in the watch list: ${url}`, "NOT_WATCHED");
    this.name = "NotWatchedError";
  }
}
