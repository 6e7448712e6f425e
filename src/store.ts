import type Database from "better-sqlite3";
import { ArchivedSnapshot, BatchResult, NotWatchedError, PreconditionError, Snapshot, StoreFailure } from "./types.js";
import { errorMessage, sha256 } from "./utils.js";

interface SnapshotRow {
  url: string;
  timestamp: number;
  content_hash: string;
  content: string;
}

interface ArchiveRow extends SnapshotRow {
  id: number;
}

function toSnapshot(row: SnapshotRow): Snapshot {
  return {
    url: row.url,
    timestamp: new Date(row.timestamp),
    contentHash: row.content_hash,
    content: row.content,
  };
}

export class RecordStore {
  constructor(
    private readonly db: Database.Database,
    private readonly clock: () => Date = () => new Date()
  ) {}

  now(): Date {
    return this.clock();
  }

  /** Inserts or refreshes each URL. `count` is the number of URLs requested. */
  addWatched(urls: string[]): BatchResult {
    const stmt = this.db.prepare<[string, number]>(
      `INSERT INTO urls (url, last_checked) VALUES (?, ?)
       ON CONFLICT(url) DO UPDATE SET last_checked = MAX(last_checked, excluded.last_checked)`
    );
    const timestamp = this.clock().getTime();
    const failures: StoreFailure[] = [];
    for (const url of urls) {
      try {
        stmt.run(url, timestamp);
      } catch (err) {
        failures.push({ url, reason: errorMessage(err) });
      }
    }
    return { count: urls.length, failures };
  }

  removeWatched(urls: string[]): BatchResult {
    const stmt = this.db.prepare<[string]>("DELETE FROM urls WHERE url = ?");
    const failures: StoreFailure[] = [];
    let count = 0;
    for (const url of urls) {
      try {
        stmt.run(url);
        count += 1;
      } catch (err) {
        failures.push({ url, reason: errorMessage(err) });
      }
    }
    return { count, failures };
  }

  listWatched(): string[] {
    const rows = this.db.prepare<[], { url: string }>("SELECT url FROM urls ORDER BY rowid").all();
    return rows.map((r) => r.url);
  }

  getSnapshot(url: string): string | null {
    const row = this.db
      .prepare<[string], { content_hash: string }>("SELECT content_hash FROM websites WHERE url = ?")
      .get(url);
    return row ? row.content_hash : null;
  }

  getCurrentSnapshot(url: string): Snapshot | null {
    const row = this.db
      .prepare<[string], SnapshotRow>("SELECT url, timestamp, content_hash, content FROM websites WHERE url = ?")
      .get(url);
    return row ? toSnapshot(row) : null;
  }

  getLastChecked(url: string): Date {
    const row = this.db
      .prepare<[string], { last_checked: number }>("SELECT last_checked FROM urls WHERE url = ?")
      .get(url);
    if (!row) throw new NotWatchedError(url);
    return new Date(row.last_checked);
  }

  touchLastChecked(url: string): void {
    this.db
      .prepare<[number, string]>("UPDATE urls SET last_checked = MAX(last_checked, ?) WHERE url = ?")
      .run(this.clock().getTime(), url);
  }

  /** Caller guarantees no current snapshot exists; a duplicate violates the primary key. */
  writeSnapshot(url: string, content: string): Snapshot {
    const snapshot: Snapshot = {
      url,
      timestamp: this.clock(),
      contentHash: sha256(content),
      content,
    };
    this.db
      .prepare<[string, number, string, string]>(
        "INSERT INTO websites (url, timestamp, content_hash, content) VALUES (?, ?, ?, ?)"
      )
      .run(snapshot.url, snapshot.timestamp.getTime(), snapshot.contentHash, snapshot.content);
    return snapshot;
  }

  archiveAndClear(url: string): Snapshot {
    const current = this.db
      .prepare<[string], SnapshotRow>("SELECT url, timestamp, content_hash, content FROM websites WHERE url = ?")
      .get(url);
    if (!current) {
      throw new PreconditionError(`Attempted to archive ${url}, but no current snapshot exists.`);
    }
    this.db
      .prepare<[string, number, string, string]>(
        "INSERT INTO website_archive (url, timestamp, content_hash, content) VALUES (?, ?, ?, ?)"
      )
      .run(current.url, current.timestamp, current.content_hash, current.content);
    this.db.prepare<[string]>("DELETE FROM websites WHERE url = ?").run(url);
    return toSnapshot(current);
  }

  listArchive(url: string): ArchivedSnapshot[] {
    const rows = this.db
      .prepare<[string], ArchiveRow>(
        "SELECT id, url, timestamp, content_hash, content FROM website_archive WHERE url = ? ORDER BY id"
      )
      .all(url);
    return rows.map((r) => ({ ...toSnapshot(r), id: r.id }));
  }
}
