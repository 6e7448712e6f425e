import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { RecordStore } from "./store.js";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS websites (
    url TEXT PRIMARY KEY,
    timestamp INTEGER NOT NULL,
    content_hash TEXT NOT NULL,
    content TEXT NOT NULL
  );
  CREATE TABLE IF NOT EXISTS website_archive (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    url TEXT NOT NULL,
    timestamp INTEGER NOT NULL,
    content_hash TEXT NOT NULL,
    content TEXT NOT NULL
  );
  CREATE TABLE IF NOT EXISTS urls (
    url TEXT PRIMARY KEY CHECK (length(url) > 0),
    last_checked INTEGER NOT NULL
  );
`;

export function createTables(db: Database.Database): void {
  db.exec(SCHEMA);
}

export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") {
    const dir = path.dirname(path.resolve(dbPath));
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }
  const db = new Database(dbPath);
  createTables(db);
  return db;
}

/**
 * Opens the database, runs `fn` inside a single transaction and commits once.
 * Any error rolls the transaction back before it is rethrown; the connection
 * is closed on every path.
 */
export async function withStore<T>(
  dbPath: string,
  fn: (store: RecordStore) => Promise<T>,
  clock: () => Date = () => new Date()
): Promise<T> {
  const db = openDatabase(dbPath);
  try {
    db.exec("BEGIN");
    try {
      const result = await fn(new RecordStore(db, clock));
      db.exec("COMMIT");
      return result;
    } catch (err) {
      if (db.inTransaction) db.exec("ROLLBACK");
      throw err;
    }
  } finally {
    db.close();
  }
}
