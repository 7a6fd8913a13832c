import Database from "better-sqlite3";
import fs from "fs";
import path from "path";

export type StateDatabase = Database.Database;

/**
 * Open (or create) the tracking-state database and make sure the schema exists.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(dbPath: string): StateDatabase {
  if (dbPath !== ":memory:") {
    // Ensure parent dir exists
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");

  db.exec(`
CREATE TABLE IF NOT EXISTS tracked_aircraft (
  callsign   TEXT PRIMARY KEY,
  first_seen TEXT NOT NULL,   -- ISO-8601 instant the ground streak started
  alert_sent INTEGER NOT NULL DEFAULT 0
);
`);

  return db;
}
