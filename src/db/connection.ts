import * as fs from "fs";
import * as path from "path";
import Database from "better-sqlite3";

/**
 * Opens (or creates) the SQLite database backing the record store.
 * Uses WAL mode for file databases; `:memory:` for tests.
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);

  if (dbPath !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  // Wait for a competing writer instead of failing immediately
  db.pragma("busy_timeout = 5000");

  return db;
}
