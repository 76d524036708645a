import type Database from "better-sqlite3";

const CURRENT_VERSION = 1;

const SCHEMA_V1 = `
-- One JSON document per record, grouped by collection
CREATE TABLE IF NOT EXISTS records (
    collection  TEXT NOT NULL,
    id          TEXT NOT NULL,
    data        TEXT NOT NULL,
    seq         INTEGER NOT NULL,
    created_at  DATETIME DEFAULT CURRENT_TIMESTAMP,
    updated_at  DATETIME DEFAULT CURRENT_TIMESTAMP,
    PRIMARY KEY (collection, id)
);

-- Schema versioning
CREATE TABLE IF NOT EXISTS schema_version (
    version     INTEGER NOT NULL,
    applied_at  DATETIME DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX IF NOT EXISTS idx_records_collection_seq ON records(collection, seq);
`;

/**
 * Returns the current schema version from the database, or 0 if no schema exists.
 */
function getSchemaVersion(db: Database.Database): number {
  const table = db
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'")
    .get();
  if (!table) return 0;

  const row = db
    .prepare<[], { version: number | null }>("SELECT MAX(version) AS version FROM schema_version")
    .get();
  return row?.version ?? 0;
}

/**
 * Ensures the database schema is up to date.
 * Runs migrations inside a transaction. Safe to call on every startup.
 */
export function ensureSchema(db: Database.Database): void {
  const currentVersion = getSchemaVersion(db);

  if (currentVersion >= CURRENT_VERSION) {
    return;
  }

  db.transaction(() => {
    if (currentVersion < 1) {
      db.exec(SCHEMA_V1);
      db.prepare("INSERT INTO schema_version (version) VALUES (?)").run(
        CURRENT_VERSION
      );
    }
  })();
}
