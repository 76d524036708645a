import type Database from "better-sqlite3";
import {
  assertSameId,
  normalizeRecord,
  type CollectionSpec,
  type RecordMutation,
  type RecordStore,
  type StoredRecord,
} from "./types";

/**
 * Record store backed by the `records` table. Each record is a JSON
 * document keyed by (collection, id); updates run in a transaction.
 */
export class SqliteRecordStore<T extends StoredRecord> implements RecordStore<T> {
  constructor(
    private readonly db: Database.Database,
    private readonly spec: CollectionSpec<T>
  ) {}

  get collection(): string {
    return this.spec.name;
  }

  loadAll(): T[] {
    return this.db
      .prepare<[string], { data: string }>(
        "SELECT data FROM records WHERE collection = ? ORDER BY seq ASC"
      )
      .all(this.spec.name)
      .map((row) => this.decode(row.data));
  }

  replaceAll(records: T[]): void {
    const normalized = records.map((r) => normalizeRecord(this.spec, r));
    this.db.transaction(() => {
      this.db.prepare("DELETE FROM records WHERE collection = ?").run(this.spec.name);
      const insert = this.db.prepare(
        "INSERT INTO records (collection, id, data, seq) VALUES (?, ?, ?, ?)"
      );
      normalized.forEach((record, i) => {
        insert.run(this.spec.name, record.id, JSON.stringify(record), i + 1);
      });
    })();
  }

  get(id: string): T | undefined {
    const row = this.db
      .prepare<[string, string], { data: string }>(
        "SELECT data FROM records WHERE collection = ? AND id = ?"
      )
      .get(this.spec.name, id);
    return row ? this.decode(row.data) : undefined;
  }

  insert(record: T): T {
    const normalized = normalizeRecord(this.spec, record);
    this.db.transaction(() => {
      const next = this.db
        .prepare<[string], { seq: number }>(
          "SELECT COALESCE(MAX(seq), 0) + 1 AS seq FROM records WHERE collection = ?"
        )
        .get(this.spec.name);
      this.db
        .prepare("INSERT INTO records (collection, id, data, seq) VALUES (?, ?, ?, ?)")
        .run(this.spec.name, normalized.id, JSON.stringify(normalized), next?.seq ?? 1);
    })();
    return normalized;
  }

  update(id: string, mutate: RecordMutation<T>): T | undefined {
    return this.db.transaction((): T | undefined => {
      const current = this.get(id);
      if (!current) return undefined;

      const next = mutate(current);
      if (next === null) return undefined;
      assertSameId(this.spec.name, id, next.id);

      const normalized = normalizeRecord(this.spec, next);
      this.db
        .prepare(
          `UPDATE records SET data = ?, updated_at = CURRENT_TIMESTAMP
           WHERE collection = ? AND id = ?`
        )
        .run(JSON.stringify(normalized), this.spec.name, id);
      return normalized;
    })();
  }

  delete(id: string): boolean {
    const result = this.db
      .prepare("DELETE FROM records WHERE collection = ? AND id = ?")
      .run(this.spec.name, id);
    return result.changes > 0;
  }

  private decode(data: string): T {
    const raw: unknown = JSON.parse(data);
    return this.spec.parse(raw);
  }
}
