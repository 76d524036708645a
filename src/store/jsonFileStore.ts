import * as fs from "fs";
import * as path from "path";
import { randomUUID } from "crypto";
import { errorMessage } from "../lib/errors";
import {
  assertSameId,
  normalizeRecord,
  type CollectionSpec,
  type RecordMutation,
  type RecordStore,
  type StoredRecord,
} from "./types";

/**
 * Flat-file record store: `<dataDir>/<collection>.json` holds a JSON array.
 * Every mutation rewrites the whole file through a temp file and rename,
 * so readers never see a half-written array.
 */
export class JsonFileRecordStore<T extends StoredRecord> implements RecordStore<T> {
  readonly filePath: string;

  constructor(
    dataDir: string,
    private readonly spec: CollectionSpec<T>
  ) {
    this.filePath = path.join(dataDir, `${spec.name}.json`);
  }

  get collection(): string {
    return this.spec.name;
  }

  loadAll(): T[] {
    if (!fs.existsSync(this.filePath)) return [];

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
    } catch (err) {
      throw new Error(
        `${this.filePath} contains invalid JSON: ${errorMessage(err)}`
      );
    }
    if (!Array.isArray(parsed)) {
      throw new Error(`${this.filePath} must contain a JSON array.`);
    }
    return parsed.map((raw: unknown) => this.spec.parse(raw));
  }

  replaceAll(records: T[]): void {
    const normalized = records.map((r) => normalizeRecord(this.spec, r));
    writeJsonAtomic(this.filePath, normalized);
  }

  get(id: string): T | undefined {
    return this.loadAll().find((r) => r.id === id);
  }

  insert(record: T): T {
    const all = this.loadAll();
    if (all.some((r) => r.id === record.id)) {
      throw new Error(`Duplicate id in ${this.spec.name}: ${record.id}`);
    }
    const normalized = normalizeRecord(this.spec, record);
    all.push(normalized);
    writeJsonAtomic(this.filePath, all);
    return normalized;
  }

  update(id: string, mutate: RecordMutation<T>): T | undefined {
    const all = this.loadAll();
    const index = all.findIndex((r) => r.id === id);
    if (index < 0) return undefined;

    const next = mutate(all[index]);
    if (next === null) return undefined;
    assertSameId(this.spec.name, id, next.id);

    const normalized = normalizeRecord(this.spec, next);
    all[index] = normalized;
    writeJsonAtomic(this.filePath, all);
    return normalized;
  }

  delete(id: string): boolean {
    const all = this.loadAll();
    const remaining = all.filter((r) => r.id !== id);
    if (remaining.length === all.length) return false;
    writeJsonAtomic(this.filePath, remaining);
    return true;
  }
}

function writeJsonAtomic(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${randomUUID()}.tmp`;
  fs.writeFileSync(tmpPath, JSON.stringify(data, null, 2) + "\n", "utf-8");
  fs.renameSync(tmpPath, filePath);
}
