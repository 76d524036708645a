/**
 * Record store abstraction over named collections of JSON documents.
 *
 * Both implementations are synchronous: a read-modify-write through
 * `update` cannot interleave with another one inside the same process.
 */

export interface StoredRecord {
  id: string;
}

/** Describes one collection: its name and how to validate a raw document. */
export interface CollectionSpec<T extends StoredRecord> {
  name: string;
  parse(raw: unknown): T;
}

/**
 * Computes the next version of a record. Return `null` to leave the stored
 * record untouched (a failed precondition).
 */
export type RecordMutation<T> = (current: T) => T | null;

export interface RecordStore<T extends StoredRecord> {
  readonly collection: string;
  /** Every record in insertion order. */
  loadAll(): T[];
  /** Replace the whole collection. */
  replaceAll(records: T[]): void;
  get(id: string): T | undefined;
  /** Throws if a record with the same id exists. */
  insert(record: T): T;
  /** Returns the stored record, or undefined if missing or the mutation declined. */
  update(id: string, mutate: RecordMutation<T>): T | undefined;
  delete(id: string): boolean;
}

/**
 * Round-trip a record through JSON and the collection parser, so what is
 * returned matches what a later read would produce.
 */
export function normalizeRecord<T extends StoredRecord>(
  spec: CollectionSpec<T>,
  record: T
): T {
  return spec.parse(JSON.parse(JSON.stringify(record)));
}

export function assertSameId(collection: string, expected: string, actual: string): void {
  if (expected !== actual) {
    throw new Error(
      `Cannot change the id of a ${collection} record (${expected} -> ${actual}).`
    );
  }
}
