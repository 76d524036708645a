import { randomUUID } from "crypto";
import type {
  BlobBackend,
  BlobRef,
  ExampleRecord,
  ExampleStatus,
  NewExample,
} from "../contracts";
import type { CollectionSpec, RecordStore } from "./types";

export type ExampleStore = RecordStore<ExampleRecord>;

// ============================================================
// Parsing
// ============================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalid(field: string, expected: string): Error {
  return new Error(`Invalid example record: '${field}' must be ${expected}.`);
}

function stringOr(obj: Record<string, unknown>, field: string, fallback: string): string {
  const value = obj[field];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "string") throw invalid(field, "a string");
  return value;
}

function nullableString(obj: Record<string, unknown>, field: string): string | null {
  const value = obj[field];
  if (value === undefined || value === null || value === "") return null;
  if (typeof value !== "string") throw invalid(field, "a string or null");
  return value;
}

function booleanOr(obj: Record<string, unknown>, field: string, fallback: boolean): boolean {
  const value = obj[field];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "boolean") throw invalid(field, "a boolean");
  return value;
}

function isBackend(value: unknown): value is BlobBackend {
  return value === "local" || value === "s3";
}

function parseRef(value: unknown, field: string): BlobRef {
  if (
    !isObject(value) ||
    !isBackend(value.backend) ||
    typeof value.key !== "string" ||
    value.key === ""
  ) {
    throw invalid(field, "a { backend: 'local' | 's3', key } reference");
  }
  return { backend: value.backend, key: value.key };
}

/**
 * Blob references are `{ backend, key }`. A bare string is a local file
 * name, as written by the flat-file layout; `legacyS3Field` names the
 * separate object-store key that layout kept beside it. When both are
 * set the object wins and the local name is returned as stale.
 */
function blobRef(
  obj: Record<string, unknown>,
  field: string,
  legacyS3Field: string
): { ref: BlobRef | null; stale: BlobRef[] } {
  const value = obj[field];
  if (isObject(value)) {
    return { ref: parseRef(value, field), stale: [] };
  }
  let local: BlobRef | null = null;
  if (typeof value === "string") {
    if (value !== "") local = { backend: "local", key: value };
  } else if (value !== undefined && value !== null) {
    throw invalid(field, "a blob reference or null");
  }

  const legacy = obj[legacyS3Field];
  if (typeof legacy === "string" && legacy !== "") {
    return { ref: { backend: "s3", key: legacy }, stale: local ? [local] : [] };
  }
  return { ref: local, stale: [] };
}

function staleBlobs(obj: Record<string, unknown>): BlobRef[] {
  const value = obj.stale_blobs;
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) throw invalid("stale_blobs", "an array of blob references");
  return value.map((item: unknown) => parseRef(item, "stale_blobs"));
}

/**
 * Validate a raw document into an ExampleRecord.
 *
 * Missing optional fields are defaulted; wrong types are errors.
 */
export function parseExampleRecord(raw: unknown): ExampleRecord {
  if (!isObject(raw)) {
    throw new Error("Invalid example record: must be a JSON object.");
  }

  const id = raw.id;
  if (typeof id !== "string" || id.length === 0) {
    throw invalid("id", "a non-empty string");
  }

  const pendingFile = nullableString(raw, "pending_file");
  const originalFilename = stringOr(
    raw,
    "original_filename",
    pendingFile ? pendingFile.replace(/^[0-9a-f]{32}_/, "") : ""
  );

  const retryCount = raw.retry_count ?? 0;
  if (typeof retryCount !== "number" || !Number.isInteger(retryCount) || retryCount < 0) {
    throw invalid("retry_count", "a non-negative integer");
  }

  const file = blobRef(raw, "file", "s3_key");
  const thumb = blobRef(raw, "thumb", "s3_thumb_key");

  const record: ExampleRecord = {
    id,
    title: stringOr(raw, "title", originalFilename),
    description: stringOr(raw, "description", ""),
    original_filename: originalFilename,
    uploaded_by: nullableString(raw, "uploaded_by"),
    created_at: stringOr(raw, "created_at", ""),
    approved: booleanOr(raw, "approved", false),
    approved_at: nullableString(raw, "approved_at"),
    processing: booleanOr(raw, "processing", false),
    processing_error: nullableString(raw, "processing_error"),
    pending_file: pendingFile,
    file: file.ref,
    thumb: thumb.ref,
    retry_count: retryCount,
    processed_at: nullableString(raw, "processed_at"),
  };

  const stale = [...staleBlobs(raw), ...file.stale, ...thumb.stale];
  if (stale.length > 0) {
    record.stale_blobs = stale;
  }

  const duration = raw.duration;
  if (typeof duration === "number" && Number.isFinite(duration) && duration > 0) {
    record.duration = duration;
  }

  return record;
}

export const EXAMPLES: CollectionSpec<ExampleRecord> = {
  name: "examples",
  parse: parseExampleRecord,
};

// ============================================================
// Lifecycle state
// ============================================================

/**
 * Derive the lifecycle state. A record matching none of the three states
 * (no file, no error, not processing) reports as failed so it surfaces for
 * remediation.
 */
export function exampleStatus(record: ExampleRecord): ExampleStatus {
  if (record.processing) return "pending";
  if (record.processing_error) return "failed";
  if (record.file) return "processed";
  return "failed";
}

/**
 * Exactly one of: processing; a processing error; a stored file with no error.
 */
export function satisfiesStateInvariant(record: ExampleRecord): boolean {
  const states = [
    record.processing,
    Boolean(record.processing_error),
    record.file !== null && !record.processing_error,
  ];
  return states.filter(Boolean).length === 1;
}

// ============================================================
// Queries
// ============================================================

export function createExample(
  store: ExampleStore,
  input: NewExample,
  now: Date = new Date()
): ExampleRecord {
  return store.insert({
    id: randomUUID(),
    title: input.title,
    description: input.description,
    original_filename: input.original_filename,
    uploaded_by: input.uploaded_by,
    created_at: now.toISOString(),
    approved: false,
    approved_at: null,
    processing: true,
    processing_error: null,
    pending_file: input.pending_file,
    file: null,
    thumb: null,
    retry_count: 0,
    processed_at: null,
  });
}

/**
 * Put a settled record back into the processing state for a retry.
 * Declines while the record is already processing.
 */
export function beginProcessing(
  store: ExampleStore,
  id: string,
  pendingFile: string
): ExampleRecord | undefined {
  return store.update(id, (current) => {
    if (current.processing) return null;
    const next: ExampleRecord = {
      ...current,
      processing: true,
      processing_error: null,
      pending_file: pendingFile,
      file: null,
      thumb: null,
      retry_count: 0,
      processed_at: null,
    };
    delete next.duration;
    return next;
  });
}

export interface ProcessingOutcome {
  file: BlobRef;
  thumb: BlobRef;
  duration: number | null;
}

/**
 * Record a successful run. Applies only while the record is processing;
 * returns undefined otherwise.
 */
export function completeProcessing(
  store: ExampleStore,
  id: string,
  outcome: ProcessingOutcome,
  now: Date = new Date()
): ExampleRecord | undefined {
  return store.update(id, (current) => {
    if (!current.processing) return null;
    const next: ExampleRecord = {
      ...current,
      processing: false,
      processing_error: null,
      pending_file: null,
      file: outcome.file,
      thumb: outcome.thumb,
      processed_at: now.toISOString(),
    };
    if (outcome.duration !== null) {
      next.duration = outcome.duration;
    } else {
      delete next.duration;
    }
    return next;
  });
}

/**
 * Record a failed run. `pending_file` is kept for retry. Applies only while
 * the record is processing.
 */
export function failProcessing(
  store: ExampleStore,
  id: string,
  message: string
): ExampleRecord | undefined {
  return store.update(id, (current) => {
    if (!current.processing) return null;
    const next: ExampleRecord = {
      ...current,
      processing: false,
      processing_error: message || "Processing failed",
      file: null,
      thumb: null,
    };
    delete next.duration;
    return next;
  });
}

export interface ExampleFilter {
  status?: ExampleStatus;
  approved?: boolean;
  uploadedBy?: string;
}

/** Matching examples, newest first. */
export function listExamples(
  store: ExampleStore,
  filter: ExampleFilter = {}
): ExampleRecord[] {
  return store
    .loadAll()
    .filter((r) => filter.status === undefined || exampleStatus(r) === filter.status)
    .filter((r) => filter.approved === undefined || r.approved === filter.approved)
    .filter((r) => filter.uploadedBy === undefined || r.uploaded_by === filter.uploadedBy)
    .sort((a, b) => b.created_at.localeCompare(a.created_at));
}
