/**
 * Shared contract types for the showcase media pipeline.
 *
 * Store, storage, media and pipeline modules import shared types from here
 * rather than from each other.
 */

// --- Media ---

export type MediaKind = "image" | "video";

export interface BoundingBox {
  width: number;
  height: number;
}

// --- Blob references ---

export type BlobBackend = "local" | "s3";

/** A stored blob, tagged with the backend that holds it. */
export interface BlobRef {
  backend: BlobBackend;
  key: string;
}

// --- Example record ---

export interface ExampleRecord {
  id: string;
  title: string;
  description: string;
  /** Sanitized upload filename; drives classification on retry. */
  original_filename: string;
  uploaded_by: string | null;
  created_at: string;
  approved: boolean;
  approved_at: string | null;
  processing: boolean;
  processing_error: string | null;
  /** File name inside the pending area. Kept after a failure for retry. */
  pending_file: string | null;
  file: BlobRef | null;
  thumb: BlobRef | null;
  /**
   * Blobs the record still owns that `file` and `thumb` no longer point at,
   * e.g. a local copy left beside an object-store key. Removed on delete.
   */
  stale_blobs?: BlobRef[];
  retry_count: number;
  /** Seconds; only for successfully processed video. */
  duration?: number;
  processed_at: string | null;
}

export type ExampleStatus = "pending" | "failed" | "processed";

export interface NewExample {
  title: string;
  description: string;
  original_filename: string;
  uploaded_by: string | null;
  pending_file: string;
}

// --- Pipeline ---

export interface IngestJob {
  /** Absolute path of the file waiting in the pending area. */
  pendingPath: string;
  originalFilename: string;
  recordId: string;
}

export interface MediaUrls {
  fileUrl: string | null;
  thumbUrl: string | null;
}
