import * as fs from "fs";
import * as path from "path";
import {
  AlreadyProcessingError,
  NoRecoverableSourceError,
  NotApprovableError,
  NotFoundError,
  UploadRejectedError,
  errorMessage,
} from "../lib/errors";
import { UPLOAD_EXTENSIONS, fileExtension } from "../lib/mediaTypes";
import { sanitizeFilename } from "../lib/pathSafety";
import {
  beginProcessing,
  createExample,
  exampleStatus,
  listExamples,
  type ExampleFilter,
  type ExampleStore,
} from "../store/examples";
import { storageNameFor, type IngestionPipeline } from "../pipeline/ingest";
import { MediaQueue } from "../pipeline/queue";
import type { ConfiguredStorage } from "../storage";
import type { BlobStorage } from "../storage/types";
import type { Notifier } from "../notify";
import type { BlobRef, ExampleRecord, IngestJob, MediaUrls } from "../contracts";

export interface GalleryOptions {
  store: ExampleStore;
  storage: ConfiguredStorage;
  pipeline: IngestionPipeline;
  notifier: Notifier;
  /** Where uploads wait for the pipeline */
  pendingDir: string;
  maxUploadBytes: number;
  urlExpirySeconds: number;
  concurrency: number;
  /** Recipient of "awaiting approval" and "processing failed" messages */
  adminContact: string | null;
  /** Make upload and retry resolve only after processing finished. */
  awaitProcessing?: boolean;
}

export interface UploadInput {
  bytes: Buffer;
  originalFilename: string;
  uploaderId: string | null;
  title?: string;
  description?: string;
}

export interface DeleteReport {
  /** Blob keys removed from their backend */
  removed: string[];
  /** Blob keys whose removal failed or whose backend is not configured */
  failed: string[];
}

const LEGACY_PREFIX = /^[0-9a-f]{32}_/;

/**
 * Uploads, retries, moderation and queries over the examples collection.
 * Everything the admin pages and the CLI do goes through here.
 */
export class GalleryService {
  private readonly queue: MediaQueue;
  private readonly awaitProcessing: boolean;

  constructor(private readonly options: GalleryOptions) {
    this.queue = new MediaQueue((job) => this.runJob(job), options.concurrency);
    this.awaitProcessing = options.awaitProcessing ?? false;
  }

  // --- Ingestion ---

  /**
   * Accept an upload: validate, write it to the pending area, create the
   * record and hand it to the pipeline. Returns the new record id.
   */
  async uploadReceived(input: UploadInput): Promise<string> {
    const filename = this.validateUpload(input.bytes, input.originalFilename);
    const pendingName = storageNameFor(filename);
    const pendingPath = path.join(this.options.pendingDir, pendingName);

    await fs.promises.mkdir(this.options.pendingDir, { recursive: true });
    await fs.promises.writeFile(pendingPath, input.bytes);

    let record: ExampleRecord;
    try {
      record = createExample(this.options.store, {
        title: input.title?.trim() || filename,
        description: input.description?.trim() ?? "",
        original_filename: filename,
        uploaded_by: input.uploaderId,
        pending_file: pendingName,
      });
    } catch (err) {
      await fs.promises.rm(pendingPath, { force: true });
      throw err;
    }

    console.log(`[gallery] Upload ${filename} accepted as ${record.id}`);
    await this.dispatch({ pendingPath, originalFilename: filename, recordId: record.id });
    return record.id;
  }

  /**
   * Reprocess a settled record from its pending file or, failing that, from
   * a copy of its stored media. Returns the record as it was resubmitted.
   */
  async retryRequested(id: string): Promise<ExampleRecord> {
    const record = this.require(id);
    if (record.processing) throw new AlreadyProcessingError(id);

    const originalFilename =
      record.original_filename ||
      path.posix.basename(record.file?.key ?? "").replace(LEGACY_PREFIX, "");

    let pendingName: string;
    let obsolete: BlobRef[] = [];
    if (record.pending_file && (await this.pendingExists(record.pending_file))) {
      pendingName = record.pending_file;
    } else if (record.file && (await this.blobExists(record.file))) {
      pendingName = storageNameFor(originalFilename);
      await this.fetchToPending(record.file, pendingName);
      obsolete = [record.file, ...(record.thumb ? [record.thumb] : [])];
    } else {
      throw new NoRecoverableSourceError(id);
    }

    const pendingPath = path.join(this.options.pendingDir, pendingName);
    const updated = beginProcessing(this.options.store, id, pendingName);
    if (!updated) {
      if (obsolete.length > 0) await fs.promises.rm(pendingPath, { force: true });
      if (!this.options.store.get(id)) throw new NotFoundError(id);
      throw new AlreadyProcessingError(id);
    }

    await this.deleteBlobs(obsolete);
    console.log(`[gallery] Retrying ${id} from ${obsolete.length > 0 ? "stored media" : "pending file"}`);
    await this.dispatch({ pendingPath, originalFilename, recordId: id });
    return updated;
  }

  /** Queue a job directly; resolves when it has run. */
  submit(job: IngestJob): Promise<void> {
    return this.queue.submit(job);
  }

  /** Resolves when no job is queued or running. */
  idle(): Promise<void> {
    return this.queue.onIdle();
  }

  // --- Moderation ---

  approveRequested(id: string, now: Date = new Date()): ExampleRecord {
    const record = this.require(id);
    const status = exampleStatus(record);
    if (status !== "processed") {
      throw new NotApprovableError(
        id,
        status === "pending" ? "still processing" : "processing failed"
      );
    }

    const updated = this.options.store.update(id, (current) => ({
      ...current,
      approved: true,
      approved_at: now.toISOString(),
    }));
    if (!updated) throw new NotFoundError(id);
    console.log(`[gallery] Approved ${id}`);
    return updated;
  }

  /**
   * Remove the record and, best effort, every blob and pending file it
   * references. The record goes even when blob removal fails.
   */
  async deleteRequested(id: string): Promise<DeleteReport> {
    const record = this.require(id);
    const refs = [record.file, record.thumb, ...(record.stale_blobs ?? [])].filter(
      (r): r is BlobRef => r !== null
    );
    const report = await this.deleteBlobs(refs);

    if (record.pending_file) {
      const pendingPath = path.join(this.options.pendingDir, record.pending_file);
      await fs.promises.rm(pendingPath, { force: true }).catch((err: unknown) => {
        console.warn(`[gallery] Could not remove pending file ${record.pending_file}: ${errorMessage(err)}`);
      });
    }

    this.options.store.delete(id);
    console.log(`[gallery] Deleted ${id}`);
    return report;
  }

  // --- Queries ---

  get(id: string): ExampleRecord | undefined {
    return this.options.store.get(id);
  }

  list(filter: ExampleFilter = {}): ExampleRecord[] {
    return listExamples(this.options.store, filter);
  }

  /** What the public gallery shows. */
  listApproved(): ExampleRecord[] {
    return listExamples(this.options.store, { status: "processed", approved: true });
  }

  /** A contractor's own uploads still waiting for approval. */
  listPendingForUser(userId: string): ExampleRecord[] {
    return listExamples(this.options.store, { approved: false, uploadedBy: userId });
  }

  /** Fresh URLs for rendering; signed URLs are never stored. */
  async mediaUrls(
    record: ExampleRecord,
    expirySeconds: number = this.options.urlExpirySeconds
  ): Promise<MediaUrls> {
    return {
      fileUrl: await this.urlFor(record.file, expirySeconds),
      thumbUrl: await this.urlFor(record.thumb, expirySeconds),
    };
  }

  // --- Internals ---

  private validateUpload(bytes: Buffer, originalFilename: string): string {
    if (!originalFilename.trim()) {
      throw new UploadRejectedError("No file selected.");
    }
    const filename = sanitizeFilename(originalFilename);
    const ext = fileExtension(filename);
    if (!filename || !ext) {
      throw new UploadRejectedError(`Invalid filename: "${originalFilename}"`);
    }
    if (!UPLOAD_EXTENSIONS.includes(ext)) {
      throw new UploadRejectedError(
        `File type .${ext} is not allowed. Allowed: ${UPLOAD_EXTENSIONS.join(", ")}`
      );
    }
    if (bytes.length === 0) {
      throw new UploadRejectedError("Uploaded file is empty.");
    }
    if (bytes.length > this.options.maxUploadBytes) {
      throw new UploadRejectedError(
        `File is too large: ${bytes.length} bytes (limit ${this.options.maxUploadBytes}).`
      );
    }
    return filename;
  }

  private async dispatch(job: IngestJob): Promise<void> {
    const done = this.submit(job);
    if (this.awaitProcessing) await done;
  }

  private async runJob(job: IngestJob): Promise<void> {
    await this.options.pipeline.process(job);
    this.notifyOutcome(job.recordId);
  }

  private notifyOutcome(id: string): void {
    const admin = this.options.adminContact;
    const record = this.options.store.get(id);
    if (!admin || !record || record.processing) return;

    if (record.processing_error) {
      this.options.notifier.notify(
        admin,
        `Example processing failed: ${record.title}`,
        `Processing of "${record.original_filename}" (${record.id}) failed: ${record.processing_error}\n` +
          `Retry it with: showcase retry ${record.id}`
      );
      return;
    }
    this.options.notifier.notify(
      admin,
      `New example awaiting approval: ${record.title}`,
      `"${record.title}" (${record.id}) was uploaded${record.uploaded_by ? ` by ${record.uploaded_by}` : ""} ` +
        `and is ready for review.\nApprove it with: showcase approve ${record.id}`
    );
  }

  private require(id: string): ExampleRecord {
    const record = this.options.store.get(id);
    if (!record) throw new NotFoundError(id);
    return record;
  }

  private backendFor(ref: BlobRef): BlobStorage | undefined {
    return this.options.storage.backends[ref.backend];
  }

  private async pendingExists(name: string): Promise<boolean> {
    try {
      return (await fs.promises.stat(path.join(this.options.pendingDir, name))).isFile();
    } catch {
      return false;
    }
  }

  private async blobExists(ref: BlobRef): Promise<boolean> {
    const storage = this.backendFor(ref);
    if (!storage) return false;
    try {
      return await storage.exists(ref.key);
    } catch (err) {
      console.warn(`[gallery] Could not check ${ref.backend} blob ${ref.key}: ${errorMessage(err)}`);
      return false;
    }
  }

  private async fetchToPending(ref: BlobRef, pendingName: string): Promise<void> {
    const storage = this.backendFor(ref);
    if (!storage) throw new NoRecoverableSourceError(ref.key);
    await fs.promises.mkdir(this.options.pendingDir, { recursive: true });
    await storage.fetchTo(ref.key, path.join(this.options.pendingDir, pendingName));
  }

  private async deleteBlobs(refs: BlobRef[]): Promise<DeleteReport> {
    const report: DeleteReport = { removed: [], failed: [] };
    for (const ref of refs) {
      const storage = this.backendFor(ref);
      if (!storage) {
        console.warn(`[gallery] No ${ref.backend} storage configured; cannot delete ${ref.key}`);
        report.failed.push(ref.key);
        continue;
      }
      try {
        await storage.delete(ref.key);
        report.removed.push(ref.key);
      } catch (err) {
        console.warn(`[gallery] Could not delete ${ref.backend} blob ${ref.key}: ${errorMessage(err)}`);
        report.failed.push(ref.key);
      }
    }
    return report;
  }

  private async urlFor(ref: BlobRef | null, expirySeconds: number): Promise<string | null> {
    if (!ref) return null;
    const storage = this.backendFor(ref);
    if (!storage) {
      console.warn(`[gallery] No ${ref.backend} storage configured; no URL for ${ref.key}`);
      return null;
    }
    try {
      return await storage.getUrl(ref.key, expirySeconds);
    } catch (err) {
      console.warn(`[gallery] Could not build URL for ${ref.key}: ${errorMessage(err)}`);
      return null;
    }
  }
}
