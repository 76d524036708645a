import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import type Database from "better-sqlite3";
import { GalleryService, type GalleryOptions } from "../../src/gallery/galleryService";
import { createIngestionPipeline } from "../../src/pipeline/ingest";
import {
  createExample,
  parseExampleRecord,
  type ExampleStore,
} from "../../src/store/examples";
import {
  AlreadyProcessingError,
  NoRecoverableSourceError,
  NotApprovableError,
  NotFoundError,
  StorageError,
  UploadRejectedError,
} from "../../src/lib/errors";
import type { BlobStorage } from "../../src/storage/types";
import type { Notifier } from "../../src/notify";
import type { ExampleRecord } from "../../src/contracts";
import {
  FlakyLocalStorage,
  cleanupDirs,
  fakeTransform,
  listFiles,
  makeTempDir,
  memoryStore,
  pngBuffer,
} from "../fixtures";

/** Object-store stand-in that keeps objects in memory. */
class MemoryObjectStorage implements BlobStorage {
  readonly backend = "s3" as const;
  readonly objects = new Map<string, Buffer>();
  readonly deletes: string[] = [];
  failDelete = false;

  async put(localPath: string, name: string): Promise<string> {
    const key = `examples/${name}`;
    this.objects.set(key, fs.readFileSync(localPath));
    fs.rmSync(localPath);
    return key;
  }

  async getUrl(key: string, expirySeconds: number): Promise<string> {
    return `https://bucket.test/${key}?X-Amz-Expires=${expirySeconds}`;
  }

  async delete(key: string): Promise<void> {
    this.deletes.push(key);
    if (this.failDelete) throw new StorageError(`Cannot delete s3://bucket/${key}: AccessDenied`);
    this.objects.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    return this.objects.has(key);
  }

  async fetchTo(key: string, destPath: string): Promise<void> {
    const body = this.objects.get(key);
    if (!body) throw new StorageError(`Cannot fetch ${key}`);
    fs.writeFileSync(destPath, body);
  }
}

interface SentMessage {
  to: string;
  subject: string;
  text: string;
}

class RecordingNotifier implements Notifier {
  readonly sent: SentMessage[] = [];

  notify(to: string, subject: string, text: string): void {
    this.sent.push({ to, subject, text });
  }
}

describe("GalleryService", () => {
  const dirs: string[] = [];
  let uploadDir: string;
  let pendingDir: string;
  let store: ExampleStore;
  let db: Database.Database;
  let local: FlakyLocalStorage;
  let s3: MemoryObjectStorage;
  let notifier: RecordingNotifier;

  beforeEach(() => {
    const root = makeTempDir();
    dirs.push(root);
    uploadDir = path.join(root, "uploads");
    pendingDir = path.join(uploadDir, "pending");
    ({ store, db } = memoryStore());
    local = new FlakyLocalStorage(uploadDir, "https://example.test");
    s3 = new MemoryObjectStorage();
    notifier = new RecordingNotifier();
  });

  afterEach(() => {
    db.close();
    cleanupDirs(dirs);
  });

  function gallery(overrides: Partial<GalleryOptions> = {}): GalleryService {
    const { transform } = fakeTransform();
    const pipeline = createIngestionPipeline({
      store,
      storage: local,
      transform,
      stagingDir: path.join(uploadDir, "staging"),
      thumbBox: { width: 400, height: 400 },
      videoFrameSeconds: 1,
      transformTimeoutMs: 5000,
      transcodeVideo: false,
    });
    return new GalleryService({
      store,
      storage: { active: local, backends: { local, s3 } },
      pipeline,
      notifier,
      pendingDir,
      maxUploadBytes: 1024 * 1024,
      urlExpirySeconds: 600,
      concurrency: 1,
      adminContact: "admin@example.test",
      awaitProcessing: true,
      ...overrides,
    });
  }

  function mustGet(id: string): ExampleRecord {
    const record = store.get(id);
    if (!record) throw new Error(`record ${id} missing`);
    return record;
  }

  describe("uploadReceived", () => {
    it("stores a valid photo and tells the admin it awaits approval", async () => {
      const service = gallery();

      const id = await service.uploadReceived({
        bytes: await pngBuffer(300, 200),
        originalFilename: "photo.png",
        uploaderId: "crew-1",
      });

      const record = mustGet(id);
      expect(record.title).toBe("photo.png");
      expect(record.uploaded_by).toBe("crew-1");
      expect(record.processing).toBe(false);
      expect(record.processing_error).toBeNull();
      expect(record.file?.key).toMatch(/^[0-9a-f]{32}_photo\.png$/);
      expect(record.approved).toBe(false);
      expect(listFiles(pendingDir)).toEqual([]);
      expect(notifier.sent).toHaveLength(1);
      expect(notifier.sent[0]?.to).toBe("admin@example.test");
      expect(notifier.sent[0]?.subject).toBe("New example awaiting approval: photo.png");
    });

    it("sanitizes the filename and trims title and description", async () => {
      const service = gallery();

      const id = await service.uploadReceived({
        bytes: await pngBuffer(40, 40),
        originalFilename: "../My Deck.PNG",
        uploaderId: null,
        title: "  Deck rebuild ",
        description: " Cedar boards ",
      });

      const record = mustGet(id);
      expect(record.original_filename).toBe("My_Deck.PNG");
      expect(record.title).toBe("Deck rebuild");
      expect(record.description).toBe("Cedar boards");
      expect(record.file?.key).toMatch(/^[0-9a-f]{32}_My_Deck\.PNG$/);
    });

    it("rejects a disallowed extension before creating anything", async () => {
      const service = gallery();

      await expect(
        service.uploadReceived({
          bytes: Buffer.from("MZ"),
          originalFilename: "setup.exe",
          uploaderId: "crew-1",
        })
      ).rejects.toThrow(
        new UploadRejectedError("File type .exe is not allowed. Allowed: png, jpg, jpeg, gif, mp4")
      );
      expect(store.loadAll()).toEqual([]);
      expect(listFiles(pendingDir)).toEqual([]);
    });

    it("only accepts the upload allow-list even for types the pipeline reads", async () => {
      await expect(
        gallery().uploadReceived({
          bytes: Buffer.from("BM"),
          originalFilename: "scan.bmp",
          uploaderId: null,
        })
      ).rejects.toThrow("File type .bmp is not allowed. Allowed: png, jpg, jpeg, gif, mp4");
    });

    it("rejects empty and oversized files", async () => {
      const service = gallery();

      await expect(
        service.uploadReceived({ bytes: Buffer.alloc(0), originalFilename: "a.png", uploaderId: null })
      ).rejects.toThrow("Uploaded file is empty.");
      await expect(
        service.uploadReceived({
          bytes: Buffer.alloc(1024 * 1024 + 1),
          originalFilename: "a.png",
          uploaderId: null,
        })
      ).rejects.toThrow("File is too large: 1048577 bytes (limit 1048576).");
      await expect(
        service.uploadReceived({ bytes: Buffer.from("x"), originalFilename: "noext", uploaderId: null })
      ).rejects.toThrow('Invalid filename: "noext"');
      expect(store.loadAll()).toEqual([]);
    });

    it("keeps a failed upload visible with its pending file", async () => {
      const service = gallery();

      const id = await service.uploadReceived({
        bytes: Buffer.from("truncated"),
        originalFilename: "photo.png",
        uploaderId: "crew-1",
      });

      const record = mustGet(id);
      expect(record.processing).toBe(false);
      expect(record.processing_error).toMatch(/^Cannot decode image [0-9a-f]{32}_photo\.png: /);
      expect(record.file).toBeNull();
      expect(record.pending_file).toMatch(/^[0-9a-f]{32}_photo\.png$/);
      expect(listFiles(pendingDir)).toEqual([record.pending_file]);
      expect(notifier.sent[0]?.subject).toBe("Example processing failed: photo.png");
    });

    it("returns before processing when not awaiting it", async () => {
      const service = gallery({ awaitProcessing: false });

      const id = await service.uploadReceived({
        bytes: await pngBuffer(40, 40),
        originalFilename: "photo.png",
        uploaderId: null,
      });
      expect(mustGet(id).processing).toBe(true);

      await service.idle();
      expect(mustGet(id).processing).toBe(false);
      expect(mustGet(id).file).not.toBeNull();
    });

    it("sends nothing when no admin contact is configured", async () => {
      await gallery({ adminContact: null }).uploadReceived({
        bytes: await pngBuffer(40, 40),
        originalFilename: "photo.png",
        uploaderId: null,
      });
      expect(notifier.sent).toEqual([]);
    });
  });

  describe("retryRequested", () => {
    it("reprocesses from the pending file once it is readable", async () => {
      const service = gallery();
      const id = await service.uploadReceived({
        bytes: Buffer.from("truncated"),
        originalFilename: "photo.png",
        uploaderId: null,
      });
      const failed = mustGet(id);
      fs.writeFileSync(path.join(pendingDir, failed.pending_file ?? ""), await pngBuffer(60, 60));

      const resubmitted = await service.retryRequested(id);

      expect(resubmitted.processing).toBe(true);
      expect(resubmitted.processing_error).toBeNull();
      const record = mustGet(id);
      expect(record.processing_error).toBeNull();
      expect(record.file?.key).toMatch(/^[0-9a-f]{32}_photo\.png$/);
      expect(record.retry_count).toBe(0);
      expect(listFiles(pendingDir)).toEqual([]);
    });

    it("fails with no recoverable source and leaves the record unchanged", async () => {
      const service = gallery();
      const id = await service.uploadReceived({
        bytes: Buffer.from("truncated"),
        originalFilename: "photo.png",
        uploaderId: null,
      });
      const before = mustGet(id);
      fs.rmSync(path.join(pendingDir, before.pending_file ?? ""));

      await expect(service.retryRequested(id)).rejects.toThrow(NoRecoverableSourceError);
      expect(mustGet(id)).toEqual(before);
    });

    it("reprocesses a stored record from a copy of its media", async () => {
      const service = gallery();
      const id = await service.uploadReceived({
        bytes: await pngBuffer(60, 60),
        originalFilename: "photo.png",
        uploaderId: null,
      });
      const first = mustGet(id);

      await service.retryRequested(id);

      const record = mustGet(id);
      expect(record.processing_error).toBeNull();
      expect(record.file?.key).toMatch(/^[0-9a-f]{32}_photo\.png$/);
      expect(record.file?.key).not.toBe(first.file?.key);
      expect(listFiles(uploadDir)).toEqual([record.file?.key, record.thumb?.key].sort());
      expect(listFiles(pendingDir)).toEqual([]);
    });

    it("refuses while the record is processing", async () => {
      const record = createExample(store, {
        title: "photo.png",
        description: "",
        original_filename: "photo.png",
        uploaded_by: null,
        pending_file: "pending_photo.png",
      });

      await expect(gallery().retryRequested(record.id)).rejects.toThrow(
        new AlreadyProcessingError(record.id)
      );
    });

    it("throws NotFoundError for an unknown id", async () => {
      await expect(gallery().retryRequested("missing")).rejects.toThrow(
        "Example not found: missing"
      );
    });
  });

  describe("approveRequested", () => {
    it("approves a processed record and lists it publicly", async () => {
      const service = gallery();
      const id = await service.uploadReceived({
        bytes: await pngBuffer(40, 40),
        originalFilename: "photo.png",
        uploaderId: "crew-1",
      });

      const approved = service.approveRequested(id, new Date("2026-03-01T12:00:00.000Z"));

      expect(approved.approved).toBe(true);
      expect(approved.approved_at).toBe("2026-03-01T12:00:00.000Z");
      expect(service.listApproved().map((r) => r.id)).toEqual([id]);
    });

    it("refuses failed and still-processing records", async () => {
      const service = gallery();
      const failedId = await service.uploadReceived({
        bytes: Buffer.from("truncated"),
        originalFilename: "photo.png",
        uploaderId: null,
      });
      const processing = createExample(store, {
        title: "clip.mp4",
        description: "",
        original_filename: "clip.mp4",
        uploaded_by: null,
        pending_file: "pending_clip.mp4",
      });

      expect(() => service.approveRequested(failedId)).toThrow(
        new NotApprovableError(failedId, "processing failed")
      );
      expect(() => service.approveRequested(processing.id)).toThrow(
        `Example ${processing.id} cannot be approved: still processing`
      );
      expect(() => service.approveRequested("missing")).toThrow(NotFoundError);
    });
  });

  describe("deleteRequested", () => {
    function insertMixed(): ExampleRecord {
      fs.mkdirSync(uploadDir, { recursive: true });
      fs.writeFileSync(path.join(uploadDir, "thumb_abc_clip.mp4.jpg"), "jpeg");
      s3.objects.set("examples/abc_clip.mp4", Buffer.from("mp4"));
      return store.insert({
        id: "mixed-1",
        title: "Clip",
        description: "",
        original_filename: "clip.mp4",
        uploaded_by: null,
        created_at: "2026-03-01T12:00:00.000Z",
        approved: false,
        approved_at: null,
        processing: false,
        processing_error: null,
        pending_file: null,
        file: { backend: "s3", key: "examples/abc_clip.mp4" },
        thumb: { backend: "local", key: "thumb_abc_clip.mp4.jpg" },
        retry_count: 0,
        duration: 8,
        processed_at: "2026-03-01T12:00:05.000Z",
      });
    }

    it("issues one delete per key through its backend and removes the record", async () => {
      const record = insertMixed();
      s3.failDelete = true;

      const report = await gallery().deleteRequested(record.id);

      expect(s3.deletes).toEqual(["examples/abc_clip.mp4"]);
      expect(local.deleted).toEqual(["thumb_abc_clip.mp4.jpg"]);
      expect(report).toEqual({
        removed: ["thumb_abc_clip.mp4.jpg"],
        failed: ["examples/abc_clip.mp4"],
      });
      expect(store.get(record.id)).toBeUndefined();
      expect(listFiles(uploadDir)).toEqual([]);
    });

    it("removes a flat-file record's local copies and its object", async () => {
      fs.mkdirSync(uploadDir, { recursive: true });
      fs.writeFileSync(path.join(uploadDir, "abc_clip.mp4"), "mp4");
      fs.writeFileSync(path.join(uploadDir, "thumb_abc_clip.mp4.jpg"), "jpeg");
      s3.objects.set("examples/abc_clip.mp4", Buffer.from("mp4"));
      store.insert(
        parseExampleRecord({
          id: "flat-1",
          title: "Clip",
          file: "abc_clip.mp4",
          thumb: "thumb_abc_clip.mp4.jpg",
          s3_key: "examples/abc_clip.mp4",
        })
      );

      const report = await gallery().deleteRequested("flat-1");

      expect(s3.deletes).toEqual(["examples/abc_clip.mp4"]);
      expect(local.deleted).toEqual(["thumb_abc_clip.mp4.jpg", "abc_clip.mp4"]);
      expect(report).toEqual({
        removed: ["examples/abc_clip.mp4", "thumb_abc_clip.mp4.jpg", "abc_clip.mp4"],
        failed: [],
      });
      expect(s3.objects.size).toBe(0);
      expect(listFiles(uploadDir)).toEqual([]);
      expect(store.get("flat-1")).toBeUndefined();
    });

    it("removes the pending file of a failed record", async () => {
      const service = gallery();
      const id = await service.uploadReceived({
        bytes: Buffer.from("truncated"),
        originalFilename: "photo.png",
        uploaderId: null,
      });

      const report = await service.deleteRequested(id);

      expect(report).toEqual({ removed: [], failed: [] });
      expect(listFiles(pendingDir)).toEqual([]);
      expect(store.get(id)).toBeUndefined();
    });

    it("throws NotFoundError for an unknown id", async () => {
      await expect(gallery().deleteRequested("missing")).rejects.toThrow(NotFoundError);
    });
  });

  describe("queries", () => {
    it("mints URLs per backend at call time", async () => {
      const record = store.insert({
        id: "urls-1",
        title: "Clip",
        description: "",
        original_filename: "clip.mp4",
        uploaded_by: null,
        created_at: "2026-03-01T12:00:00.000Z",
        approved: true,
        approved_at: "2026-03-02T12:00:00.000Z",
        processing: false,
        processing_error: null,
        pending_file: null,
        file: { backend: "s3", key: "examples/abc_clip.mp4" },
        thumb: { backend: "local", key: "thumb_abc_clip.mp4.jpg" },
        retry_count: 0,
        processed_at: "2026-03-01T12:00:05.000Z",
      });
      const service = gallery();

      expect(await service.mediaUrls(record)).toEqual({
        fileUrl: "https://bucket.test/examples/abc_clip.mp4?X-Amz-Expires=600",
        thumbUrl: "https://example.test/uploads/thumb_abc_clip.mp4.jpg",
      });
      expect((await service.mediaUrls(record, 60)).fileUrl).toBe(
        "https://bucket.test/examples/abc_clip.mp4?X-Amz-Expires=60"
      );
    });

    it("returns null URLs for a record without blobs", async () => {
      const record = createExample(store, {
        title: "photo.png",
        description: "",
        original_filename: "photo.png",
        uploaded_by: null,
        pending_file: "pending_photo.png",
      });

      expect(await gallery().mediaUrls(record)).toEqual({ fileUrl: null, thumbUrl: null });
    });

    it("lists a contractor's unapproved uploads", async () => {
      const service = gallery();
      const approvedId = await service.uploadReceived({
        bytes: await pngBuffer(40, 40),
        originalFilename: "one.png",
        uploaderId: "crew-1",
      });
      const waitingId = await service.uploadReceived({
        bytes: await pngBuffer(40, 40),
        originalFilename: "two.png",
        uploaderId: "crew-1",
      });
      await service.uploadReceived({
        bytes: await pngBuffer(40, 40),
        originalFilename: "three.png",
        uploaderId: "crew-2",
      });
      service.approveRequested(approvedId);

      expect(service.listPendingForUser("crew-1").map((r) => r.id)).toEqual([waitingId]);
      expect(service.list({ status: "processed" })).toHaveLength(3);
      expect(service.list({ uploadedBy: "crew-2" })).toHaveLength(1);
    });
  });
});
