import * as path from "path";
import type Database from "better-sqlite3";
import type { AppConfig } from "./config";
import { openDatabase } from "./db/connection";
import { ensureSchema } from "./db/schema";
import { ensureJsonCollections } from "./store/collections";
import { EXAMPLES, type ExampleStore } from "./store/examples";
import { JsonFileRecordStore } from "./store/jsonFileStore";
import { SqliteRecordStore } from "./store/sqliteStore";
import { createBlobStorages } from "./storage";
import { createMediaTransform, type MediaTransform } from "./media";
import { createIngestionPipeline } from "./pipeline/ingest";
import { reconcileOnStartup, type ReconcileSummary } from "./pipeline/reconcile";
import { createNotifier, type Notifier } from "./notify";
import { GalleryService } from "./gallery/galleryService";

export interface App {
  config: AppConfig;
  store: ExampleStore;
  gallery: GalleryService;
  pendingDir: string;
  /** Settle records left processing by an earlier process. */
  reconcile(): Promise<ReconcileSummary>;
  /** Wait for queued work, then release the database. */
  close(): Promise<void>;
}

export interface AppOverrides {
  transform?: MediaTransform;
  notifier?: Notifier;
  awaitProcessing?: boolean;
}

function openStore(config: AppConfig): { store: ExampleStore; db: Database.Database | null } {
  if (config.store === "json") {
    const created = ensureJsonCollections(config.dataDir);
    if (created.length > 0) {
      console.log(`[app] Created collections: ${created.join(", ")}`);
    }
    return { store: new JsonFileRecordStore(config.dataDir, EXAMPLES), db: null };
  }

  const db = openDatabase(config.dbPath);
  ensureSchema(db);
  return { store: new SqliteRecordStore(db, EXAMPLES), db };
}

/** Wire store, storage, media tools, pipeline and gallery from config. */
export function createApp(config: AppConfig, overrides: AppOverrides = {}): App {
  const { store, db } = openStore(config);
  const storage = createBlobStorages(config);
  const pendingDir = path.join(config.uploadDir, "pending");

  const transform =
    overrides.transform ??
    createMediaTransform({
      ffmpegPath: config.ffmpegPath,
      ffprobePath: config.ffprobePath,
      killTimeoutSeconds: Math.ceil(config.transformTimeoutMs / 1000),
    });

  const pipeline = createIngestionPipeline({
    store,
    storage: storage.active,
    transform,
    stagingDir: path.join(config.uploadDir, "staging"),
    thumbBox: config.thumbBox,
    videoFrameSeconds: config.videoFrameSeconds,
    transformTimeoutMs: config.transformTimeoutMs,
    transcodeVideo: config.transcodeVideo,
  });

  const gallery = new GalleryService({
    store,
    storage,
    pipeline,
    notifier: overrides.notifier ?? createNotifier(config),
    pendingDir,
    maxUploadBytes: config.maxUploadBytes,
    urlExpirySeconds: config.urlExpirySeconds,
    concurrency: config.concurrency,
    adminContact: config.adminContact,
    awaitProcessing: overrides.awaitProcessing,
  });

  console.log(
    `[app] Store: ${config.store}, storage: ${storage.active.backend}, uploads: ${config.uploadDir}`
  );

  return {
    config,
    store,
    gallery,
    pendingDir,
    reconcile: () => reconcileOnStartup(store, pendingDir, (job) => gallery.submit(job)),
    async close() {
      await gallery.idle();
      db?.close();
    },
  };
}
