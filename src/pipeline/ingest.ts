import * as fs from "fs";
import * as path from "path";
import { randomUUID } from "crypto";
import { classifyMedia } from "../lib/mediaTypes";
import { StorageError, errorMessage } from "../lib/errors";
import { sanitizeFilename } from "../lib/pathSafety";
import { withTimeout } from "../lib/timeout";
import {
  completeProcessing,
  failProcessing,
  type ExampleStore,
  type ProcessingOutcome,
} from "../store/examples";
import type { BlobStorage } from "../storage/types";
import type { MediaTransform } from "../media";
import type { BlobRef, BoundingBox, IngestJob, MediaKind } from "../contracts";

export interface PipelineDeps {
  store: ExampleStore;
  /** Backend that receives the processed media and thumbnail. */
  storage: BlobStorage;
  transform: MediaTransform;
  /** Scratch directory for thumbnails and transcodes before placement. */
  stagingDir: string;
  thumbBox: BoundingBox;
  videoFrameSeconds: number;
  transformTimeoutMs: number;
  transcodeVideo: boolean;
}

export interface IngestionPipeline {
  /**
   * Turn one pending upload into a processed or failed record.
   * Never rejects: failures end up in the record's `processing_error`.
   */
  process(job: IngestJob): Promise<void>;
  /** Record ids with a run in progress in this process. */
  inFlight(): string[];
}

/**
 * Collision-resistant storage name: 32 hex chars, then the sanitized
 * upload name. Fresh on every call.
 */
export function storageNameFor(originalFilename: string): string {
  const base = sanitizeFilename(originalFilename) || "upload";
  return `${randomUUID().replace(/-/g, "")}_${base}`;
}

export function thumbNameFor(storageName: string): string {
  return `thumb_${storageName}.jpg`;
}

interface TransformResult {
  /** File to place as the media blob: the pending file or a transcode. */
  mediaPath: string;
  duration: number | null;
}

interface Placement extends ProcessingOutcome {
  transcoded: boolean;
}

/** What a run leaves behind that must be cleaned up if it fails. */
interface RunScratch {
  staged: string[];
  placed: BlobRef[];
  /** The transform, which keeps writing to staging after a timeout. */
  transforming: Promise<unknown> | null;
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

export function createIngestionPipeline(deps: PipelineDeps): IngestionPipeline {
  const running = new Set<string>();
  const backend = deps.storage.backend;

  async function discard(refs: BlobRef[]): Promise<void> {
    for (const ref of refs) {
      await deps.storage.delete(ref.key).catch((err: unknown) => {
        console.warn(`[ingest] Could not remove orphaned blob ${ref.key}: ${errorMessage(err)}`);
      });
    }
  }

  async function removeStaged(paths: string[]): Promise<void> {
    for (const p of paths) {
      await fs.promises.rm(p, { force: true }).catch((err: unknown) => {
        console.warn(`[ingest] Could not remove staging file ${p}: ${errorMessage(err)}`);
      });
    }
  }

  async function transform(
    kind: MediaKind,
    job: IngestJob,
    thumbPath: string,
    transcodePath: string
  ): Promise<TransformResult> {
    if (kind === "image") {
      await deps.transform.makeImageThumbnail(job.pendingPath, thumbPath, deps.thumbBox);
      return { mediaPath: job.pendingPath, duration: null };
    }

    let mediaPath = job.pendingPath;
    if (deps.transcodeVideo) {
      await deps.transform.transcodeToMp4(job.pendingPath, transcodePath);
      mediaPath = transcodePath;
    }
    const duration = await deps.transform.probeDuration(mediaPath);
    await deps.transform.extractFrame(
      mediaPath,
      thumbPath,
      deps.videoFrameSeconds,
      deps.thumbBox,
      duration
    );
    return { mediaPath, duration };
  }

  /**
   * Classify, transform from the pending file, then place the thumbnail and
   * the media. Moving the media out of the pending area is the last step,
   * so any earlier failure leaves the pending file where a retry finds it.
   */
  async function transformAndPlace(job: IngestJob, scratch: RunScratch): Promise<Placement> {
    const kind = classifyMedia(job.originalFilename);

    if (!(await isFile(job.pendingPath))) {
      throw new StorageError(`Pending file missing: ${path.basename(job.pendingPath)}`);
    }

    const storageName = storageNameFor(job.originalFilename);
    const thumbName = thumbNameFor(storageName);
    await fs.promises.mkdir(deps.stagingDir, { recursive: true });
    const thumbPath = path.join(deps.stagingDir, thumbName);
    const transcodePath = path.join(deps.stagingDir, `transcode_${storageName}`);
    scratch.staged.push(thumbPath, transcodePath);

    const work = transform(kind, job, thumbPath, transcodePath);
    scratch.transforming = work;
    const { mediaPath, duration } = await withTimeout(
      work,
      deps.transformTimeoutMs,
      `Processing ${job.originalFilename}`
    );

    const thumb: BlobRef = { backend, key: await deps.storage.put(thumbPath, thumbName) };
    scratch.placed.push(thumb);
    const file: BlobRef = { backend, key: await deps.storage.put(mediaPath, storageName) };

    return { file, thumb, duration, transcoded: mediaPath !== job.pendingPath };
  }

  async function run(job: IngestJob): Promise<void> {
    const record = deps.store.get(job.recordId);
    if (!record) {
      console.warn(`[ingest] ${job.recordId}: no such example; nothing to do.`);
      return;
    }
    if (!record.processing) {
      console.warn(`[ingest] ${job.recordId}: not awaiting processing; ignoring.`);
      return;
    }

    console.log(`[ingest] ${job.recordId}: processing ${job.originalFilename}`);
    const scratch: RunScratch = { staged: [], placed: [], transforming: null };

    let placement: Placement;
    try {
      placement = await transformAndPlace(job, scratch);
    } catch (err) {
      const message = errorMessage(err);
      if (failProcessing(deps.store, job.recordId, message)) {
        console.error(`[ingest] ${job.recordId}: failed: ${message}`);
      } else {
        console.warn(
          `[ingest] ${job.recordId}: failed (${message}) after the record was settled elsewhere; left as is.`
        );
      }
      await discard(scratch.placed);
      // A timed-out transform may still write its output; let it finish first
      if (scratch.transforming) await Promise.allSettled([scratch.transforming]);
      await removeStaged(scratch.staged);
      return;
    }

    // Settle the record before any further await
    const settled = completeProcessing(deps.store, job.recordId, {
      file: placement.file,
      thumb: placement.thumb,
      duration: placement.duration,
    });
    await removeStaged(scratch.staged);

    if (!settled) {
      console.warn(
        `[ingest] ${job.recordId}: example deleted or settled during processing; discarding ${placement.file.key}.`
      );
      await discard([placement.file, placement.thumb]);
      return;
    }

    if (placement.transcoded) {
      await removeStaged([job.pendingPath]);
    }
    console.log(`[ingest] ${job.recordId}: stored ${placement.file.key}`);
  }

  async function processJob(job: IngestJob): Promise<void> {
    if (running.has(job.recordId)) {
      console.warn(`[ingest] ${job.recordId}: a run is already in progress; ignoring duplicate.`);
      return;
    }

    running.add(job.recordId);
    try {
      await run(job);
    } catch (err) {
      // Only a failing store write gets here; the caller still must not see it
      console.error(`[ingest] ${job.recordId}: could not record outcome: ${errorMessage(err)}`);
    } finally {
      running.delete(job.recordId);
    }
  }

  return {
    process: processJob,
    inFlight: () => [...running],
  };
}
