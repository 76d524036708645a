import sharp from "sharp";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import Database from "better-sqlite3";
import { ensureSchema } from "../src/db/schema";
import { SqliteRecordStore } from "../src/store/sqliteStore";
import { EXAMPLES, type ExampleStore } from "../src/store/examples";
import { makeImageThumbnail, type MediaTransform } from "../src/media";
import { LocalBlobStorage } from "../src/storage/localStorage";
import { DecodeError } from "../src/lib/errors";
import type { BoundingBox } from "../src/contracts";

/**
 * Create a temporary directory. Caller is responsible for cleanup.
 */
export function makeTempDir(prefix = "showcase-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanupDirs(dirs: string[]): void {
  for (const dir of dirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  dirs.length = 0;
}

/**
 * A solid-colour PNG of the given size.
 */
export async function pngBuffer(width: number, height: number): Promise<Buffer> {
  return sharp({
    create: {
      width,
      height,
      channels: 3,
      background: { r: 34, g: 139, b: 34 },
    },
  })
    .png()
    .toBuffer();
}

export async function writePng(filePath: string, width: number, height: number): Promise<void> {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, await pngBuffer(width, height));
}

/** An examples store over a fresh in-memory SQLite database. */
export function memoryStore(): { store: ExampleStore; db: Database.Database } {
  const db = new Database(":memory:");
  ensureSchema(db);
  return { store: new SqliteRecordStore(db, EXAMPLES), db };
}

export interface FakeVideoOptions {
  /** What probeDuration reports */
  duration?: number | null;
  /** Make extractFrame fail with this error */
  frameError?: Error;
  /** Make transcodeToMp4 fail with this error */
  transcodeError?: Error;
  /** Delay before extractFrame settles, in ms */
  frameDelayMs?: number;
}

export interface TransformCalls {
  thumbnails: string[];
  probes: string[];
  frames: Array<{ videoPath: string; atSeconds: number; knownDuration: number | null }>;
  transcodes: string[];
}

/**
 * Real sharp thumbnails for images; ffmpeg replaced by a stand-in that
 * writes a small JPEG frame, so tests need no ffmpeg binary.
 */
export function fakeTransform(options: FakeVideoOptions = {}): {
  transform: MediaTransform;
  calls: TransformCalls;
} {
  const calls: TransformCalls = { thumbnails: [], probes: [], frames: [], transcodes: [] };

  const transform: MediaTransform = {
    async makeImageThumbnail(imagePath: string, destPath: string, box: BoundingBox) {
      calls.thumbnails.push(imagePath);
      return makeImageThumbnail(imagePath, destPath, box);
    },
    async probeDuration(videoPath: string) {
      calls.probes.push(videoPath);
      return options.duration === undefined ? 12.5 : options.duration;
    },
    async extractFrame(videoPath, destPath, atSeconds, box, knownDuration = null) {
      calls.frames.push({ videoPath, atSeconds, knownDuration });
      if (options.frameDelayMs) {
        await new Promise((resolve) => setTimeout(resolve, options.frameDelayMs));
      }
      if (options.frameError) throw options.frameError;
      if (!fs.existsSync(videoPath)) {
        throw new DecodeError(`Cannot read video ${path.basename(videoPath)}`);
      }
      const frame = await sharp({
        create: { width: box.width, height: box.height, channels: 3, background: { r: 0, g: 0, b: 0 } },
      })
        .jpeg()
        .toBuffer();
      fs.writeFileSync(destPath, frame);
    },
    async transcodeToMp4(inputPath: string, destPath: string) {
      calls.transcodes.push(inputPath);
      if (options.transcodeError) throw options.transcodeError;
      fs.copyFileSync(inputPath, destPath);
    },
  };

  return { transform, calls };
}

/**
 * Local storage whose `put` can be made to fail for chosen names.
 */
export class FlakyLocalStorage extends LocalBlobStorage {
  failPut: (name: string) => boolean = () => false;
  readonly deleted: string[] = [];

  async put(localPath: string, name: string): Promise<string> {
    if (this.failPut(name)) {
      throw new Error(`Injected put failure for ${name}`);
    }
    return super.put(localPath, name);
  }

  async delete(key: string): Promise<void> {
    this.deleted.push(key);
    return super.delete(key);
  }
}

/** Names of the regular files directly inside a directory ([] if absent). */
export function listFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();
}
