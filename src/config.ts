import * as path from "path";
import type { BlobBackend, BoundingBox } from "./contracts";

export type StoreKind = "sqlite" | "json";
export type NotifyTransport = "console" | "telegram";

export interface S3Config {
  bucket: string;
  region: string;
  /** Custom endpoint for S3-compatible stores (MinIO, R2). */
  endpoint?: string;
  forcePathStyle: boolean;
  /** Object name prefix, e.g. "examples/". */
  prefix: string;
}

export interface AppConfig {
  /** Directory holding the JSON collections and the SQLite file */
  dataDir: string;
  store: StoreKind;
  dbPath: string;
  /** Local blob root; `pending/` and `staging/` live beneath it */
  uploadDir: string;
  /** Backend that receives newly processed blobs */
  storage: BlobBackend;
  /** Prefix for local `/uploads/<key>` URLs (empty = site-relative) */
  publicBaseUrl: string;
  s3: S3Config | null;
  thumbBox: BoundingBox;
  /** Offset of the frame grabbed from videos, in seconds */
  videoFrameSeconds: number;
  transformTimeoutMs: number;
  transcodeVideo: boolean;
  concurrency: number;
  maxUploadBytes: number;
  urlExpirySeconds: number;
  ffmpegPath: string | null;
  ffprobePath: string | null;
  notify: NotifyTransport;
  telegramBotToken: string | null;
  /** Email address or Telegram chat id that hears about new uploads */
  adminContact: string | null;
}

type Env = Record<string, string | undefined>;

function optional(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function positiveNumber(env: Env, name: string, fallback: number): number {
  const raw = optional(env, name);
  if (raw === null) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`Invalid ${name}: must be a positive number, got "${raw}".`);
  }
  return n;
}

function positiveInteger(env: Env, name: string, fallback: number): number {
  const n = positiveNumber(env, name, fallback);
  if (!Number.isInteger(n)) {
    throw new Error(`Invalid ${name}: must be a whole number, got "${n}".`);
  }
  return n;
}

function flag(env: Env, name: string, fallback: boolean): boolean {
  const raw = optional(env, name);
  if (raw === null) return fallback;
  const lower = raw.toLowerCase();
  if (["1", "true", "yes", "on"].includes(lower)) return true;
  if (["0", "false", "no", "off"].includes(lower)) return false;
  throw new Error(`Invalid ${name}: expected true or false, got "${raw}".`);
}

function oneOf<T extends string>(
  env: Env,
  name: string,
  allowed: readonly T[],
  fallback: T
): T {
  const raw = optional(env, name);
  if (raw === null) return fallback;
  const match = allowed.find((a) => a === raw.toLowerCase());
  if (match === undefined) {
    throw new Error(`Invalid ${name}: "${raw}". Must be one of: ${allowed.join(", ")}`);
  }
  return match;
}

/**
 * Build the application config from environment variables.
 * Relative directories resolve against `cwd`.
 */
export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): AppConfig {
  const dataDir = path.resolve(cwd, optional(env, "SHOWCASE_DATA_DIR") ?? "data");
  const uploadDir = path.resolve(cwd, optional(env, "SHOWCASE_UPLOAD_DIR") ?? "uploads");
  const store = oneOf<StoreKind>(env, "SHOWCASE_STORE", ["sqlite", "json"], "sqlite");
  const dbPath = path.resolve(cwd, optional(env, "SHOWCASE_DB_PATH") ?? path.join(dataDir, "showcase.db"));
  const storage = oneOf<BlobBackend>(env, "SHOWCASE_STORAGE", ["local", "s3"], "local");

  const bucket = optional(env, "S3_BUCKET");
  if (storage === "s3" && bucket === null) {
    throw new Error("S3_BUCKET is not set. It is required when SHOWCASE_STORAGE=s3.");
  }
  const s3: S3Config | null = bucket
    ? {
        bucket,
        region: optional(env, "S3_REGION") ?? "us-east-1",
        endpoint: optional(env, "S3_ENDPOINT") ?? undefined,
        forcePathStyle: flag(env, "S3_FORCE_PATH_STYLE", false),
        prefix: env.S3_PREFIX ?? "examples/",
      }
    : null;

  const thumbEdge = positiveInteger(env, "SHOWCASE_THUMB_SIZE", 400);

  const notify = oneOf<NotifyTransport>(env, "SHOWCASE_NOTIFY", ["console", "telegram"], "console");
  const telegramBotToken = optional(env, "TELEGRAM_BOT_TOKEN");
  if (notify === "telegram" && telegramBotToken === null) {
    throw new Error(
      "TELEGRAM_BOT_TOKEN is not set. It is required when SHOWCASE_NOTIFY=telegram."
    );
  }

  return {
    dataDir,
    store,
    dbPath,
    uploadDir,
    storage,
    publicBaseUrl: optional(env, "SHOWCASE_PUBLIC_BASE_URL") ?? "",
    s3,
    thumbBox: { width: thumbEdge, height: thumbEdge },
    videoFrameSeconds: positiveNumber(env, "SHOWCASE_VIDEO_FRAME_SECONDS", 1),
    transformTimeoutMs: positiveNumber(env, "SHOWCASE_TRANSFORM_TIMEOUT_SECONDS", 120) * 1000,
    transcodeVideo: flag(env, "SHOWCASE_TRANSCODE_VIDEO", false),
    concurrency: positiveInteger(env, "SHOWCASE_CONCURRENCY", 1),
    maxUploadBytes: positiveInteger(env, "SHOWCASE_MAX_UPLOAD_BYTES", 40 * 1024 * 1024),
    urlExpirySeconds: positiveInteger(env, "SHOWCASE_URL_EXPIRY_SECONDS", 3600),
    ffmpegPath: optional(env, "FFMPEG_PATH"),
    ffprobePath: optional(env, "FFPROBE_PATH"),
    notify,
    telegramBotToken,
    adminContact: optional(env, "SHOWCASE_ADMIN_CONTACT"),
  };
}
