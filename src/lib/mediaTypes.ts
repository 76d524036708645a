import { UnsupportedTypeError } from "./errors";
import type { MediaKind } from "../contracts";

// --- Allow-lists ---

/** Extensions the pipeline can turn into a thumbnail with sharp. */
export const IMAGE_EXTENSIONS: readonly string[] = ["jpg", "jpeg", "png", "gif", "bmp", "webp"];

/** Extensions the pipeline hands to ffmpeg. */
export const VIDEO_EXTENSIONS: readonly string[] = ["mp4"];

/** Extensions accepted at upload time; narrower than what the pipeline can handle. */
export const UPLOAD_EXTENSIONS: readonly string[] = ["png", "jpg", "jpeg", "gif", "mp4"];

/**
 * Lower-cased extension after the last dot, or "" when there is none.
 */
export function fileExtension(filename: string): string {
  const dot = filename.lastIndexOf(".");
  if (dot < 0 || dot === filename.length - 1) return "";
  return filename.slice(dot + 1).toLowerCase();
}

/**
 * Classify a filename by extension. Throws UnsupportedTypeError for anything
 * outside the image and video allow-lists.
 */
export function classifyMedia(filename: string): MediaKind {
  const ext = fileExtension(filename);
  if (IMAGE_EXTENSIONS.includes(ext)) return "image";
  if (VIDEO_EXTENSIONS.includes(ext)) return "video";
  throw new UnsupportedTypeError(ext);
}

const CONTENT_TYPES: Record<string, string> = {
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  png: "image/png",
  gif: "image/gif",
  bmp: "image/bmp",
  webp: "image/webp",
  mp4: "video/mp4",
};

export function contentTypeFor(filename: string): string {
  return CONTENT_TYPES[fileExtension(filename)] ?? "application/octet-stream";
}
