import type { BoundingBox } from "../contracts";
import { makeImageThumbnail, type ThumbnailInfo } from "./thumbnail";
import {
  extractFrame,
  probeDuration,
  transcodeToMp4,
  type FfmpegTools,
} from "./video";

export { makeImageThumbnail, type ThumbnailInfo } from "./thumbnail";
export {
  clampSeek,
  extractFrame,
  probeDuration,
  transcodeToMp4,
  DEFAULT_TOOLS,
  type FfmpegTools,
} from "./video";

/**
 * Stateless operations on files at rest. The pipeline depends on this
 * interface so tests can stand in for ffmpeg.
 */
export interface MediaTransform {
  makeImageThumbnail(imagePath: string, destPath: string, box: BoundingBox): Promise<ThumbnailInfo>;
  probeDuration(videoPath: string): Promise<number | null>;
  extractFrame(
    videoPath: string,
    destPath: string,
    atSeconds: number,
    box: BoundingBox,
    knownDuration?: number | null
  ): Promise<void>;
  transcodeToMp4(inputPath: string, destPath: string): Promise<void>;
}

/** sharp for images, fluent-ffmpeg with the given binaries for video. */
export function createMediaTransform(tools: FfmpegTools): MediaTransform {
  return {
    makeImageThumbnail,
    probeDuration: (videoPath) => probeDuration(videoPath, tools),
    extractFrame: (videoPath, destPath, atSeconds, box, knownDuration = null) =>
      extractFrame(videoPath, destPath, atSeconds, box, knownDuration, tools),
    transcodeToMp4: (inputPath, destPath) => transcodeToMp4(inputPath, destPath, tools),
  };
}
