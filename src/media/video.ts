import * as fs from "fs";
import * as path from "path";
import ffmpeg from "fluent-ffmpeg";
import type { FfprobeData, FfmpegCommand } from "fluent-ffmpeg";
import {
  DecodeError,
  ProbeFailure,
  SeekError,
  TranscodeError,
  errorMessage,
} from "../lib/errors";
import type { BoundingBox } from "../contracts";

/** Binary locations and the kill timeout applied to every ffmpeg run. */
export interface FfmpegTools {
  ffmpegPath: string | null;
  ffprobePath: string | null;
  /** ffmpeg is killed after this many seconds; 0 disables. */
  killTimeoutSeconds: number;
}

export const DEFAULT_TOOLS: FfmpegTools = {
  ffmpegPath: null,
  ffprobePath: null,
  killTimeoutSeconds: 0,
};

function command(input: string, tools: FfmpegTools): FfmpegCommand {
  const cmd =
    tools.killTimeoutSeconds > 0
      ? ffmpeg(input, { timeout: tools.killTimeoutSeconds })
      : ffmpeg(input);
  if (tools.ffmpegPath) cmd.setFfmpegPath(tools.ffmpegPath);
  if (tools.ffprobePath) cmd.setFfprobePath(tools.ffprobePath);
  return cmd;
}

function runToEnd(cmd: FfmpegCommand): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    cmd
      .on("end", () => resolve())
      .on("error", (err: Error) => reject(err))
      .run();
  });
}

async function nonEmptyFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isFile() && stat.size > 0;
  } catch {
    return false;
  }
}

/**
 * Duration of a media file in seconds, or null when it cannot be told.
 * Never throws: a malformed file, a missing codec or a missing ffprobe
 * binary all mean "unknown".
 */
export async function probeDuration(
  videoPath: string,
  tools: FfmpegTools = DEFAULT_TOOLS
): Promise<number | null> {
  const name = path.basename(videoPath);
  try {
    const data = await new Promise<FfprobeData>((resolve, reject) => {
      command(videoPath, tools).ffprobe((error: Error | null, metadata: FfprobeData) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(metadata);
      });
    });
    const duration = Number(data.format.duration);
    if (!Number.isFinite(duration) || duration <= 0) {
      throw new ProbeFailure(`No usable duration reported for ${name}`);
    }
    return duration;
  } catch (err) {
    const failure =
      err instanceof ProbeFailure
        ? err
        : new ProbeFailure(`ffprobe failed for ${name}: ${errorMessage(err)}`);
    console.warn(`[media] ${failure.message}; duration unknown.`);
    return null;
  }
}

/**
 * Keep a seek offset inside the clip. Offsets at or past the end of a clip
 * of known length fall back to its midpoint.
 */
export function clampSeek(atSeconds: number, durationSeconds: number | null): number {
  const at = Math.max(0, atSeconds);
  if (durationSeconds === null || at < durationSeconds) return at;
  return durationSeconds / 2;
}

/**
 * Grab one frame at `atSeconds` as a JPEG that fits inside `box`.
 * DecodeError when ffmpeg cannot read the input, SeekError when it ran but
 * produced no frame.
 */
export async function extractFrame(
  videoPath: string,
  destPath: string,
  atSeconds: number,
  box: BoundingBox,
  knownDuration: number | null = null,
  tools: FfmpegTools = DEFAULT_TOOLS
): Promise<void> {
  const name = path.basename(videoPath);
  const seek = clampSeek(atSeconds, knownDuration);
  await fs.promises.rm(destPath, { force: true });

  try {
    await runToEnd(
      command(videoPath, tools)
        .seekInput(seek)
        .frames(1)
        .videoFilters(
          `scale=${box.width}:${box.height}:force_original_aspect_ratio=decrease`
        )
        .outputOptions(["-q:v", "3"])
        .output(destPath)
    );
  } catch (err) {
    await fs.promises.rm(destPath, { force: true });
    throw new DecodeError(`Cannot decode video ${name}: ${errorMessage(err)}`);
  }

  if (!(await nonEmptyFile(destPath))) {
    throw new SeekError(`No frame at ${seek}s in ${name}; the clip may be shorter.`);
  }
}

/**
 * Re-encode to H.264/AAC in an mp4 container that starts playing before it
 * has fully downloaded.
 */
export async function transcodeToMp4(
  inputPath: string,
  destPath: string,
  tools: FfmpegTools = DEFAULT_TOOLS
): Promise<void> {
  const name = path.basename(inputPath);
  try {
    await runToEnd(
      command(inputPath, tools)
        .videoCodec("libx264")
        .audioCodec("aac")
        .outputOptions([
          "-preset", "medium",
          "-crf", "23",
          "-pix_fmt", "yuv420p",
          "-movflags", "+faststart",
        ])
        .format("mp4")
        .output(destPath)
    );
  } catch (err) {
    await fs.promises.rm(destPath, { force: true });
    throw new TranscodeError(`Cannot transcode ${name}: ${errorMessage(err)}`);
  }

  if (!(await nonEmptyFile(destPath))) {
    throw new TranscodeError(`Transcoding ${name} produced no output.`);
  }
}
