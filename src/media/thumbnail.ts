import * as fs from "fs";
import * as path from "path";
import sharp from "sharp";
import { DecodeError, errorMessage } from "../lib/errors";
import type { BoundingBox } from "../contracts";

export interface ThumbnailInfo {
  width: number;
  height: number;
}

// White matte for transparent PNG/GIF input, since thumbnails are JPEG.
const MATTE = { r: 255, g: 255, b: 255 };

/**
 * Write a JPEG thumbnail that fits inside `box`.
 * - Honors EXIF orientation
 * - Preserves aspect ratio, never upscales
 * - Animated input contributes its first frame
 */
export async function makeImageThumbnail(
  imagePath: string,
  destPath: string,
  box: BoundingBox
): Promise<ThumbnailInfo> {
  try {
    const info = await sharp(imagePath)
      .rotate()
      .resize({
        width: box.width,
        height: box.height,
        fit: "inside",
        withoutEnlargement: true,
      })
      .flatten({ background: MATTE })
      .jpeg({ quality: 82 })
      .toFile(destPath);
    return { width: info.width, height: info.height };
  } catch (err) {
    await fs.promises.rm(destPath, { force: true });
    throw new DecodeError(
      `Cannot decode image ${path.basename(imagePath)}: ${errorMessage(err)}`
    );
  }
}
