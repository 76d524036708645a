import * as fs from "fs";
import * as path from "path";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  DeleteObjectCommand,
  HeadObjectCommand,
} from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { StorageError, errorMessage } from "../lib/errors";
import { assertSafeFilename } from "../lib/pathSafety";
import { contentTypeFor } from "../lib/mediaTypes";
import type { BlobStorage } from "./types";

export interface S3StorageOptions {
  bucket: string;
  /** Prepended to every object name, e.g. "examples/". */
  prefix: string;
  region: string;
  endpoint?: string;
  forcePathStyle?: boolean;
}

function isNotFound(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if (err.name === "NotFound" || err.name === "NoSuchKey") return true;
  if ("$metadata" in err && typeof err.$metadata === "object" && err.$metadata !== null) {
    return "httpStatusCode" in err.$metadata && err.$metadata.httpStatusCode === 404;
  }
  return false;
}

/**
 * Blobs as objects in one bucket. The key is the prefixed object name;
 * URLs are presigned GETs minted per request.
 */
export class S3BlobStorage implements BlobStorage {
  readonly backend = "s3" as const;
  private readonly s3: S3Client;

  constructor(private readonly options: S3StorageOptions) {
    // Credentials come from the default provider chain (env, profile, role)
    this.s3 = new S3Client({
      region: options.region,
      endpoint: options.endpoint || undefined,
      forcePathStyle: options.forcePathStyle ?? false,
    });
  }

  get bucket(): string {
    return this.options.bucket;
  }

  async put(localPath: string, name: string): Promise<string> {
    assertSafeFilename(name, "Blob name");
    const key = `${this.options.prefix}${name}`;

    try {
      const body = await fs.promises.readFile(localPath);
      await this.s3.send(
        new PutObjectCommand({
          Bucket: this.options.bucket,
          Key: key,
          Body: body,
          ContentType: contentTypeFor(name),
        })
      );
    } catch (err) {
      throw new StorageError(
        `Cannot upload ${path.basename(localPath)} to s3://${this.options.bucket}/${key}: ${errorMessage(err)}`,
        err
      );
    }

    // The object is the copy of record now; a leftover local file is only litter.
    await fs.promises.unlink(localPath).catch((err: unknown) => {
      console.warn(`[storage] Uploaded ${key} but could not remove ${localPath}: ${errorMessage(err)}`);
    });
    return key;
  }

  async getUrl(key: string, expirySeconds: number): Promise<string> {
    const cmd = new GetObjectCommand({ Bucket: this.options.bucket, Key: key });
    return getSignedUrl(this.s3, cmd, { expiresIn: expirySeconds });
  }

  async delete(key: string): Promise<void> {
    try {
      await this.s3.send(new DeleteObjectCommand({ Bucket: this.options.bucket, Key: key }));
    } catch (err) {
      throw new StorageError(
        `Cannot delete s3://${this.options.bucket}/${key}: ${errorMessage(err)}`,
        err
      );
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.s3.send(new HeadObjectCommand({ Bucket: this.options.bucket, Key: key }));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw new StorageError(
        `Cannot inspect s3://${this.options.bucket}/${key}: ${errorMessage(err)}`,
        err
      );
    }
  }

  async fetchTo(key: string, destPath: string): Promise<void> {
    try {
      const res = await this.s3.send(
        new GetObjectCommand({ Bucket: this.options.bucket, Key: key })
      );
      if (!res.Body) {
        throw new Error("empty response body");
      }
      if (!(res.Body instanceof Readable)) {
        throw new Error("response body is not a stream");
      }
      await fs.promises.mkdir(path.dirname(destPath), { recursive: true });
      await pipeline(res.Body, fs.createWriteStream(destPath));
    } catch (err) {
      await fs.promises.rm(destPath, { force: true });
      throw new StorageError(
        `Cannot fetch s3://${this.options.bucket}/${key}: ${errorMessage(err)}`,
        err
      );
    }
  }
}
