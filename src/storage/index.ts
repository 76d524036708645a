import type { AppConfig } from "../config";
import { LocalBlobStorage } from "./localStorage";
import { S3BlobStorage } from "./s3Storage";
import type { BlobStorage, BlobStorageMap } from "./types";

export type { BlobStorage, BlobStorageMap } from "./types";
export { LocalBlobStorage, moveFile } from "./localStorage";
export { S3BlobStorage } from "./s3Storage";

export interface ConfiguredStorage {
  /** Receives newly processed blobs. */
  active: BlobStorage;
  /** Every backend that existing records may reference. */
  backends: BlobStorageMap;
}

/**
 * Local storage is always available so records written before a switch to
 * S3 stay reachable; S3 is added whenever a bucket is configured.
 */
export function createBlobStorages(config: AppConfig): ConfiguredStorage {
  const local = new LocalBlobStorage(config.uploadDir, config.publicBaseUrl);
  const s3 = config.s3 ? new S3BlobStorage(config.s3) : null;

  const backends: BlobStorageMap = { local };
  if (s3) backends.s3 = s3;

  if (config.storage === "s3") {
    if (!s3) {
      throw new Error("SHOWCASE_STORAGE=s3 requires S3_BUCKET.");
    }
    return { active: s3, backends };
  }
  return { active: local, backends };
}
