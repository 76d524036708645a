import type { BlobBackend } from "../contracts";

/**
 * Where processed media and thumbnails live. Keys are opaque to callers:
 * persist what `put` returns and hand it back later.
 */
export interface BlobStorage {
  readonly backend: BlobBackend;
  /**
   * Move a local file into storage under `name`. The local file is gone
   * once this resolves. Returns the key to persist.
   */
  put(localPath: string, name: string): Promise<string>;
  /** A URL for the blob; signed URLs expire after `expirySeconds`. */
  getUrl(key: string, expirySeconds: number): Promise<string>;
  /** Deleting a blob that is already gone is not an error. */
  delete(key: string): Promise<void>;
  exists(key: string): Promise<boolean>;
  /** Copy the blob to a local path, leaving it in storage. */
  fetchTo(key: string, destPath: string): Promise<void>;
}

export type BlobStorageMap = Partial<Record<BlobBackend, BlobStorage>>;
