import * as fs from "fs";
import * as path from "path";
import { StorageError, errorMessage } from "../lib/errors";
import { resolveWithin } from "../lib/pathSafety";
import type { BlobStorage } from "./types";

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Move a file, falling back to copy + unlink when source and destination
 * sit on different devices.
 */
export async function moveFile(src: string, dest: string): Promise<void> {
  try {
    await fs.promises.rename(src, dest);
  } catch (err) {
    if (errorCode(err) !== "EXDEV") throw err;
    await fs.promises.copyFile(src, dest);
    await fs.promises.unlink(src);
  }
}

/**
 * Blobs as files directly under a root directory. The key is the file
 * name; URLs point at the static `/uploads/` route.
 */
export class LocalBlobStorage implements BlobStorage {
  readonly backend = "local" as const;

  constructor(
    private readonly root: string,
    private readonly publicBaseUrl: string = ""
  ) {}

  async put(localPath: string, name: string): Promise<string> {
    const dest = resolveWithin(this.root, name, "Blob name");
    try {
      await fs.promises.mkdir(this.root, { recursive: true });
      await moveFile(localPath, dest);
    } catch (err) {
      throw new StorageError(
        `Cannot move ${path.basename(localPath)} into storage: ${errorMessage(err)}`,
        err
      );
    }
    return name;
  }

  async getUrl(key: string, _expirySeconds: number): Promise<string> {
    resolveWithin(this.root, key, "Blob key");
    const base = this.publicBaseUrl.replace(/\/+$/, "");
    return `${base}/uploads/${encodeURIComponent(key)}`;
  }

  async delete(key: string): Promise<void> {
    const target = resolveWithin(this.root, key, "Blob key");
    try {
      await fs.promises.unlink(target);
    } catch (err) {
      if (errorCode(err) === "ENOENT") return;
      throw new StorageError(`Cannot delete ${key}: ${errorMessage(err)}`, err);
    }
  }

  async exists(key: string): Promise<boolean> {
    const target = resolveWithin(this.root, key, "Blob key");
    try {
      const stat = await fs.promises.stat(target);
      return stat.isFile();
    } catch {
      return false;
    }
  }

  async fetchTo(key: string, destPath: string): Promise<void> {
    const source = resolveWithin(this.root, key, "Blob key");
    try {
      await fs.promises.mkdir(path.dirname(destPath), { recursive: true });
      await fs.promises.copyFile(source, destPath);
    } catch (err) {
      throw new StorageError(`Cannot fetch ${key}: ${errorMessage(err)}`, err);
    }
  }
}
