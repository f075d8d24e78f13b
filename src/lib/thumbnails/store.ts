import { mkdirSync, statSync } from "fs";
import { readdir, rename, stat, unlink } from "fs/promises";
import { randomUUID } from "crypto";
import { basename, dirname, join } from "path";
import { cacheLog } from "@/lib/logger";
import { CacheDirCreationFailedError, EncodeOrWriteFailedError, ThumbnailError, errorMessage } from "./errors";
import { parseCacheEntryName } from "./keys";
import type { EntryFormat, NativeFormat } from "./types";

/** Writes the file at the given path; the path is not the final entry path. */
export type Renderer = (stagingPath: string) => Promise<void>;

/** Staging files younger than this may belong to a live writer. */
const STAGING_GRACE_MS = 10 * 60 * 1000;

const STAGING_NAME_PATTERN = /^\..+\.tmp$/;

function isStagingName(fileName: string): boolean {
  return STAGING_NAME_PATTERN.test(fileName);
}

export async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw err;
  }
}

async function isStaleFile(path: string, staleBefore: number): Promise<boolean> {
  try {
    return (await stat(path)).mtimeMs < staleBefore;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw err;
  }
}

/**
 * Delete a file, treating "already gone" as success.
 * Other failures are logged and skipped. Returns whether a file was removed.
 */
export async function removeFile(path: string): Promise<boolean> {
  try {
    await unlink(path);
    return true;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
    cacheLog.warn({ path, error: errorMessage(err) }, "Could not delete file");
    return false;
  }
}

/**
 * Render into a hidden staging file beside the target, then rename it over
 * the target. Readers see either the old file, no file, or the complete new one.
 */
export async function writeAtomically(targetPath: string, render: Renderer): Promise<string> {
  const stagingPath = join(dirname(targetPath), `.${basename(targetPath)}.${randomUUID()}.tmp`);

  try {
    await render(stagingPath);
    await rename(stagingPath, targetPath);
    return targetPath;
  } catch (err) {
    await removeFile(stagingPath);
    throw err;
  }
}

/**
 * Disk-backed cache of generated thumbnails.
 * Structure: {cachePath}/{key}.{jpg|png|webp}
 *
 * Only this class writes into the cache directory. File presence is the
 * whole index; there is no manifest.
 */
export class CacheStore {
  readonly cachePath: string;

  constructor(cachePath: string) {
    this.cachePath = cachePath;

    try {
      mkdirSync(cachePath, { recursive: true, mode: 0o755 });
      if (!statSync(cachePath).isDirectory()) {
        throw new Error("Cache path exists and is not a directory");
      }
    } catch (err) {
      throw new CacheDirCreationFailedError(cachePath, err);
    }
  }

  entryPath(key: string, format: EntryFormat): string {
    return join(this.cachePath, `${key}.${format}`);
  }

  /**
   * Find the committed entry for a key.
   * A WebP entry wins when `preferWebp` is set; otherwise the native format is used.
   */
  async lookup(key: string, nativeFormat: NativeFormat, preferWebp: boolean): Promise<string | null> {
    if (preferWebp) {
      const webpPath = this.entryPath(key, "webp");
      if (await isRegularFile(webpPath)) return webpPath;
    }

    const nativePath = this.entryPath(key, nativeFormat);
    if (await isRegularFile(nativePath)) return nativePath;

    return null;
  }

  /**
   * Persist a new entry produced by `render`.
   * The entry becomes visible only once it is completely written.
   */
  async write(key: string, format: EntryFormat, render: Renderer): Promise<string> {
    const targetPath = this.entryPath(key, format);

    try {
      await writeAtomically(targetPath, render);
    } catch (err) {
      if (err instanceof ThumbnailError) throw err;
      throw new EncodeOrWriteFailedError(targetPath, err);
    }

    cacheLog.debug({ key, format, path: targetPath }, "Cache entry written");
    return targetPath;
  }

  /**
   * Delete cache files.
   *
   * With a source hash, only the committed size variants of that source are
   * removed. Without, every regular file goes, except staging files written
   * within STAGING_GRACE_MS, which may still be renamed into place.
   *
   * @returns Number of files deleted
   */
  async flush(hash?: string): Promise<number> {
    const entries = await readdir(this.cachePath, { withFileTypes: true });
    const staleBefore = Date.now() - STAGING_GRACE_MS;
    let deleted = 0;

    for (const entry of entries) {
      if (!entry.isFile()) continue;
      const path = join(this.cachePath, entry.name);

      if (hash !== undefined) {
        if (parseCacheEntryName(entry.name)?.hash !== hash) continue;
      } else if (isStagingName(entry.name) && !(await isStaleFile(path, staleBefore))) {
        continue;
      }

      if (await removeFile(path)) {
        deleted++;
      }
    }

    cacheLog.info({ hash: hash ?? null, deleted }, hash ? "Flushed source variants" : "Flushed cache");
    return deleted;
  }
}
