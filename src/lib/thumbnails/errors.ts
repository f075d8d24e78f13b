export type ThumbnailErrorCode = "cache_dir" | "decode" | "encode" | "transcode" | "config";

/**
 * Base class for failures raised by the thumbnail cache.
 * The underlying error, when there is one, is kept as `cause`.
 */
export class ThumbnailError extends Error {
  constructor(
    message: string,
    public readonly code: ThumbnailErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ThumbnailError";
  }
}

export class CacheDirCreationFailedError extends ThumbnailError {
  constructor(public readonly cachePath: string, cause?: unknown) {
    super(`Could not create cache folder: ${cachePath}`, "cache_dir", { cause });
    this.name = "CacheDirCreationFailedError";
  }
}

export class DecodeFailedError extends ThumbnailError {
  constructor(public readonly sourcePath: string, cause?: unknown) {
    super(`Could not decode image: ${sourcePath}`, "decode", { cause });
    this.name = "DecodeFailedError";
  }
}

export class EncodeOrWriteFailedError extends ThumbnailError {
  constructor(public readonly targetPath: string, cause?: unknown) {
    super(`Could not write thumbnail: ${targetPath}`, "encode", { cause });
    this.name = "EncodeOrWriteFailedError";
  }
}

/** Non-fatal: the pipeline keeps the native file and retains this error. */
export class TranscodeFailedError extends ThumbnailError {
  constructor(public readonly sourcePath: string, cause?: unknown) {
    super(`WebP conversion failed: ${sourcePath}`, "transcode", { cause });
    this.name = "TranscodeFailedError";
  }
}

export class InvalidConfigError extends ThumbnailError {
  constructor(public readonly issues: string[]) {
    super(`Invalid thumbnail configuration: ${issues.join("; ")}`, "config");
    this.name = "InvalidConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
