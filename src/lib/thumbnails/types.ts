import type { TranscodeFailedError } from "./errors";

/** Source raster kinds accepted by the pipeline. */
export type MediaType = "image/jpeg" | "image/png";

/** Extensions of committed cache entries. */
export type EntryFormat = "jpg" | "png" | "webp";

export type NativeFormat = Exclude<EntryFormat, "webp">;

export const NATIVE_FORMAT: Record<MediaType, NativeFormat> = {
  "image/jpeg": "jpg",
  "image/png": "png",
};

/** Source rectangle sampled on a cache miss. */
export interface CropRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface CropPlan {
  /** Output width, always the requested width */
  width: number;
  /** Output height, requested or derived from the source aspect ratio */
  height: number;
  crop: CropRect;
}

/**
 * Per-request context. Built once after validation and passed through
 * every stage instead of living on the pipeline instance.
 */
export interface ThumbnailRequest {
  readonly sourcePath: string;
  readonly mediaType: MediaType;
  readonly format: NativeFormat;
  readonly width: number;
  readonly height?: number;
  readonly key: string;
}

export type ThumbnailFailure = "not_found" | "unsupported_type" | "invalid_dimensions";

export type ThumbnailResult =
  | {
      success: true;
      path: string;
      cacheHit: boolean;
      transcodeError?: TranscodeFailedError;
    }
  | {
      success: false;
      error: ThumbnailFailure;
      message: string;
    };
