// Types
export {
  NATIVE_FORMAT,
  type MediaType,
  type EntryFormat,
  type NativeFormat,
  type CropRect,
  type CropPlan,
  type ThumbnailRequest,
  type ThumbnailFailure,
  type ThumbnailResult,
} from "./types";

// Errors
export {
  ThumbnailError,
  CacheDirCreationFailedError,
  DecodeFailedError,
  EncodeOrWriteFailedError,
  TranscodeFailedError,
  InvalidConfigError,
  type ThumbnailErrorCode,
} from "./errors";

// Configuration
export { resolveConfig, getDefaultCachePath, type ThumbnailerConfig } from "./config";

// Keys and geometry
export { deriveCacheKey, hashSourceName, sanitizeName, parseCacheEntryName } from "./keys";
export { computeCrop } from "./crop";

// Storage
export { CacheStore, writeAtomically, type Renderer } from "./store";

// Collaborators
export { Canvas, SharpRasterEngine, type RasterEngine, type DecodedImage } from "./raster";
export { SharpWebpTranscoder, type Transcoder, type TranscodeOptions } from "./transcoder";
export { detectMediaType, sniffMediaType } from "./media-type";

// Pipeline
export {
  ThumbnailPipeline,
  createThumbnailer,
  type ThumbnailPipelineOptions,
  type CreateThumbnailerOptions,
} from "./pipeline";
