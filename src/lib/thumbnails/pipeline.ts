import pLimit from "p-limit";
import { basename, dirname, extname, join } from "path";
import { thumbnailLog } from "@/lib/logger";
import { addSpanEvent, withSpan, withSpanSync } from "@/lib/tracing";
import { resolveConfig, type ThumbnailerConfig } from "./config";
import { computeCrop } from "./crop";
import { EncodeOrWriteFailedError, TranscodeFailedError, errorMessage } from "./errors";
import { deriveCacheKey, hashSourceName } from "./keys";
import { pathExists, sniffMediaType } from "./media-type";
import { SharpRasterEngine, type DecodedImage, type RasterEngine } from "./raster";
import { CacheStore, isRegularFile, removeFile, writeAtomically, type Renderer } from "./store";
import { SharpWebpTranscoder, type Transcoder } from "./transcoder";
import {
  NATIVE_FORMAT,
  type CropPlan,
  type ThumbnailRequest,
  type ThumbnailResult,
} from "./types";

type ThumbnailRejection = Extract<ThumbnailResult, { success: false }>;
type ThumbnailServed = Extract<ThumbnailResult, { success: true }>;

interface TranscodeOutcome {
  path: string;
  error?: TranscodeFailedError;
}

export interface ThumbnailPipelineOptions {
  config: ThumbnailerConfig;
  engine: RasterEngine;
  transcoder: Transcoder;
}

// Persist attempts per miss; a flush can remove a fresh entry before it is served
const MAX_GENERATION_ATTEMPTS = 2;

function reject(error: ThumbnailRejection["error"], message: string): ThumbnailRejection {
  return { success: false, error, message };
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * On-demand thumbnail generator backed by a disk cache.
 *
 * A request is validated, keyed and looked up before anything expensive
 * happens. Only a miss decodes the source, crops it to fill the requested
 * box, encodes it and persists the result (optionally as WebP).
 */
export class ThumbnailPipeline {
  readonly store: CacheStore;
  private readonly config: ThumbnailerConfig;
  private readonly engine: RasterEngine;
  private readonly transcoder: Transcoder;
  private readonly generationLimit: ReturnType<typeof pLimit>;

  // In-flight generations by entry name ({key}.{format}), so concurrent misses share one run
  private readonly pendingGenerations = new Map<string, Promise<ThumbnailServed>>();

  private _lastTranscodeError: TranscodeFailedError | null = null;

  constructor(options: ThumbnailPipelineOptions) {
    this.config = options.config;
    this.engine = options.engine;
    this.transcoder = options.transcoder;
    this.store = new CacheStore(options.config.cachePath);
    this.generationLimit = pLimit(options.config.concurrency);
  }

  /** Most recent WebP conversion failure, kept for diagnostics. */
  get lastTranscodeError(): TranscodeFailedError | null {
    return this._lastTranscodeError;
  }

  /**
   * Get the thumbnail for a source, generating it on a cache miss.
   *
   * Missing sources, unsupported formats and invalid sizes are returned as
   * failed results. Decode and write failures are thrown.
   */
  async make(sourcePath: string, width: number, height?: number): Promise<ThumbnailResult> {
    return withSpan<ThumbnailResult>(
      "thumbnails.make",
      async (span) => {
        const checked = await this.validate(sourcePath, width, height);
        if ("success" in checked) {
          thumbnailLog.debug({ sourcePath, error: checked.error }, "Thumbnail request rejected");
          return checked;
        }

        span.setAttribute("thumbnail.key", checked.key);

        const cached = await this.store.lookup(checked.key, checked.format, this.config.webp);
        if (cached) {
          addSpanEvent("cache.hit");
          thumbnailLog.debug({ key: checked.key, path: cached }, "Cache hit");
          return { success: true, path: cached, cacheHit: true };
        }

        addSpanEvent("cache.miss");
        try {
          return await this.generateOnce(checked);
        } catch (err) {
          thumbnailLog.error({ key: checked.key, sourcePath, error: errorMessage(err) }, "Thumbnail generation failed");
          throw err;
        }
      },
      { "thumbnail.source": sourcePath, "thumbnail.width": width }
    );
  }

  /**
   * Delete cached thumbnails.
   * With a source path, every size variant of that source goes; without, the whole cache.
   *
   * @example pipeline.flush("images/photo.jpg") // photo.jpg at every size
   * @example pipeline.flush() // everything
   */
  async flush(sourcePath?: string): Promise<number> {
    return withSpan("thumbnails.flush", () =>
      this.store.flush(sourcePath !== undefined ? hashSourceName(sourcePath) : undefined)
    );
  }

  /**
   * Convert an image to WebP next to the original.
   * On failure the original path is returned and the error is kept in
   * `lastTranscodeError`.
   */
  async toWebP(path: string, deleteOriginal = true): Promise<string> {
    const target = join(dirname(path), `${basename(path, extname(path))}.webp`);
    const outcome = await this.transcode(path, deleteOriginal, (render) => writeAtomically(target, render));
    return outcome.path;
  }

  private async validate(
    sourcePath: string,
    width: number,
    height?: number
  ): Promise<ThumbnailRequest | ThumbnailRejection> {
    if (!isPositiveInteger(width) || (height !== undefined && !isPositiveInteger(height))) {
      return reject("invalid_dimensions", "Width and height must be positive integers");
    }

    if (!(await pathExists(sourcePath))) {
      return reject("not_found", "Image not found");
    }

    const mediaType = await sniffMediaType(sourcePath);
    if (!mediaType) {
      return reject("unsupported_type", "Not a valid JPG or PNG image");
    }

    return {
      sourcePath,
      mediaType,
      format: NATIVE_FORMAT[mediaType],
      width,
      height,
      key: deriveCacheKey(sourcePath, width, height),
    };
  }

  private async generateOnce(request: ThumbnailRequest): Promise<ThumbnailServed> {
    const entry = `${request.key}.${request.format}`;
    const existing = this.pendingGenerations.get(entry);
    if (existing) {
      thumbnailLog.debug({ key: request.key, format: request.format }, "Joining in-flight generation");
      return existing;
    }

    const promise = this.generationLimit(() => this.generate(request));
    this.pendingGenerations.set(entry, promise);

    try {
      return await promise;
    } finally {
      this.pendingGenerations.delete(entry);
    }
  }

  private async generate(request: ThumbnailRequest): Promise<ThumbnailServed> {
    // Another generation may have committed while this one was queued
    const cached = await this.store.lookup(request.key, request.format, this.config.webp);
    if (cached) {
      return { success: true, path: cached, cacheHit: true };
    }

    const source = await this.engine.decode(request.sourcePath, request.mediaType);
    const plan = withSpanSync("thumbnails.crop", () =>
      computeCrop(source.width, source.height, request.width, request.height)
    );

    let servedPath = "";
    for (let attempt = 1; attempt <= MAX_GENERATION_ATTEMPTS; attempt++) {
      const served = await this.persist(request, source, plan);
      if (await isRegularFile(served.path)) {
        return served;
      }

      servedPath = served.path;
      addSpanEvent("entry.vanished");
      thumbnailLog.warn({ key: request.key, path: served.path, attempt }, "Cache entry removed before it was served");
    }

    throw new EncodeOrWriteFailedError(servedPath, new Error("Cache entry was removed while generating"));
  }

  private async persist(request: ThumbnailRequest, source: DecodedImage, plan: CropPlan): Promise<ThumbnailServed> {
    const nativePath = await this.store.write(request.key, request.format, (stagingPath) =>
      this.render(request, source, plan, stagingPath)
    );

    thumbnailLog.info(
      { key: request.key, width: plan.width, height: plan.height, crop: plan.crop },
      "Thumbnail generated"
    );

    if (!this.config.webp) {
      return { success: true, path: nativePath, cacheHit: false };
    }

    const outcome = await this.transcode(nativePath, true, (render) =>
      this.store.write(request.key, "webp", render)
    );

    return outcome.error
      ? { success: true, path: outcome.path, cacheHit: false, transcodeError: outcome.error }
      : { success: true, path: outcome.path, cacheHit: false };
  }

  private async render(
    request: ThumbnailRequest,
    source: DecodedImage,
    plan: CropPlan,
    targetPath: string
  ): Promise<void> {
    const canvas = this.engine.newCanvas(plan.width, plan.height);

    // Must precede the resample, or transparency is lost
    if (request.mediaType === "image/png") {
      this.engine.setAlphaMode(canvas, false, true);
    }

    const { crop } = plan;
    await this.engine.resample(canvas, source, 0, 0, crop.x, crop.y, plan.width, plan.height, crop.width, crop.height);

    const level = request.mediaType === "image/png" ? this.config.pngCompression : this.config.jpegQuality;
    await this.engine.encode(canvas, targetPath, request.mediaType, level);
  }

  private async convert(srcPath: string, stagingPath: string): Promise<void> {
    try {
      await this.transcoder.convert(srcPath, stagingPath, { quality: this.config.jpegQuality });
    } catch (err) {
      throw err instanceof TranscodeFailedError ? err : new TranscodeFailedError(srcPath, err);
    }
  }

  private async transcode(
    srcPath: string,
    deleteOriginal: boolean,
    persist: (render: Renderer) => Promise<string>
  ): Promise<TranscodeOutcome> {
    let webpPath: string;

    try {
      webpPath = await persist((stagingPath) => this.convert(srcPath, stagingPath));
    } catch (err) {
      const error = err instanceof TranscodeFailedError ? err : new TranscodeFailedError(srcPath, err);
      this._lastTranscodeError = error;
      addSpanEvent("transcode.failed");
      thumbnailLog.warn({ path: srcPath, error: errorMessage(error.cause ?? error) }, "WebP conversion failed, keeping original");
      return { path: srcPath, error };
    }

    if (deleteOriginal) {
      await removeFile(srcPath);
    }

    return { path: webpPath };
  }
}

export interface CreateThumbnailerOptions extends Partial<ThumbnailerConfig> {
  engine?: RasterEngine;
  transcoder?: Transcoder;
}

/**
 * Build a pipeline from THUMBNAIL_* environment variables and explicit options.
 * Uses sharp for decoding, encoding and WebP conversion unless overridden.
 *
 * @throws InvalidConfigError when a setting is out of range
 * @throws CacheDirCreationFailedError when the cache directory cannot be created
 */
export function createThumbnailer(options: CreateThumbnailerOptions = {}): ThumbnailPipeline {
  const { engine, transcoder, ...overrides } = options;

  return new ThumbnailPipeline({
    config: resolveConfig(overrides),
    engine: engine ?? new SharpRasterEngine(),
    transcoder: transcoder ?? new SharpWebpTranscoder(),
  });
}
