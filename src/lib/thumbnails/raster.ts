import sharp from "sharp";
import { readFile } from "fs/promises";
import { DecodeFailedError, EncodeOrWriteFailedError } from "./errors";
import type { MediaType } from "./types";

export interface DecodedImage {
  readonly sourcePath: string;
  readonly mediaType: MediaType;
  readonly width: number;
  readonly height: number;
  /** Encoded source bytes; pixels are read when resampling */
  readonly data: Buffer;
}

interface CanvasLayer {
  data: Buffer;
  left: number;
  top: number;
  blend: boolean;
}

/**
 * Destination image. Starts opaque black with alpha blending on and alpha
 * saving off. The blend flag is captured per resample call, so it has to be
 * set before drawing to have an effect.
 */
export class Canvas {
  blend = true;
  saveAlpha = false;
  readonly layers: CanvasLayer[] = [];

  constructor(
    readonly width: number,
    readonly height: number
  ) {}
}

/**
 * Raster decode/resample/encode engine used on cache misses.
 * Quality is 1-100 for JPEG; for PNG the same argument is the 1-9 compression level.
 */
export interface RasterEngine {
  decode(path: string, mediaType: MediaType): Promise<DecodedImage>;
  newCanvas(width: number, height: number): Canvas;
  setAlphaMode(canvas: Canvas, blend: boolean, saveAlpha: boolean): void;
  resample(
    canvas: Canvas,
    source: DecodedImage,
    dstX: number,
    dstY: number,
    srcX: number,
    srcY: number,
    dstW: number,
    dstH: number,
    srcW: number,
    srcH: number
  ): Promise<void>;
  encode(canvas: Canvas, path: string, mediaType: MediaType, qualityOrCompression: number): Promise<void>;
}

/**
 * RasterEngine backed by sharp (libvips).
 */
export class SharpRasterEngine implements RasterEngine {
  async decode(path: string, mediaType: MediaType): Promise<DecodedImage> {
    try {
      const data = await readFile(path);
      const metadata = await sharp(data, { limitInputPixels: 268402689 }).metadata();

      if (!metadata.width || !metadata.height) {
        throw new Error("Image has no dimensions");
      }

      return { sourcePath: path, mediaType, width: metadata.width, height: metadata.height, data };
    } catch (err) {
      throw new DecodeFailedError(path, err);
    }
  }

  newCanvas(width: number, height: number): Canvas {
    return new Canvas(width, height);
  }

  setAlphaMode(canvas: Canvas, blend: boolean, saveAlpha: boolean): void {
    canvas.blend = blend;
    canvas.saveAlpha = saveAlpha;
  }

  async resample(
    canvas: Canvas,
    source: DecodedImage,
    dstX: number,
    dstY: number,
    srcX: number,
    srcY: number,
    dstW: number,
    dstH: number,
    srcW: number,
    srcH: number
  ): Promise<void> {
    try {
      const data = await sharp(source.data, { limitInputPixels: 268402689 })
        .extract({ left: srcX, top: srcY, width: srcW, height: srcH })
        .resize(dstW, dstH, { fit: "fill" })
        .ensureAlpha()
        .png()
        .toBuffer();

      canvas.layers.push({ data, left: dstX, top: dstY, blend: canvas.blend });
    } catch (err) {
      throw new DecodeFailedError(source.sourcePath, err);
    }
  }

  async encode(canvas: Canvas, path: string, mediaType: MediaType, qualityOrCompression: number): Promise<void> {
    try {
      const flattened = await sharp({
        create: {
          width: canvas.width,
          height: canvas.height,
          channels: 4,
          background: { r: 0, g: 0, b: 0, alpha: 1 },
        },
      })
        .composite(
          canvas.layers.map((layer) => ({
            input: layer.data,
            left: layer.left,
            top: layer.top,
            // Without blending the layer replaces what is below, alpha included
            blend: layer.blend ? ("over" as const) : ("source" as const),
          }))
        )
        .png()
        .toBuffer();

      let output = sharp(flattened);
      if (!canvas.saveAlpha) {
        output = output.removeAlpha();
      }

      if (mediaType === "image/png") {
        await output.png({ compressionLevel: qualityOrCompression }).toFile(path);
      } else {
        await output.jpeg({ quality: qualityOrCompression }).toFile(path);
      }
    } catch (err) {
      throw new EncodeOrWriteFailedError(path, err);
    }
  }
}
