import sharp from "sharp";
import { TranscodeFailedError } from "./errors";

export interface TranscodeOptions {
  /** WebP quality (1-100) */
  quality: number;
}

/**
 * Converts an encoded raster file to WebP.
 * Implementations reject with TranscodeFailedError.
 */
export interface Transcoder {
  convert(srcPath: string, dstPath: string, options: TranscodeOptions): Promise<void>;
}

export class SharpWebpTranscoder implements Transcoder {
  async convert(srcPath: string, dstPath: string, options: TranscodeOptions): Promise<void> {
    try {
      await sharp(srcPath).webp({ quality: options.quality }).toFile(dstPath);
    } catch (err) {
      throw new TranscodeFailedError(srcPath, err);
    }
  }
}
