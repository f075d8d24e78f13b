import { vi } from 'vitest';
import { writeFile } from 'fs/promises';
import { Canvas, type DecodedImage, type RasterEngine } from '@/lib/thumbnails/raster';
import type { Transcoder } from '@/lib/thumbnails/transcoder';
import type { MediaType } from '@/lib/thumbnails/types';

/**
 * Raster engine stub: reports fixed source dimensions, records the order of
 * canvas operations, and writes a placeholder file on encode.
 */
export function createMockEngine(dimensions: { width: number; height: number } = { width: 4000, height: 3000 }) {
  const operations: string[] = [];

  const decode = vi.fn(async (path: string, mediaType: MediaType): Promise<DecodedImage> => {
    operations.push('decode');
    return { sourcePath: path, mediaType, width: dimensions.width, height: dimensions.height, data: Buffer.alloc(0) };
  });

  const newCanvas = vi.fn((width: number, height: number) => {
    operations.push('newCanvas');
    return new Canvas(width, height);
  });

  const setAlphaMode = vi.fn((canvas: Canvas, blend: boolean, saveAlpha: boolean) => {
    operations.push('setAlphaMode');
    canvas.blend = blend;
    canvas.saveAlpha = saveAlpha;
  });

  const resample = vi.fn(
    async (
      canvas: Canvas,
      _source: DecodedImage,
      dstX: number,
      dstY: number,
      _srcX: number,
      _srcY: number,
      _dstW: number,
      _dstH: number,
      _srcW: number,
      _srcH: number
    ) => {
      operations.push('resample');
      canvas.layers.push({ data: Buffer.alloc(0), left: dstX, top: dstY, blend: canvas.blend });
    }
  );

  const encode = vi.fn(async (_canvas: Canvas, path: string, mediaType: MediaType, _level: number) => {
    operations.push('encode');
    await writeFile(path, `encoded ${mediaType}`);
  });

  const engine: RasterEngine = { decode, newCanvas, setAlphaMode, resample, encode };

  return { engine, operations, decode, newCanvas, setAlphaMode, resample, encode };
}

/**
 * Transcoder stub that writes a placeholder WebP file.
 */
export function createMockTranscoder() {
  const convert = vi.fn(async (_srcPath: string, dstPath: string, _options: { quality: number }) => {
    await writeFile(dstPath, 'webp');
  });

  const transcoder: Transcoder = { convert };

  return { transcoder, convert };
}
