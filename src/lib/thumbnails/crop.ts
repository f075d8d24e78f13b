import type { CropPlan } from "./types";

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Compute the crop-to-fill plan for a source of srcW x srcH drawn into a
 * dstW x dstH box.
 *
 * Without dstH the output height follows the source aspect ratio and the
 * whole source is used. With dstH, the axis where the source overflows the
 * box is cropped symmetrically so the sampled rectangle has the box's aspect.
 * The rectangle always lies within [0, srcW] x [0, srcH].
 */
export function computeCrop(srcW: number, srcH: number, dstW: number, dstH?: number): CropPlan {
  assertPositiveInteger("dstW", dstW);
  if (dstH !== undefined) assertPositiveInteger("dstH", dstH);

  const full = { x: 0, y: 0, width: srcW, height: srcH };

  if (dstH === undefined) {
    return {
      width: dstW,
      height: Math.max(1, Math.round((dstW * srcH) / srcW)),
      crop: full,
    };
  }

  const cmpX = srcW / dstW;
  const cmpY = srcH / dstH;

  if (cmpX > cmpY) {
    // Source is relatively wider than the box
    const width = clamp(Math.round((srcW / cmpX) * cmpY), 1, srcW);
    return {
      width: dstW,
      height: dstH,
      crop: { x: Math.round((srcW - width) / 2), y: 0, width, height: srcH },
    };
  }

  if (cmpY > cmpX) {
    const height = clamp(Math.round((srcH / cmpY) * cmpX), 1, srcH);
    return {
      width: dstW,
      height: dstH,
      crop: { x: 0, y: Math.round((srcH - height) / 2), width: srcW, height },
    };
  }

  return { width: dstW, height: dstH, crop: full };
}
