import { open, stat } from "fs/promises";
import type { MediaType } from "./types";

/**
 * Leading bytes of the supported raster formats.
 * The extension of the source path is never trusted.
 */
const SIGNATURES: Array<[MediaType, number[]]> = [
  ["image/jpeg", [0xff, 0xd8, 0xff]],
  ["image/png", [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]],
];

const HEADER_LENGTH = 8;

export function detectMediaType(header: Uint8Array): MediaType | null {
  for (const [mediaType, signature] of SIGNATURES) {
    if (signature.every((byte, i) => header[i] === byte)) {
      return mediaType;
    }
  }
  return null;
}

/**
 * Sniff the media type of a file on disk.
 * Returns null for directories, short files and anything that is not JPEG or PNG.
 */
export async function sniffMediaType(path: string): Promise<MediaType | null> {
  const info = await stat(path);
  if (!info.isFile()) return null;

  const handle = await open(path, "r");
  try {
    const header = Buffer.alloc(HEADER_LENGTH);
    const { bytesRead } = await handle.read(header, 0, HEADER_LENGTH, 0);
    return detectMediaType(header.subarray(0, bytesRead));
  } finally {
    await handle.close();
  }
}

/** True when something (file or directory) exists at the path. */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;
    if (code === "ENOENT" || code === "ENOTDIR") return false;
    throw err;
  }
}
