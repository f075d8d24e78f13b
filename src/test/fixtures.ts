import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

export const JPEG_HEADER = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46, 0x49, 0x46]);
export const PNG_HEADER = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00]);

/**
 * Create a scratch directory under the OS temp dir.
 * Returns its path and a cleanup function for afterEach.
 */
export async function createTempDir(prefix = 'thumbcache-'): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  return {
    dir,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

/**
 * Write a file that only carries the leading bytes of a JPEG or PNG.
 * Enough for media type sniffing; not decodable.
 */
export async function writeFakeImage(path: string, kind: 'jpeg' | 'png'): Promise<string> {
  await writeFile(path, kind === 'jpeg' ? JPEG_HEADER : PNG_HEADER);
  return path;
}
