import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'fs';
import { mkdir, readdir, readFile, utimes, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { CacheStore } from './store';
import { CacheDirCreationFailedError, DecodeFailedError, EncodeOrWriteFailedError } from './errors';
import { createTempDir } from '@/test/fixtures';

describe('CacheStore', () => {
  let dir: string;
  let cleanup: () => Promise<void>;
  let store: CacheStore;

  beforeEach(async () => {
    ({ dir, cleanup } = await createTempDir());
    store = new CacheStore(join(dir, 'cache'));
  });

  afterEach(async () => {
    await cleanup();
  });

  describe('constructor', () => {
    it('should create the cache directory recursively', () => {
      const nested = join(dir, 'a', 'b', 'c');

      new CacheStore(nested);

      expect(existsSync(nested)).toBe(true);
    });

    it('should accept an existing directory', () => {
      expect(() => new CacheStore(join(dir, 'cache'))).not.toThrow();
    });

    it('should fail when the directory cannot be created', async () => {
      const file = join(dir, 'not-a-dir');
      await writeFile(file, 'x');

      expect(() => new CacheStore(join(file, 'cache'))).toThrow(CacheDirCreationFailedError);
      expect(() => new CacheStore(file)).toThrow(CacheDirCreationFailedError);
    });
  });

  describe('lookup', () => {
    it('should report a miss for an empty cache', async () => {
      expect(await store.lookup('photo-200-8c68a64e', 'jpg', true)).toBeNull();
    });

    it('should find the native entry', async () => {
      await writeFile(store.entryPath('photo-200-8c68a64e', 'jpg'), 'jpg');

      expect(await store.lookup('photo-200-8c68a64e', 'jpg', false)).toBe(join(dir, 'cache', 'photo-200-8c68a64e.jpg'));
    });

    it('should prefer the WebP entry only when asked', async () => {
      await writeFile(store.entryPath('photo-200-8c68a64e', 'jpg'), 'jpg');
      await writeFile(store.entryPath('photo-200-8c68a64e', 'webp'), 'webp');

      expect(await store.lookup('photo-200-8c68a64e', 'jpg', true)).toBe(store.entryPath('photo-200-8c68a64e', 'webp'));
      expect(await store.lookup('photo-200-8c68a64e', 'jpg', false)).toBe(store.entryPath('photo-200-8c68a64e', 'jpg'));
    });

    it('should fall back to the native entry when no WebP exists', async () => {
      await writeFile(store.entryPath('holiday-64-a0a86474', 'png'), 'png');

      expect(await store.lookup('holiday-64-a0a86474', 'png', true)).toBe(store.entryPath('holiday-64-a0a86474', 'png'));
    });

    it('should ignore entries that are not regular files', async () => {
      await mkdir(store.entryPath('photo-200-8c68a64e', 'jpg'));

      expect(await store.lookup('photo-200-8c68a64e', 'jpg', false)).toBeNull();
    });
  });

  describe('write', () => {
    it('should render into a staging file and move it into place', async () => {
      let staged = '';

      const path = await store.write('photo-200-8c68a64e', 'jpg', async (stagingPath) => {
        staged = stagingPath;
        await writeFile(stagingPath, 'thumbnail bytes');
      });

      expect(path).toBe(store.entryPath('photo-200-8c68a64e', 'jpg'));
      expect(await readFile(path, 'utf8')).toBe('thumbnail bytes');
      expect(dirname(staged)).toBe(join(dir, 'cache'));
      expect(basename(staged).startsWith('.photo-200-8c68a64e.jpg.')).toBe(true);
      expect(await readdir(join(dir, 'cache'))).toEqual(['photo-200-8c68a64e.jpg']);
    });

    it('should not expose the entry before rendering finishes', async () => {
      let visibleDuringRender: string | null = 'unset';

      await store.write('photo-200-8c68a64e', 'jpg', async (stagingPath) => {
        await writeFile(stagingPath, 'partial');
        visibleDuringRender = await store.lookup('photo-200-8c68a64e', 'jpg', false);
      });

      expect(visibleDuringRender).toBeNull();
    });

    it('should wrap plain failures and remove the staging file', async () => {
      const write = store.write('photo-200-8c68a64e', 'jpg', async (stagingPath) => {
        await writeFile(stagingPath, 'partial');
        throw new Error('disk full');
      });

      await expect(write).rejects.toBeInstanceOf(EncodeOrWriteFailedError);
      expect(await readdir(join(dir, 'cache'))).toEqual([]);
    });

    it('should pass thumbnail errors through unchanged', async () => {
      const failure = new DecodeFailedError('/images/broken.jpg');

      await expect(
        store.write('broken-200-00000000', 'jpg', async () => {
          throw failure;
        })
      ).rejects.toBe(failure);
    });
  });

  describe('flush', () => {
    const files = [
      'photo-200-1acfe4c4.jpg',
      'photo-300x100-1acfe4c4.webp',
      'other-200-5ec4ab6f.png',
      'x1acfe4c4y-200-5ec4ab6f.png',
      'notes.txt',
      '.photo-200-1acfe4c4.jpg.pending.tmp',
    ];

    beforeEach(async () => {
      for (const file of files) {
        await writeFile(join(dir, 'cache', file), file);
      }
    });

    it('should delete every variant of one source hash', async () => {
      const deleted = await store.flush('1acfe4c4');

      expect(deleted).toBe(2);
      expect((await readdir(join(dir, 'cache'))).sort()).toEqual([
        '.photo-200-1acfe4c4.jpg.pending.tmp',
        'notes.txt',
        'other-200-5ec4ab6f.png',
        'x1acfe4c4y-200-5ec4ab6f.png',
      ]);
    });

    it('should delete every file except fresh staging files without a hash', async () => {
      const deleted = await store.flush();

      expect(deleted).toBe(5);
      expect(await readdir(join(dir, 'cache'))).toEqual(['.photo-200-1acfe4c4.jpg.pending.tmp']);
    });

    it('should delete staging files left behind by a dead writer', async () => {
      const abandoned = join(dir, 'cache', '.photo-200-1acfe4c4.jpg.abandoned.tmp');
      await writeFile(abandoned, 'partial');
      const longAgo = new Date('2020-01-01T00:00:00Z');
      await utimes(abandoned, longAgo, longAgo);

      const deleted = await store.flush();

      expect(deleted).toBe(6);
      expect(await readdir(join(dir, 'cache'))).toEqual(['.photo-200-1acfe4c4.jpg.pending.tmp']);
    });

    it('should leave stale staging files alone when flushing one source', async () => {
      const abandoned = join(dir, 'cache', '.photo-200-1acfe4c4.jpg.abandoned.tmp');
      await writeFile(abandoned, 'partial');
      const longAgo = new Date('2020-01-01T00:00:00Z');
      await utimes(abandoned, longAgo, longAgo);

      await store.flush('1acfe4c4');

      expect(existsSync(abandoned)).toBe(true);
    });

    it('should report nothing deleted for an unknown hash', async () => {
      expect(await store.flush('deadbeef')).toBe(0);
    });

    it('should skip subdirectories', async () => {
      await mkdir(join(dir, 'cache', 'nested-200-1acfe4c4.jpg'));

      await store.flush();

      expect(existsSync(join(dir, 'cache', 'nested-200-1acfe4c4.jpg'))).toBe(true);
    });
  });
});
