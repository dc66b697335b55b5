import { DirectoryCache, DIRECTORY_CACHE_FILE } from '../../src/core/version/DirectoryCache';
import { ValidationError } from '../../src/utils/errors';
import { createTempDir, cleanupTempDir } from '../setup';
import * as fs from 'fs-extra';
import * as path from 'path';

describe('DirectoryCache', () => {
  let tempDir: string;
  let cache: DirectoryCache;

  beforeEach(async () => {
    tempDir = await createTempDir();
    cache = new DirectoryCache(tempDir);
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('should tell unseen directories from directories without a version', async () => {
    await cache.record('/srv/plain', null);
    await cache.record('/srv/app', 'php@8.2');

    expect(await cache.lookup('/srv/unseen')).toBeUndefined();
    expect(await cache.lookup('/srv/plain')).toBeNull();
    expect(await cache.lookup('/srv/app/')).toBe('php@8.2');
    expect(await fs.readFile(path.join(tempDir, DIRECTORY_CACHE_FILE), 'utf8')).toBe(
      '/srv/plain:\n/srv/app:php@8.2\n'
    );
  });

  it('should move a re-recorded directory to the end', async () => {
    await cache.record('/srv/a', 'php@8.1');
    await cache.record('/srv/b', 'php@8.2');
    await cache.record('/srv/a', 'php@8.3');

    expect([...(await cache.entries())]).toEqual([
      ['/srv/b', 'php@8.2'],
      ['/srv/a', 'php@8.3'],
    ]);
  });

  it('should refuse directory names with control characters', async () => {
    await expect(cache.record('/srv/bad\nname', 'php@8.2')).rejects.toBeInstanceOf(ValidationError);
  });

  it('should clear the file', async () => {
    await cache.record('/srv/app', 'php@8.2');

    expect(await cache.clear()).toBe(true);
    expect(await cache.lookup('/srv/app')).toBeUndefined();
  });

  describe('parse', () => {
    it('should split at the last colon and skip invalid lines', () => {
      const entries = DirectoryCache.parse('C:/work:php@8.2\n/srv/x:8.2\nno-separator\n:php@8.1\n/srv/y:\n');

      expect([...entries]).toEqual([
        ['C:/work', 'php@8.2'],
        ['/srv/y', null],
      ]);
    });
  });

  describe('serialize', () => {
    it('should write nothing for an empty map', () => {
      expect(DirectoryCache.serialize(new Map())).toBe('');
    });
  });
});
