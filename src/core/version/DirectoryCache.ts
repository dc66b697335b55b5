import * as fs from 'fs-extra';
import * as path from 'path';
import { VersionIdentifier } from '../../types/Version';
import { Versions } from './Versions';
import { FileSystem } from '../../utils/FileSystem';
import { PathValidator } from '../../utils/PathValidator';
import { ValidationError } from '../../utils/errors';
import { logger } from '../../utils/Logger';

export const DIRECTORY_CACHE_FILE = 'directory_cache.txt';

/**
 * Remembers which version each visited directory resolved to, so the shell
 * hook can skip the upward walk. A directory with no project version is stored
 * with an empty value.
 */
export class DirectoryCache {
  readonly file: string;

  constructor(cacheDir: string) {
    this.file = path.join(cacheDir, DIRECTORY_CACHE_FILE);
  }

  /**
   * `undefined` when the directory has not been seen, `null` when it has and
   * had no project version.
   */
  async lookup(directory: string): Promise<VersionIdentifier | null | undefined> {
    const entries = await this.entries();
    return entries.get(path.resolve(directory));
  }

  async record(directory: string, version: VersionIdentifier | null): Promise<void> {
    const resolved = path.resolve(directory);
    if (PathValidator.hasControlCharacters(resolved)) {
      throw new ValidationError(
        'Refusing to cache a directory name with control characters',
        'control-characters'
      );
    }

    const entries = await this.entries();
    entries.delete(resolved);
    entries.set(resolved, version);
    await FileSystem.writeFileAtomic(this.file, DirectoryCache.serialize(entries));
  }

  async clear(): Promise<boolean> {
    return FileSystem.deleteFile(this.file);
  }

  async entries(): Promise<Map<string, VersionIdentifier | null>> {
    try {
      if (!(await fs.pathExists(this.file))) {
        return new Map();
      }
      return DirectoryCache.parse(await fs.readFile(this.file, 'utf8'));
    } catch (error) {
      logger.warn(`Ignoring unreadable directory cache ${this.file}`, error);
      return new Map();
    }
  }

  /**
   * One `directory:version` per line. Directories may contain colons, so the
   * split is at the last one.
   */
  static parse(content: string): Map<string, VersionIdentifier | null> {
    const entries = new Map<string, VersionIdentifier | null>();

    for (const line of content.split(/\r?\n/)) {
      const separator = line.lastIndexOf(':');
      if (separator <= 0) continue;

      const directory = line.slice(0, separator);
      const value = line.slice(separator + 1).trim();
      if (value === '') {
        entries.set(directory, null);
      } else if (Versions.isIdentifier(value)) {
        entries.set(directory, value);
      }
    }

    return entries;
  }

  static serialize(entries: Map<string, VersionIdentifier | null>): string {
    const lines = [...entries].map(([directory, version]) => `${directory}:${version ?? ''}`);
    return lines.length > 0 ? `${lines.join('\n')}\n` : '';
  }
}
